/**
 * SFM line classifier
 *
 * Turns raw text into a lazy sequence of classified lines. A line's kind
 * depends on its own shape only; the classifier never looks at the lines
 * around it or at what a marker means.
 */

import type { ClassifiedLine, LineTrimming, TokenizerOptions } from "./types";
import { normalizeLineEndings, removeBOM, splitLines } from "./utils";

/**
 * Marker token, then end of line or exactly one whitespace character
 * followed by the value fragment (kept verbatim)
 */
const MARKER_BODY = /^(\S+)(?:\s([^]*))?$/;

function trimLine(line: string, trimming: LineTrimming): string {
  switch (trimming) {
    case "none":
      return line;
    case "trailing":
      return line.trimEnd();
    case "both":
      return line.trim();
  }
}

/**
 * Classify a single physical line
 *
 * @param raw - Line without its line terminator
 * @param lineNumber - 1-based line number for diagnostics
 * @param options - Marker prefix, continuation indent, blank line policy, trimming
 */
export function classifyLine(
  raw: string,
  lineNumber: number,
  options: TokenizerOptions
): ClassifiedLine {
  const line = trimLine(raw, options.trimLines);

  if (line.startsWith(options.markerPrefix)) {
    const match = MARKER_BODY.exec(line.slice(options.markerPrefix.length));
    if (match?.[1] !== undefined) {
      return { kind: "marker", lineNumber, raw, marker: match[1], value: match[2] ?? "" };
    }
  }

  if (line.trim() === "" && options.blankLinesAsSeparators) {
    return { kind: "separator", lineNumber, raw };
  }

  const indent = options.continuationIndent;
  const text = indent !== "" && line.startsWith(indent) ? line.slice(indent.length) : line;
  return { kind: "continuation", lineNumber, raw, text };
}

/**
 * Classify every line of an SFM document
 *
 * Line endings are folded to LF and a leading byte order mark is dropped.
 *
 * @example
 * ```typescript
 * for (const line of classifyLines("\\lx kali\n  dog", options)) {
 *   console.log(line.kind); // "marker", then "continuation"
 * }
 * ```
 */
export function* classifyLines(text: string, options: TokenizerOptions): Generator<ClassifiedLine> {
  let lineNumber = 0;
  for (const raw of splitLines(normalizeLineEndings(removeBOM(text)))) {
    lineNumber++;
    yield classifyLine(raw, lineNumber, options);
  }
}
