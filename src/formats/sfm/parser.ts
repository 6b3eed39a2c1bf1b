/**
 * @module formats/sfm/parser
 * @description SFM (Standard Format Marker) parser
 *
 * Runs the three stages over an in-memory document:
 * - line classification (`tokenizer.ts`)
 * - field assembly and entry grouping (`assembler.ts`)
 * - collection building, with preamble and duplicate-id handling (here)
 *
 * Blank lines before the first marker line belong to no field and are
 * dropped, so writing a parsed document leaves them out.
 */

// =============================================================================
// IMPORTS
// =============================================================================

import { DuplicateIdError, PreambleError } from "../../errors";
import { readToString } from "../../io/file-reader";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { assembleFields, createAssemblerState, groupEntries } from "./assembler";
import { Collection } from "./collection";
import { MAX_LINE_LENGTH } from "./constants";
import { Entry } from "./entry";
import { classifyLines } from "./tokenizer";
import type {
  ClassifiedLine,
  Diagnostic,
  EntryBlock,
  LineTrimming,
  PreamblePolicy,
  ResolvedFormatOptions,
  SfmParseResult,
  SfmParserOptions,
} from "./types";
import { resolveFormatOptions, validateParserOptions } from "./validation";

function rejectDuplicate(error: DuplicateIdError): never {
  throw error;
}

// =============================================================================
// PARSER
// =============================================================================

/**
 * Parser for SFM documents
 *
 * @example
 * ```typescript
 * const parser = new SfmParser({ idMarker: "lx", uniqueIds: true });
 * const { collection, diagnostics } = parser.parseString(text);
 * collection.getById("kali")?.get("ge"); // ["dog", "hound"]
 * ```
 */
export class SfmParser extends AbstractParser<SfmParseResult, SfmParserOptions> {
  private readonly format: ResolvedFormatOptions;
  private readonly trimLines: LineTrimming;
  private readonly preamblePolicy: PreamblePolicy;
  private readonly keepEmpty: boolean;

  protected getDefaultOptions(): Partial<SfmParserOptions> {
    return {
      maxLineLength: MAX_LINE_LENGTH,
      trimLines: "none",
      preamble: "keep",
      keepEmpty: true,
    };
  }

  constructor(options: SfmParserOptions = {}) {
    // Reject bad configuration before any text is seen
    validateParserOptions(options);
    super(options);

    this.format = resolveFormatOptions(options);
    this.trimLines = this.options.trimLines ?? "none";
    this.preamblePolicy = this.options.preamble ?? "keep";
    this.keepEmpty = this.options.keepEmpty ?? true;
  }

  getFormatName(): string {
    return "SFM";
  }

  /**
   * Parse a whole SFM document
   *
   * @throws {DanglingContinuationError} When a continuation line has no field to extend
   * @throws {PreambleError} When fields precede the first entry and the preamble policy is "reject"
   * @throws {DuplicateIdError} When ids collide and `onDuplicateId` does not resolve it
   * @throws {ParseError} When a line is too long (default `onError`) or parsing is aborted
   */
  parseString(data: string): SfmParseResult {
    const diagnostics: Diagnostic[] = [];
    const state = createAssemblerState();
    const collection = new Collection({
      idMarker: this.format.idMarker,
      uniqueIds: this.format.uniqueIds,
    });

    const lines = this.checkLines(
      classifyLines(data, {
        markerPrefix: this.format.markerPrefix,
        continuationIndent: this.format.continuationIndent,
        blankLinesAsSeparators: this.format.blankLinesAsSeparators,
        trimLines: this.trimLines,
      }),
      diagnostics
    );
    const blocks = groupEntries(assembleFields(lines, state, this.options.markerMap ?? {}), {
      entryStartMarker: this.format.entryStartMarker,
      keepEmpty: this.keepEmpty,
    });

    for (const block of blocks) {
      if (block.kind === "preamble") {
        this.placePreamble(collection, block);
      } else {
        this.addEntry(collection, new Entry(block.fields), block.lineNumber);
      }
    }

    if (state.markerLines === 0 && state.dangling !== undefined) {
      const message = `No line starts with marker prefix "${this.format.markerPrefix}"; the document has no fields`;
      const lineNumber = this.reportedLine(state.dangling.lineNumber);
      diagnostics.push({ level: "warning", code: "UNKNOWN_MARKER_PREFIX", message, lineNumber });
      this.options.onWarning(message, lineNumber);
    }

    return { collection, diagnostics, format: this.format };
  }

  /**
   * Read and parse an SFM file
   *
   * @throws {FileError} When the file cannot be read
   */
  async parseFile(filePath: string, options?: FileReaderOptions): Promise<SfmParseResult> {
    const text = await readToString(filePath, options);
    this.throwIfAborted("file read");
    return this.parseString(text);
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  /**
   * Per-line checks: cancellation and line length
   */
  private *checkLines(
    lines: Iterable<ClassifiedLine>,
    diagnostics: Diagnostic[]
  ): Generator<ClassifiedLine> {
    for (const line of lines) {
      this.checkAborted();

      if (line.raw.length > this.options.maxLineLength) {
        const message = `Line length ${line.raw.length} exceeds maximum ${this.options.maxLineLength}`;
        const lineNumber = this.reportedLine(line.lineNumber);
        this.options.onError(message, lineNumber);
        diagnostics.push({ level: "warning", code: "LINE_TOO_LONG", message, lineNumber });
      }

      yield line;
    }
  }

  private placePreamble(collection: Collection, block: EntryBlock): void {
    switch (this.preamblePolicy) {
      case "keep":
        collection.preamble = new Entry(block.fields);
        return;
      case "entry":
        this.addEntry(collection, new Entry(block.fields), block.lineNumber);
        return;
      case "reject": {
        const first = block.fields[0];
        const line =
          first === undefined ? "" : `${this.format.markerPrefix}${first.sourceMarker} ${first.value}`;
        throw new PreambleError(this.format.entryStartMarker, block.lineNumber, line);
      }
    }
  }

  private addEntry(collection: Collection, entry: Entry, lineNumber: number): void {
    const result = collection.append(entry);
    if (result.success) return;

    const { id, idMarker, existing, incoming } = result.error;
    const error = new DuplicateIdError(id, idMarker, existing, incoming, this.reportedLine(lineNumber));
    const resolved = (this.options.onDuplicateId ?? rejectDuplicate)(error);
    if (resolved === undefined) return;

    const retry = collection.append(resolved);
    if (!retry.success) {
      throw retry.error;
    }
  }
}

// =============================================================================
// CONVENIENCE FUNCTIONS
// =============================================================================

/**
 * Parse SFM text into a collection
 *
 * @example
 * ```typescript
 * const collection = parse("\\lx kali\n\\ge dog\n");
 * collection.at(0)?.getFirst("ge"); // "dog"
 * ```
 */
export function parse(text: string, options: SfmParserOptions = {}): Collection {
  return new SfmParser(options).parseString(text).collection;
}

/**
 * Read an SFM file into a collection
 */
export async function readSfmFile(
  path: string,
  options: SfmParserOptions & FileReaderOptions = {}
): Promise<Collection> {
  const { encoding, maxFileSize, ...parserOptions } = options;
  const result = await new SfmParser(parserOptions).parseFile(path, { encoding, maxFileSize });
  return result.collection;
}
