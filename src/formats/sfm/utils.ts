/**
 * SFM Utility Functions Module
 *
 * Text normalization helpers shared by the tokenizer and the entry model.
 */

/**
 * Remove a leading byte order mark
 *
 * @param text - Text potentially starting with U+FEFF
 * @returns Text without BOM
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize line endings to Unix format (LF)
 * Handles Windows (CRLF), Classic Mac (CR), and Unix (LF)
 *
 * @param text - Text with mixed line endings
 * @returns Text with normalized line endings
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

/**
 * Yield the lines of LF-normalized text one at a time.
 * A final newline terminates the last line rather than opening an empty one.
 */
export function* splitLines(text: string): Generator<string> {
  if (text === "") return;

  let start = 0;
  while (start < text.length) {
    const end = text.indexOf("\n", start);
    if (end === -1) {
      yield text.slice(start);
      return;
    }
    yield text.slice(start, end);
    start = end + 1;
  }
}

/**
 * Count how often each marker occurs, in first-seen order
 */
export function countMarkers(markers: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const marker of markers) {
    counts.set(marker, (counts.get(marker) ?? 0) + 1);
  }
  return counts;
}
