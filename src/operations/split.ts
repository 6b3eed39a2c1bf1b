/**
 * SplitProcessor - Denormalize a multi-valued marker into several entries
 */

import { Entry } from "../formats/sfm/entry";
import type { EntryProcessor, SplitTransform } from "./types";

/**
 * Processor producing one entry per value of a marker
 *
 * Each output entry carries a single value of the marker, at the position of
 * the marker's first occurrence, plus a copy of every other field. Empty
 * pieces are skipped. An entry without the marker passes through unchanged.
 *
 * @example
 * ```typescript
 * const processor = new SplitProcessor();
 * processor.process(Entry.of(["lx", "kali"], ["ge", "dog; hound"]), {
 *   kind: "split",
 *   marker: "ge",
 *   separator: /;\s+/,
 * });
 * // [\lx kali \ge dog], [\lx kali \ge hound]
 * ```
 */
export class SplitProcessor implements EntryProcessor<SplitTransform> {
  process(entry: Entry, transform: SplitTransform): Entry[] {
    const { marker, separator } = transform;
    const fields = entry.fields;
    const position = fields.findIndex((field) => field.marker === marker);
    if (position === -1) {
      return [entry];
    }

    const pieces = entry
      .get(marker)
      .flatMap((value) => (separator === undefined ? [value] : value.split(separator)))
      .filter((piece) => piece !== "");
    if (pieces.length === 0) {
      return [entry];
    }

    const before = fields.slice(0, position);
    const after = fields.slice(position + 1).filter((field) => field.marker !== marker);
    return pieces.map((value) => new Entry([...before, { marker, value }, ...after]));
  }
}
