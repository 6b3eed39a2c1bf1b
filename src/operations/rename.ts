/**
 * RenameProcessor - Rename markers by exact name or pattern
 */

import type { Entry } from "../formats/sfm/entry";
import type { EntryProcessor, RenameTransform } from "./types";
import { statelessPattern } from "./validation";

/**
 * Processor for renaming markers
 *
 * @example
 * ```typescript
 * const processor = new RenameProcessor();
 * processor.process(entry, { kind: "rename", from: /^x(.+)$/, to: "$1" });
 * // \xge → \ge, \xps → \ps
 * ```
 */
export class RenameProcessor implements EntryProcessor<RenameTransform> {
  process(entry: Entry, transform: RenameTransform): Entry[] {
    const rename = this.compile(transform);
    entry.visit((field) => {
      const marker = rename(field.marker);
      return marker === field.marker ? undefined : { marker, value: field.value };
    });
    return [entry];
  }

  private compile(transform: RenameTransform): (marker: string) => string {
    const { from, to } = transform;
    if (typeof from === "string") {
      return (marker) => (marker === from ? to : marker);
    }
    const pattern = statelessPattern(from);
    return (marker) => (pattern.test(marker) ? marker.replace(pattern, to) : marker);
  }
}
