/**
 * FilterProcessor - Drop fields, or keep only some of them
 */

import type { Entry } from "../formats/sfm/entry";
import type { DropTransform, EntryProcessor, KeepTransform, MarkerSelector } from "./types";
import { statelessPattern } from "./validation";

/**
 * Build a marker predicate from a list or a pattern
 */
export function selectMarkers(markers: MarkerSelector): (marker: string) => boolean {
  if (markers instanceof RegExp) {
    const pattern = statelessPattern(markers);
    return (marker) => pattern.test(marker);
  }
  const wanted = new Set(markers);
  return (marker) => wanted.has(marker);
}

/**
 * Processor for the `drop` and `keep` transforms
 *
 * @example
 * ```typescript
 * const processor = new FilterProcessor();
 * processor.process(entry, { kind: "keep", markers: ["lx", "ge"] });
 * ```
 */
export class FilterProcessor implements EntryProcessor<DropTransform | KeepTransform> {
  process(entry: Entry, transform: DropTransform | KeepTransform): Entry[] {
    const selected = selectMarkers(transform.markers);
    const keepSelected = transform.kind === "keep";

    entry.visit((field) => (selected(field.marker) === keepSelected ? undefined : []));
    return [entry];
  }
}
