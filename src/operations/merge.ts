/**
 * MergeProcessor - Join runs of adjacent fields that share a marker
 */

import { DEFAULT_MERGE_SEPARATOR } from "../formats/sfm/constants";
import { Entry } from "../formats/sfm/entry";
import type { Field } from "../formats/sfm/types";
import type { EntryProcessor, MergeTransform } from "./types";

/**
 * Processor for merging adjacent same-marker fields
 *
 * Only neighbours merge: `\ge a \ge b \ps n \ge c` becomes
 * `\ge a; b \ps n \ge c`.
 */
export class MergeProcessor implements EntryProcessor<MergeTransform> {
  process(entry: Entry, transform: MergeTransform): Entry[] {
    const separator = transform.separator ?? DEFAULT_MERGE_SEPARATOR;
    const only = transform.markers === undefined ? undefined : new Set(transform.markers);

    const merged: Field[] = [];
    for (const field of entry) {
      const previous = merged.at(-1);
      if (
        previous !== undefined &&
        previous.marker === field.marker &&
        (only === undefined || only.has(field.marker))
      ) {
        merged[merged.length - 1] = {
          marker: field.marker,
          value: previous.value + separator + field.value,
        };
      } else {
        merged.push(field);
      }
    }

    return [new Entry(merged)];
  }
}
