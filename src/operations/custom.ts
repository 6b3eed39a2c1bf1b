/**
 * Processors for caller-supplied field and entry functions
 */

import { Entry } from "../formats/sfm/entry";
import type { EntriesTransform, EntryProcessor, FieldsTransform } from "./types";

export class FieldMapProcessor implements EntryProcessor<FieldsTransform> {
  process(entry: Entry, transform: FieldsTransform): Entry[] {
    return [entry.visit(transform.fn)];
  }
}

/**
 * Runs an entry mapper; entries it returns are copied so that later
 * transforms never touch an object the caller still holds. Only the first
 * occurrence of the working entry keeps its identity.
 */
export class EntryMapProcessor implements EntryProcessor<EntriesTransform> {
  process(entry: Entry, transform: EntriesTransform): Entry[] {
    const result = transform.fn(entry);
    if (result === undefined) {
      return [entry];
    }
    if (result instanceof Entry) {
      return [result === entry ? entry : result.clone()];
    }
    let reused = false;
    return result.map((produced) => {
      if (produced === entry && !reused) {
        reused = true;
        return entry;
      }
      return produced.clone();
    });
  }
}
