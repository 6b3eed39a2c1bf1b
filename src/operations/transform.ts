/**
 * @module operations/transform
 * @description Apply a sequence of transforms to entries and collections
 *
 * Transforms compose left to right; each one sees only what the previous
 * one produced. Inputs are never changed: every entry is copied before the
 * first transform runs and results go into a new collection.
 */

import { TransformError } from "../errors";
import { Collection } from "../formats/sfm/collection";
import type { Entry } from "../formats/sfm/entry";
import { EntryMapProcessor, FieldMapProcessor } from "./custom";
import { FilterProcessor } from "./filter";
import { MergeProcessor } from "./merge";
import { RenameProcessor } from "./rename";
import { SplitProcessor } from "./split";
import type { FieldLevelTransform, Transform, TransformResult } from "./types";
import { validateTransforms } from "./validation";

/**
 * Entry index reported for failures while transforming a preamble
 */
export const PREAMBLE_INDEX = -1;

const processors = {
  rename: new RenameProcessor(),
  filter: new FilterProcessor(),
  merge: new MergeProcessor(),
  split: new SplitProcessor(),
  fields: new FieldMapProcessor(),
  entries: new EntryMapProcessor(),
} as const;

function runTransform(entry: Entry, transform: Transform): Entry[] {
  switch (transform.kind) {
    case "rename":
      return processors.rename.process(entry, transform);
    case "drop":
    case "keep":
      return processors.filter.process(entry, transform);
    case "merge":
      return processors.merge.process(entry, transform);
    case "split":
      return processors.split.process(entry, transform);
    case "fields":
      return processors.fields.process(entry, transform);
    case "entries":
      return processors.entries.process(entry, transform);
  }
}

export function isFieldLevel(transform: Transform): transform is FieldLevelTransform {
  return transform.kind !== "split" && transform.kind !== "entries";
}

function runAll(
  entry: Entry,
  transforms: readonly Transform[],
  entryIndex: number,
  fieldLevelOnly: boolean
): Entry[] {
  let current = [entry.clone()];
  transforms.forEach((transform, transformIndex) => {
    if (fieldLevelOnly && !isFieldLevel(transform)) return;
    try {
      current = current.flatMap((working) => runTransform(working, transform));
    } catch (thrown) {
      throw TransformError.fromThrown(transformIndex, entryIndex, thrown);
    }
  });
  return current;
}

/**
 * Apply transforms to a single entry
 *
 * @returns Zero or more new entries; `entry` is left as it was
 * @throws {ValidationError} When a transform definition is malformed
 * @throws {TransformError} When a transform throws
 *
 * @example
 * ```typescript
 * applyToEntry(Entry.of(["lx", "foo"], ["sf", "bar"], ["ge", "gloss"]), [
 *   { kind: "rename", from: "lx", to: "headword" },
 *   { kind: "drop", markers: ["sf"] },
 * ]);
 * // [\headword foo \ge gloss]
 * ```
 */
export function applyToEntry(entry: Entry, transforms: readonly Transform[]): Entry[] {
  validateTransforms(transforms);
  return runAll(entry, transforms, 0, false);
}

/**
 * Apply transforms to every entry of a collection
 *
 * The preamble, if any, receives the field-level transforms only. The new
 * collection keeps the id configuration of the input, so a transform that
 * makes two ids collide yields a {@link DuplicateIdError}.
 *
 * @returns A new collection, or the first failure; `collection` is never changed
 * @throws {ValidationError} When a transform definition is malformed
 */
export function transformCollection(
  collection: Collection,
  transforms: readonly Transform[]
): TransformResult {
  validateTransforms(transforms);
  const output = new Collection({
    idMarker: collection.idMarker,
    uniqueIds: collection.uniqueIds,
  });

  try {
    const preamble = collection.preamble;
    if (preamble !== undefined) {
      const [transformed] = runAll(preamble, transforms, PREAMBLE_INDEX, true);
      output.preamble = transformed !== undefined && transformed.length > 0 ? transformed : undefined;
    }

    for (const [entryIndex, entry] of collection.entries.entries()) {
      for (const produced of runAll(entry, transforms, entryIndex, false)) {
        const result = output.append(produced);
        if (!result.success) {
          return { success: false, error: result.error };
        }
      }
    }
  } catch (error) {
    if (error instanceof TransformError) {
      return { success: false, error };
    }
    throw error;
  }

  return { success: true, value: output };
}
