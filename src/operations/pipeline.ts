/**
 * TransformPipeline - Fluent, immutable builder for transform sequences
 */

import type { Collection } from "../formats/sfm/collection";
import type { Entry } from "../formats/sfm/entry";
import type { FieldVisitor } from "../formats/sfm/types";
import { applyToEntry, transformCollection } from "./transform";
import type { EntryMapper, MarkerSelector, Transform, TransformResult } from "./types";

/**
 * Chainable transform pipeline. Every step returns a new pipeline, so a
 * partly built pipeline can be shared and extended safely.
 *
 * @example
 * ```typescript
 * const result = new TransformPipeline()
 *   .rename("lx", "headword")
 *   .drop("sf")
 *   .merge({ markers: ["ge"] })
 *   .apply(collection);
 *
 * if (result.success) {
 *   console.log(result.value.toString());
 * }
 * ```
 */
export class TransformPipeline {
  private readonly transforms: readonly Transform[];

  constructor(transforms: readonly Transform[] = []) {
    this.transforms = [...transforms];
  }

  /**
   * Transforms in the order they run
   */
  get steps(): readonly Transform[] {
    return this.transforms;
  }

  /**
   * Add any transform variant
   */
  then(transform: Transform): TransformPipeline {
    return new TransformPipeline([...this.transforms, transform]);
  }

  rename(from: string | RegExp, to: string): TransformPipeline {
    return this.then({ kind: "rename", from, to });
  }

  drop(markers: string | MarkerSelector): TransformPipeline {
    return this.then({ kind: "drop", markers: typeof markers === "string" ? [markers] : markers });
  }

  keep(markers: string | MarkerSelector): TransformPipeline {
    return this.then({ kind: "keep", markers: typeof markers === "string" ? [markers] : markers });
  }

  merge(options: { markers?: readonly string[]; separator?: string } = {}): TransformPipeline {
    return this.then({ kind: "merge", ...options });
  }

  split(marker: string, separator?: string | RegExp): TransformPipeline {
    return this.then({ kind: "split", marker, separator });
  }

  mapFields(fn: FieldVisitor): TransformPipeline {
    return this.then({ kind: "fields", fn });
  }

  mapEntries(fn: EntryMapper): TransformPipeline {
    return this.then({ kind: "entries", fn });
  }

  applyToEntry(entry: Entry): Entry[] {
    return applyToEntry(entry, this.transforms);
  }

  apply(collection: Collection): TransformResult {
    return transformCollection(collection, this.transforms);
  }
}
