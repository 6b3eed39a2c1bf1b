/**
 * Transform engine
 *
 * Closed set of entry transforms (rename, drop, keep, merge, split) plus
 * caller-supplied field and entry functions, applied left to right.
 *
 * @example
 * ```typescript
 * import { TransformPipeline } from 'sfm-toolkit';
 *
 * const result = new TransformPipeline()
 *   .keep(['lx', 'ps', 'ge'])
 *   .split('ge', /;\s+/)
 *   .apply(collection);
 * ```
 */

export { EntryMapProcessor, FieldMapProcessor } from "./custom";
export { FilterProcessor, selectMarkers } from "./filter";
export { MergeProcessor } from "./merge";
export { TransformPipeline } from "./pipeline";
export { RenameProcessor } from "./rename";
export { SplitProcessor } from "./split";
export { applyToEntry, isFieldLevel, PREAMBLE_INDEX, transformCollection } from "./transform";
export type {
  DropTransform,
  EntriesTransform,
  EntryMapper,
  EntryProcessor,
  FieldLevelTransform,
  FieldsTransform,
  KeepTransform,
  MarkerSelector,
  MergeTransform,
  RenameTransform,
  SplitTransform,
  Transform,
  TransformKind,
  TransformResult,
} from "./types";
export { statelessPattern, TransformSchema, validateTransforms } from "./validation";
