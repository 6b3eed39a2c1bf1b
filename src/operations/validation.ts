/**
 * @module operations/validation
 * @description ArkType schemas for transform definitions
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { withoutUndefined } from "../formats/sfm/validation";
import type { Transform } from "./types";

const MarkerSelectorSchema = type("string[] | RegExp");

const RenameSchema = type({
  kind: "'rename'",
  from: "string>0 | RegExp",
  to: "string>0",
});

const DropSchema = type({
  kind: "'drop'",
  markers: MarkerSelectorSchema,
});

const KeepSchema = type({
  kind: "'keep'",
  markers: MarkerSelectorSchema,
});

const MergeSchema = type({
  kind: "'merge'",
  "markers?": "string[]",
  "separator?": "string",
});

const SplitSchema = type({
  kind: "'split'",
  marker: "string>0",
  "separator?": "string>0 | RegExp",
});

const FieldsSchema = type({
  kind: "'fields'",
  fn: "Function",
});

const EntriesSchema = type({
  kind: "'entries'",
  fn: "Function",
});

/**
 * ArkType validation schema for any transform variant
 */
export const TransformSchema = RenameSchema.or(DropSchema)
  .or(KeepSchema)
  .or(MergeSchema)
  .or(SplitSchema)
  .or(FieldsSchema)
  .or(EntriesSchema);

/**
 * @throws {ValidationError} Naming the position of the first malformed transform
 */
export function validateTransforms(transforms: readonly Transform[]): void {
  transforms.forEach((transform, index) => {
    const validation = TransformSchema(withoutUndefined(transform));
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid transform #${index}: ${validation.summary}`);
    }
  });
}

/**
 * Copy of a pattern without the `g` and `y` flags, whose `lastIndex`
 * would make repeated `test` calls disagree
 */
export function statelessPattern(pattern: RegExp): RegExp {
  return pattern.global || pattern.sticky
    ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""))
    : pattern;
}
