/**
 * Shared types for the transform engine
 *
 * A transform is one variant of a closed tagged union. Five variants are
 * canonical (rename, drop, keep, merge, split); `fields` and `entries` take
 * a caller-supplied pure function for anything else.
 */

import type { DuplicateIdError, TransformError } from "../errors";
import type { Collection } from "../formats/sfm/collection";
import type { Entry } from "../formats/sfm/entry";
import type { FieldVisitor } from "../formats/sfm/types";
import type { OperationResult } from "../types";

/**
 * A list of markers, or a pattern a marker must match
 */
export type MarkerSelector = readonly string[] | RegExp;

/**
 * Rename markers equal to `from`, or matching it when it is a RegExp.
 * With a RegExp, `to` may refer to capture groups (`$1`).
 */
export interface RenameTransform {
  readonly kind: "rename";
  readonly from: string | RegExp;
  readonly to: string;
}

/**
 * Remove fields whose marker is selected
 */
export interface DropTransform {
  readonly kind: "drop";
  readonly markers: MarkerSelector;
}

/**
 * Remove every field whose marker is not selected
 */
export interface KeepTransform {
  readonly kind: "keep";
  readonly markers: MarkerSelector;
}

/**
 * Join runs of adjacent fields sharing a marker into one field
 */
export interface MergeTransform {
  readonly kind: "merge";
  /** Only merge these markers (default: all) */
  readonly markers?: readonly string[];
  /** Placed between joined values (default "; ") */
  readonly separator?: string;
}

/**
 * Fan an entry out into one entry per value of `marker`
 */
export interface SplitTransform {
  readonly kind: "split";
  readonly marker: string;
  /** Also split each value on this separator */
  readonly separator?: string | RegExp;
}

/**
 * Caller-supplied field mapping, applied like {@link Entry.visit}
 */
export interface FieldsTransform {
  readonly kind: "fields";
  readonly fn: FieldVisitor;
}

/**
 * Entry-level mapping: `undefined` keeps the entry, an array fans out
 * (an empty array drops the entry)
 */
export type EntryMapper = (entry: Entry) => Entry | readonly Entry[] | undefined;

/**
 * Caller-supplied entry mapping
 */
export interface EntriesTransform {
  readonly kind: "entries";
  readonly fn: EntryMapper;
}

export type Transform =
  | RenameTransform
  | DropTransform
  | KeepTransform
  | MergeTransform
  | SplitTransform
  | FieldsTransform
  | EntriesTransform;

export type TransformKind = Transform["kind"];

/**
 * Transforms that only look at fields, and so also apply to a preamble
 */
export type FieldLevelTransform = Exclude<Transform, SplitTransform | EntriesTransform>;

/**
 * Result of transforming a whole collection
 */
export type TransformResult = OperationResult<Collection, TransformError | DuplicateIdError>;

/**
 * Base interface for transform processors
 *
 * A processor receives a working copy that nothing else references and may
 * change it in place; it returns the entries that replace it.
 */
export interface EntryProcessor<T extends Transform> {
  process(entry: Entry, transform: T): Entry[];
}
