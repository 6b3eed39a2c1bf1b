/**
 * @module formats/sfm/validation
 * @description Validation utilities for SFM parsing and writing
 *
 * This module contains:
 * - ArkType schemas for the format, parser, writer and collection options
 * - Option resolution (validation plus defaults)
 * - Marker and value checks used by the data model
 */

import { type } from "arktype";
import { MalformedConfigurationError, ValidationError } from "../../errors";
import { DEFAULT_ENTRY_START_MARKER, DEFAULT_MARKER_PREFIX } from "./constants";
import type {
  CollectionOptions,
  ResolvedFormatOptions,
  SfmFormatOptions,
  SfmParserOptions,
  SfmWriterOptions,
} from "./types";

// =============================================================================
// ARKTYPE VALIDATION SCHEMAS
// =============================================================================

/**
 * One or more non-whitespace characters
 */
const MarkerTokenSchema = type(/^\S+$/);

const formatDefinition = {
  "markerPrefix?": MarkerTokenSchema,
  "entryStartMarker?": MarkerTokenSchema,
  "idMarker?": MarkerTokenSchema,
  "uniqueIds?": "boolean",
  "blankLinesAsSeparators?": "boolean",
  "continuationIndent?": "string",
} as const;

/**
 * ArkType validation schema for the format bundle
 */
export const SfmFormatOptionsSchema = type(formatDefinition).narrow((options, ctx) => {
  if (options.uniqueIds === true && options.idMarker === undefined) {
    return ctx.reject({
      path: ["uniqueIds"],
      expected: "an idMarker when uniqueIds is set",
      actual: "no idMarker",
    });
  }

  const prefix = options.markerPrefix ?? DEFAULT_MARKER_PREFIX;
  const indent = options.continuationIndent ?? "";
  if (indent !== "" && (indent.startsWith(prefix) || prefix.startsWith(indent))) {
    return ctx.reject({
      path: ["continuationIndent"],
      expected: "an indent that cannot be confused with the marker prefix",
      actual: JSON.stringify(indent),
    });
  }

  return true;
});

/**
 * ArkType validation schema for SFM parser options
 */
export const SfmParserOptionsSchema = type({
  ...formatDefinition,
  "trimLines?": '"none"|"trailing"|"both"',
  "preamble?": '"keep"|"entry"|"reject"',
  "keepEmpty?": "boolean",
  "markerMap?": "Record<string, string>",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "onError?": "Function",
  "onWarning?": "Function",
  "onDuplicateId?": "Function",
}).narrow((options, ctx) => {
  if (options.markerMap !== undefined) {
    for (const [from, to] of Object.entries(options.markerMap)) {
      if (!isValidMarker(to)) {
        return ctx.reject({
          path: ["markerMap", from],
          expected: "a marker without whitespace",
          actual: JSON.stringify(to),
        });
      }
    }
  }
  return true;
});

/**
 * ArkType validation schema for SFM writer options
 */
export const SfmWriterOptionsSchema = type({
  ...formatDefinition,
  "lineEnding?": '"\n"|"\r\n"',
  "finalNewline?": "boolean",
  "blankLineBetweenEntries?": "boolean",
});

/**
 * ArkType validation schema for collection options
 */
export const CollectionOptionsSchema = type({
  "idMarker?": MarkerTokenSchema,
  "uniqueIds?": "boolean",
}).narrow((options, ctx) =>
  options.uniqueIds === true && options.idMarker === undefined
    ? ctx.reject({ path: ["uniqueIds"], expected: "an idMarker when uniqueIds is set" })
    : true
);

// =============================================================================
// OPTION RESOLUTION
// =============================================================================

/**
 * Drop keys whose value is `undefined` so optional keys validate as absent
 */
export function withoutUndefined(options: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(options).filter(([, value]) => value !== undefined));
}

function assertValid(
  schema: (input: unknown) => unknown,
  options: object,
  label: string
): void {
  const validation = schema(withoutUndefined(options));
  if (validation instanceof type.errors) {
    throw new MalformedConfigurationError(
      `Invalid ${label} options: ${validation.summary}`,
      validation.summary
    );
  }
}

export function validateParserOptions(options: SfmParserOptions): void {
  assertValid(SfmFormatOptionsSchema, options, "SFM parser");
  assertValid(SfmParserOptionsSchema, options, "SFM parser");
}

export function validateWriterOptions(options: SfmWriterOptions): void {
  assertValid(SfmFormatOptionsSchema, options, "SFM writer");
  assertValid(SfmWriterOptionsSchema, options, "SFM writer");
}

export function validateCollectionOptions(options: CollectionOptions): void {
  assertValid(CollectionOptionsSchema, options, "collection");
}

/**
 * Validate a format bundle and fill in defaults
 *
 * @throws {MalformedConfigurationError} When the bundle is rejected
 */
export function resolveFormatOptions(options: SfmFormatOptions = {}): ResolvedFormatOptions {
  assertValid(SfmFormatOptionsSchema, options, "SFM format");

  return {
    markerPrefix: options.markerPrefix ?? DEFAULT_MARKER_PREFIX,
    entryStartMarker: options.entryStartMarker ?? DEFAULT_ENTRY_START_MARKER,
    idMarker: options.idMarker,
    uniqueIds: options.uniqueIds ?? false,
    blankLinesAsSeparators: options.blankLinesAsSeparators ?? false,
    continuationIndent: options.continuationIndent ?? "",
  };
}

// =============================================================================
// FIELD VALIDATION
// =============================================================================

const MARKER_TOKEN = /^\S+$/;

export function isValidMarker(marker: string): boolean {
  return MARKER_TOKEN.test(marker);
}

/**
 * @throws {ValidationError} if the marker is empty or contains whitespace,
 * or the value contains a carriage return
 */
export function validateField(marker: string, value: string): void {
  if (!isValidMarker(marker)) {
    throw new ValidationError(
      `Invalid marker ${JSON.stringify(marker)}: markers are non-empty and contain no whitespace`
    );
  }
  if (value.includes("\r")) {
    throw new ValidationError(
      `Value of marker "${marker}" contains a carriage return; use "\\n" for line breaks`
    );
  }
}
