/**
 * Shared type definitions for the SFM toolkit
 *
 * Format-specific types live next to their format in `formats/sfm/types.ts`;
 * this module holds what parsers, writers and file helpers have in common.
 */

import { type } from "arktype";

// =============================================================================
// RESULTS
// =============================================================================

/**
 * Outcome of an operation whose failure is recoverable by the caller
 *
 * @example
 * ```typescript
 * const result = collection.append(entry);
 * if (!result.success) {
 *   console.warn(result.error.toString());
 * }
 * ```
 */
export type OperationResult<T, E = Error> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

// =============================================================================
// PARSER OPTIONS
// =============================================================================

/**
 * Parser configuration options shared by every parser
 */
export interface ParserOptions {
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to keep line numbers on diagnostics and errors */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Branded path type produced by {@link FilePathSchema}
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * Text encodings accepted by the file helpers
 */
export type TextEncodingName = "utf-8" | "utf8" | "utf-16le" | "latin1";

/**
 * Options for reading files
 */
export interface FileReaderOptions {
  /** Text encoding of the file (default "utf-8") */
  encoding?: TextEncodingName;
  /** Refuse files larger than this many bytes (default 100MB) */
  maxFileSize?: number;
}

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** Text encoding of the output (default "utf-8") */
  encoding?: TextEncodingName;
  /** Create missing parent directories (default true) */
  createParents?: boolean;
}

/**
 * Non-empty path without NUL bytes
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) =>
    path.includes("\0") ? ctx.reject("a path without null characters") : true
  )
  .pipe((path): FilePath => path as FilePath);

export const FileReaderOptionsSchema = type({
  "encoding?": '"utf-8"|"utf8"|"utf-16le"|"latin1"',
  "maxFileSize?": "number>=0",
});
