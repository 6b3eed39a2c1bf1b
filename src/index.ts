/**
 * sfm-toolkit - Standard Format Marker parsing, modelling and writing
 *
 * Reads backslash-marker lexicon and interlinear text into ordered,
 * duplicate-tolerant entries, transforms them, and writes them back
 * unchanged where nothing was edited.
 */

// Error types
export {
  DanglingContinuationError,
  DuplicateIdError,
  FileError,
  MalformedConfigurationError,
  ParseError,
  PreambleError,
  SerializationError,
  SfmError,
  TransformError,
  ValidationError,
} from "./errors";
// SFM format
export * from "./formats";
// File I/O infrastructure
export { exists, getSize, readToString } from "./io/file-reader";
export { deleteFile, writeString } from "./io/file-writer";
// Transforms
export * from "./operations";
// Core types
export type {
  FilePath,
  FileReaderOptions,
  OperationResult,
  ParserOptions,
  TextEncodingName,
  WriteOptions,
} from "./types";
export { FilePathSchema, FileReaderOptionsSchema } from "./types";
