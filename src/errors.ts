/**
 * Error handling for SFM parsing, modelling and serialization
 *
 * Structural problems in the text (a continuation line with no field to
 * extend) are fatal and thrown. Conflicts that the caller is expected to
 * resolve (duplicate ids, failing transforms) are returned as values.
 */

import type { Entry } from "./formats/sfm/entry";

/**
 * Base error class for all SFM toolkit errors
 */
export class SfmError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SfmError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed markers, values or options
 */
export class ValidationError extends SfmError {
  constructor(message: string, lineNumber?: number, context?: string, code = "VALIDATION_ERROR") {
    super(message, code, lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Configuration rejected before any parsing or writing begins
 * (empty marker prefix, empty entry-start marker, ...)
 */
export class MalformedConfigurationError extends ValidationError {
  constructor(
    message: string,
    public readonly summary?: string
  ) {
    super(message, undefined, summary, "MALFORMED_CONFIGURATION");
    this.name = "MalformedConfigurationError";
  }
}

/**
 * Parsing errors for structural problems in SFM text
 */
export class ParseError extends SfmError {
  constructor(message: string, lineNumber?: number, context?: string, code = "PARSE_ERROR") {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * A continuation line appeared while no field was open
 */
export class DanglingContinuationError extends ParseError {
  constructor(lineNumber: number, line: string) {
    super(
      "Continuation line has no preceding marker line to extend",
      lineNumber,
      line,
      "DANGLING_CONTINUATION"
    );
    this.name = "DanglingContinuationError";
  }
}

/**
 * Fields appeared before the first entry-start marker while the
 * preamble policy is "reject"
 */
export class PreambleError extends ParseError {
  constructor(
    public readonly entryStartMarker: string,
    lineNumber: number,
    line: string
  ) {
    super(`Fields found before the first \\${entryStartMarker} entry`, lineNumber, line);
    this.name = "PreambleError";
  }
}

/**
 * Two entries share the same id-marker value while ids are required to be
 * unique. Carries both entries; the caller decides how to resolve it.
 */
export class DuplicateIdError extends SfmError {
  constructor(
    public readonly id: string,
    public readonly idMarker: string,
    public readonly existing: Entry,
    public readonly incoming: Entry,
    lineNumber?: number
  ) {
    super(`Duplicate value "${id}" for id marker "${idMarker}"`, "DUPLICATE_ID", lineNumber);
    this.name = "DuplicateIdError";
  }
}

/**
 * A caller-supplied transform threw while a collection was being transformed
 */
export class TransformError extends SfmError {
  constructor(
    message: string,
    public readonly transformIndex: number,
    public readonly entryIndex: number,
    public readonly thrown?: unknown
  ) {
    super(message, "TRANSFORM_ERROR", undefined, `transform #${transformIndex}, entry #${entryIndex}`);
    this.name = "TransformError";
  }

  static fromThrown(transformIndex: number, entryIndex: number, thrown: unknown): TransformError {
    const message = thrown instanceof Error ? thrown.message : String(thrown);
    return new TransformError(
      `Transform failed: ${message}`,
      transformIndex,
      entryIndex,
      thrown
    );
  }
}

/**
 * A value cannot be written without being read back differently
 */
export class SerializationError extends SfmError {
  constructor(
    message: string,
    public readonly marker: string,
    context?: string
  ) {
    super(message, "SERIALIZATION_ERROR", undefined, context);
    this.name = "SerializationError";
  }
}

/**
 * File system errors with path and operation context
 */
export class FileError extends SfmError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}
