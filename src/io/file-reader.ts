/**
 * File reading utilities
 *
 * Each helper is an Effect program over the platform `FileSystem` service,
 * run with the Node.js platform layer behind a Promise-based API. Failures
 * surface as {@link FileError}.
 */

import { FileSystem, type Path } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import type { FilePath, FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  encoding: "utf-8",
  maxFileSize: 104_857_600, // 100MB
};

/**
 * Run a file program on the Node.js platform layer, rethrowing its typed
 * failure as-is
 */
export async function runFileEffect<A>(
  program: Effect.Effect<A, FileError, FileSystem.FileSystem | Path.Path>
): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program).pipe(Effect.provide(NodeContext.layer))
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}

const statFile = (path: FilePath) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.stat(path);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));

/**
 * Check if a regular file exists at `path`
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = statFile(validatedPath).pipe(
    Effect.map((info) => info.type === "File"),
    Effect.catchAll(() => Effect.succeed(false))
  );

  return runFileEffect(program);
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);
  return runFileEffect(statFile(validatedPath).pipe(Effect.map((info) => Number(info.size))));
}

/**
 * Read an entire file to a string, refusing files over the size limit
 *
 * @param path File path to read
 * @param options Encoding and size limit
 * @throws {FileError} If file cannot be read or is too large
 *
 * @example
 * ```typescript
 * const text = await readToString("lexicon.sfm", { encoding: "latin1" });
 * ```
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options, validatedPath);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* statFile(validatedPath);
    if (info.type !== "File") {
      return yield* Effect.fail(
        new FileError("Path points to a directory, not a file", validatedPath, "read")
      );
    }
    const size = Number(info.size);
    if (size > mergedOptions.maxFileSize) {
      return yield* Effect.fail(
        new FileError(
          `File too large: ${size} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
          validatedPath,
          "read"
        )
      );
    }

    return yield* fs
      .readFileString(validatedPath, mergedOptions.encoding)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validatedPath, error)));
  });

  return runFileEffect(program);
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
export function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions, path: FilePath): Required<FileReaderOptions> {
  const merged = {
    encoding: options.encoding ?? DEFAULT_OPTIONS.encoding,
    maxFileSize: options.maxFileSize ?? DEFAULT_OPTIONS.maxFileSize,
  };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, path, "read");
  }
  return merged;
}
