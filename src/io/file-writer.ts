/**
 * File writing operations
 *
 * Promise-based helpers over Effect programs on the platform `FileSystem`;
 * failures surface as {@link FileError}.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import type { TextEncodingName, WriteOptions } from "../types";
import { runFileEffect, validatePath } from "./file-reader";

/**
 * Encode text in one of the supported encodings
 */
function encodeText(content: string, encoding: TextEncodingName): Uint8Array {
  switch (encoding) {
    case "utf-8":
    case "utf8":
      return new TextEncoder().encode(content);
    case "utf-16le":
      return Buffer.from(content, "utf16le");
    case "latin1":
      return Buffer.from(content, "latin1");
  }
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @param path - File path to write to
 * @param content - String content to write
 * @param options - Encoding and parent directory creation
 * @throws {FileError} When write operation fails or path is invalid
 *
 * @example
 * ```typescript
 * await writeString("out/lexicon.sfm", "\\lx kali\n", { encoding: "latin1" });
 * ```
 */
export async function writeString(
  path: string,
  content: string,
  options: WriteOptions = {}
): Promise<void> {
  const validatedPath = validatePath(path);
  const data = encodeText(content, options.encoding ?? "utf-8");

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const paths = yield* Path.Path;

    if (options.createParents ?? true) {
      yield* fs.makeDirectory(paths.dirname(validatedPath), { recursive: true });
    }
    yield* fs.writeFile(validatedPath, data);
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));

  await runFileEffect(program);
}

/**
 * Delete file from filesystem. Does not throw if the file doesn't exist.
 *
 * @throws {FileError} When deletion fails (other than file not existing)
 */
export async function deleteFile(path: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    if (yield* fs.exists(validatedPath)) {
      yield* fs.remove(validatedPath);
    }
  }).pipe(Effect.mapError((error) => FileError.fromSystemError("write", validatedPath, error)));

  await runFileEffect(program);
}
