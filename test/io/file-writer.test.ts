/**
 * File writer tests
 */

import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, SerializationError } from "../../src/errors";
import { Collection } from "../../src/formats/sfm/collection";
import { Entry } from "../../src/formats/sfm/entry";
import { readSfmFile } from "../../src/formats/sfm/parser";
import { SfmWriter, writeSfmFile } from "../../src/formats/sfm/writer";
import { exists, readToString } from "../../src/io/file-reader";
import { deleteFile, writeString } from "../../src/io/file-writer";

describe("File writer", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sfm-writer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("writeString", () => {
    test("writes and overwrites", async () => {
      const path = join(dir, "out.sfm");
      await writeString(path, "\\lx first\n");
      await writeString(path, "\\lx second\n");
      expect(await readToString(path)).toBe("\\lx second\n");
    });

    test("creates missing parent directories", async () => {
      const path = join(dir, "nested", "deeper", "out.sfm");
      await writeString(path, "\\lx kali\n");
      expect(await exists(path)).toBe(true);
    });

    test("fails when parents are missing and creation is off", async () => {
      const path = join(dir, "absent", "out.sfm");
      await expect(writeString(path, "\\lx kali\n", { createParents: false })).rejects.toBeInstanceOf(
        FileError
      );
    });

    test("encodes latin1", async () => {
      const path = join(dir, "latin1.sfm");
      await writeString(path, "\\ge café\n", { encoding: "latin1" });
      expect((await stat(path)).size).toBe(9);
      expect((await readFile(path))[7]).toBe(0xe9);
    });

    test("an empty path is a FileError", async () => {
      await expect(writeString("", "x")).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("deleteFile", () => {
    test("removes a file and ignores a missing one", async () => {
      const path = join(dir, "out.sfm");
      await writeString(path, "\\lx kali\n");

      await deleteFile(path);
      expect(await exists(path)).toBe(false);
      await expect(deleteFile(path)).resolves.toBeUndefined();
    });
  });

  describe("writeSfmFile", () => {
    test("collections survive a trip through a file", async () => {
      const collection = new Collection({ idMarker: "lx" });
      collection.preamble = Entry.of(["_sh", "v3.0"]);
      collection.append(Entry.of(["lx", "kali"], ["ge", "dog"], ["de", "a domestic\nanimal"]));
      collection.append(Entry.of(["lx", "kalu"], ["ge", "cat"]));

      const path = join(dir, "lexicon.sfm");
      await writeSfmFile(path, collection, { blankLineBetweenEntries: true });

      expect(await readToString(path)).toBe(
        "\\_sh v3.0\n\n\\lx kali\n\\ge dog\n\\de a domestic\nanimal\n\n\\lx kalu\n\\ge cat\n"
      );

      const reread = await readSfmFile(path, { idMarker: "lx", blankLinesAsSeparators: true });
      expect(reread.getById("kali")?.getFirst("de")).toBe("a domestic\nanimal");
      expect(reread.preamble?.toJSON()).toEqual([["_sh", "v3.0"]]);
    });

    test("SfmWriter.writeFile writes CRLF documents", async () => {
      const path = join(dir, "entry.sfm");
      await new SfmWriter({ lineEnding: "\r\n" }).writeFile(path, Entry.of(["lx", "kali"], ["ge", "dog"]));
      expect(await readToString(path)).toBe("\\lx kali\r\n\\ge dog\r\n");
    });

    test("nothing is written when a value cannot be serialized", async () => {
      const path = join(dir, "bad.sfm");
      const entry = Entry.of(["de", "first\n\\ge second"]);

      await expect(writeSfmFile(path, entry)).rejects.toBeInstanceOf(SerializationError);
      expect(await exists(path)).toBe(false);
    });
  });
});
