/**
 * File reader tests
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { readSfmFile, SfmParser } from "../../src/formats/sfm/parser";
import { serialize } from "../../src/formats/sfm/writer";
import { exists, getSize, readToString } from "../../src/io/file-reader";

const DICTIONARY = fileURLToPath(new URL("../fixtures/dictionary.sfm", import.meta.url));

describe("File reader", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "sfm-reader-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("readToString", () => {
    test("reads a whole file", async () => {
      const path = join(dir, "entry.sfm");
      await writeFile(path, "\\lx kali\n");
      expect(await readToString(path)).toBe("\\lx kali\n");
    });

    test("decodes latin1", async () => {
      const path = join(dir, "latin1.sfm");
      await writeFile(path, Buffer.from([0x5c, 0x67, 0x65, 0x20, 0x63, 0x61, 0x66, 0xe9]));
      expect(await readToString(path, { encoding: "latin1" })).toBe("\\ge café");
    });

    test("a missing file is a FileError", async () => {
      await expect(readToString(join(dir, "missing.sfm"))).rejects.toBeInstanceOf(FileError);
    });

    test("a directory is refused", async () => {
      await expect(readToString(dir)).rejects.toThrow("Path points to a directory, not a file");
    });

    test("files over the size limit are refused", async () => {
      const path = join(dir, "big.sfm");
      await writeFile(path, "\\lx a\n");
      await expect(readToString(path, { maxFileSize: 3 })).rejects.toThrow(
        "File too large: 6 bytes exceeds limit of 3 bytes"
      );
    });

    test("an empty path is a FileError", async () => {
      await expect(readToString("")).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("exists and getSize", () => {
    test("report regular files only", async () => {
      const path = join(dir, "entry.sfm");
      await writeFile(path, "\\lx kali\n");

      expect(await exists(path)).toBe(true);
      expect(await exists(dir)).toBe(false);
      expect(await exists(join(dir, "missing.sfm"))).toBe(false);
      expect(await getSize(path)).toBe(9);
    });

    test("getSize of a missing file is a FileError", async () => {
      await expect(getSize(join(dir, "missing.sfm"))).rejects.toBeInstanceOf(FileError);
    });
  });

  describe("readSfmFile", () => {
    test("reads the sample dictionary", async () => {
      const collection = await readSfmFile(DICTIONARY, { idMarker: "lx", uniqueIds: true });

      expect(collection.length).toBe(3);
      expect(collection.preamble?.getFirst("_sh")).toBe("v3.0  400  MDF 4.0");
      expect(collection.getById("tumba")?.get("ge")).toEqual(["run", "hurry"]);
      expect(collection.getById("kali")?.getFirst("de")).toBe(
        "a domesticated animal\nkept for herding"
      );
    });

    test("writes back byte for byte", async () => {
      const text = await readToString(DICTIONARY);
      const collection = await readSfmFile(DICTIONARY);
      expect(serialize(collection)).toBe(text);
    });

    test("blank-line separators drop the empty continuations", async () => {
      const collection = await readSfmFile(DICTIONARY, { blankLinesAsSeparators: true });
      expect(collection.at(0)?.getFirst("dt")).toBe("12/Mar/2024");
    });

    test("parser reads files through parseFile", async () => {
      const result = await new SfmParser({ idMarker: "lx" }).parseFile(DICTIONARY);
      expect(result.diagnostics).toEqual([]);
      expect(result.collection.index().size).toBe(3);
    });

    test("parseFile honours an aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();
      const parser = new SfmParser({ signal: controller.signal });
      await expect(parser.parseFile(DICTIONARY)).rejects.toThrow(
        "Operation aborted during SFM file read"
      );
    });
  });
});
