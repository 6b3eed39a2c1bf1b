/**
 * SFM field assembly and entry grouping tests
 */

import { describe, expect, test } from "vitest";
import { DanglingContinuationError } from "../../src/errors";
import {
  assembleFields,
  createAssemblerState,
  groupEntries,
  type GroupingOptions,
} from "../../src/formats/sfm/assembler";
import { classifyLines } from "../../src/formats/sfm/tokenizer";
import type { TokenizerOptions } from "../../src/formats/sfm/types";

const DEFAULTS: TokenizerOptions = {
  markerPrefix: "\\",
  continuationIndent: "",
  blankLinesAsSeparators: false,
  trimLines: "none",
};
const SEPARATED: TokenizerOptions = { ...DEFAULTS, blankLinesAsSeparators: true };
const GROUPING: GroupingOptions = { entryStartMarker: "lx", keepEmpty: true };

function items(text: string, options = DEFAULTS) {
  return [...assembleFields(classifyLines(text, options))];
}

function blocks(text: string, options = DEFAULTS, grouping = GROUPING) {
  return [...groupEntries(assembleFields(classifyLines(text, options)), grouping)];
}

function markersOf(block: { fields: ReadonlyArray<{ marker: string }> }): string[] {
  return block.fields.map((field) => field.marker);
}

describe("SFM Assembler", () => {
  describe("assembleFields", () => {
    test("joins continuation lines with single newlines", () => {
      const result = items("\\lx kali\nline two\nline three");

      expect(result).toEqual([
        {
          kind: "field",
          field: {
            marker: "lx",
            sourceMarker: "lx",
            value: "kali\nline two\nline three",
            lineNumber: 1,
          },
        },
      ]);
    });

    test("blank continuation lines become empty fragments", () => {
      const [item] = items("\\de first\n\nthird\n");
      expect(item).toMatchObject({ kind: "field", field: { value: "first\n\nthird" } });
    });

    test("a continuation before the first marker line is dangling", () => {
      expect(() => items("orphan\n\\lx kali")).toThrow(DanglingContinuationError);

      try {
        items("\n  orphan\n\\lx kali");
      } catch (error) {
        expect(error).toBeInstanceOf(DanglingContinuationError);
        if (error instanceof DanglingContinuationError) {
          expect(error.lineNumber).toBe(2);
          expect(error.code).toBe("DANGLING_CONTINUATION");
          expect(error.context).toBe("  orphan");
        }
      }
    });

    test("text without marker lines yields nothing and records the first line", () => {
      const state = createAssemblerState();
      const result = [...assembleFields(classifyLines("\njust text\nmore", DEFAULTS), state)];

      expect(result).toEqual([]);
      expect(state.markerLines).toBe(0);
      expect(state.dangling?.lineNumber).toBe(2);
      expect(state.linesSeen).toBe(3);
    });

    test("leading blank lines are ignored", () => {
      expect(items("\n\n\\lx a")).toHaveLength(1);
    });

    test("separators close the open field", () => {
      const result = items("\\lx a\n\n\\lx b", SEPARATED);
      expect(result.map((item) => item.kind)).toEqual(["field", "separator", "field"]);
    });

    test("separators before any marker line are dropped", () => {
      const result = items("\n\\lx a", SEPARATED);
      expect(result.map((item) => item.kind)).toEqual(["field"]);
    });

    test("a continuation right after a separator is dangling", () => {
      expect(() => items("\\lx a\n\ncontinued", SEPARATED)).toThrow(DanglingContinuationError);
    });

    test("applies a marker map while keeping the source marker", () => {
      const result = [
        ...assembleFields(classifyLines("\\ge dog", DEFAULTS), createAssemblerState(), {
          ge: "gloss",
        }),
      ];
      expect(result[0]).toMatchObject({ field: { marker: "gloss", sourceMarker: "ge" } });
    });
  });

  describe("groupEntries", () => {
    test("every entry-start marker opens an entry", () => {
      const result = blocks("\\lx a\n\\lx b\n\\lx c");
      expect(result.map((block) => block.kind)).toEqual(["entry", "entry", "entry"]);
    });

    test("fields before the first entry-start marker form the preamble", () => {
      const result = blocks("\\_sh v3\n\\id x\n\\lx a\n\\ge b");

      expect(result.map((block) => block.kind)).toEqual(["preamble", "entry"]);
      expect(markersOf(result[0] ?? { fields: [] })).toEqual(["_sh", "id"]);
      expect(markersOf(result[1] ?? { fields: [] })).toEqual(["lx", "ge"]);
      expect(result[1]?.lineNumber).toBe(3);
    });

    test("consecutive entry-start markers each start an entry", () => {
      const result = blocks("\\lx a\n\\lx b\n\\ge c");
      expect(result.map((block) => block.fields.length)).toEqual([1, 2]);
    });

    test("a separator starts a new entry once entries have begun", () => {
      const result = blocks("\\lx a\n\\ge b\n\n\\ge c", SEPARATED);

      expect(result.map(markersOf)).toEqual([["lx", "ge"], ["ge"]]);
      expect(result[1]?.lineNumber).toBe(4);
    });

    test("separators inside the preamble do not split it", () => {
      const result = blocks("\\_sh v\n\n\\id x\n\\lx a", SEPARATED);
      expect(result.map(markersOf)).toEqual([["_sh", "id"], ["lx"]]);
    });

    test("keepEmpty false drops blank values and empty blocks", () => {
      const grouping = { ...GROUPING, keepEmpty: false };

      const result = blocks("\\lx a\n\\ge\n\\ps   \n\\lx b", DEFAULTS, grouping);
      expect(result.map(markersOf)).toEqual([["lx"], ["lx"]]);

      expect(blocks("\\lx\n\\lx b", DEFAULTS, grouping)).toHaveLength(1);
    });

    test("boundaries use the source marker under a marker map", () => {
      const fields = assembleFields(classifyLines("\\lx a\n\\lx b", DEFAULTS), createAssemblerState(), {
        lx: "headword",
      });
      const result = [...groupEntries(fields, GROUPING)];

      expect(result.map(markersOf)).toEqual([["headword"], ["headword"]]);
    });
  });
});
