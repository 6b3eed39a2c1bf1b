/**
 * SFM Collection model tests
 */

import { describe, expect, test } from "vitest";
import { DuplicateIdError, MalformedConfigurationError, ValidationError } from "../../src/errors";
import { Collection } from "../../src/formats/sfm/collection";
import { Entry } from "../../src/formats/sfm/entry";

function lexicon(...ids: string[]): Collection {
  const collection = new Collection({ idMarker: "lx", uniqueIds: true });
  for (const id of ids) {
    collection.append(Entry.of(["lx", id], ["ge", `gloss of ${id}`]));
  }
  return collection;
}

describe("SFM Collection", () => {
  describe("construction", () => {
    test("starts empty", () => {
      const collection = new Collection();
      expect(collection.length).toBe(0);
      expect(collection.entries).toEqual([]);
      expect(collection.preamble).toBeUndefined();
    });

    test("rejects uniqueIds without an id marker", () => {
      expect(() => new Collection({ uniqueIds: true })).toThrow(MalformedConfigurationError);
    });

    test("from builds a collection or reports the first conflict", () => {
      const ok = Collection.from([Entry.of(["lx", "a"]), Entry.of(["lx", "b"])], { idMarker: "lx" });
      expect(ok.success && ok.value.length).toBe(2);

      const clash = Collection.from([Entry.of(["lx", "a"]), Entry.of(["lx", "a"])], {
        idMarker: "lx",
        uniqueIds: true,
      });
      expect(clash.success).toBe(false);
      if (!clash.success) {
        expect(clash.error.id).toBe("a");
      }
    });
  });

  describe("append and positions", () => {
    test("append keeps order and returns the stored entry", () => {
      const collection = new Collection();
      const first = Entry.of(["lx", "a"]);
      const result = collection.append(first);

      expect(result).toEqual({ success: true, value: first });
      collection.append(Entry.of(["lx", "b"]));
      expect(collection.entries.map((entry) => entry.getFirst("lx"))).toEqual(["a", "b"]);
      expect(collection.at(-1)?.getFirst("lx")).toBe("b");
    });

    test("an entry held by another collection is copied", () => {
      const entry = Entry.of(["lx", "a"]);
      const owner = new Collection();
      owner.append(entry);

      const other = new Collection();
      const result = other.append(entry);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.value).not.toBe(entry);
        expect(result.value.toJSON()).toEqual(entry.toJSON());
      }
      expect(owner.at(0)).toBe(entry);
    });

    test("insertAt and removeAt", () => {
      const collection = lexicon("a", "c");
      collection.insertAt(1, Entry.of(["lx", "b"]));

      expect(collection.entries.map((entry) => entry.getFirst("lx"))).toEqual(["a", "b", "c"]);

      const removed = collection.removeAt(0);
      expect(removed.getFirst("lx")).toBe("a");
      expect(removed.isOwned).toBe(false);
      expect(collection.length).toBe(2);
      expect(() => collection.removeAt(5)).toThrow(ValidationError);
      expect(() => collection.insertAt(9, Entry.of(["lx", "z"]))).toThrow(ValidationError);
    });

    test("replaceAt may keep the replaced entry's id", () => {
      const collection = lexicon("a", "b");

      const same = collection.replaceAt(0, Entry.of(["lx", "a"], ["ge", "new"]));
      expect(same.success).toBe(true);
      expect(collection.getById("a")?.getFirst("ge")).toBe("new");

      const taken = collection.replaceAt(0, Entry.of(["lx", "b"]));
      expect(taken.success).toBe(false);
      expect(collection.at(0)?.getFirst("ge")).toBe("new");
    });
  });

  describe("id index", () => {
    test("a duplicate id is reported with both entries and nothing changes", () => {
      const collection = lexicon("kali");
      const incoming = Entry.of(["lx", "kali"], ["ge", "other"]);
      const result = collection.append(incoming);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DuplicateIdError);
        expect(result.error.id).toBe("kali");
        expect(result.error.idMarker).toBe("lx");
        expect(result.error.existing).toBe(collection.at(0));
        expect(result.error.incoming).toBe(incoming);
      }
      expect(collection.length).toBe(1);
      expect(incoming.isOwned).toBe(false);
    });

    test("an entry already held cannot be added again under unique ids", () => {
      const collection = lexicon("kali");
      const held = collection.at(0);
      expect(held).toBeDefined();
      if (held === undefined) return;

      const appended = collection.append(held);
      expect(appended.success).toBe(false);
      if (!appended.success) {
        expect(appended.error.existing).toBe(held);
      }

      expect(collection.insertAt(0, held).success).toBe(false);
      expect(collection.length).toBe(1);
      expect(collection.getAllById("kali")).toHaveLength(1);
    });

    test("without uniqueness both entries are kept and indexed", () => {
      const collection = new Collection({ idMarker: "lx" });
      collection.append(Entry.of(["lx", "kali"], ["ge", "dog"]));
      collection.append(Entry.of(["lx", "kali"], ["ge", "hound"]));

      expect(collection.length).toBe(2);
      expect(collection.getById("kali")?.getFirst("ge")).toBe("dog");
      expect(collection.getAllById("kali").map((entry) => entry.getFirst("ge"))).toEqual([
        "dog",
        "hound",
      ]);
    });

    test("entries without the id marker are not indexed", () => {
      const collection = new Collection({ idMarker: "lx" });
      collection.append(Entry.of(["ge", "orphan"]));
      expect(collection.index().size).toBe(0);
    });

    test("index needs an id marker", () => {
      const collection = new Collection();
      collection.append(Entry.of(["lx", "a"], ["ps", "n"]));

      expect(() => collection.index()).toThrow(ValidationError);
      expect(collection.index("ps").get("n")?.length).toBe(1);
      expect(collection.getAllById.bind(collection, "a")).toThrow(ValidationError);
    });

    test("editing an owned entry invalidates the index", () => {
      const collection = lexicon("a");
      expect(collection.getById("a")).toBeDefined();

      collection.at(0)?.visit((field) => (field.marker === "lx" ? { marker: "lx", value: "z" } : undefined));

      expect(collection.getById("a")).toBeUndefined();
      expect(collection.getById("z")?.getFirst("ge")).toBe("gloss of a");
    });

    test("removing an entry clears its index slot", () => {
      const collection = lexicon("a", "b");
      expect(collection.getById("a")).toBeDefined();

      collection.removeAt(0);
      expect(collection.getById("a")).toBeUndefined();
      expect(collection.getById("b")).toBeDefined();
    });

    test("findConflicts reports collisions introduced by entry edits", () => {
      const collection = lexicon("a", "b");
      expect(collection.findConflicts()).toEqual([]);

      collection.at(1)?.removeAll("lx");
      collection.at(1)?.insertAt(0, "lx", "a");

      const conflicts = collection.findConflicts();
      expect(conflicts).toHaveLength(1);
      expect(conflicts[0]?.id).toBe("a");
      expect(conflicts[0]?.existing).toBe(collection.at(0));
      expect(conflicts[0]?.incoming).toBe(collection.at(1));
    });
  });

  describe("visit", () => {
    test("applies edits and replacements in order", () => {
      const collection = lexicon("a", "b");
      const result = collection.visit((entry, index) =>
        index === 0 ? Entry.of(["lx", "first"]) : entry.append("nt", "seen")
      );

      expect(result.success).toBe(true);
      expect(collection.entries.map((entry) => entry.toJSON())).toEqual([
        [["lx", "first"]],
        [
          ["lx", "b"],
          ["ge", "gloss of b"],
          ["nt", "seen"],
        ],
      ]);
      expect(collection.getById("first")).toBe(collection.at(0));
    });

    test("is all or nothing when ids would collide", () => {
      const collection = lexicon("a", "b");
      const result = collection.visit((entry) => {
        entry.removeAll("lx");
        entry.insertAt(0, "lx", "same");
        return undefined;
      });

      expect(result.success).toBe(false);
      expect(collection.entries.map((entry) => entry.getFirst("lx"))).toEqual(["a", "b"]);
    });

    test("a throwing visitor leaves the collection unchanged", () => {
      const collection = lexicon("a", "b");
      expect(() =>
        collection.visit((entry, index) => {
          if (index === 1) throw new Error("stop");
          return entry.append("nt", "x");
        })
      ).toThrow("stop");
      expect(collection.at(0)?.has("nt")).toBe(false);
    });
  });

  describe("copies and text", () => {
    test("clone is deep", () => {
      const collection = lexicon("a");
      collection.preamble = Entry.of(["_sh", "v3"]);
      const copy = collection.clone();

      copy.at(0)?.append("nt", "copy only");
      copy.preamble?.append("_x", "copy only");

      expect(collection.at(0)?.has("nt")).toBe(false);
      expect(collection.preamble?.length).toBe(1);
      expect(copy.uniqueIds).toBe(true);
      expect(copy.getById("a")?.has("nt")).toBe(true);
    });

    test("toString writes the preamble first", () => {
      const collection = new Collection();
      collection.preamble = Entry.of(["_sh", "v3"]);
      collection.append(Entry.of(["lx", "a"]));

      expect(collection.toString()).toBe("\\_sh v3\n\\lx a\n");
    });
  });
});
