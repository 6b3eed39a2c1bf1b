/**
 * SFM collection: the ordered entries of one document
 *
 * A collection owns its entries and keeps an optional id index over them.
 * The index is a lazily built view: any change to the collection, or to an
 * entry it owns, throws it away.
 *
 * @module formats/sfm/collection
 */

import { DuplicateIdError, ValidationError } from "../../errors";
import type { OperationResult } from "../../types";
import { Entry, type EntryOwner } from "./entry";
import type { CollectionOptions, SfmWriterOptions } from "./types";
import { validateCollectionOptions } from "./validation";
import { SfmWriter } from "./writer";

/**
 * Outcome of a collection mutation that may collide with an indexed id
 */
export type CollectionResult<T = Entry> = OperationResult<T, DuplicateIdError>;

export type EntryVisitor = (entry: Entry, index: number) => Entry | undefined;

type IdIndex = Map<string, Entry[]>;

/**
 * Ordered sequence of entries with an optional id index
 *
 * @example
 * ```typescript
 * const dictionary = new Collection({ idMarker: "lx", uniqueIds: true });
 * dictionary.append(Entry.of(["lx", "kali"], ["ge", "dog"]));
 *
 * const result = dictionary.append(Entry.of(["lx", "kali"]));
 * if (!result.success) {
 *   console.warn(result.error.existing.toString());
 * }
 * ```
 */
export class Collection implements Iterable<Entry>, EntryOwner {
  readonly idMarker: string | undefined;
  readonly uniqueIds: boolean;

  private items: Entry[] = [];
  private preambleEntry: Entry | undefined;
  private readonly indexes = new Map<string, IdIndex>();

  constructor(options: CollectionOptions = {}) {
    validateCollectionOptions(options);
    this.idMarker = options.idMarker;
    this.uniqueIds = options.uniqueIds ?? false;
  }

  /**
   * Build a collection from entries, stopping at the first id conflict
   */
  static from(entries: Iterable<Entry>, options: CollectionOptions = {}): CollectionResult<Collection> {
    const collection = new Collection(options);
    for (const entry of entries) {
      const result = collection.append(entry);
      if (!result.success) {
        return result;
      }
    }
    return { success: true, value: collection };
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  get length(): number {
    return this.items.length;
  }

  /**
   * Snapshot of the entries in order
   */
  get entries(): readonly Entry[] {
    return this.items.slice();
  }

  [Symbol.iterator](): Iterator<Entry> {
    return this.items.slice()[Symbol.iterator]();
  }

  at(index: number): Entry | undefined {
    return this.items.at(index);
  }

  /**
   * Fields that came before the first entry-start marker, if any
   */
  get preamble(): Entry | undefined {
    return this.preambleEntry;
  }

  set preamble(entry: Entry | undefined) {
    this.preambleEntry?.detach();
    this.preambleEntry = entry === undefined ? undefined : this.adopt(entry);
  }

  /**
   * Map of id value to the entries carrying it, in collection order.
   * Entries without a value for the id marker are not indexed.
   *
   * @param idMarker - Marker to index by (defaults to the collection's idMarker)
   * @throws {ValidationError} When no id marker is given or configured
   */
  index(idMarker: string | undefined = this.idMarker): ReadonlyMap<string, readonly Entry[]> {
    if (idMarker === undefined) {
      throw new ValidationError("No id marker configured for this collection");
    }

    let index = this.indexes.get(idMarker);
    if (index === undefined) {
      index = new Map();
      for (const entry of this.items) {
        addToIndex(index, idMarker, entry);
      }
      this.indexes.set(idMarker, index);
    }
    return index;
  }

  /**
   * First entry whose id-marker value is `id`
   */
  getById(id: string): Entry | undefined {
    return this.index().get(id)?.[0];
  }

  getAllById(id: string): readonly Entry[] {
    return this.index().get(id) ?? [];
  }

  /**
   * Id collisions currently present, e.g. after an owned entry's id field
   * was edited. One error per entry after the first carrying an id.
   */
  findConflicts(): DuplicateIdError[] {
    const idMarker = this.idMarker;
    if (idMarker === undefined) return [];

    const conflicts: DuplicateIdError[] = [];
    for (const [id, entries] of this.index(idMarker)) {
      const [first, ...rest] = entries;
      if (first === undefined) continue;
      for (const duplicate of rest) {
        conflicts.push(new DuplicateIdError(id, idMarker, first, duplicate));
      }
    }
    return conflicts;
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  /**
   * Add an entry at the end.
   *
   * An entry already held by a collection is copied first. When ids must be
   * unique and the entry's id is taken, nothing changes and the conflict is
   * returned.
   *
   * @returns The entry as stored, or the conflict
   */
  append(entry: Entry): CollectionResult {
    const conflict = this.findCollision(entry);
    if (conflict !== undefined) {
      return { success: false, error: conflict };
    }

    const owned = this.adopt(entry);
    this.items.push(owned);
    for (const [idMarker, index] of this.indexes) {
      addToIndex(index, idMarker, owned);
    }
    return { success: true, value: owned };
  }

  /**
   * Insert an entry before position `index` (`index === length` appends)
   *
   * @throws {ValidationError} When the index is out of range
   */
  insertAt(index: number, entry: Entry): CollectionResult {
    this.checkPosition(index, this.items.length);
    const conflict = this.findCollision(entry);
    if (conflict !== undefined) {
      return { success: false, error: conflict };
    }

    const owned = this.adopt(entry);
    this.items.splice(index, 0, owned);
    this.invalidate();
    return { success: true, value: owned };
  }

  /**
   * Replace the entry at `index`; the replaced entry is detached
   *
   * @throws {ValidationError} When the index is out of range
   */
  replaceAt(index: number, entry: Entry): CollectionResult {
    this.checkPosition(index, this.items.length - 1);
    const previous = this.items[index];
    const conflict = this.findCollision(entry, previous);
    if (conflict !== undefined) {
      return { success: false, error: conflict };
    }

    previous?.detach();
    const owned = this.adopt(entry);
    this.items[index] = owned;
    this.invalidate();
    return { success: true, value: owned };
  }

  /**
   * Remove and return the entry at `index`, detached from this collection
   *
   * @throws {ValidationError} When the index is out of range
   */
  removeAt(index: number): Entry {
    this.checkPosition(index, this.items.length - 1);
    const [removed] = this.items.splice(index, 1);
    if (removed === undefined) {
      throw new ValidationError(`No entry at position ${index}`);
    }
    removed.detach();
    this.invalidate();
    return removed;
  }

  /**
   * Run `visitor` on a copy of every entry, in order. The visitor may edit
   * the copy in place or return a replacement.
   *
   * All or nothing: when the result would break id uniqueness (or the visitor
   * throws) the collection keeps its previous entries.
   */
  visit(visitor: EntryVisitor): CollectionResult<this> {
    const staged = new Collection({ idMarker: this.idMarker, uniqueIds: this.uniqueIds });
    for (const [index, entry] of this.items.entries()) {
      const copy = entry.clone();
      const result = staged.append(visitor(copy, index) ?? copy);
      if (!result.success) {
        return result;
      }
    }

    for (const entry of this.items) {
      entry.detach();
    }
    this.items = staged.items.map((entry) => {
      entry.detach();
      entry.attach(this);
      return entry;
    });
    this.invalidate();
    return { success: true, value: this };
  }

  /**
   * Deep copy with the same id configuration
   */
  clone(): Collection {
    const copy = new Collection({ idMarker: this.idMarker, uniqueIds: this.uniqueIds });
    copy.items = this.items.map((entry) => {
      const cloned = entry.clone();
      cloned.attach(copy);
      return cloned;
    });
    if (this.preambleEntry !== undefined) {
      copy.preamble = this.preambleEntry.clone();
    }
    return copy;
  }

  /**
   * Render as an SFM document (preamble first, final newline by default)
   */
  toString(options: SfmWriterOptions = {}): string {
    return new SfmWriter(options).format(this);
  }

  /**
   * Drop every cached id index
   */
  invalidate(): void {
    this.indexes.clear();
  }

  // ===========================================================================
  // PRIVATE HELPERS
  // ===========================================================================

  private adopt(entry: Entry): Entry {
    const owned = entry.isOwned ? entry.clone() : entry;
    owned.attach(this);
    return owned;
  }

  private findCollision(entry: Entry, replacing?: Entry): DuplicateIdError | undefined {
    const idMarker = this.idMarker;
    if (!this.uniqueIds || idMarker === undefined) return undefined;

    const id = entry.getFirst(idMarker);
    if (id === undefined) return undefined;

    const existing = this.index(idMarker)
      .get(id)
      ?.find((candidate) => candidate !== replacing);
    return existing === undefined ? undefined : new DuplicateIdError(id, idMarker, existing, entry);
  }

  private checkPosition(index: number, max: number): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      throw new ValidationError(`Position ${index} outside 0..${max}`);
    }
  }
}

function addToIndex(index: IdIndex, idMarker: string, entry: Entry): void {
  const id = entry.getFirst(idMarker);
  if (id === undefined) return;

  const bucket = index.get(id);
  if (bucket === undefined) {
    index.set(id, [entry]);
  } else {
    bucket.push(entry);
  }
}
