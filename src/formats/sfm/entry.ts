/**
 * SFM entry: an ordered, duplicate-tolerant sequence of marker/value fields
 *
 * @module formats/sfm/entry
 */

import { DanglingContinuationError, ValidationError } from "../../errors";
import { assembleFields, createAssemblerState } from "./assembler";
import { classifyLines } from "./tokenizer";
import type { Field, FieldVisitor, SfmFormatOptions, SfmWriterOptions } from "./types";
import { countMarkers } from "./utils";
import { resolveFormatOptions, validateField } from "./validation";
import { SfmWriter } from "./writer";

/**
 * Anything that must hear about changes to an entry it holds
 * (a collection caching an id index)
 */
export interface EntryOwner {
  invalidate(): void;
}

/**
 * Create a frozen field after validating marker and value
 *
 * @throws {ValidationError} For an empty or whitespace-containing marker,
 * or a value containing a carriage return
 */
export function createField(marker: string, value: string): Field {
  validateField(marker, value);
  return Object.freeze({ marker, value });
}

/**
 * One logical SFM record
 *
 * Lookups by marker return every matching value in order; a marker may
 * repeat any number of times.
 *
 * @example
 * ```typescript
 * const entry = Entry.of(["lx", "kali"], ["ge", "dog"], ["ge", "hound"]);
 * entry.get("ge");       // ["dog", "hound"]
 * entry.getFirst("lx");  // "kali"
 * entry.toString();      // "\\lx kali\n\\ge dog\n\\ge hound"
 * ```
 */
export class Entry implements Iterable<Field> {
  private items: Field[];
  private owner: EntryOwner | undefined;

  constructor(fields: Iterable<Field> = []) {
    this.items = [];
    for (const field of fields) {
      this.items.push(createField(field.marker, field.value));
    }
  }

  /**
   * Build an entry from `[marker, value]` pairs
   */
  static of(...pairs: ReadonlyArray<readonly [string, string]>): Entry {
    return new Entry(pairs.map(([marker, value]) => ({ marker, value })));
  }

  /**
   * Parse a text block into a single entry, ignoring entry boundaries.
   * Non-blank text before the first marker line, or a block with text but
   * no marker line at all, raises {@link DanglingContinuationError}.
   *
   * @param block - SFM text of one record
   * @param options - Format options (marker prefix, continuation indent)
   * @param keepEmpty - Keep fields with blank values (default true)
   */
  static fromString(block: string, options: SfmFormatOptions = {}, keepEmpty = true): Entry {
    const format = resolveFormatOptions(options);
    const lines = classifyLines(block, {
      markerPrefix: format.markerPrefix,
      continuationIndent: format.continuationIndent,
      blankLinesAsSeparators: false,
      trimLines: "none",
    });

    const state = createAssemblerState();
    const entry = new Entry();
    for (const item of assembleFields(lines, state)) {
      if (item.kind === "field" && (keepEmpty || item.field.value.trim() !== "")) {
        entry.items.push(createField(item.field.marker, item.field.value));
      }
    }
    if (state.dangling !== undefined) {
      throw new DanglingContinuationError(state.dangling.lineNumber, state.dangling.raw);
    }
    return entry;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  get length(): number {
    return this.items.length;
  }

  /**
   * Snapshot of the fields in order
   */
  get fields(): readonly Field[] {
    return this.items.slice();
  }

  /**
   * Whether a collection currently holds this entry
   */
  get isOwned(): boolean {
    return this.owner !== undefined;
  }

  [Symbol.iterator](): Iterator<Field> {
    return this.items.slice()[Symbol.iterator]();
  }

  at(index: number): Field | undefined {
    return this.items.at(index);
  }

  /**
   * All values of a marker, in order; empty when the marker is absent
   */
  get(marker: string): string[] {
    return this.items.filter((field) => field.marker === marker).map((field) => field.value);
  }

  getFirst(marker: string): string | undefined {
    return this.items.find((field) => field.marker === marker)?.value;
  }

  has(marker: string): boolean {
    return this.items.some((field) => field.marker === marker);
  }

  /**
   * Marker frequencies, in order of first appearance
   */
  markers(): Map<string, number> {
    return countMarkers(this.items.map((field) => field.marker));
  }

  // ===========================================================================
  // MUTATION
  // ===========================================================================

  /**
   * Add a field at the end. Existing fields with the same marker stay.
   */
  append(marker: string, value: string): this {
    this.items.push(createField(marker, value));
    this.touch();
    return this;
  }

  /**
   * Insert a field before position `index` (`index === length` appends)
   *
   * @throws {ValidationError} When the index is out of range
   */
  insertAt(index: number, marker: string, value: string): this {
    if (!Number.isInteger(index) || index < 0 || index > this.items.length) {
      throw new ValidationError(`Insert position ${index} outside 0..${this.items.length}`);
    }
    this.items.splice(index, 0, createField(marker, value));
    this.touch();
    return this;
  }

  /**
   * Remove and return the field at `index`
   *
   * @throws {ValidationError} When the index is out of range
   */
  removeAt(index: number): Field {
    const field = Number.isInteger(index) && index >= 0 ? this.items[index] : undefined;
    if (field === undefined) {
      throw new ValidationError(`No field at position ${index} (entry has ${this.items.length})`);
    }
    this.items.splice(index, 1);
    this.touch();
    return field;
  }

  /**
   * Remove every field with the given marker
   *
   * @returns Number of fields removed
   */
  removeAll(marker: string): number {
    const before = this.items.length;
    this.items = this.items.filter((field) => field.marker !== marker);
    const removed = before - this.items.length;
    if (removed > 0) {
      this.touch();
    }
    return removed;
  }

  /**
   * Run `visitor` over every field in order, in place.
   *
   * The visitor may keep (return nothing), replace (return a field) or
   * expand a field (return an array, possibly empty). The entry changes only
   * once every field has been visited, so a throwing visitor leaves it as it was.
   */
  visit(visitor: FieldVisitor): this {
    const next: Field[] = [];
    this.items.forEach((field, index) => {
      const result = visitor(field, index);
      if (result === undefined) {
        next.push(field);
      } else if (isFieldList(result)) {
        for (const replacement of result) {
          next.push(createField(replacement.marker, replacement.value));
        }
      } else {
        next.push(createField(result.marker, result.value));
      }
    });
    this.items = next;
    this.touch();
    return this;
  }

  /**
   * Independent copy, not owned by any collection
   */
  clone(): Entry {
    return new Entry(this.items);
  }

  /**
   * Render as SFM text (no trailing newline)
   */
  toString(options: SfmWriterOptions = {}): string {
    return new SfmWriter(options).formatEntry(this);
  }

  toJSON(): Array<[string, string]> {
    return this.items.map((field) => [field.marker, field.value]);
  }

  // ===========================================================================
  // OWNERSHIP
  // ===========================================================================

  /**
   * @internal Called by a collection taking this entry in
   */
  attach(owner: EntryOwner): void {
    if (this.owner !== undefined && this.owner !== owner) {
      throw new ValidationError("Entry already belongs to another collection; add a clone instead");
    }
    this.owner = owner;
  }

  /**
   * @internal Called by a collection letting this entry go
   */
  detach(): void {
    this.owner = undefined;
  }

  private touch(): void {
    this.owner?.invalidate();
  }
}

function isFieldList(result: Field | readonly Field[]): result is readonly Field[] {
  return Array.isArray(result);
}
