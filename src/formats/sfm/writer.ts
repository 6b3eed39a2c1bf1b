/**
 * SFM Writer
 *
 * Renders entries and collections back to SFM text. For anything produced
 * by parsing alone, writing with the same format options reproduces the
 * source text, normalized to LF line endings and a final newline. Blank
 * lines before the first marker line hold no field and are not written.
 */

import { SerializationError } from "../../errors";
import { writeString } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import type { Collection } from "./collection";
import type { Entry } from "./entry";
import { LINE_ENDINGS } from "./constants";
import { classifyLine } from "./tokenizer";
import type { Field, ResolvedFormatOptions, SfmWriterOptions, TokenizerOptions } from "./types";
import { resolveFormatOptions, validateWriterOptions } from "./validation";

/**
 * SFM writer with configurable marker prefix and continuation convention
 *
 * @example
 * ```typescript
 * const writer = new SfmWriter({ continuationIndent: "  " });
 * writer.formatField({ marker: "de", value: "first line\nsecond line" });
 * // "\\de first line\n  second line"
 * ```
 */
export class SfmWriter {
  private readonly dialect: ResolvedFormatOptions;
  private readonly lineEnding: "\n" | "\r\n";
  private readonly finalNewline: boolean;
  private readonly blankLineBetweenEntries: boolean;
  private readonly readBack: TokenizerOptions;

  constructor(options: SfmWriterOptions = {}) {
    validateWriterOptions(options);
    this.dialect = resolveFormatOptions(options);
    this.lineEnding = options.lineEnding ?? LINE_ENDINGS.unix;
    this.finalNewline = options.finalNewline ?? true;
    this.blankLineBetweenEntries =
      options.blankLineBetweenEntries ?? this.dialect.blankLinesAsSeparators;
    this.readBack = {
      markerPrefix: this.dialect.markerPrefix,
      continuationIndent: this.dialect.continuationIndent,
      blankLinesAsSeparators: this.dialect.blankLinesAsSeparators,
      trimLines: "none",
    };
  }

  /**
   * Format one field as a marker line plus one continuation line per
   * embedded newline
   *
   * @throws {SerializationError} When a continuation fragment would be read
   * back as a marker line or an entry separator
   */
  formatField(field: Field): string {
    const [first = "", ...rest] = field.value.split("\n");
    const head = `${this.dialect.markerPrefix}${field.marker}`;
    const lines = [first === "" ? head : `${head} ${first}`];

    for (const fragment of rest) {
      const line = `${this.dialect.continuationIndent}${fragment}`;
      const readAs = classifyLine(line, 0, this.readBack).kind;
      if (readAs !== "continuation") {
        throw new SerializationError(
          `Value of marker "${field.marker}" has a line that would be read back as a ${readAs} line`,
          field.marker,
          line
        );
      }
      lines.push(line);
    }

    return lines.join(this.lineEnding);
  }

  /**
   * Format an entry without a trailing line ending
   */
  formatEntry(entry: Entry): string {
    return entry.fields.map((field) => this.formatField(field)).join(this.lineEnding);
  }

  /**
   * Format a collection (preamble first) without a trailing line ending.
   * Entries with no fields produce no text.
   */
  formatCollection(collection: Collection): string {
    const blocks = [collection.preamble, ...collection.entries]
      .filter((entry): entry is Entry => entry !== undefined && entry.length > 0)
      .map((entry) => this.formatEntry(entry));

    const separator = this.blankLineBetweenEntries
      ? this.lineEnding + this.lineEnding
      : this.lineEnding;
    return blocks.join(separator);
  }

  /**
   * Format an entry or a collection as a complete document
   */
  format(target: Entry | Collection): string {
    const body = "preamble" in target ? this.formatCollection(target) : this.formatEntry(target);
    return body !== "" && this.finalNewline ? body + this.lineEnding : body;
  }

  /**
   * Write an entry or collection to a file
   *
   * @throws {SerializationError} When a value cannot be written faithfully
   * @throws {FileError} When the file cannot be written
   */
  async writeFile(path: string, target: Entry | Collection, options?: WriteOptions): Promise<void> {
    await writeString(path, this.format(target), options);
  }
}

/**
 * Serialize an entry or collection to SFM text
 *
 * @example
 * ```typescript
 * serialize(Entry.of(["lx", "kali"], ["ge", "dog"]));
 * // "\\lx kali\n\\ge dog\n"
 * ```
 */
export function serialize(target: Entry | Collection, options: SfmWriterOptions = {}): string {
  return new SfmWriter(options).format(target);
}

/**
 * Serialize an entry or collection straight to a file
 */
export async function writeSfmFile(
  path: string,
  target: Entry | Collection,
  options: SfmWriterOptions & WriteOptions = {}
): Promise<void> {
  const { encoding, createParents, ...writerOptions } = options;
  await new SfmWriter(writerOptions).writeFile(path, target, { encoding, createParents });
}
