/**
 * SFM Format Module
 *
 * Parsing, modelling and writing of Standard Format Marker text, the
 * backslash-marker record format of Toolbox and Shoebox lexicons:
 * - Line classification with configurable marker prefix and continuation indent
 * - Entry grouping on an entry-start marker, with optional blank-line separators
 * - Ordered, duplicate-tolerant entries and an id-indexed collection
 * - Writing that reproduces parsed text unchanged
 *
 * @module sfm
 *
 * @example Parsing
 * ```typescript
 * import { SfmParser } from 'sfm-toolkit';
 *
 * const parser = new SfmParser({ entryStartMarker: 'lx', idMarker: 'lx' });
 * const { collection, diagnostics } = parser.parseString(text);
 * for (const entry of collection) {
 *   console.log(entry.getFirst('lx'), entry.get('ge'));
 * }
 * ```
 *
 * @example Building and writing
 * ```typescript
 * import { Collection, Entry, serialize } from 'sfm-toolkit';
 *
 * const lexicon = new Collection();
 * lexicon.append(Entry.of(['lx', 'kali'], ['ge', 'dog']));
 * serialize(lexicon); // "\\lx kali\n\\ge dog\n"
 * ```
 */

export { assembleFields, createAssemblerState, type GroupingOptions, groupEntries } from "./assembler";
export { Collection, type CollectionResult, type EntryVisitor } from "./collection";
export {
  DEFAULT_ENTRY_START_MARKER,
  DEFAULT_MARKER_PREFIX,
  DEFAULT_MERGE_SEPARATOR,
  LINE_ENDINGS,
  MAX_LINE_LENGTH,
  VALUE_LIST_SEPARATOR,
} from "./constants";
export { createField, Entry, type EntryOwner } from "./entry";
export { parse, readSfmFile, SfmParser } from "./parser";
export { classifyLine, classifyLines } from "./tokenizer";
export type {
  AssembledField,
  AssemblerState,
  AssemblyItem,
  ClassifiedLine,
  CollectionOptions,
  Diagnostic,
  DiagnosticCode,
  DuplicateIdHandler,
  EntryBlock,
  Field,
  FieldVisitor,
  FieldVisitResult,
  LineKind,
  LineTrimming,
  PreamblePolicy,
  ResolvedFormatOptions,
  SfmFormatOptions,
  SfmParseResult,
  SfmParserOptions,
  SfmWriterOptions,
  TokenizerOptions,
} from "./types";
export { countMarkers, normalizeLineEndings, removeBOM, splitLines } from "./utils";
export {
  CollectionOptionsSchema,
  isValidMarker,
  resolveFormatOptions,
  SfmFormatOptionsSchema,
  SfmParserOptionsSchema,
  SfmWriterOptionsSchema,
  validateField,
} from "./validation";
export { SfmWriter, serialize, writeSfmFile } from "./writer";
