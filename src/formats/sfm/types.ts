/**
 * SFM Format Type Definitions
 *
 * Types for the Standard Format Marker module: fields, classified lines,
 * assembler state, and the option bundles shared by parser and writer.
 */

import type { DuplicateIdError } from "../../errors";
import type { ParserOptions } from "../../types";
import type { Collection } from "./collection";
import type { Entry } from "./entry";

// =============================================================================
// DATA MODEL
// =============================================================================

/**
 * A single marker/value pair. Fields are frozen once created.
 */
export interface Field {
  readonly marker: string;
  readonly value: string;
}

/**
 * Result of an entry-level field visitor:
 * - `undefined` keeps the field
 * - a Field replaces it
 * - an array expands it (an empty array drops it)
 */
export type FieldVisitResult = Field | readonly Field[] | undefined;

export type FieldVisitor = (field: Field, index: number) => FieldVisitResult;

/**
 * What to do with fields found before the first entry-start marker
 */
export type PreamblePolicy = "keep" | "entry" | "reject";

/**
 * Whitespace trimming applied to every physical line before classification
 */
export type LineTrimming = "none" | "trailing" | "both";

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Configuration bundle describing one SFM dialect.
 * Shared by parser and writer so a document is written back the way it was read.
 */
export interface SfmFormatOptions {
  /** Literal character(s) that start a marker line (default `\`) */
  markerPrefix?: string;
  /** Marker whose every occurrence starts a new entry (default `lx`) */
  entryStartMarker?: string;
  /** Marker whose first value identifies an entry */
  idMarker?: string;
  /** Reject a second entry with an already indexed id (requires idMarker) */
  uniqueIds?: boolean;
  /** Treat blank lines as entry separators instead of continuation lines */
  blankLinesAsSeparators?: boolean;
  /** Indentation stripped from continuation lines on input and emitted on output */
  continuationIndent?: string;
}

/**
 * Called when a parsed entry collides with an indexed id.
 * May mutate either entry; returns the entry to insert instead of the
 * incoming one (checked again), or `undefined` to skip it.
 */
export type DuplicateIdHandler = (error: DuplicateIdError) => Entry | undefined;

/**
 * SFM parser options extending base parser options
 */
export interface SfmParserOptions extends ParserOptions, SfmFormatOptions {
  /** Whitespace trimming applied to each line (default "none") */
  trimLines?: LineTrimming;
  /** Handling of fields before the first entry-start marker (default "keep") */
  preamble?: PreamblePolicy;
  /** Keep fields with empty or whitespace-only values (default true) */
  keepEmpty?: boolean;
  /** Rename markers while assembling; boundaries use the source marker */
  markerMap?: Readonly<Record<string, string>>;
  /** Duplicate id resolution; the default throws the error */
  onDuplicateId?: DuplicateIdHandler;
}

/**
 * SFM writer options for output formatting
 */
export interface SfmWriterOptions extends SfmFormatOptions {
  lineEnding?: "\n" | "\r\n";
  /** Terminate non-empty output with a line ending (default true) */
  finalNewline?: boolean;
  /** Put an empty line between entries (defaults to blankLinesAsSeparators) */
  blankLineBetweenEntries?: boolean;
}

/**
 * Options for a collection's id index
 */
export interface CollectionOptions {
  idMarker?: string;
  uniqueIds?: boolean;
}

/**
 * Format options with every default applied
 */
export interface ResolvedFormatOptions {
  readonly markerPrefix: string;
  readonly entryStartMarker: string;
  readonly idMarker: string | undefined;
  readonly uniqueIds: boolean;
  readonly blankLinesAsSeparators: boolean;
  readonly continuationIndent: string;
}

// =============================================================================
// TOKENIZER / ASSEMBLER
// =============================================================================

/**
 * Settings the line classifier needs
 */
export interface TokenizerOptions {
  readonly markerPrefix: string;
  readonly continuationIndent: string;
  readonly blankLinesAsSeparators: boolean;
  readonly trimLines: LineTrimming;
}

/**
 * One physical line, classified by its shape alone
 */
export type ClassifiedLine =
  | {
      readonly kind: "marker";
      readonly lineNumber: number;
      readonly raw: string;
      readonly marker: string;
      readonly value: string;
    }
  | {
      readonly kind: "continuation";
      readonly lineNumber: number;
      readonly raw: string;
      readonly text: string;
    }
  | {
      readonly kind: "separator";
      readonly lineNumber: number;
      readonly raw: string;
    };

export type LineKind = ClassifiedLine["kind"];

/**
 * A field as produced by the assembler, before it joins an entry
 */
export interface AssembledField extends Field {
  /** Marker as written in the source, before any markerMap renaming */
  readonly sourceMarker: string;
  readonly lineNumber: number;
}

/**
 * Output of the field assembler: a completed field, or an entry separator
 */
export type AssemblyItem =
  | { readonly kind: "field"; readonly field: AssembledField }
  | { readonly kind: "separator"; readonly lineNumber: number };

/**
 * Mutable state of the field assembler, kept outside the generator so
 * the caller can inspect what was seen once the input is exhausted
 */
export interface AssemblerState {
  open: { sourceMarker: string; fragments: string[]; lineNumber: number } | undefined;
  /** First continuation line seen before any marker line */
  dangling: ClassifiedLine | undefined;
  markerLines: number;
  linesSeen: number;
}

/**
 * Fields grouped into one entry (or the preamble)
 */
export interface EntryBlock {
  readonly kind: "preamble" | "entry";
  readonly lineNumber: number;
  readonly fields: AssembledField[];
}

// =============================================================================
// PARSE RESULTS
// =============================================================================

export type DiagnosticCode = "UNKNOWN_MARKER_PREFIX" | "LINE_TOO_LONG";

/**
 * Non-fatal finding reported while parsing
 */
export interface Diagnostic {
  readonly level: "warning";
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly lineNumber?: number;
}

/**
 * Parsed document: the collection plus any warnings raised on the way
 */
export interface SfmParseResult {
  readonly collection: Collection;
  readonly diagnostics: readonly Diagnostic[];
  readonly format: ResolvedFormatOptions;
}
