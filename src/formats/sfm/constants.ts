/**
 * SFM Format Constants
 *
 * Defaults and limits for the SFM module.
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Character(s) introducing a marker line (`\lx headword`)
 */
export const DEFAULT_MARKER_PREFIX = "\\";

/**
 * Marker that opens a new entry in Toolbox-style lexicons
 */
export const DEFAULT_ENTRY_START_MARKER = "lx";

/**
 * Separator used when merging adjacent values of the same marker.
 * Matches {@link VALUE_LIST_SEPARATOR} so merged values split back apart.
 */
export const DEFAULT_MERGE_SEPARATOR = "; ";

/**
 * Conventional separator of list-valued fields (`\ge house; home`)
 */
export const VALUE_LIST_SEPARATOR = /;\s+/;

/**
 * Maximum line length accepted by the parser (1MB)
 */
export const MAX_LINE_LENGTH = 1_000_000;

/**
 * Line ending options for the writer
 */
export const LINE_ENDINGS = {
  unix: "\n",
  windows: "\r\n",
} as const;
