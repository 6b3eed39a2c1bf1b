/**
 * SFM entry assembler
 *
 * Two generator stages sit between the line classifier and the data model:
 *
 * 1. {@link assembleFields} joins continuation lines onto the field opened by
 *    the preceding marker line.
 * 2. {@link groupEntries} cuts the field sequence into entries at every
 *    entry-start marker (and, optionally, at blank-line separators).
 *
 * Neither stage strips or rewrites value text.
 */

import { DanglingContinuationError } from "../../errors";
import type {
  AssembledField,
  AssemblerState,
  AssemblyItem,
  ClassifiedLine,
  EntryBlock,
} from "./types";

/**
 * Create initial assembler state
 */
export function createAssemblerState(): AssemblerState {
  return {
    open: undefined,
    dangling: undefined,
    markerLines: 0,
    linesSeen: 0,
  };
}

function closeField(
  state: AssemblerState,
  markerMap: Readonly<Record<string, string>>
): AssembledField | undefined {
  const open = state.open;
  if (open === undefined) return undefined;
  state.open = undefined;

  return {
    marker: markerMap[open.sourceMarker] ?? open.sourceMarker,
    sourceMarker: open.sourceMarker,
    value: open.fragments.join("\n"),
    lineNumber: open.lineNumber,
  };
}

/**
 * Join classified lines into fields
 *
 * Continuation lines that show up before the first marker line are held
 * back: if a marker line follows, the first of them raises
 * {@link DanglingContinuationError}; if none does, the document simply has
 * no fields and `state.markerLines` stays at zero.
 *
 * @param lines - Classified lines in source order
 * @param state - Assembler state, inspected by the caller afterwards
 * @param markerMap - Optional marker renaming applied to completed fields
 * @throws {DanglingContinuationError} When a continuation line has no field to extend
 */
export function* assembleFields(
  lines: Iterable<ClassifiedLine>,
  state: AssemblerState = createAssemblerState(),
  markerMap: Readonly<Record<string, string>> = {}
): Generator<AssemblyItem> {
  for (const line of lines) {
    state.linesSeen++;

    switch (line.kind) {
      case "marker": {
        if (state.dangling !== undefined) {
          throw new DanglingContinuationError(state.dangling.lineNumber, state.dangling.raw);
        }
        const field = closeField(state, markerMap);
        if (field !== undefined) {
          yield { kind: "field", field };
        }
        state.open = {
          sourceMarker: line.marker,
          fragments: [line.value],
          lineNumber: line.lineNumber,
        };
        state.markerLines++;
        break;
      }

      case "separator": {
        const field = closeField(state, markerMap);
        if (field !== undefined) {
          yield { kind: "field", field };
        }
        if (state.markerLines > 0) {
          yield { kind: "separator", lineNumber: line.lineNumber };
        }
        break;
      }

      case "continuation": {
        if (state.open !== undefined) {
          state.open.fragments.push(line.text);
        } else if (state.markerLines > 0) {
          // the field was closed by a blank-line separator
          throw new DanglingContinuationError(line.lineNumber, line.raw);
        } else if (line.text.trim() !== "" && state.dangling === undefined) {
          state.dangling = line;
        }
        break;
      }
    }
  }

  const field = closeField(state, markerMap);
  if (field !== undefined) {
    yield { kind: "field", field };
  }
}

/**
 * Options for grouping fields into entries
 */
export interface GroupingOptions {
  readonly entryStartMarker: string;
  readonly keepEmpty: boolean;
}

/**
 * Partition assembled fields into entry blocks
 *
 * Every field whose source marker is the entry-start marker opens a new
 * entry. Once the first entry has started, the first field after a
 * separator opens one too. Fields before the first entry-start marker
 * form a single "preamble" block, separators included.
 *
 * Blocks left without fields (all of their values empty while
 * `keepEmpty` is false) are not yielded.
 */
export function* groupEntries(
  items: Iterable<AssemblyItem>,
  options: GroupingOptions
): Generator<EntryBlock> {
  let current: EntryBlock | undefined;
  let entryStarted = false;
  let pendingBreak = false;

  for (const item of items) {
    if (item.kind === "separator") {
      pendingBreak = entryStarted;
      continue;
    }

    const field = item.field;
    if (field.sourceMarker === options.entryStartMarker || pendingBreak) {
      if (current !== undefined && current.fields.length > 0) {
        yield current;
      }
      current = { kind: "entry", lineNumber: field.lineNumber, fields: [] };
      entryStarted = true;
      pendingBreak = false;
    } else if (current === undefined) {
      current = { kind: "preamble", lineNumber: field.lineNumber, fields: [] };
    }

    if (options.keepEmpty || field.value.trim() !== "") {
      current.fields.push(field);
    }
  }

  if (current !== undefined && current.fields.length > 0) {
    yield current;
  }
}
