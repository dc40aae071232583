import type { ConflictRegion, LineRange, ResolutionChoice } from "../patching/types";

// ===========================================================================
// Conflict view model
//
// What the editor shows for each staged conflict: highlighted line ranges
// and one code lens per resolution choice above the opening marker.
//
// No VS Code imports.
// ===========================================================================

export const RESOLVE_AT_COMMAND = "promptpatch.resolveConflictAt";

export interface ConflictDecorationRanges {
  /** The three marker lines of every region. */
  readonly markers: readonly LineRange[];
  readonly current: readonly LineRange[];
  readonly incoming: readonly LineRange[];
}

export interface ConflictLens {
  /** Line the lens sits above (the opening marker). */
  readonly line: number;
  readonly title: string;
  readonly choice: ResolutionChoice;
}

const LENS_TITLES: ReadonlyArray<readonly [ResolutionChoice, string]> = [
  ["current", "Accept Current"],
  ["incoming", "Accept Incoming"],
  ["both", "Accept Both"],
  ["none", "Accept None"],
];

function lines(...numbers: number[]): LineRange[] {
  return numbers.map((n) => ({ startLine: n, endLine: n }));
}

export function conflictDecorationRanges(conflicts: readonly ConflictRegion[]): ConflictDecorationRanges {
  const markers: LineRange[] = [];
  const current: LineRange[] = [];
  const incoming: LineRange[] = [];

  for (const c of conflicts) {
    markers.push(...lines(c.startLine, c.separatorLine, c.endLine));
    if (c.currentEnd >= c.currentStart) {
      current.push({ startLine: c.currentStart, endLine: c.currentEnd });
    }
    if (c.incomingEnd >= c.incomingStart) {
      incoming.push({ startLine: c.incomingStart, endLine: c.incomingEnd });
    }
  }

  return { markers, current, incoming };
}

export function conflictLenses(conflicts: readonly ConflictRegion[]): ConflictLens[] {
  return conflicts.flatMap((c) =>
    LENS_TITLES.map(([choice, title]) => ({ line: c.startLine, title, choice }))
  );
}
