import type { AnchorPair, LineRange } from "./types";

// ===========================================================================
// Position anchors
//
// Line anchors that follow their content as the document is edited. Each
// buffer owns one tracker and reports every edit to it as
// (startLine, removedCount, insertedCount).
// ===========================================================================

export interface PositionAnchor {
  readonly id: number;
}

interface AnchorState {
  line: number;
  valid: boolean;
}

export class AnchorTracker {
  private readonly anchors = new Map<number, AnchorState>();
  private nextId = 1;

  /** Place an anchor at `line` (1-indexed). */
  create(line: number): PositionAnchor {
    const id = this.nextId++;
    this.anchors.set(id, { line, valid: true });
    return { id };
  }

  /** Anchor both ends of a range. */
  createPair(range: LineRange): AnchorPair {
    return { start: this.create(range.startLine), end: this.create(range.endLine) };
  }

  /** Current line of the anchor, or `undefined` once its line was deleted. */
  resolve(anchor: PositionAnchor): number | undefined {
    const state = this.anchors.get(anchor.id);
    if (!state || !state.valid) return undefined;
    return state.line;
  }

  isValid(anchor: PositionAnchor): boolean {
    return this.resolve(anchor) !== undefined;
  }

  /**
   * Resolve a start/end pair to a live range. `null` when either anchor is
   * gone or the pair has been inverted by edits.
   */
  resolveRange(start: PositionAnchor, end: PositionAnchor): LineRange | null {
    const startLine = this.resolve(start);
    const endLine = this.resolve(end);
    if (startLine === undefined || endLine === undefined) return null;
    if (endLine < startLine) return null;
    return { startLine, endLine };
  }

  /**
   * Shift anchors for an edit that replaced `removedCount` lines starting at
   * `startLine` with `insertedCount` lines. An anchor inside the removed block
   * survives when its offset still exists in the inserted block.
   */
  applyEdit(startLine: number, removedCount: number, insertedCount: number): void {
    const delta = insertedCount - removedCount;
    const removedEnd = startLine + removedCount - 1;

    for (const state of this.anchors.values()) {
      if (!state.valid || state.line < startLine) continue;

      if (state.line > removedEnd) {
        state.line += delta;
      } else if (state.line - startLine >= insertedCount) {
        state.valid = false;
      }
    }
  }

  resolvePair(pair: AnchorPair): LineRange | null {
    return this.resolveRange(pair.start, pair.end);
  }

  delete(anchor: PositionAnchor): void {
    this.anchors.delete(anchor.id);
  }

  deletePair(pair: AnchorPair): void {
    this.anchors.delete(pair.start.id);
    this.anchors.delete(pair.end.id);
  }

  /** For changes whose position cannot be mapped: every anchor is lost. */
  invalidateAll(): void {
    for (const state of this.anchors.values()) {
      state.valid = false;
    }
  }

  get size(): number {
    return this.anchors.size;
  }

  clear(): void {
    this.anchors.clear();
  }
}
