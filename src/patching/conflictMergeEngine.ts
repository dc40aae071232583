import type { Logger } from "../utils/logger";
import { NullLogger } from "../utils/logger";
import { normalizeError } from "../utils/errors";
import type {
  ConflictMenuItem,
  ConflictRegion,
  ConflictsChange,
  IEditorState,
  IEventEmitter,
  IEventEmitterFactory,
  ILintValidator,
  ITextBuffer,
  LineRange,
  ResolutionChoice,
  ResolutionResult,
} from "./types";

// ===========================================================================
// Conflict Merge Engine
//
// Stages generated code as git-style conflict regions in the document and
// resolves them on request. The marker text is the only state: regions are
// re-derived by scanning the buffer every time, so they survive saves,
// reloads and manual edits.
// ===========================================================================

export const CONFLICT_MARKERS = {
  currentStart: "<<<<<<< CURRENT",
  separator: "=======",
  incomingEnd: ">>>>>>> INCOMING",
} as const;

const START_PREFIX = "<<<<<<<";
const SEPARATOR_PREFIX = "=======";
const END_PREFIX = ">>>>>>>";

export interface ConflictEngineConfig {
  /** Validate code kept by incoming/both resolutions. */
  readonly lintAfterAccept: boolean;
  readonly autoFixLintErrors: boolean;
  /** Focus the first conflict after new ones are inserted. */
  readonly autoShowMenu: boolean;
  /** Focus the next remaining conflict after one is resolved. */
  readonly autoShowNextConflict: boolean;
  readonly incomingLabel: string;
}

export const DEFAULT_CONFLICT_CONFIG: ConflictEngineConfig = {
  lintAfterAccept: true,
  autoFixLintErrors: false,
  autoShowMenu: true,
  autoShowNextConflict: true,
  incomingLabel: "INCOMING",
};

export interface ConflictEngineDeps {
  readonly editor: IEditorState;
  readonly emitterFactory: IEventEmitterFactory;
  readonly lintValidator?: ILintValidator;
  readonly logger?: Logger;
}

export interface ConflictFocus {
  readonly bufferId: string;
  readonly conflict: ConflictRegion;
}

export interface ConflictResolved {
  readonly bufferId: string;
  readonly result: ResolutionResult;
}

function countLines(start: number, end: number): number {
  return Math.max(0, end - start + 1);
}

function preview(lines: readonly string[]): string {
  const shown = lines.slice(0, 3).map((l) => l.trim().slice(0, 50));
  if (lines.length > 3) shown.push("…");
  return shown.join(" ⏎ ");
}

export class ConflictMergeEngine {
  readonly onDidChangeConflicts: IEventEmitter<ConflictsChange>;
  readonly onDidFocusConflict: IEventEmitter<ConflictFocus>;
  readonly onDidResolveConflict: IEventEmitter<ConflictResolved>;

  private config: ConflictEngineConfig;
  private readonly logger: Logger;

  constructor(
    config: Partial<ConflictEngineConfig>,
    private readonly deps: ConflictEngineDeps
  ) {
    this.config = { ...DEFAULT_CONFLICT_CONFIG, ...config };
    this.logger = deps.logger ?? new NullLogger();
    this.onDidChangeConflicts = deps.emitterFactory.create<ConflictsChange>();
    this.onDidFocusConflict = deps.emitterFactory.create<ConflictFocus>();
    this.onDidResolveConflict = deps.emitterFactory.create<ConflictResolved>();
  }

  configure(config: Partial<ConflictEngineConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): ConflictEngineConfig {
    return this.config;
  }

  // -------------------------------------------------------------------------
  // Construction and scanning
  // -------------------------------------------------------------------------

  /**
   * Replace `range` with a conflict block whose CURRENT body is the text that
   * was there. An empty range (`endLine = startLine - 1`) stages a pure
   * insertion with no CURRENT lines. Returns the inserted region.
   */
  insertConflict(
    buffer: ITextBuffer,
    range: LineRange,
    newLines: readonly string[],
    label?: string
  ): ConflictRegion | null {
    if (!buffer.isValid()) return null;

    const lineCount = buffer.getLineCount();
    const startLine = Math.max(1, Math.min(range.startLine, lineCount + 1));
    const endLine = Math.max(startLine - 1, Math.min(range.endLine, lineCount));

    const current = endLine >= startLine ? buffer.getLines(startLine, endLine) : [];
    const block = [
      CONFLICT_MARKERS.currentStart,
      ...current,
      CONFLICT_MARKERS.separator,
      ...newLines,
      `${END_PREFIX} ${label ?? this.config.incomingLabel}`,
    ];

    buffer.replaceLines(startLine, endLine, block);

    const separatorLine = startLine + current.length + 1;
    const blockEnd = startLine + block.length - 1;
    return {
      startLine,
      currentStart: startLine + 1,
      currentEnd: separatorLine - 1,
      separatorLine,
      incomingStart: separatorLine + 1,
      incomingEnd: blockEnd - 1,
      endLine: blockEnd,
    };
  }

  /**
   * Linear scan for `<<<<<<<` / `=======` / `>>>>>>>` in that order. A new
   * start marker abandons an open region; an end marker without a separator
   * drops the region.
   */
  detectConflicts(buffer: ITextBuffer): ConflictRegion[] {
    if (!buffer.isValid()) return [];

    const lines = buffer.getLines();
    const conflicts: ConflictRegion[] = [];
    let start: number | null = null;
    let separator: number | null = null;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const lineNumber = i + 1;

      if (line.startsWith(START_PREFIX)) {
        start = lineNumber;
        separator = null;
      } else if (line.startsWith(SEPARATOR_PREFIX) && start !== null && separator === null) {
        separator = lineNumber;
      } else if (line.startsWith(END_PREFIX) && start !== null) {
        if (separator !== null) {
          conflicts.push({
            startLine: start,
            currentStart: start + 1,
            currentEnd: separator - 1,
            separatorLine: separator,
            incomingStart: separator + 1,
            incomingEnd: lineNumber - 1,
            endLine: lineNumber,
          });
        }
        start = null;
        separator = null;
      }
    }

    return conflicts;
  }

  getConflictAt(buffer: ITextBuffer, line: number): ConflictRegion | undefined {
    return this.detectConflicts(buffer).find((c) => line >= c.startLine && line <= c.endLine);
  }

  hasConflicts(buffer: ITextBuffer): boolean {
    return this.detectConflicts(buffer).length > 0;
  }

  countConflicts(buffer: ITextBuffer): number {
    return this.detectConflicts(buffer).length;
  }

  /** Re-scan and notify the view layer. Returns the conflict count. */
  refresh(buffer: ITextBuffer): number {
    const conflicts = this.detectConflicts(buffer);
    this.onDidChangeConflicts.fire({ bufferId: buffer.id, conflicts });
    return conflicts.length;
  }

  /** After staging conflicts: re-scan and, when enabled, focus the first one. */
  presentConflicts(buffer: ITextBuffer): number {
    const count = this.refresh(buffer);
    if (count > 0) {
      this.logger.info(`Found ${count} conflict(s) in ${buffer.path}`);
      if (this.config.autoShowMenu) this.focusFirst(buffer);
    }
    return count;
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  acceptCurrent(buffer: ITextBuffer): ResolutionResult | null {
    return this.acceptAtCursor(buffer, "current");
  }

  acceptIncoming(buffer: ITextBuffer): ResolutionResult | null {
    return this.acceptAtCursor(buffer, "incoming");
  }

  acceptBoth(buffer: ITextBuffer): ResolutionResult | null {
    return this.acceptAtCursor(buffer, "both");
  }

  acceptNone(buffer: ITextBuffer): ResolutionResult | null {
    return this.acceptAtCursor(buffer, "none");
  }

  /** Resolve the conflict under the cursor. `null` when there is none. */
  acceptAtCursor(buffer: ITextBuffer, choice: ResolutionChoice): ResolutionResult | null {
    const cursor = this.deps.editor.getCursorLine(buffer.id);
    if (cursor === undefined) {
      this.logger.warn("No conflict at cursor position");
      return null;
    }
    return this.acceptAt(buffer, cursor, choice);
  }

  /** Resolve the conflict containing `line`, e.g. from a code lens. */
  acceptAt(buffer: ITextBuffer, line: number, choice: ResolutionChoice): ResolutionResult | null {
    const conflict = this.getConflictAt(buffer, line);
    if (!conflict) {
      this.logger.warn(`No conflict at line ${line}`);
      return null;
    }

    const result = this.resolve(buffer, conflict, choice);
    this.refresh(buffer);
    if (result.remaining > 0 && this.config.autoShowNextConflict) {
      this.focusFirst(buffer);
    }
    return result;
  }

  /** Resolve every conflict with the same choice, bottom to top. */
  resolveAll(buffer: ITextBuffer, choice: ResolutionChoice): number {
    const conflicts = this.detectConflicts(buffer);
    for (let i = conflicts.length - 1; i >= 0; i--) {
      const conflict = conflicts[i];
      if (conflict) this.resolve(buffer, conflict, choice);
    }
    if (conflicts.length > 0) {
      this.refresh(buffer);
      this.logger.info(`Resolved ${conflicts.length} conflict(s) in ${buffer.path} (${choice})`);
    }
    return conflicts.length;
  }

  /** Replace the whole region, markers included, with the chosen lines. */
  resolve(buffer: ITextBuffer, conflict: ConflictRegion, choice: ResolutionChoice): ResolutionResult {
    const current =
      conflict.currentEnd >= conflict.currentStart
        ? buffer.getLines(conflict.currentStart, conflict.currentEnd)
        : [];
    const incoming =
      conflict.incomingEnd >= conflict.incomingStart
        ? buffer.getLines(conflict.incomingStart, conflict.incomingEnd)
        : [];

    let keep: string[];
    switch (choice) {
      case "current":
        keep = current;
        break;
      case "incoming":
        keep = incoming;
        break;
      case "both":
        keep = [...current, ...incoming];
        break;
      case "none":
        keep = [];
        break;
    }

    buffer.replaceLines(conflict.startLine, conflict.endLine, keep);

    const result: ResolutionResult = {
      choice,
      startLine: conflict.startLine,
      lineCount: keep.length,
      remaining: this.countConflicts(buffer),
    };

    this.logger.info(`Accepted ${choice.toUpperCase()} at line ${conflict.startLine} (${keep.length} line(s))`);

    if ((choice === "incoming" || choice === "both") && keep.length > 0) {
      this.validateAccepted(buffer, conflict.startLine, conflict.startLine + keep.length - 1);
    }

    this.onDidResolveConflict.fire({ bufferId: buffer.id, result });
    return result;
  }

  // -------------------------------------------------------------------------
  // Navigation
  // -------------------------------------------------------------------------

  /** Next conflict below the cursor, wrapping to the first. */
  gotoNext(buffer: ITextBuffer): ConflictRegion | null {
    const conflicts = this.detectConflicts(buffer);
    if (conflicts.length === 0) {
      this.logger.info("No more conflicts");
      return null;
    }

    const cursor = this.deps.editor.getCursorLine(buffer.id) ?? 0;
    let target = conflicts.find((c) => c.startLine > cursor);
    if (!target) {
      target = conflicts[0];
      this.logger.info("Wrapped to first conflict");
    }
    return target ? this.focus(buffer, target) : null;
  }

  /** Previous conflict above the cursor, wrapping to the last. */
  gotoPrev(buffer: ITextBuffer): ConflictRegion | null {
    const conflicts = this.detectConflicts(buffer);
    if (conflicts.length === 0) {
      this.logger.info("No more conflicts");
      return null;
    }

    const cursor = this.deps.editor.getCursorLine(buffer.id) ?? Number.MAX_SAFE_INTEGER;
    let target = [...conflicts].reverse().find((c) => c.startLine < cursor);
    if (!target) {
      target = conflicts[conflicts.length - 1];
      this.logger.info("Wrapped to last conflict");
    }
    return target ? this.focus(buffer, target) : null;
  }

  /** Quick-pick entries for a region, with line counts in the labels. */
  buildMenu(buffer: ITextBuffer, conflict: ConflictRegion): ConflictMenuItem[] {
    const currentCount = countLines(conflict.currentStart, conflict.currentEnd);
    const incomingCount = countLines(conflict.incomingStart, conflict.incomingEnd);
    const current = currentCount > 0 ? buffer.getLines(conflict.currentStart, conflict.currentEnd) : [];
    const incoming = incomingCount > 0 ? buffer.getLines(conflict.incomingStart, conflict.incomingEnd) : [];

    return [
      {
        choice: "current",
        label: `Accept CURRENT (original) - ${currentCount} lines`,
        description: preview(current),
      },
      {
        choice: "incoming",
        label: `Accept INCOMING (AI suggestion) - ${incomingCount} lines`,
        description: preview(incoming),
      },
      {
        choice: "both",
        label: `Accept BOTH versions - ${currentCount + incomingCount} lines total`,
        description: "",
      },
      {
        choice: "none",
        label: "Delete conflict (accept NONE)",
        description: "",
      },
    ];
  }

  dispose(): void {
    this.onDidChangeConflicts.dispose();
    this.onDidFocusConflict.dispose();
    this.onDidResolveConflict.dispose();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private focusFirst(buffer: ITextBuffer): void {
    const first = this.detectConflicts(buffer)[0];
    if (first) this.focus(buffer, first);
  }

  private focus(buffer: ITextBuffer, conflict: ConflictRegion): ConflictRegion {
    this.deps.editor.revealLine(buffer.id, conflict.startLine);
    this.onDidFocusConflict.fire({ bufferId: buffer.id, conflict });
    return conflict;
  }

  /** Fire-and-forget; never blocks or fails a resolution. */
  private validateAccepted(buffer: ITextBuffer, startLine: number, endLine: number): void {
    const validator = this.deps.lintValidator;
    if (!this.config.lintAfterAccept || !validator) return;

    void validator
      .validateAfterInjection(buffer, startLine, endLine)
      .then(async (result) => {
        if (!result?.hasErrors) return;
        this.logger.warn(`Lint: ${result.errorCount} error(s) in lines ${startLine}-${endLine} of ${buffer.path}`);
        if (this.config.autoFixLintErrors) {
          this.logger.info("Requesting fix for lint errors");
          await validator.requestFix(buffer, result);
        }
      })
      .catch((err: unknown) => {
        this.logger.warn(`Lint validation failed: ${normalizeError(err).message}`);
      });
  }
}
