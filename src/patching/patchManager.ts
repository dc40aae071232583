import { isReplacement } from "../intelligence/intentClassifier";
import type { Logger } from "../utils/logger";
import { NullLogger } from "../utils/logger";
import { BufferNotFoundError, InjectionError, SearchReplaceError, normalizeError } from "../utils/errors";
import type { IApplicationRecorder, PatchOutcome } from "../utils/telemetry";
import { NullApplicationRecorder } from "../utils/telemetry";
import type { ConflictMergeEngine } from "./conflictMergeEngine";
import { DEFAULT_TAG_DELIMITERS, removePromptTags, removeTagsFromBuffer, type TagDelimiters } from "./promptTags";
import { applyToBuffer, locateBlock, parseBlocks, replacementText, type LocatedBlock } from "./searchReplace";
import { hashRegion, isSnapshotStale, snapshotBuffer } from "./snapshot";
import type {
  ApplyResult,
  FlushResult,
  IBufferRegistry,
  ICodeInjector,
  IEditorState,
  IEventEmitter,
  IEventEmitterFactory,
  InjectionStrategy,
  InjectOptions,
  IScopeResolver,
  ITextBuffer,
  LineRange,
  PatchCandidate,
  PatchStats,
  PatchStatus,
  PatchStatusChange,
  PromptEvent,
  StalenessResult,
} from "./types";

// ===========================================================================
// PatchManager
//
// Owns every generation result from the moment its response arrives until it
// is applied or discarded. Patches are applied only when the editor is idle
// and the snapshotted region is unchanged; everything that mutates a buffer
// is wrapped so failures become rejected patches instead of exceptions.
// ===========================================================================

export const USER_TYPING = "user_typing";
export const BUFFER_NOT_FOUND = "buffer_not_found";

/** A re-resolved scope is accepted when its header moved at most this far. */
const SCOPE_DRIFT_TOLERANCE = 5;

export const DEFAULT_MAX_PATCH_AGE_MS = 3_600_000;

export interface PatchManagerConfig {
  /** Stage patches as conflict regions instead of writing them directly. */
  readonly useConflictMode: boolean;
  readonly sortImports: boolean;
  /**
   * When false, only a selection inside the patch's target document blocks
   * an apply; when true, any selection anywhere does.
   */
  readonly treatAnySelectionAsUnsafe: boolean;
  /** Path fragment identifying companion prompt files. */
  readonly companionMarker: string;
  readonly tags: TagDelimiters;
}

export const DEFAULT_PATCH_CONFIG: PatchManagerConfig = {
  useConflictMode: false,
  sortImports: true,
  treatAnySelectionAsUnsafe: true,
  companionMarker: ".coder.",
  tags: DEFAULT_TAG_DELIMITERS,
};

export interface PatchManagerDeps {
  readonly buffers: IBufferRegistry;
  readonly editor: IEditorState;
  readonly injector: ICodeInjector;
  readonly conflicts: ConflictMergeEngine;
  readonly emitterFactory: IEventEmitterFactory;
  readonly scopeResolver?: IScopeResolver;
  readonly recorder?: IApplicationRecorder;
  readonly logger?: Logger;
  readonly now?: () => number;
}

type GateResult =
  | { readonly ok: true; readonly target: ITextBuffer }
  | { readonly ok: false; readonly error: string };

function normalizePath(path: string): string {
  return path.replace(/\\/g, "/");
}

function formatRange(range: LineRange | undefined): string {
  return range ? `${range.startLine}-${range.endLine}` : "none";
}

export class PatchManager {
  readonly onDidChangePatch: IEventEmitter<PatchStatusChange>;

  private patches: PatchCandidate[] = [];
  private idCounter = 0;
  private config: PatchManagerConfig;

  private readonly logger: Logger;
  private readonly recorder: IApplicationRecorder;
  private readonly now: () => number;

  constructor(config: Partial<PatchManagerConfig>, private readonly deps: PatchManagerDeps) {
    this.config = { ...DEFAULT_PATCH_CONFIG, ...config };
    this.logger = deps.logger ?? new NullLogger();
    this.recorder = deps.recorder ?? new NullApplicationRecorder();
    this.now = deps.now ?? Date.now;
    this.onDidChangePatch = deps.emitterFactory.create<PatchStatusChange>();
  }

  configure(config: Partial<PatchManagerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): PatchManagerConfig {
    return this.config;
  }

  isConflictMode(): boolean {
    return this.config.useConflictMode;
  }

  // -------------------------------------------------------------------------
  // Creation
  // -------------------------------------------------------------------------

  /**
   * Build and queue a patch for a generation response. The snapshot is taken
   * now, over the event's range as it has moved while the request was in
   * flight. A prompt whose tag was deleted in the meantime is queued stale.
   */
  create(
    event: PromptEvent,
    generatedCode: string,
    confidence: number,
    strategyOverride?: InjectionStrategy
  ): PatchCandidate {
    const target = this.findTarget(event.targetPath);
    const source = this.deps.buffers.get(event.sourceBufferId);
    const rebased = this.rebase(event, source);
    const current = rebased ?? event;
    const isInline = this.isInline(current, source, target);

    const snapshotSubject = target ?? source;
    const snapshotRange = current.scopeRange ?? current.range;
    const originalSnapshot = snapshotSubject
      ? snapshotBuffer(snapshotSubject, snapshotRange)
      : { bufferId: event.sourceBufferId, changeCounter: -1, contentHash: "", range: snapshotRange };
    const snapshotAnchors = snapshotSubject?.isValid() ? snapshotSubject.anchors.createPair(snapshotRange) : undefined;

    const blocks = parseBlocks(generatedCode);
    const { strategy, range } = this.chooseStrategy(current, isInline, blocks.length > 0, strategyOverride);

    // Tag-driven inline patches follow their range the way selection transforms do
    let injectionAnchors = current.injectionAnchors;
    if (!injectionAnchors && range && isInline && target?.id === current.sourceBufferId && target.isValid()) {
      injectionAnchors = target.anchors.createPair(range);
    }

    const patch: PatchCandidate = {
      id: this.generateId(),
      eventId: event.id,
      sourceBufferId: event.sourceBufferId,
      targetBufferId: target?.id ?? null,
      targetPath: event.targetPath,
      originalSnapshot,
      snapshotAnchors,
      generatedCode,
      injectionRange: range,
      injectionAnchors,
      injectionStrategy: strategy,
      confidence,
      intent: current.intent,
      scope: current.scope,
      isInlinePrompt: isInline,
      useSearchReplace: blocks.length > 0,
      searchReplaceBlocks: blocks,
      promptTagRange: current.range,
      createdAt: this.now(),
      status: "pending",
    };

    this.logger.debug(
      `create: inline=${isInline} strategy=${strategy} range=${formatRange(range)} blocks=${blocks.length}`
    );
    this.queue(patch);

    if (!rebased) {
      this.transition(patch, "stale", "content_changed");
      this.recordOutcome(patch, "stale", "content_changed");
      this.logger.warn(`Patch ${patch.id} is stale: prompt region changed during generation`);
    }
    return patch;
  }

  /**
   * The event with `range` and `scopeRange` moved to where their anchors are
   * now. Consumes the event's anchors; `null` when the region was edited or
   * deleted while the request was in flight.
   */
  private rebase(event: PromptEvent, source: ITextBuffer | undefined): PromptEvent | null {
    const { rangeAnchors, scopeAnchors } = event;
    if (!rangeAnchors) return event;
    if (!source?.isValid()) return null;

    const live = source.anchors.resolvePair(rangeAnchors);
    const liveScope = scopeAnchors ? source.anchors.resolvePair(scopeAnchors) : null;
    source.anchors.deletePair(rangeAnchors);
    if (scopeAnchors) source.anchors.deletePair(scopeAnchors);
    if (!live || (scopeAnchors && !liveScope)) return null;

    const region = liveScope ?? live;
    if (event.regionHash !== undefined && hashRegion(source, region) !== event.regionHash) return null;

    const moved = live.startLine !== event.range.startLine || live.endLine !== event.range.endLine;
    if (moved) this.logger.debug(`Prompt range moved ${formatRange(event.range)} -> ${formatRange(live)}`);

    return {
      ...event,
      range: { ...event.range, ...live },
      scopeRange: liveScope ?? event.scopeRange,
      scope: event.scope && liveScope ? { ...event.scope, ...liveScope } : event.scope,
      rangeAnchors: undefined,
      scopeAnchors: undefined,
    };
  }

  /** Store a patch as pending. */
  queue(patch: PatchCandidate): PatchCandidate {
    this.patches.push(patch);
    this.logger.info(`Patch queued: ${patch.id} (confidence: ${patch.confidence.toFixed(2)})`);
    this.onDidChangePatch.fire({ patch, previous: null });
    return patch;
  }

  private chooseStrategy(
    event: PromptEvent,
    isInline: boolean,
    hasBlocks: boolean,
    strategyOverride: InjectionStrategy | undefined
  ): { strategy: InjectionStrategy; range?: LineRange } {
    if (hasBlocks) {
      return { strategy: "search_replace" };
    }

    if (event.intentOverride) {
      return {
        strategy: event.intentOverride.action,
        range: event.injectionRange ?? { startLine: event.range.startLine, endLine: event.range.endLine },
      };
    }

    if (isInline) {
      let startLine = Math.max(1, event.range.startLine);
      let endLine = Math.max(startLine, event.range.endLine);
      // An unresolved tag location falls back to the scope
      if ((event.range.startLine === 0 || event.range.endLine === 0) && event.scopeRange) {
        startLine = Math.max(1, event.scopeRange.startLine);
        endLine = Math.max(startLine, event.scopeRange.endLine);
      }
      return { strategy: "replace", range: { startLine, endLine } };
    }

    if (strategyOverride) {
      return { strategy: strategyOverride, range: event.injectionRange };
    }

    const tagRange: LineRange = { startLine: event.range.startLine, endLine: event.range.endLine };
    const intent = event.intent;
    if (intent && isReplacement(intent)) {
      if (!event.scopeRange) this.logger.warn("No scope found, using tag range as fallback");
      return { strategy: "replace", range: event.scopeRange ?? tagRange };
    }
    if (intent?.action === "insert") {
      return { strategy: "insert", range: tagRange };
    }
    return { strategy: "append" };
  }

  /** Same buffer, or a prompt that does not live in a companion file. */
  private isInline(event: PromptEvent, source: ITextBuffer | undefined, target: ITextBuffer | undefined): boolean {
    if (target && target.id === event.sourceBufferId) return true;
    const marker = this.config.companionMarker;
    const sourceIsCompanion = source?.path.includes(marker) ?? false;
    return !sourceIsCompanion && !event.targetPath.includes(marker);
  }

  private findTarget(targetPath: string): ITextBuffer | undefined {
    const fast = this.deps.buffers.findByPath(targetPath);
    if (fast) return fast;
    const wanted = normalizePath(targetPath);
    return this.deps.buffers.list().find((b) => normalizePath(b.path) === wanted);
  }

  private generateId(): string {
    this.idCounter++;
    return `patch_${this.now()}_${this.idCounter}`;
  }

  // -------------------------------------------------------------------------
  // Staleness
  // -------------------------------------------------------------------------

  /** Compared over where the snapshotted range is now, when it is anchored. */
  isStale(patch: PatchCandidate): StalenessResult {
    const buffer = this.deps.buffers.get(patch.originalSnapshot.bufferId);
    if (!buffer) return { stale: true, reason: "buffer_invalid" };

    const anchors = patch.snapshotAnchors;
    if (!anchors || !buffer.isValid()) return isSnapshotStale(patch.originalSnapshot, buffer);

    const live = buffer.anchors.resolvePair(anchors);
    if (!live) return { stale: true, reason: "content_changed" };
    return isSnapshotStale(patch.originalSnapshot, buffer, live);
  }

  // -------------------------------------------------------------------------
  // Application
  // -------------------------------------------------------------------------

  /** Write a patch straight into its target. Never throws. */
  apply(patch: PatchCandidate): ApplyResult {
    const gate = this.checkGates(patch);
    if (!gate.ok) return { success: false, error: gate.error };
    const { target } = gate;

    try {
      const source = this.deps.buffers.get(patch.sourceBufferId);
      if (!patch.isInlinePrompt && source?.isValid()) {
        this.removeSourceTags(source);
      }

      let code = patch.generatedCode;
      let reason: string | undefined;

      if (patch.useSearchReplace && patch.searchReplaceBlocks.length > 0) {
        if (patch.isInlinePrompt && source?.isValid()) {
          this.removeSourceTags(source);
        }

        const result = applyToBuffer(target, patch.searchReplaceBlocks);
        if (result.success) {
          this.succeed(patch, "applied");
          this.logger.info(
            `Patch ${patch.id} applied via SEARCH/REPLACE (${patch.searchReplaceBlocks.length} block(s))`
          );
          return { success: true };
        }

        const failure = new SearchReplaceError(result.error, result.failedBlocks);
        this.logger.warn(`SEARCH/REPLACE failed: ${failure.message}. Using REPLACE content only`);
        reason = "search_replace_failed";
        const fallback = replacementText(patch.searchReplaceBlocks);
        if (fallback !== "") code = fallback;
      }

      const options = this.resolveInjectOptions(patch, target);
      this.logger.debug(`inject: strategy=${options.strategy} range=${formatRange(options.range)}`);

      const injected = this.deps.injector.inject(target, code, options);
      if (injected.importsAdded > 0) {
        this.logger.debug(
          `${injected.importsMerged ? "Merged" : "Added"} ${injected.importsAdded} import(s), injected ${injected.bodyLines} body line(s)`
        );
      }

      this.succeed(patch, "applied", reason, injected.bodyLines);
      this.logger.info(`Patch ${patch.id} applied (${injected.bodyLines} line(s))`);
      return { success: true };
    } catch (err) {
      return this.fail(patch, err);
    }
  }

  /**
   * Stage a patch as conflict regions for review. SEARCH/REPLACE blocks
   * each become a region over their match; otherwise one region covers the
   * injection range. Patches with no range are applied directly.
   */
  applyWithConflict(patch: PatchCandidate): ApplyResult {
    const gate = this.checkGates(patch);
    if (!gate.ok) return { success: false, error: gate.error };
    const { target } = gate;

    try {
      const source = this.deps.buffers.get(patch.sourceBufferId);
      if (!patch.isInlinePrompt && source?.isValid()) {
        this.removeSourceTags(source);
      }

      let newLines = patch.generatedCode.split("\n");

      if (patch.useSearchReplace && patch.searchReplaceBlocks.length > 0) {
        const staged = this.stageBlocks(patch, target);
        if (staged > 0) {
          if (patch.isInlinePrompt && source?.isValid()) {
            this.removeSourceTags(source);
          }
          this.succeed(patch, "conflict");
          this.logger.info(`Patch ${patch.id} staged as ${staged} conflict(s)`);
          this.deps.conflicts.presentConflicts(target);
          return { success: true };
        }

        this.logger.warn("No SEARCH/REPLACE block matched. Staging REPLACE content only");
        const fallback = replacementText(patch.searchReplaceBlocks);
        if (fallback !== "") newLines = fallback.split("\n");
      }

      let range = this.conflictRange(patch, target);
      if (!range) {
        this.logger.debug(`Patch ${patch.id} has no range, applying directly`);
        return this.apply(patch);
      }

      if (patch.isInlinePrompt && range.endLine >= range.startLine) {
        const original = target.getLines(range.startLine, range.endLine);
        const stripped = removePromptTags(original, this.config.tags);
        if (stripped.removed > 0) {
          target.replaceLines(range.startLine, range.endLine, stripped.lines);
          range = { startLine: range.startLine, endLine: range.startLine + stripped.lines.length - 1 };
        }
      }

      this.deps.conflicts.insertConflict(target, range, newLines);
      this.succeed(patch, "conflict", undefined, newLines.length);
      this.logger.info(`Patch ${patch.id} staged as conflict at line ${range.startLine}`);
      this.deps.conflicts.presentConflicts(target);
      return { success: true };
    } catch (err) {
      return this.fail(patch, err);
    }
  }

  smartApply(patch: PatchCandidate): ApplyResult {
    return this.config.useConflictMode ? this.applyWithConflict(patch) : this.apply(patch);
  }

  /**
   * Try every pending patch in creation order. Patches blocked by the safety
   * gate stay pending for the next call.
   */
  flushPending(): FlushResult {
    let applied = 0;
    let stale = 0;
    let deferred = 0;

    for (const patch of this.getPending()) {
      if (patch.status !== "pending") continue;
      const result = this.smartApply(patch);
      if (result.success) {
        applied++;
      } else if (result.error === USER_TYPING) {
        deferred++;
      } else {
        stale++;
      }
    }

    return { applied, stale, deferred };
  }

  // -------------------------------------------------------------------------
  // Queries and housekeeping
  // -------------------------------------------------------------------------

  get(id: string): PatchCandidate | undefined {
    return this.patches.find((p) => p.id === id);
  }

  getForEvent(eventId: string): PatchCandidate | undefined {
    return this.patches.find((p) => p.eventId === eventId);
  }

  /** Pending patches in creation order. */
  getPending(): PatchCandidate[] {
    return this.patches.filter((p) => p.status === "pending");
  }

  /** Cancel pending patches targeting or snapshotting `bufferId`. The document is not touched. */
  cancelForBuffer(bufferId: string): number {
    let cancelled = 0;
    for (const patch of this.getPending()) {
      if (patch.targetBufferId === bufferId || patch.originalSnapshot.bufferId === bufferId) {
        this.transition(patch, "cancelled", "buffer_closed");
        cancelled++;
      }
    }
    if (cancelled > 0) this.logger.info(`Cancelled ${cancelled} pending patch(es)`);
    return cancelled;
  }

  /** Drop terminal patches older than `maxAgeMs`. Returns how many were removed. */
  cleanup(maxAgeMs: number = DEFAULT_MAX_PATCH_AGE_MS): number {
    const cutoff = this.now() - maxAgeMs;
    const before = this.patches.length;
    this.patches = this.patches.filter((p) => p.status === "pending" || p.createdAt >= cutoff);
    return before - this.patches.length;
  }

  stats(): PatchStats {
    const counts: Record<PatchStatus | "total", number> = {
      total: this.patches.length,
      pending: 0,
      applied: 0,
      stale: 0,
      rejected: 0,
      cancelled: 0,
    };
    for (const patch of this.patches) {
      counts[patch.status]++;
    }
    return counts;
  }

  clear(): void {
    this.patches = [];
  }

  markApplied(id: string): boolean {
    return this.transitionById(id, "applied");
  }

  markStale(id: string, reason?: string): boolean {
    return this.transitionById(id, "stale", reason);
  }

  markRejected(id: string, reason?: string): boolean {
    return this.transitionById(id, "rejected", reason);
  }

  dispose(): void {
    this.onDidChangePatch.dispose();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Safety, staleness and target validity, in that order. */
  private checkGates(patch: PatchCandidate): GateResult {
    if (patch.status !== "pending") {
      return { ok: false, error: `patch_not_pending: ${patch.status}` };
    }

    if (!this.isSafeToModify(patch)) {
      this.logger.debug(`Patch ${patch.id} deferred: editor busy`);
      this.recordOutcome(patch, "deferred", USER_TYPING);
      return { ok: false, error: USER_TYPING };
    }

    const staleness = this.isStale(patch);
    if (staleness.stale) {
      const reason = staleness.reason ?? "unknown";
      this.transition(patch, "stale", reason);
      this.recordOutcome(patch, "stale", reason);
      this.logger.warn(`Patch ${patch.id} is stale: ${reason}`);
      return { ok: false, error: `patch_stale: ${reason}` };
    }

    const target = this.resolveTarget(patch);
    if (!target) {
      this.transition(patch, "rejected", BUFFER_NOT_FOUND);
      this.recordOutcome(patch, "rejected", BUFFER_NOT_FOUND);
      this.logger.error(new BufferNotFoundError(patch.targetPath), patch.id);
      return { ok: false, error: BUFFER_NOT_FOUND };
    }

    return { ok: true, target };
  }

  private isSafeToModify(patch: PatchCandidate): boolean {
    const { editor } = this.deps;
    if (editor.isInsertMode() || editor.isCompletionVisible()) return false;
    const scope = this.config.treatAnySelectionAsUnsafe ? undefined : patch.targetBufferId ?? undefined;
    return !editor.hasActiveSelection(scope);
  }

  private anchorBuffer(patch: PatchCandidate): ITextBuffer | undefined {
    return patch.targetBufferId ? this.deps.buffers.get(patch.targetBufferId) : undefined;
  }

  private liveAnchorRange(patch: PatchCandidate): LineRange | null {
    const anchors = patch.injectionAnchors;
    const buffer = this.anchorBuffer(patch);
    if (!anchors || !buffer?.isValid()) return null;
    return buffer.anchors.resolveRange(anchors.start, anchors.end);
  }

  private releaseAnchors(patch: PatchCandidate): void {
    const anchors = patch.injectionAnchors;
    const buffer = this.anchorBuffer(patch);
    if (anchors && buffer) buffer.anchors.deletePair(anchors);

    const snapshotAnchors = patch.snapshotAnchors;
    const snapshotBufferOf = this.deps.buffers.get(patch.originalSnapshot.bufferId);
    if (snapshotAnchors && snapshotBufferOf) snapshotBufferOf.anchors.deletePair(snapshotAnchors);
  }

  private resolveTarget(patch: PatchCandidate): ITextBuffer | undefined {
    const current = patch.targetBufferId ? this.deps.buffers.get(patch.targetBufferId) : undefined;
    if (current?.isValid()) return current;

    const reloaded = this.deps.buffers.load(patch.targetPath);
    if (reloaded?.isValid()) {
      patch.targetBufferId = reloaded.id;
      return reloaded;
    }
    return undefined;
  }

  private removeSourceTags(source: ITextBuffer): void {
    const removed = removeTagsFromBuffer(source, this.config.tags);
    if (removed > 0) this.logger.debug(`Removed ${removed} prompt tag(s) from ${source.path}`);
  }

  private resolveInjectOptions(patch: PatchCandidate, target: ITextBuffer): InjectOptions {
    const base = { filetype: target.languageId, sortImports: this.config.sortImports };
    const range = patch.injectionRange;
    const live = this.liveAnchorRange(patch);

    if (patch.injectionStrategy === "replace" && range) {
      let { startLine, endLine } = live ?? range;
      if (live) this.logger.debug(`Applying at anchored range ${formatRange(live)}`);

      if (!patch.isInlinePrompt && patch.scope && this.deps.scopeResolver) {
        const scope = this.deps.scopeResolver.resolve(target, startLine);
        if (scope && Math.abs(scope.startLine - startLine) <= SCOPE_DRIFT_TOLERANCE) {
          startLine = scope.startLine;
          endLine = scope.endLine;
        }
      }

      const lineCount = target.getLineCount();
      return {
        ...base,
        strategy: "replace",
        range: { startLine: Math.max(1, startLine), endLine: Math.min(lineCount, endLine) },
      };
    }

    if (patch.injectionStrategy === "insert" && range) {
      if (live) {
        return { ...base, strategy: "insert", range: { startLine: live.startLine, endLine: live.startLine } };
      }
      // The generated code takes the place of the tag that asked for it
      if (patch.isInlinePrompt && patch.promptTagRange) {
        const tag = patch.promptTagRange;
        return { ...base, strategy: "replace", range: { startLine: tag.startLine, endLine: tag.endLine } };
      }
      return { ...base, strategy: "insert", range: { startLine: range.startLine, endLine: range.startLine } };
    }

    return { ...base, strategy: patch.injectionStrategy };
  }

  /** Inserts bottom-up so earlier matches keep their line numbers. */
  private stageBlocks(patch: PatchCandidate, target: ITextBuffer): number {
    const lines = target.getLines();
    const located = patch.searchReplaceBlocks
      .map((block) => locateBlock(lines, block))
      .filter((b): b is LocatedBlock => b !== null)
      .sort((a, b) => b.match.startLine - a.match.startLine);

    let staged = 0;
    let ceiling = Number.MAX_SAFE_INTEGER;
    for (const { match, replacement } of located) {
      if (match.endLine >= ceiling) continue;
      this.deps.conflicts.insertConflict(target, match, replacement);
      ceiling = match.startLine;
      staged++;
    }
    return staged;
  }

  private conflictRange(patch: PatchCandidate, target: ITextBuffer): LineRange | null {
    const range = this.liveAnchorRange(patch) ?? patch.injectionRange;
    if (!range) return null;

    if (patch.injectionStrategy === "insert" && !patch.isInlinePrompt) {
      return { startLine: range.startLine, endLine: range.startLine - 1 };
    }
    if (patch.injectionStrategy === "replace" || patch.injectionStrategy === "insert") {
      const lineCount = target.getLineCount();
      const startLine = Math.max(1, range.startLine);
      return { startLine, endLine: Math.min(lineCount, Math.max(startLine - 1, range.endLine)) };
    }
    return null;
  }

  private succeed(patch: PatchCandidate, outcome: PatchOutcome, reason?: string, bodyLines?: number): void {
    this.transition(patch, "applied");
    this.recordOutcome(patch, outcome, reason, bodyLines);
  }

  private fail(patch: PatchCandidate, err: unknown): ApplyResult {
    const message = normalizeError(err).message;
    this.logger.error(new InjectionError(patch.id, message, err));
    this.transition(patch, "rejected", message);
    this.recordOutcome(patch, "rejected", "injection_failed");
    return { success: false, error: message };
  }

  /** Recorder failures never affect the patch. */
  private recordOutcome(patch: PatchCandidate, outcome: PatchOutcome, reason?: string, bodyLines?: number): void {
    try {
      this.recorder.recordApplication({
        patchId: patch.id,
        outcome,
        strategy: patch.injectionStrategy,
        intentType: patch.intent?.type,
        reason,
        bodyLines,
      });
    } catch (err) {
      this.logger.warn(`Failed to record patch outcome: ${normalizeError(err).message}`);
    }
  }

  private transitionById(id: string, status: PatchStatus, reason?: string): boolean {
    const patch = this.get(id);
    return patch ? this.transition(patch, status, reason) : false;
  }

  /** Terminal states have no transitions out. */
  private transition(patch: PatchCandidate, status: PatchStatus, reason?: string): boolean {
    if (patch.status !== "pending" || status === "pending") return false;

    const previous = patch.status;
    patch.status = status;
    patch.statusReason = reason;
    patch.resolvedAt = this.now();
    this.releaseAnchors(patch);
    this.onDidChangePatch.fire({ patch, previous });
    return true;
  }
}
