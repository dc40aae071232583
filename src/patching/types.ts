import type { Intent } from "../intelligence/types";
import type { AnchorTracker, PositionAnchor } from "./positionAnchors";
import type { SearchReplaceBlock } from "./searchReplace";

// ===========================================================================
// Patching types
//
// Lines are 1-indexed and ranges inclusive throughout. A range whose
// endLine is startLine - 1 is empty and denotes an insertion point.
// ===========================================================================

export interface LineRange {
  readonly startLine: number;
  readonly endLine: number;
}

/** Location of a prompt tag, with optional 0-based columns on its boundary lines. */
export interface PromptRange extends LineRange {
  readonly startCol?: number;
  readonly endCol?: number;
}

// ---------------------------------------------------------------------------
// Buffers
// ---------------------------------------------------------------------------

/** A live document. Implemented over vscode.TextDocument and in memory for tests. */
export interface ITextBuffer {
  readonly id: string;
  readonly path: string;
  readonly languageId: string;
  readonly anchors: AnchorTracker;

  isValid(): boolean;
  /** Monotonic edit counter, bumped by every content change. */
  getChangeCounter(): number;
  getLineCount(): number;
  /** Lines `startLine..endLine` (defaults: whole document). An empty document is `[""]`. */
  getLines(startLine?: number, endLine?: number): string[];
  /**
   * Replace lines `startLine..endLine` with `lines`. `endLine = startLine - 1`
   * inserts before `startLine`; `startLine = lineCount + 1` appends.
   */
  replaceLines(startLine: number, endLine: number, lines: readonly string[]): void;
  getText(): string;
}

export interface IBufferRegistry {
  get(id: string): ITextBuffer | undefined;
  /** Fast lookup keyed on the normalized path. */
  findByPath(path: string): ITextBuffer | undefined;
  /** All open buffers, used for the by-name scan. */
  list(): readonly ITextBuffer[];
  /** Re-acquire a buffer for a path whose handle went invalid. */
  load(path: string): ITextBuffer | undefined;
}

/** Editor state consulted by the safety gate and the conflict commands. */
export interface IEditorState {
  isInsertMode(): boolean;
  /** With `bufferId`, only selections in that buffer count. */
  hasActiveSelection(bufferId?: string): boolean;
  isCompletionVisible(): boolean;
  getCursorLine(bufferId: string): number | undefined;
  revealLine(bufferId: string, line: number): void;
}

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

export interface BufferSnapshot {
  readonly bufferId: string;
  readonly changeCounter: number;
  readonly contentHash: string;
  readonly range?: LineRange;
}

export type StalenessReason = "buffer_invalid" | "content_changed";

export interface StalenessResult {
  readonly stale: boolean;
  readonly reason?: StalenessReason;
}

// ---------------------------------------------------------------------------
// Scope resolution
// ---------------------------------------------------------------------------

export type ScopeType = "function" | "class" | "block";

export interface ScopeInfo {
  readonly type: ScopeType;
  readonly name: string;
  readonly startLine: number;
  readonly endLine: number;
}

export interface IScopeResolver {
  /** `null` means "no enclosing scope"; callers fall back to the tag range. */
  resolve(buffer: ITextBuffer, approximateLine: number): ScopeInfo | null;
}

// ---------------------------------------------------------------------------
// Injection
// ---------------------------------------------------------------------------

export type InjectionStrategy = "append" | "replace" | "insert" | "search_replace";

export interface InjectOptions {
  readonly strategy: InjectionStrategy;
  readonly range?: LineRange;
  readonly filetype: string;
  readonly sortImports: boolean;
}

export interface InjectResult {
  readonly importsAdded: number;
  readonly importsMerged: boolean;
  readonly bodyLines: number;
}

export interface ICodeInjector {
  inject(buffer: ITextBuffer, code: string, options: InjectOptions): InjectResult;
}

// ---------------------------------------------------------------------------
// Lint validation (fire-and-forget)
// ---------------------------------------------------------------------------

export interface LintMessage {
  readonly line: number;
  readonly severity: "error" | "warning";
  readonly message: string;
}

export interface LintResult {
  readonly hasErrors: boolean;
  readonly errorCount: number;
  readonly warningCount: number;
  readonly messages: readonly LintMessage[];
}

export interface ILintValidator {
  /** Resolves `null` when no diagnostics are available for the buffer. */
  validateAfterInjection(
    buffer: ITextBuffer,
    startLine: number,
    endLine: number
  ): Promise<LintResult | null>;
  requestFix(buffer: ITextBuffer, result: LintResult): Promise<void>;
}

// ---------------------------------------------------------------------------
// Prompt events and patches
// ---------------------------------------------------------------------------

export interface AnchorPair {
  readonly start: PositionAnchor;
  readonly end: PositionAnchor;
}

/** Explicit action from a selection or cursor transform. */
export interface IntentOverride {
  readonly action: "replace" | "insert";
}

/** A processed prompt, handed to the patch manager when its response arrives. */
export interface PromptEvent {
  readonly id: string;
  readonly sourceBufferId: string;
  readonly targetPath: string;
  readonly prompt: string;
  /** Location of the prompt tag (or selection) in the source buffer. */
  readonly range: PromptRange;
  readonly scopeRange?: LineRange;
  readonly scope?: ScopeInfo;
  readonly intent?: Intent;
  readonly intentOverride?: IntentOverride;
  readonly injectionRange?: LineRange;
  readonly injectionAnchors?: AnchorPair;
  /** `range` and `scopeRange` as they move while the request is in flight. */
  readonly rangeAnchors?: AnchorPair;
  readonly scopeAnchors?: AnchorPair;
  /** Hash of `scopeRange ?? range` when the request was submitted. */
  readonly regionHash?: string;
  readonly timestamp: number;
}

export type PatchStatus = "pending" | "applied" | "stale" | "rejected" | "cancelled";

export interface PatchCandidate {
  readonly id: string;
  readonly eventId: string;
  readonly sourceBufferId: string;
  /**
   * `null` when no buffer for the target path was open at creation time.
   * Updated when the target is reloaded during apply.
   */
  targetBufferId: string | null;
  readonly targetPath: string;
  readonly originalSnapshot: BufferSnapshot;
  /** Follows the snapshotted range in the snapshot's buffer. */
  readonly snapshotAnchors?: AnchorPair;
  readonly generatedCode: string;
  readonly injectionRange?: LineRange;
  readonly injectionAnchors?: AnchorPair;
  readonly injectionStrategy: InjectionStrategy;
  readonly confidence: number;
  readonly intent?: Intent;
  readonly scope?: ScopeInfo;
  readonly isInlinePrompt: boolean;
  readonly useSearchReplace: boolean;
  readonly searchReplaceBlocks: readonly SearchReplaceBlock[];
  readonly promptTagRange?: PromptRange;
  readonly createdAt: number;
  status: PatchStatus;
  statusReason?: string;
  resolvedAt?: number;
}

export type ApplyResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: string };

export interface FlushResult {
  readonly applied: number;
  readonly stale: number;
  readonly deferred: number;
}

export type PatchStats = Readonly<Record<PatchStatus | "total", number>>;

export interface PatchStatusChange {
  readonly patch: PatchCandidate;
  readonly previous: PatchStatus | null;
}

// ---------------------------------------------------------------------------
// Conflict regions
// ---------------------------------------------------------------------------

/** A marker region found by scanning buffer text. Bodies are empty when start > end. */
export interface ConflictRegion {
  readonly startLine: number;
  readonly currentStart: number;
  readonly currentEnd: number;
  readonly separatorLine: number;
  readonly incomingStart: number;
  readonly incomingEnd: number;
  readonly endLine: number;
}

export type ResolutionChoice = "current" | "incoming" | "both" | "none";

export interface ResolutionResult {
  readonly choice: ResolutionChoice;
  readonly startLine: number;
  readonly lineCount: number;
  readonly remaining: number;
}

export interface ConflictsChange {
  readonly bufferId: string;
  readonly conflicts: readonly ConflictRegion[];
}

export interface ConflictMenuItem {
  readonly choice: ResolutionChoice;
  readonly label: string;
  readonly description: string;
}

// ===========================================================================
// Dependency inversion interfaces over VS Code APIs
// ===========================================================================

/** Typed event emitter (abstracts vscode.EventEmitter) */
export interface IEventEmitter<T> {
  readonly event: (listener: (e: T) => void) => { dispose(): void };
  fire(data: T): void;
  dispose(): void;
}

/** Factory for creating IEventEmitter instances */
export interface IEventEmitterFactory {
  create<T>(): IEventEmitter<T>;
}
