import * as vscode from "vscode";
import type { Logger } from "../utils/logger";
import { NullLogger } from "../utils/logger";
import { normalizeError } from "../utils/errors";
import { AnchorTracker } from "./positionAnchors";
import { OwnEditLedger } from "./ownEdits";
import { buildLintFixPrompt, lintFixRange, summarizeLint } from "./lintFix";
import type {
  IBufferRegistry,
  IEditorState,
  IEventEmitter,
  IEventEmitterFactory,
  ILintValidator,
  ITextBuffer,
  LineRange,
  LintMessage,
  LintResult,
} from "./types";

// ===========================================================================
// VS Code API adapters
//
// Bridges the patching interfaces to text documents, editors and
// diagnostics. This is the ONLY file in the patching module that imports
// `vscode` directly.
// ===========================================================================

function normalizePath(path: string): string {
  return path.replace(/\\/g, "/");
}

// ---------------------------------------------------------------------------
// Text buffer
// ---------------------------------------------------------------------------

/**
 * A text document seen through ITextBuffer. Edits land in a line shadow
 * synchronously and reach the document through a serial chain of
 * WorkspaceEdits, so callers can read back what they wrote straight away.
 */
export class VsCodeTextBuffer implements ITextBuffer {
  readonly id: string;
  readonly anchors = new AnchorTracker();

  private lines: string[];
  private changeCounter = 0;
  private pendingEdits = 0;
  private closed = false;
  private editChain: Promise<void> = Promise.resolve();
  private readonly ownEdits = new OwnEditLedger();

  constructor(
    readonly document: vscode.TextDocument,
    private readonly logger: Logger = new NullLogger()
  ) {
    this.id = document.uri.toString();
    this.lines = splitDocument(document.getText());
  }

  get path(): string {
    return this.document.uri.fsPath;
  }

  get languageId(): string {
    return this.document.languageId;
  }

  isValid(): boolean {
    return !this.closed && !this.document.isClosed;
  }

  getChangeCounter(): number {
    return this.changeCounter;
  }

  getLineCount(): number {
    return this.lines.length;
  }

  getLines(startLine = 1, endLine = this.lines.length): string[] {
    return this.lines.slice(Math.max(0, startLine - 1), Math.max(0, endLine));
  }

  getText(): string {
    return this.lines.join("\n");
  }

  replaceLines(startLine: number, endLine: number, lines: readonly string[]): void {
    const lineCount = this.lines.length;
    const removed = Math.max(0, endLine - startLine + 1);
    const { range, text } = toDocumentEdit(this.lines, startLine, endLine, lines);

    this.lines.splice(startLine - 1, removed, ...lines);
    if (this.lines.length === 0) this.lines = [""];
    this.anchors.applyEdit(startLine, removed, lines.length);
    this.changeCounter++;
    this.logger.trace(`${this.path}: replaced ${removed} of ${lineCount} line(s) with ${lines.length}`);

    this.pendingEdits++;
    this.ownEdits.expect({ range, text });
    this.editChain = this.editChain
      .then(() => this.applyToDocument(range, text))
      .catch((err: unknown) => {
        this.logger.error(`Edit to ${this.path} failed: ${normalizeError(err).message}`);
      })
      .finally(() => {
        this.pendingEdits--;
        if (this.pendingEdits === 0) this.resync();
      });
  }

  /** Resolves once every queued edit has reached the document. */
  flush(): Promise<void> {
    return this.editChain;
  }

  /**
   * Document changes, including the echoes of this buffer's own edits.
   * Returns true when some change was made by someone else (typing, other
   * extensions).
   */
  handleDocumentChange(changes: readonly vscode.TextDocumentContentChangeEvent[]): boolean {
    const { foreign } = this.ownEdits.partition(changes);
    if (foreign.length === 0) return false;

    if (this.pendingEdits > 0) {
      // Positions mix document states with and without our queued edits
      this.logger.debug(`${this.path}: edited while own edits are pending, dropping anchors`);
      this.anchors.invalidateAll();
      this.changeCounter++;
      return true;
    }

    const ordered = [...foreign].sort((a, b) => b.range.start.line - a.range.start.line);
    for (const change of ordered) {
      const removed = change.range.end.line - change.range.start.line;
      const inserted = change.text.split("\n").length - 1;
      if (removed !== 0 || inserted !== 0) {
        // Line start.line itself survives; everything after it shifts
        this.anchors.applyEdit(change.range.start.line + 2, removed, inserted);
      }
    }

    this.lines = splitDocument(this.document.getText());
    this.changeCounter++;
    return true;
  }

  /** Also invalidates every anchor, which makes pending transforms fall back to staleness checks. */
  close(): void {
    this.closed = true;
    this.anchors.clear();
  }

  private async applyToDocument(range: vscode.Range, text: string): Promise<void> {
    const edit = new vscode.WorkspaceEdit();
    edit.replace(this.document.uri, range, text);
    const applied = await vscode.workspace.applyEdit(edit);
    if (!applied) {
      this.logger.warn(`Edit to ${this.path} was rejected by the editor`);
    }
  }

  private resync(): void {
    this.ownEdits.clear();
    const actual = splitDocument(this.document.getText());
    if (actual.join("\n") !== this.lines.join("\n")) {
      this.logger.debug(`${this.path}: shadow out of sync, reloading from document`);
      this.lines = actual;
      this.anchors.invalidateAll();
      this.changeCounter++;
    }
  }
}

function splitDocument(text: string): string[] {
  return text.replace(/\r\n/g, "\n").split("\n");
}

/** The document range and text equivalent to a line splice on `current`. */
function toDocumentEdit(
  current: readonly string[],
  startLine: number,
  endLine: number,
  lines: readonly string[]
): { range: vscode.Range; text: string } {
  const lineCount = current.length;
  const lastLength = (line: number): number => (current[line - 1] ?? "").length;

  // Pure insertion
  if (endLine < startLine) {
    if (startLine <= lineCount) {
      const at = new vscode.Position(startLine - 1, 0);
      return { range: new vscode.Range(at, at), text: lines.map((l) => `${l}\n`).join("") };
    }
    const at = new vscode.Position(lineCount - 1, lastLength(lineCount));
    return { range: new vscode.Range(at, at), text: lines.map((l) => `\n${l}`).join("") };
  }

  if (endLine < lineCount) {
    return {
      range: new vscode.Range(startLine - 1, 0, endLine, 0),
      text: lines.map((l) => `${l}\n`).join(""),
    };
  }

  // The replaced block runs to the end of the document
  if (lines.length === 0 && startLine > 1) {
    return {
      range: new vscode.Range(startLine - 2, lastLength(startLine - 1), endLine - 1, lastLength(endLine)),
      text: "",
    };
  }
  return {
    range: new vscode.Range(startLine - 1, 0, endLine - 1, lastLength(endLine)),
    text: lines.join("\n"),
  };
}

// ---------------------------------------------------------------------------
// Buffer registry
// ---------------------------------------------------------------------------

export class VsCodeBufferRegistry implements IBufferRegistry, vscode.Disposable {
  /** Fires the id of a buffer whose document was closed. */
  readonly onDidCloseBuffer: IEventEmitter<string>;
  /** Fires the id of a buffer whose document someone else edited. */
  readonly onDidEditByUser: IEventEmitter<string>;

  private readonly buffers = new Map<string, VsCodeTextBuffer>();
  private readonly byPath = new Map<string, VsCodeTextBuffer>();
  private readonly subscriptions: vscode.Disposable[] = [];

  constructor(
    emitterFactory: IEventEmitterFactory,
    private readonly logger: Logger = new NullLogger()
  ) {
    this.onDidCloseBuffer = emitterFactory.create<string>();
    this.onDidEditByUser = emitterFactory.create<string>();

    this.subscriptions.push(
      vscode.workspace.onDidChangeTextDocument((e) => {
        const id = e.document.uri.toString();
        if (this.buffers.get(id)?.handleDocumentChange(e.contentChanges)) {
          this.onDidEditByUser.fire(id);
        }
      }),
      vscode.workspace.onDidCloseTextDocument((document) => {
        this.forget(document.uri.toString());
      })
    );
  }

  /** Wrap a document, reusing the existing buffer when it is already tracked. */
  track(document: vscode.TextDocument): VsCodeTextBuffer {
    const id = document.uri.toString();
    const existing = this.buffers.get(id);
    if (existing?.isValid()) return existing;

    const buffer = new VsCodeTextBuffer(document, this.logger);
    this.buffers.set(id, buffer);
    this.byPath.set(normalizePath(buffer.path), buffer);
    return buffer;
  }

  get(id: string): VsCodeTextBuffer | undefined {
    return this.buffers.get(id);
  }

  findByPath(path: string): VsCodeTextBuffer | undefined {
    return this.byPath.get(normalizePath(path));
  }

  list(): readonly VsCodeTextBuffer[] {
    return [...this.buffers.values()];
  }

  /** Only documents VS Code already has open can be acquired synchronously. */
  load(path: string): VsCodeTextBuffer | undefined {
    const wanted = normalizePath(path);
    const document = vscode.workspace.textDocuments.find(
      (d) => !d.isClosed && normalizePath(d.uri.fsPath) === wanted
    );
    return document ? this.track(document) : undefined;
  }

  dispose(): void {
    for (const s of this.subscriptions) s.dispose();
    this.subscriptions.length = 0;
    this.buffers.clear();
    this.byPath.clear();
    this.onDidCloseBuffer.dispose();
    this.onDidEditByUser.dispose();
  }

  private forget(id: string): void {
    const buffer = this.buffers.get(id);
    if (!buffer) return;
    buffer.close();
    this.buffers.delete(id);
    const key = normalizePath(buffer.path);
    if (this.byPath.get(key) === buffer) this.byPath.delete(key);
    this.onDidCloseBuffer.fire(id);
  }
}

// ---------------------------------------------------------------------------
// Editor state
// ---------------------------------------------------------------------------

/**
 * VS Code has no modes, so "insert mode" means a keystroke landed within
 * the quiet period. Edits made by our own buffers are not typing; tracked
 * documents report the rest through the registry.
 */
export class VsCodeEditorState implements IEditorState, vscode.Disposable {
  private lastTypingAt = Number.NEGATIVE_INFINITY;
  private readonly subscriptions: { dispose(): void }[];

  constructor(
    private readonly registry: VsCodeBufferRegistry,
    private typingQuietPeriodMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.subscriptions = [
      vscode.workspace.onDidChangeTextDocument((e) => {
        if (e.contentChanges.length === 0) return;
        if (this.registry.get(e.document.uri.toString())) return;
        this.noteTyping(e.document.uri.toString());
      }),
      this.registry.onDidEditByUser.event((id) => this.noteTyping(id)),
    ];
  }

  configure(typingQuietPeriodMs: number): void {
    this.typingQuietPeriodMs = typingQuietPeriodMs;
  }

  isInsertMode(): boolean {
    return this.now() - this.lastTypingAt < this.typingQuietPeriodMs;
  }

  hasActiveSelection(bufferId?: string): boolean {
    return vscode.window.visibleTextEditors
      .filter((e) => bufferId === undefined || e.document.uri.toString() === bufferId)
      .some((e) => e.selections.some((s) => !s.isEmpty));
  }

  /** Not exposed by the extension API. */
  isCompletionVisible(): boolean {
    return false;
  }

  getCursorLine(bufferId: string): number | undefined {
    const editor = this.editorFor(bufferId);
    return editor ? editor.selection.active.line + 1 : undefined;
  }

  revealLine(bufferId: string, line: number): void {
    const editor = this.editorFor(bufferId);
    if (!editor) return;
    const position = new vscode.Position(Math.max(0, line - 1), 0);
    editor.selection = new vscode.Selection(position, position);
    editor.revealRange(new vscode.Range(position, position), vscode.TextEditorRevealType.InCenterIfOutsideViewport);
  }

  dispose(): void {
    for (const s of this.subscriptions) s.dispose();
  }

  private noteTyping(documentId: string): void {
    const visible = vscode.window.visibleTextEditors.some((ed) => ed.document.uri.toString() === documentId);
    if (visible) this.lastTypingAt = this.now();
  }

  private editorFor(bufferId: string): vscode.TextEditor | undefined {
    const active = vscode.window.activeTextEditor;
    if (active?.document.uri.toString() === bufferId) return active;
    return vscode.window.visibleTextEditors.find((e) => e.document.uri.toString() === bufferId);
  }
}

// ---------------------------------------------------------------------------
// Lint validator (diagnostics)
// ---------------------------------------------------------------------------

export interface LintValidatorConfig {
  /** Time given to language servers to publish diagnostics after an edit. */
  readonly settleDelayMs: number;
  readonly saveBeforeValidate: boolean;
}

export type LintFixRequester = (buffer: ITextBuffer, range: LineRange, prompt: string) => Promise<unknown>;

export class VsCodeLintValidator implements ILintValidator {
  constructor(
    private config: LintValidatorConfig,
    private readonly fix: LintFixRequester,
    private readonly logger: Logger = new NullLogger()
  ) {}

  configure(config: Partial<LintValidatorConfig>): void {
    this.config = { ...this.config, ...config };
  }

  async validateAfterInjection(buffer: ITextBuffer, startLine: number, endLine: number): Promise<LintResult | null> {
    if (this.config.saveBeforeValidate && buffer instanceof VsCodeTextBuffer) {
      await buffer.flush();
      await buffer.document.save();
    }
    await delay(this.config.settleDelayMs);
    if (!buffer.isValid()) return null;

    const messages: LintMessage[] = [];
    for (const diagnostic of vscode.languages.getDiagnostics(vscode.Uri.parse(buffer.id))) {
      const line = diagnostic.range.start.line + 1;
      if (line < startLine || line > endLine) continue;
      if (diagnostic.severity === vscode.DiagnosticSeverity.Error) {
        messages.push({ line, severity: "error", message: diagnostic.message });
      } else if (diagnostic.severity === vscode.DiagnosticSeverity.Warning) {
        messages.push({ line, severity: "warning", message: diagnostic.message });
      }
    }

    const errorCount = messages.filter((m) => m.severity === "error").length;
    const result: LintResult = {
      hasErrors: errorCount > 0,
      errorCount,
      warningCount: messages.length - errorCount,
      messages,
    };
    this.logger.info(`Lint check of lines ${startLine}-${endLine}: ${summarizeLint(result)}`);
    return result;
  }

  async requestFix(buffer: ITextBuffer, result: LintResult): Promise<void> {
    const range = lintFixRange(result, buffer.getLineCount());
    if (!range) return;
    this.logger.info(`Requesting fix for lines ${range.startLine}-${range.endLine}`);
    await this.fix(buffer, range, buildLintFixPrompt(result));
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Event Emitter Factory
// ---------------------------------------------------------------------------

export class VsCodeEventEmitterFactory implements IEventEmitterFactory {
  create<T>(): IEventEmitter<T> {
    return new VsCodeEventEmitterAdapter<T>();
  }
}

class VsCodeEventEmitterAdapter<T> implements IEventEmitter<T> {
  private readonly emitter = new vscode.EventEmitter<T>();

  get event(): (listener: (e: T) => void) => { dispose(): void } {
    return (listener: (e: T) => void) => this.emitter.event(listener);
  }

  fire(data: T): void {
    this.emitter.fire(data);
  }

  dispose(): void {
    this.emitter.dispose();
  }
}
