/**
 * Shared test factory helpers.
 *
 * Every factory accepts a Partial<T> override and returns a valid default.
 * Import from here instead of duplicating factories in each test file.
 */

import { vi } from "vitest";
import { AnchorTracker } from "../patching/positionAnchors";
import { snapshotBuffer } from "../patching/snapshot";
import type {
  IBufferRegistry,
  IEditorState,
  IEventEmitter,
  IEventEmitterFactory,
  ILintValidator,
  ITextBuffer,
  LintResult,
  PatchCandidate,
  PromptEvent,
} from "../patching/types";
import type {
  GenerationContext,
  ICancellationToken,
  ICancellationTokenSource,
  ICancellationTokenSourceFactory,
  IGenerationProvider,
  ILanguageModel,
  ILanguageModelMessage,
  ILanguageModelProvider,
  ILanguageModelResponse,
} from "../generation/types";
import type { IStateStore } from "../utils/stateStore";
import type { Logger } from "../utils/logger";
import { GenerationError } from "../utils/errors";

// ---------------------------------------------------------------------------
// Buffers
// ---------------------------------------------------------------------------

/** ITextBuffer over an array of lines. */
export class InMemoryTextBuffer implements ITextBuffer {
  readonly anchors = new AnchorTracker();

  private lines: string[];
  private changeCounter = 0;
  private valid = true;

  constructor(
    readonly id: string,
    readonly path: string,
    text: string,
    readonly languageId = "typescript"
  ) {
    this.lines = text.split("\n");
  }

  isValid(): boolean {
    return this.valid;
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

  replaceLines(startLine: number, endLine: number, lines: readonly string[]): void {
    const removed = Math.max(0, endLine - startLine + 1);
    this.lines.splice(startLine - 1, removed, ...lines);
    if (this.lines.length === 0) this.lines = [""];
    this.anchors.applyEdit(startLine, removed, lines.length);
    this.changeCounter++;
  }

  getText(): string {
    return this.lines.join("\n");
  }

  /** Simulates a counter bump with no content change (e.g. a save). */
  touch(): void {
    this.changeCounter++;
  }

  close(): void {
    this.valid = false;
    this.anchors.clear();
  }
}

export function makeBuffer(
  text: string,
  overrides?: { id?: string; path?: string; languageId?: string }
): InMemoryTextBuffer {
  const path = overrides?.path ?? "/work/src/app.ts";
  return new InMemoryTextBuffer(overrides?.id ?? path, path, text, overrides?.languageId ?? "typescript");
}

export class InMemoryBufferRegistry implements IBufferRegistry {
  private readonly buffers = new Map<string, InMemoryTextBuffer>();
  /** Buffers `load` hands out for paths with no valid open buffer. */
  readonly onDisk = new Map<string, InMemoryTextBuffer>();

  constructor(...buffers: InMemoryTextBuffer[]) {
    for (const b of buffers) this.add(b);
  }

  add(buffer: InMemoryTextBuffer): InMemoryTextBuffer {
    this.buffers.set(buffer.id, buffer);
    return buffer;
  }

  get(id: string): InMemoryTextBuffer | undefined {
    return this.buffers.get(id);
  }

  findByPath(path: string): InMemoryTextBuffer | undefined {
    return [...this.buffers.values()].find((b) => b.path === path && b.isValid());
  }

  list(): readonly InMemoryTextBuffer[] {
    return [...this.buffers.values()];
  }

  load(path: string): InMemoryTextBuffer | undefined {
    const open = this.findByPath(path);
    if (open) return open;
    const fromDisk = this.onDisk.get(path);
    return fromDisk ? this.add(fromDisk) : undefined;
  }
}

// ---------------------------------------------------------------------------
// Editor state and lint validation
// ---------------------------------------------------------------------------

export class FakeEditorState implements IEditorState {
  insertMode = false;
  completionVisible = false;
  /** Buffer ids with a non-empty selection. */
  readonly selections = new Set<string>();
  readonly cursors = new Map<string, number>();
  readonly revealed: { bufferId: string; line: number }[] = [];

  isInsertMode(): boolean {
    return this.insertMode;
  }

  hasActiveSelection(bufferId?: string): boolean {
    return bufferId === undefined ? this.selections.size > 0 : this.selections.has(bufferId);
  }

  isCompletionVisible(): boolean {
    return this.completionVisible;
  }

  getCursorLine(bufferId: string): number | undefined {
    return this.cursors.get(bufferId);
  }

  revealLine(bufferId: string, line: number): void {
    this.revealed.push({ bufferId, line });
    this.cursors.set(bufferId, line);
  }
}

export function makeLintResult(overrides?: Partial<LintResult>): LintResult {
  return {
    hasErrors: true,
    errorCount: 1,
    warningCount: 0,
    messages: [{ line: 3, severity: "error", message: "Cannot find name 'x'" }],
    ...overrides,
  };
}

export class FakeLintValidator implements ILintValidator {
  result: LintResult | null = null;
  readonly validated: { bufferId: string; startLine: number; endLine: number }[] = [];
  readonly fixRequests: { bufferId: string; result: LintResult }[] = [];

  async validateAfterInjection(buffer: ITextBuffer, startLine: number, endLine: number): Promise<LintResult | null> {
    this.validated.push({ bufferId: buffer.id, startLine, endLine });
    return this.result;
  }

  async requestFix(buffer: ITextBuffer, result: LintResult): Promise<void> {
    this.fixRequests.push({ bufferId: buffer.id, result });
  }
}

// ---------------------------------------------------------------------------
// Domain object factories
// ---------------------------------------------------------------------------

export function makeEvent(overrides?: Partial<PromptEvent>): PromptEvent {
  return {
    id: "evt-1",
    sourceBufferId: "/work/src/app.ts",
    targetPath: "/work/src/app.ts",
    prompt: "add a helper",
    range: { startLine: 2, endLine: 2 },
    timestamp: 1000,
    ...overrides,
  };
}

export function makePatch(
  buffer: ITextBuffer,
  overrides?: Partial<PatchCandidate>
): PatchCandidate {
  return {
    id: "patch-1",
    eventId: "evt-1",
    sourceBufferId: buffer.id,
    targetBufferId: buffer.id,
    targetPath: buffer.path,
    originalSnapshot: snapshotBuffer(buffer),
    generatedCode: "const added = true;",
    injectionStrategy: "append",
    confidence: 0.9,
    isInlinePrompt: false,
    useSearchReplace: false,
    searchReplaceBlocks: [],
    createdAt: 1000,
    status: "pending",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

/**
 * Scripted IGenerationProvider. With `hold`, generate() waits for
 * `release()` or cancellation, which rejects like a real provider would.
 */
export class FakeGenerationProvider implements IGenerationProvider {
  readonly requests: { prompt: string; context: GenerationContext }[] = [];
  response = "const generated = 1;";
  failure: Error | null = null;
  hold = false;
  available = true;

  private waiting: (() => void)[] = [];

  constructor(readonly id = "fake/model") {}

  async generate(prompt: string, context: GenerationContext, token: ICancellationToken): Promise<string> {
    this.requests.push({ prompt, context });
    if (this.hold) {
      await new Promise<void>((resolve, reject) => {
        this.waiting.push(resolve);
        token.onCancellationRequested(() => reject(new GenerationError(this.id, "cancelled")));
      });
    }
    if (this.failure) throw this.failure;
    return this.response;
  }

  async validate(): Promise<boolean> {
    return this.available;
  }

  release(): void {
    const waiting = this.waiting;
    this.waiting = [];
    for (const resolve of waiting) resolve();
  }
}

export function makeMockLanguageModelProvider(
  responseChunks: string[] = ["Done."],
  family = "mock-family"
): { provider: ILanguageModelProvider; capturedPrompts: string[] } {
  const capturedPrompts: string[] = [];
  const model: ILanguageModel = {
    id: "mock-model",
    vendor: "copilot",
    family,
    name: "Mock Model",
    maxInputTokens: 100000,
    sendRequest: vi.fn(
      async (messages: readonly ILanguageModelMessage[]): Promise<ILanguageModelResponse> => {
        capturedPrompts.push(messages.map((m) => m.content).join("\n"));
        return {
          text: (async function* () {
            for (const c of responseChunks) yield c;
          })(),
        };
      }
    ),
  };
  return {
    provider: { selectModels: vi.fn(async () => [model]) },
    capturedPrompts,
  };
}

// ---------------------------------------------------------------------------
// Mock infrastructure helpers
// ---------------------------------------------------------------------------

/** Synchronous emitter, so tests can observe events. */
export function makeMockEmitterFactory(): IEventEmitterFactory {
  return {
    create: <T>(): IEventEmitter<T> => {
      let listeners: ((e: T) => void)[] = [];
      return {
        event: (listener: (e: T) => void) => {
          listeners.push(listener);
          return {
            dispose: () => {
              listeners = listeners.filter((l) => l !== listener);
            },
          };
        },
        fire: (data: T) => {
          for (const l of listeners) l(data);
        },
        dispose: () => {
          listeners = [];
        },
      };
    },
  };
}

export function makeMockCancellationFactory(): ICancellationTokenSourceFactory & {
  sources: ICancellationTokenSource[];
} {
  const sources: ICancellationTokenSource[] = [];
  return {
    sources,
    create: () => {
      let cancelled = false;
      let listeners: (() => void)[] = [];
      const source: ICancellationTokenSource = {
        token: {
          get isCancellationRequested() {
            return cancelled;
          },
          onCancellationRequested: (listener: () => void) => {
            listeners.push(listener);
            return { dispose: () => {} };
          },
        },
        cancel: () => {
          if (cancelled) return;
          cancelled = true;
          for (const l of listeners) l();
        },
        dispose: () => {
          listeners = [];
        },
      };
      sources.push(source);
      return source;
    },
  };
}

export function makeMockStateStore(): IStateStore & { data: Map<string, unknown> } {
  const data = new Map<string, unknown>();
  return {
    data,
    save: vi.fn(async (key: string, state: unknown) => {
      data.set(key, state);
    }),
    load: vi.fn(async (key: string) => data.get(key) ?? null),
    delete: vi.fn(async (key: string) => {
      data.delete(key);
    }),
  };
}

export function makeMockLogger(): Logger & {
  trace: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
