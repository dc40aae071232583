import { detectIntent, formatIntent } from "../intelligence";
import type { Intent } from "../intelligence";
import { formatBreakdown, scoreConfidence } from "../generation/confidence";
import { buildGenerationPrompt, extractCode, type PromptMode } from "../generation/promptBuilder";
import { selectProvider, type ProviderAccuracyStats } from "../generation/providerAccuracy";
import type {
  GenerationContext,
  ICancellationTokenSource,
  ICancellationTokenSourceFactory,
  IGenerationProvider,
} from "../generation/types";
import { GenerationError, normalizeError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import { NullLogger } from "../utils/logger";
import type { PatchManager } from "./patchManager";
import { hashRegion } from "./snapshot";
import { DEFAULT_TAG_DELIMITERS, findPromptTags, type PromptTag, type TagDelimiters } from "./promptTags";
import type {
  IBufferRegistry,
  IScopeResolver,
  ITextBuffer,
  LineRange,
  PatchCandidate,
  PromptEvent,
} from "./types";

// ===========================================================================
// PromptProcessor
//
// The asynchronous half of the pipeline: turns a prompt tag or a selection
// into a generation request and, once the response is in, hands it to the
// PatchManager. No patch exists while a request is in flight.
// ===========================================================================

export interface PromptProcessorConfig {
  /** Replies scoring below this are dropped. */
  readonly minConfidence: number;
  readonly tags: TagDelimiters;
  readonly companionMarker: string;
}

export const DEFAULT_PROCESSOR_CONFIG: PromptProcessorConfig = {
  minConfidence: 0,
  tags: DEFAULT_TAG_DELIMITERS,
  companionMarker: ".coder.",
};

export interface PromptProcessorDeps {
  readonly patches: PatchManager;
  readonly buffers: IBufferRegistry;
  /** Read on every request so provider changes take effect immediately. */
  readonly providers: () => readonly IGenerationProvider[];
  readonly accuracy: ProviderAccuracyStats;
  readonly cancellation: ICancellationTokenSourceFactory;
  readonly scopeResolver?: IScopeResolver;
  readonly logger?: Logger;
  readonly now?: () => number;
}

interface InFlight {
  readonly bufferId: string;
  readonly source: ICancellationTokenSource;
}

interface GenerationJob {
  readonly key: string;
  readonly source: ITextBuffer;
  readonly target: ITextBuffer;
  readonly event: PromptEvent;
  readonly intent: Intent;
  readonly mode: PromptMode;
}

export class PromptProcessor {
  private readonly inFlight = new Map<string, InFlight>();
  private readonly lastProvider = new Map<string, string>();
  private config: PromptProcessorConfig;
  private eventCounter = 0;

  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: Partial<PromptProcessorConfig>, private readonly deps: PromptProcessorDeps) {
    this.config = { ...DEFAULT_PROCESSOR_CONFIG, ...config };
    this.logger = deps.logger ?? new NullLogger();
    this.now = deps.now ?? Date.now;
  }

  configure(config: Partial<PromptProcessorConfig>): void {
    this.config = { ...this.config, ...config };
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Provider that produced the most recent patch for a target buffer. */
  lastProviderFor(bufferId: string): string | undefined {
    return this.lastProvider.get(bufferId);
  }

  isCompanion(path: string): boolean {
    return path.includes(this.config.companionMarker);
  }

  /** `src/app.coder.ts` → `src/app.ts` */
  companionTargetPath(path: string): string {
    return path.replace(this.config.companionMarker, ".");
  }

  // -------------------------------------------------------------------------
  // Submission
  // -------------------------------------------------------------------------

  /** Submit every prompt tag in the buffer. Resolves with the patches created. */
  async processBuffer(buffer: ITextBuffer): Promise<PatchCandidate[]> {
    const tags = findPromptTags(buffer.getLines(), this.config.tags);
    if (tags.length === 0) {
      this.logger.info(`No prompt tags in ${buffer.path}`);
      return [];
    }

    const results = await Promise.all(tags.map((tag) => this.submit(buffer, tag)));
    return results.filter((p): p is PatchCandidate => p !== null);
  }

  /** Generate code for one prompt tag. `null` when nothing was queued. */
  async submit(buffer: ITextBuffer, tag: PromptTag): Promise<PatchCandidate | null> {
    const prompt = tag.content.trim();
    if (prompt === "") return null;

    const companion = this.isCompanion(buffer.path);
    const targetPath = companion ? this.companionTargetPath(buffer.path) : buffer.path;
    const target = companion ? this.openTarget(targetPath) : buffer;
    if (!target) {
      this.logger.warn(`Target ${targetPath} for companion ${buffer.path} is not available`);
      return null;
    }

    const intent = detectIntent(prompt);
    const scope = companion ? null : this.deps.scopeResolver?.resolve(buffer, tag.range.startLine) ?? null;

    const event: PromptEvent = {
      id: this.nextEventId(),
      sourceBufferId: buffer.id,
      targetPath,
      prompt,
      range: tag.range,
      scope: scope ?? undefined,
      scopeRange: scope ? { startLine: scope.startLine, endLine: scope.endLine } : undefined,
      intent,
      rangeAnchors: buffer.anchors.createPair(tag.range),
      scopeAnchors: scope ? buffer.anchors.createPair(scope) : undefined,
      regionHash: hashRegion(buffer, scope ?? tag.range),
      timestamp: this.now(),
    };

    return this.run({
      key: `${buffer.id}:${tag.range.startLine}:${prompt}`,
      source: buffer,
      target,
      event,
      intent,
      mode: companion ? "companion" : "inline",
    });
  }

  /**
   * Generate code for a selection (`replace`) or at the cursor line
   * (`insert`). The target range is anchored so it follows edits made
   * while the request is in flight.
   */
  async transformSelection(
    buffer: ITextBuffer,
    range: LineRange,
    prompt: string,
    action: "replace" | "insert"
  ): Promise<PatchCandidate | null> {
    const trimmed = prompt.trim();
    if (trimmed === "") return null;

    const injectionRange: LineRange =
      action === "replace" ? range : { startLine: range.startLine, endLine: range.startLine };
    const anchors = buffer.anchors.createPair(injectionRange);

    const intent = detectIntent(trimmed);
    const event: PromptEvent = {
      id: this.nextEventId(),
      sourceBufferId: buffer.id,
      targetPath: buffer.path,
      prompt: trimmed,
      range,
      intent,
      intentOverride: { action },
      injectionRange,
      injectionAnchors: anchors,
      rangeAnchors: buffer.anchors.createPair(range),
      regionHash: hashRegion(buffer, range),
      timestamp: this.now(),
    };

    const patch = await this.run({
      key: `${buffer.id}:selection:${range.startLine}-${range.endLine}:${trimmed}`,
      source: buffer,
      target: buffer,
      event,
      intent,
      mode: "inline",
    });

    if (!patch) buffer.anchors.deletePair(anchors);
    return patch;
  }

  /** Cancel requests started from `bufferId`. */
  cancelForBuffer(bufferId: string): number {
    let cancelled = 0;
    for (const [key, entry] of this.inFlight) {
      if (entry.bufferId !== bufferId) continue;
      entry.source.cancel();
      this.inFlight.delete(key);
      cancelled++;
    }
    return cancelled;
  }

  cancelAll(): void {
    for (const entry of this.inFlight.values()) {
      entry.source.cancel();
    }
    this.inFlight.clear();
  }

  dispose(): void {
    this.cancelAll();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** The event's range anchors never outlive the request. */
  private async run(job: GenerationJob): Promise<PatchCandidate | null> {
    try {
      return await this.execute(job);
    } finally {
      const { rangeAnchors, scopeAnchors } = job.event;
      if (rangeAnchors) job.source.anchors.deletePair(rangeAnchors);
      if (scopeAnchors) job.source.anchors.deletePair(scopeAnchors);
    }
  }

  private async execute(job: GenerationJob): Promise<PatchCandidate | null> {
    if (this.inFlight.has(job.key)) {
      this.logger.debug(`Prompt already in flight: ${job.key}`);
      return null;
    }

    const provider = selectProvider(this.deps.providers(), this.deps.accuracy);
    if (!provider) {
      this.logger.warn("No generation provider available");
      return null;
    }

    const context: GenerationContext = {
      language: job.target.languageId,
      filePath: job.target.path,
      fileContent: job.target.getText(),
    };
    const prompt = buildGenerationPrompt(job.event, job.intent, context, job.mode);
    this.logger.info(`Intent: ${formatIntent(job.intent)} via ${provider.id}`);

    const source = this.deps.cancellation.create();
    this.inFlight.set(job.key, { bufferId: job.source.id, source });

    let response: string;
    try {
      response = await provider.generate(prompt, context, source.token);
    } catch (err) {
      if (source.token.isCancellationRequested) {
        this.logger.debug(`Prompt cancelled: ${job.key}`);
        return null;
      }
      const failure =
        err instanceof GenerationError ? err : new GenerationError(provider.id, normalizeError(err).message, err);
      this.logger.error(failure);
      return null;
    } finally {
      this.inFlight.delete(job.key);
      source.dispose();
    }

    if (source.token.isCancellationRequested) {
      this.logger.debug(`Prompt cancelled: ${job.key}`);
      return null;
    }

    const code = extractCode(response);
    if (code === "") {
      this.logger.warn(`Empty response from ${provider.id}`);
      return null;
    }

    const confidence = scoreConfidence(code, job.event.prompt);
    this.logger.debug(`Confidence ${formatBreakdown(confidence)}`);
    if (confidence.score < this.config.minConfidence) {
      this.logger.warn(
        `Response from ${provider.id} dropped: confidence ${confidence.score.toFixed(2)} < ${this.config.minConfidence}`
      );
      return null;
    }

    this.lastProvider.set(job.target.id, provider.id);
    const patch = this.deps.patches.create(job.event, code, confidence.score);
    const result = this.deps.patches.smartApply(patch);
    if (!result.success) {
      this.logger.debug(`Patch ${patch.id} not applied yet: ${result.error}`);
    }
    return patch;
  }

  private openTarget(path: string): ITextBuffer | undefined {
    return this.deps.buffers.findByPath(path) ?? this.deps.buffers.load(path);
  }

  private nextEventId(): string {
    this.eventCounter++;
    return `evt_${this.now()}_${this.eventCounter}`;
  }
}
