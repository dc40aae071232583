import * as vscode from "vscode";
import {
  ConflictMergeEngine,
  HeuristicScopeResolver,
  PatchManager,
  PromptProcessor,
  SmartCodeInjector,
  VsCodeBufferRegistry,
  VsCodeEditorState,
  VsCodeEventEmitterFactory,
  VsCodeLintValidator,
} from "./patching";
import {
  LanguageModelGenerationProvider,
  ProviderAccuracyStats,
  VsCodeCancellationTokenSourceFactory,
  VsCodeLanguageModelProvider,
  VsCodeStateStoreAdapter,
} from "./generation";
import type { IGenerationProvider, ILanguageModelProvider } from "./generation";
import {
  VsCodeSettingsAdapter,
  conflictEngineConfig,
  modelSelectors,
  patchManagerConfig,
  promptProcessorConfig,
} from "./settings";
import type { PromptPatchSettings } from "./settings";
import { ConflictDecorations } from "./ui";
import { OutcomeFrequencyTracker, normalizeError } from "./utils";
import { registerAllCommands } from "./commands";
import type { CommandDeps } from "./commands";

let logger: vscode.LogOutputChannel | undefined;

export function activate(context: vscode.ExtensionContext): void {
  const log = vscode.window.createOutputChannel("PromptPatch", { log: true });
  logger = log;
  context.subscriptions.push(log);
  log.info("PromptPatch activating...");

  const settingsAdapter = new VsCodeSettingsAdapter((field, message) =>
    log.warn(`Invalid setting ${field}: ${message}`)
  );
  let settings = settingsAdapter.getSettings();

  // Adapters
  const emitterFactory = new VsCodeEventEmitterFactory();
  const registry = new VsCodeBufferRegistry(emitterFactory, log);
  const editor = new VsCodeEditorState(registry, settings.patch.typingQuietPeriodMs);
  context.subscriptions.push(registry, editor);

  // Statistics
  const outcomes = new OutcomeFrequencyTracker();
  const accuracy = new ProviderAccuracyStats(new VsCodeStateStoreAdapter(context.globalState), log);
  void accuracy.load().then(() => log.debug("Provider accuracy loaded"));

  // Pipeline
  const scopeResolver = new HeuristicScopeResolver();
  const lintValidator: VsCodeLintValidator = new VsCodeLintValidator(
    {
      settleDelayMs: settings.conflict.lintSettleDelayMs,
      saveBeforeValidate: settings.conflict.saveBeforeLint,
    },
    (buffer, range, prompt) => processor.transformSelection(buffer, range, prompt, "replace"),
    log
  );
  const conflicts = new ConflictMergeEngine(conflictEngineConfig(settings), {
    editor,
    emitterFactory,
    lintValidator,
    logger: log,
  });
  const patches = new PatchManager(patchManagerConfig(settings), {
    buffers: registry,
    editor,
    injector: new SmartCodeInjector(),
    conflicts,
    emitterFactory,
    scopeResolver,
    recorder: outcomes,
    logger: log,
  });

  const lmProvider = new VsCodeLanguageModelProvider();
  let providers = buildProviders(lmProvider, settings);
  const processor = new PromptProcessor(promptProcessorConfig(settings), {
    patches,
    buffers: registry,
    providers: () => providers,
    accuracy,
    cancellation: new VsCodeCancellationTokenSourceFactory(),
    scopeResolver,
    logger: log,
  });
  context.subscriptions.push({
    dispose: () => {
      processor.dispose();
      patches.dispose();
      conflicts.dispose();
    },
  });

  // Conflict view
  const decorations = new ConflictDecorations(conflicts, registry);
  context.subscriptions.push(
    decorations,
    vscode.languages.registerCodeLensProvider({ scheme: "file" }, decorations)
  );

  // Reviewed suggestions feed provider accuracy
  context.subscriptions.push(
    conflicts.onDidResolveConflict.event(({ bufferId, result }) => {
      const providerId = processor.lastProviderFor(bufferId);
      if (!providerId) return;
      accuracy.recordOutcome(providerId, result.choice === "incoming" || result.choice === "both");
    }),
    registry.onDidCloseBuffer.event((bufferId) => {
      const requests = processor.cancelForBuffer(bufferId);
      const cancelled = patches.cancelForBuffer(bufferId);
      if (requests + cancelled > 0) {
        log.info(`Document closed: cancelled ${requests} request(s) and ${cancelled} patch(es)`);
      }
    })
  );

  // Timers
  let timers = startTimers(patches, settings, log);
  context.subscriptions.push({ dispose: () => stopTimers(timers) });

  // Settings changes
  context.subscriptions.push(
    settingsAdapter.onDidChangeSettings((updated) => {
      settings = updated;
      patches.configure(patchManagerConfig(settings));
      conflicts.configure(conflictEngineConfig(settings));
      processor.configure(promptProcessorConfig(settings));
      editor.configure(settings.patch.typingQuietPeriodMs);
      lintValidator.configure({
        settleDelayMs: settings.conflict.lintSettleDelayMs,
        saveBeforeValidate: settings.conflict.saveBeforeLint,
      });
      providers = buildProviders(lmProvider, settings);
      stopTimers(timers);
      timers = startTimers(patches, settings, log);
      log.info("Settings updated");
    })
  );

  const commandDeps: CommandDeps = {
    patches,
    conflicts,
    processor,
    registry,
    accuracy,
    outcomes,
    settingsAdapter,
    logger: log,
  };
  registerAllCommands(context, commandDeps);

  log.info("PromptPatch activated");
}

export function deactivate(): void {
  logger?.info("PromptPatch deactivated");
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildProviders(
  lmProvider: ILanguageModelProvider,
  settings: PromptPatchSettings
): IGenerationProvider[] {
  return modelSelectors(settings.generation).map(
    (selector) => new LanguageModelGenerationProvider(lmProvider, selector)
  );
}

interface Timers {
  readonly flush: ReturnType<typeof setInterval>;
  readonly cleanup: ReturnType<typeof setInterval>;
}

function startTimers(
  patches: PatchManager,
  settings: PromptPatchSettings,
  log: vscode.LogOutputChannel
): Timers {
  const flush = setInterval(() => {
    if (patches.getPending().length === 0) return;
    try {
      const { applied, stale } = patches.flushPending();
      if (applied + stale > 0) log.debug(`Flush: ${applied} applied, ${stale} stale`);
    } catch (err) {
      log.error(`Flush failed: ${normalizeError(err).message}`);
    }
  }, settings.patch.flushIntervalMs);

  const cleanup = setInterval(() => {
    const removed = patches.cleanup(settings.patch.maxPatchAgeMs);
    if (removed > 0) log.debug(`Cleanup: removed ${removed} old patch(es)`);
  }, settings.patch.cleanupIntervalMs);

  return { flush, cleanup };
}

function stopTimers(timers: Timers): void {
  clearInterval(timers.flush);
  clearInterval(timers.cleanup);
}
