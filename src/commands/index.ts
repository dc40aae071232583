import type * as vscode from "vscode";
import type { PatchManager } from "../patching/patchManager";
import type { ConflictMergeEngine } from "../patching/conflictMergeEngine";
import type { PromptProcessor } from "../patching/promptProcessor";
import type { VsCodeBufferRegistry } from "../patching/vscodeAdapters";
import type { ProviderAccuracyStats } from "../generation/providerAccuracy";
import type { VsCodeSettingsAdapter } from "../settings/vscodeSettingsAdapter";
import type { OutcomeFrequencyTracker } from "../utils/telemetry";
import { registerPatchCommands } from "./patchCommands";
import { registerConflictCommands } from "./conflictCommands";

// ===========================================================================
// Command Registration
//
// Aggregates all command modules into a single registration entry point.
// Called from extension.ts activate().
// ===========================================================================

/** Shared dependencies injected into every command module. */
export interface CommandDeps {
  readonly patches: PatchManager;
  readonly conflicts: ConflictMergeEngine;
  readonly processor: PromptProcessor;
  readonly registry: VsCodeBufferRegistry;
  readonly accuracy: ProviderAccuracyStats;
  readonly outcomes: OutcomeFrequencyTracker;
  readonly settingsAdapter: VsCodeSettingsAdapter;
  readonly logger: vscode.LogOutputChannel;
}

/** Register all PromptPatch commands on the extension context. */
export function registerAllCommands(
  context: vscode.ExtensionContext,
  deps: CommandDeps
): void {
  registerPatchCommands(context, deps);
  registerConflictCommands(context, deps);
}
