import * as vscode from "vscode";
import { SettingsService } from "./settingsService";
import type { PromptPatchSettings } from "./types";

// ===========================================================================
// VS Code Settings Adapter
//
// The only settings file that imports vscode. Reads/writes configuration
// via vscode.workspace.getConfiguration("promptpatch").
// ===========================================================================

export const CONFIG_SECTION = "promptpatch";

/** Every key read from the configuration, relative to the section. */
export const SETTING_KEYS = [
  "patch.useConflictMode",
  "patch.flushIntervalMs",
  "patch.maxPatchAgeMs",
  "patch.cleanupIntervalMs",
  "patch.sortImports",
  "patch.typingQuietPeriodMs",
  "patch.treatAnySelectionAsUnsafe",
  "conflict.lintAfterAccept",
  "conflict.autoFixLintErrors",
  "conflict.autoShowMenu",
  "conflict.autoShowNextConflict",
  "conflict.incomingLabel",
  "conflict.lintSettleDelayMs",
  "conflict.saveBeforeLint",
  "prompt.openTag",
  "prompt.closeTag",
  "prompt.companionMarker",
  "generation.vendor",
  "generation.modelFamily",
  "generation.additionalModelFamilies",
  "generation.minConfidence",
] as const;

/** Abstraction over settings reading. */
export interface ISettingsProvider {
  getSettings(): PromptPatchSettings;
  onDidChangeSettings(
    listener: (settings: PromptPatchSettings) => void
  ): { dispose(): void };
}

/**
 * Reads PromptPatch settings from VS Code's configuration API and resolves
 * them via {@link SettingsService}. Emits change events when the user
 * modifies settings.
 */
export class VsCodeSettingsAdapter implements ISettingsProvider {
  private readonly service = new SettingsService();

  constructor(
    private readonly onInvalid?: (field: string, message: string) => void
  ) {}

  getSettings(): PromptPatchSettings {
    const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
    const raw: Record<string, unknown> = {};
    for (const key of SETTING_KEYS) {
      raw[key] = config.get(key);
    }

    const { settings, errors } = this.service.resolve(raw);
    for (const error of errors) {
      this.onInvalid?.(`${CONFIG_SECTION}.${error.field}`, error.message);
    }
    return settings;
  }

  onDidChangeSettings(
    listener: (settings: PromptPatchSettings) => void
  ): { dispose(): void } {
    const disposable = vscode.workspace.onDidChangeConfiguration((e) => {
      if (e.affectsConfiguration(CONFIG_SECTION)) {
        listener(this.getSettings());
      }
    });
    return { dispose: () => disposable.dispose() };
  }

  /** Write a single setting via VS Code's configuration API. */
  async updateSetting(
    key: string,
    value: unknown,
    target: vscode.ConfigurationTarget = vscode.ConfigurationTarget.Global
  ): Promise<void> {
    const config = vscode.workspace.getConfiguration(CONFIG_SECTION);
    await config.update(key, value, target);
  }
}
