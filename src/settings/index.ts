export { SettingsService, DEFAULT_SETTINGS } from "./settingsService";
export { VsCodeSettingsAdapter, CONFIG_SECTION, SETTING_KEYS } from "./vscodeSettingsAdapter";
export type { ISettingsProvider } from "./vscodeSettingsAdapter";
export type {
  PromptPatchSettings,
  PatchSettings,
  ConflictSettings,
  PromptSettings,
  GenerationSettings,
  SettingsValidationError,
} from "./types";
export {
  conflictEngineConfig,
  modelSelectors,
  patchManagerConfig,
  promptProcessorConfig,
  tagDelimiters,
} from "./componentConfig";
