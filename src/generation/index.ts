export { LanguageModelGenerationProvider } from "./languageModelProvider";
export type { ModelSelector } from "./languageModelProvider";
export { buildGenerationPrompt, extractCode, markRegion } from "./promptBuilder";
export type { PromptMode } from "./promptBuilder";
export {
  CONFIDENCE_WEIGHTS,
  scoreConfidence,
  confidenceLevel,
  formatBreakdown,
  bracketsBalanced,
} from "./confidence";
export type {
  ConfidenceBreakdown,
  ConfidenceFactor,
  ConfidenceLevel,
  ConfidenceScore,
} from "./confidence";
export {
  ProviderAccuracyStats,
  selectProvider,
  ACCURACY_STATE_KEY,
} from "./providerAccuracy";
export type { ProviderAccuracy, ProviderAccuracySummary } from "./providerAccuracy";
export {
  VsCodeLanguageModelProvider,
  VsCodeCancellationTokenSourceFactory,
  VsCodeStateStoreAdapter,
} from "./vscodeAdapters";
export type {
  GenerationContext,
  IGenerationProvider,
  ILanguageModelProvider,
  ILanguageModel,
  ILanguageModelMessage,
  ILanguageModelResponse,
  ICancellationToken,
  ICancellationTokenSource,
  ICancellationTokenSourceFactory,
} from "./types";
