export {
  PatchManager,
  DEFAULT_PATCH_CONFIG,
  DEFAULT_MAX_PATCH_AGE_MS,
  USER_TYPING,
  BUFFER_NOT_FOUND,
} from "./patchManager";
export type { PatchManagerConfig, PatchManagerDeps } from "./patchManager";
export {
  ConflictMergeEngine,
  CONFLICT_MARKERS,
  DEFAULT_CONFLICT_CONFIG,
} from "./conflictMergeEngine";
export type {
  ConflictEngineConfig,
  ConflictEngineDeps,
  ConflictFocus,
  ConflictResolved,
} from "./conflictMergeEngine";
export { PromptProcessor, DEFAULT_PROCESSOR_CONFIG } from "./promptProcessor";
export type { PromptProcessorConfig, PromptProcessorDeps } from "./promptProcessor";
export { SmartCodeInjector, parseCode, findImportSection, mergeImports, sortImports } from "./codeInjector";
export { HeuristicScopeResolver } from "./scopeResolver";
export {
  parseBlocks,
  hasBlocks,
  applyBlocks,
  applyToBuffer,
  findMatch,
  similarity,
} from "./searchReplace";
export type { SearchReplaceBlock } from "./searchReplace";
export {
  findPromptTags,
  removePromptTags,
  removeTagsFromBuffer,
  DEFAULT_TAG_DELIMITERS,
} from "./promptTags";
export type { PromptTag, TagDelimiters } from "./promptTags";
export { hashText, snapshotBuffer, isSnapshotStale } from "./snapshot";
export { AnchorTracker } from "./positionAnchors";
export type { PositionAnchor } from "./positionAnchors";
export { buildLintFixPrompt, lintFixRange, formatLintMessage, summarizeLint } from "./lintFix";
export {
  VsCodeTextBuffer,
  VsCodeBufferRegistry,
  VsCodeEditorState,
  VsCodeLintValidator,
  VsCodeEventEmitterFactory,
} from "./vscodeAdapters";
export type { LintValidatorConfig, LintFixRequester } from "./vscodeAdapters";
export type {
  LineRange,
  PromptRange,
  ITextBuffer,
  IBufferRegistry,
  IEditorState,
  ICodeInjector,
  IScopeResolver,
  ILintValidator,
  IEventEmitter,
  IEventEmitterFactory,
  PromptEvent,
  PatchCandidate,
  PatchStatus,
  PatchStatusChange,
  ApplyResult,
  FlushResult,
  ConflictRegion,
  ConflictMenuItem,
  ResolutionChoice,
  ResolutionResult,
  LintResult,
  ScopeInfo,
} from "./types";
