import type { PatchManagerConfig } from "../patching/patchManager";
import type { ConflictEngineConfig } from "../patching/conflictMergeEngine";
import type { PromptProcessorConfig } from "../patching/promptProcessor";
import type { TagDelimiters } from "../patching/promptTags";
import type { ModelSelector } from "../generation/languageModelProvider";
import type { GenerationSettings, PromptPatchSettings } from "./types";

// ===========================================================================
// Component configuration
//
// Maps resolved settings onto the config objects each component takes, so
// activation and configuration changes share one mapping.
// ===========================================================================

export function tagDelimiters(settings: PromptPatchSettings): TagDelimiters {
  return { openTag: settings.prompt.openTag, closeTag: settings.prompt.closeTag };
}

export function patchManagerConfig(settings: PromptPatchSettings): PatchManagerConfig {
  return {
    useConflictMode: settings.patch.useConflictMode,
    sortImports: settings.patch.sortImports,
    treatAnySelectionAsUnsafe: settings.patch.treatAnySelectionAsUnsafe,
    companionMarker: settings.prompt.companionMarker,
    tags: tagDelimiters(settings),
  };
}

export function conflictEngineConfig(settings: PromptPatchSettings): ConflictEngineConfig {
  const { lintAfterAccept, autoFixLintErrors, autoShowMenu, autoShowNextConflict, incomingLabel } =
    settings.conflict;
  return { lintAfterAccept, autoFixLintErrors, autoShowMenu, autoShowNextConflict, incomingLabel };
}

export function promptProcessorConfig(settings: PromptPatchSettings): PromptProcessorConfig {
  return {
    minConfidence: settings.generation.minConfidence,
    tags: tagDelimiters(settings),
    companionMarker: settings.prompt.companionMarker,
  };
}

/** The configured family first, then the additional ones, without duplicates. */
export function modelSelectors(generation: GenerationSettings): ModelSelector[] {
  const families = [generation.modelFamily, ...generation.additionalModelFamilies];
  return [...new Set(families)].map((family) => ({ vendor: generation.vendor, family }));
}
