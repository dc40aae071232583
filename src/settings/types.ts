// ===========================================================================
// PromptPatch Settings Types
//
// Pure type definitions, no VS Code imports.
// ===========================================================================

// ---------------------------------------------------------------------------
// Patch application
// ---------------------------------------------------------------------------

export interface PatchSettings {
  /** Stage generated code as conflict regions instead of writing it directly. */
  readonly useConflictMode: boolean;
  /** How often deferred patches are retried (100–10000 ms). */
  readonly flushIntervalMs: number;
  /** Resolved patches older than this are dropped (≥ 60000 ms). */
  readonly maxPatchAgeMs: number;
  /** How often old patches are swept (1000–3600000 ms). */
  readonly cleanupIntervalMs: number;
  readonly sortImports: boolean;
  /** A keystroke within this window counts as typing (0–5000 ms). */
  readonly typingQuietPeriodMs: number;
  /** When false, only a selection in the patch's own document blocks it. */
  readonly treatAnySelectionAsUnsafe: boolean;
}

// ---------------------------------------------------------------------------
// Conflict review
// ---------------------------------------------------------------------------

export interface ConflictSettings {
  readonly lintAfterAccept: boolean;
  readonly autoFixLintErrors: boolean;
  /** Jump to the first conflict as soon as a patch is staged. */
  readonly autoShowMenu: boolean;
  readonly autoShowNextConflict: boolean;
  readonly incomingLabel: string;
  /** Time given to language servers before diagnostics are read (0–10000 ms). */
  readonly lintSettleDelayMs: number;
  readonly saveBeforeLint: boolean;
}

// ---------------------------------------------------------------------------
// Prompt tags
// ---------------------------------------------------------------------------

export interface PromptSettings {
  readonly openTag: string;
  readonly closeTag: string;
  /** Path fragment marking companion prompt files, e.g. `app.coder.ts`. */
  readonly companionMarker: string;
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

export interface GenerationSettings {
  readonly vendor: string;
  readonly modelFamily: string;
  /** Further model families tried by accuracy once they have a history. */
  readonly additionalModelFamilies: readonly string[];
  /** Responses scoring below this are discarded (0–1). */
  readonly minConfidence: number;
}

// ---------------------------------------------------------------------------
// Root settings shape
// ---------------------------------------------------------------------------

export interface PromptPatchSettings {
  readonly patch: PatchSettings;
  readonly conflict: ConflictSettings;
  readonly prompt: PromptSettings;
  readonly generation: GenerationSettings;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export interface SettingsValidationError {
  readonly field: string;
  readonly message: string;
}
