import type {
  PromptPatchSettings,
  PatchSettings,
  ConflictSettings,
  PromptSettings,
  GenerationSettings,
  SettingsValidationError,
} from "./types";

// ===========================================================================
// Settings Service
//
// Defaults, resolution (raw → typed), and validation.
// No VS Code imports.
// ===========================================================================

// ---------------------------------------------------------------------------
// Ranges (used by both resolve and validate)
// ---------------------------------------------------------------------------

interface IntRange {
  readonly min: number;
  readonly max: number;
}

const FLUSH_INTERVAL: IntRange = { min: 100, max: 10_000 };
const MAX_PATCH_AGE: IntRange = { min: 60_000, max: Number.MAX_SAFE_INTEGER };
const CLEANUP_INTERVAL: IntRange = { min: 1_000, max: 3_600_000 };
const TYPING_QUIET_PERIOD: IntRange = { min: 0, max: 5_000 };
const LINT_SETTLE_DELAY: IntRange = { min: 0, max: 10_000 };

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_SETTINGS: PromptPatchSettings = {
  patch: {
    useConflictMode: false,
    flushIntervalMs: 500,
    maxPatchAgeMs: 3_600_000,
    cleanupIntervalMs: 60_000,
    sortImports: true,
    typingQuietPeriodMs: 400,
    treatAnySelectionAsUnsafe: true,
  },
  conflict: {
    lintAfterAccept: true,
    autoFixLintErrors: false,
    autoShowMenu: true,
    autoShowNextConflict: true,
    incomingLabel: "INCOMING",
    lintSettleDelayMs: 500,
    saveBeforeLint: true,
  },
  prompt: {
    openTag: "/@",
    closeTag: "@/",
    companionMarker: ".coder.",
  },
  generation: {
    vendor: "copilot",
    modelFamily: "gpt-4o",
    additionalModelFamilies: [],
    minConfidence: 0,
  },
};

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

/**
 * Resolves raw configuration values into typed {@link PromptPatchSettings}.
 *
 * Invalid values are replaced with defaults (best-effort, never throws).
 */
export class SettingsService {
  /**
   * Resolve raw configuration values, keyed `group.name`, into a typed
   * settings object. Each invalid value falls back to its default and
   * records a validation error.
   */
  resolve(raw: Readonly<Record<string, unknown>>): {
    readonly settings: PromptPatchSettings;
    readonly errors: readonly SettingsValidationError[];
  } {
    const errors: SettingsValidationError[] = [];

    const patch = this.resolvePatch(raw, errors);
    const conflict = this.resolveConflict(raw, errors);
    const prompt = this.resolvePrompt(raw, errors);
    const generation = this.resolveGeneration(raw, errors);

    return { settings: { patch, conflict, prompt, generation }, errors };
  }

  /** Validate a fully-resolved settings object. */
  validate(settings: PromptPatchSettings): readonly SettingsValidationError[] {
    const errors: SettingsValidationError[] = [];
    const { patch, conflict, prompt, generation } = settings;

    this.checkInt(patch.flushIntervalMs, FLUSH_INTERVAL, "patch.flushIntervalMs", errors);
    this.checkInt(patch.maxPatchAgeMs, MAX_PATCH_AGE, "patch.maxPatchAgeMs", errors);
    this.checkInt(patch.cleanupIntervalMs, CLEANUP_INTERVAL, "patch.cleanupIntervalMs", errors);
    this.checkInt(patch.typingQuietPeriodMs, TYPING_QUIET_PERIOD, "patch.typingQuietPeriodMs", errors);
    this.checkInt(conflict.lintSettleDelayMs, LINT_SETTLE_DELAY, "conflict.lintSettleDelayMs", errors);

    for (const [field, value] of [
      ["conflict.incomingLabel", conflict.incomingLabel],
      ["prompt.openTag", prompt.openTag],
      ["prompt.closeTag", prompt.closeTag],
      ["prompt.companionMarker", prompt.companionMarker],
      ["generation.vendor", generation.vendor],
      ["generation.modelFamily", generation.modelFamily],
    ] as const) {
      if (value.trim() === "") errors.push({ field, message: "Must not be empty" });
    }

    if (prompt.openTag === prompt.closeTag && prompt.openTag !== "") {
      errors.push({ field: "prompt", message: "Open and close tags must differ" });
    }
    if (!(generation.minConfidence >= 0 && generation.minConfidence <= 1)) {
      errors.push({ field: "generation.minConfidence", message: "Must be between 0 and 1" });
    }
    return errors;
  }

  // -----------------------------------------------------------------------
  // Resolve helpers
  // -----------------------------------------------------------------------

  private resolvePatch(
    raw: Readonly<Record<string, unknown>>,
    errors: SettingsValidationError[]
  ): PatchSettings {
    const d = DEFAULT_SETTINGS.patch;
    return {
      useConflictMode: this.resolveBool(raw["patch.useConflictMode"], d.useConflictMode),
      flushIntervalMs: this.resolveInt(
        raw["patch.flushIntervalMs"],
        FLUSH_INTERVAL,
        d.flushIntervalMs,
        "patch.flushIntervalMs",
        errors
      ),
      maxPatchAgeMs: this.resolveInt(
        raw["patch.maxPatchAgeMs"],
        MAX_PATCH_AGE,
        d.maxPatchAgeMs,
        "patch.maxPatchAgeMs",
        errors
      ),
      cleanupIntervalMs: this.resolveInt(
        raw["patch.cleanupIntervalMs"],
        CLEANUP_INTERVAL,
        d.cleanupIntervalMs,
        "patch.cleanupIntervalMs",
        errors
      ),
      sortImports: this.resolveBool(raw["patch.sortImports"], d.sortImports),
      typingQuietPeriodMs: this.resolveInt(
        raw["patch.typingQuietPeriodMs"],
        TYPING_QUIET_PERIOD,
        d.typingQuietPeriodMs,
        "patch.typingQuietPeriodMs",
        errors
      ),
      treatAnySelectionAsUnsafe: this.resolveBool(
        raw["patch.treatAnySelectionAsUnsafe"],
        d.treatAnySelectionAsUnsafe
      ),
    };
  }

  private resolveConflict(
    raw: Readonly<Record<string, unknown>>,
    errors: SettingsValidationError[]
  ): ConflictSettings {
    const d = DEFAULT_SETTINGS.conflict;
    return {
      lintAfterAccept: this.resolveBool(raw["conflict.lintAfterAccept"], d.lintAfterAccept),
      autoFixLintErrors: this.resolveBool(raw["conflict.autoFixLintErrors"], d.autoFixLintErrors),
      autoShowMenu: this.resolveBool(raw["conflict.autoShowMenu"], d.autoShowMenu),
      autoShowNextConflict: this.resolveBool(raw["conflict.autoShowNextConflict"], d.autoShowNextConflict),
      incomingLabel: this.resolveNonEmpty(
        raw["conflict.incomingLabel"],
        d.incomingLabel,
        "conflict.incomingLabel",
        errors
      ),
      lintSettleDelayMs: this.resolveInt(
        raw["conflict.lintSettleDelayMs"],
        LINT_SETTLE_DELAY,
        d.lintSettleDelayMs,
        "conflict.lintSettleDelayMs",
        errors
      ),
      saveBeforeLint: this.resolveBool(raw["conflict.saveBeforeLint"], d.saveBeforeLint),
    };
  }

  private resolvePrompt(
    raw: Readonly<Record<string, unknown>>,
    errors: SettingsValidationError[]
  ): PromptSettings {
    const d = DEFAULT_SETTINGS.prompt;
    let openTag = this.resolveNonEmpty(raw["prompt.openTag"], d.openTag, "prompt.openTag", errors);
    let closeTag = this.resolveNonEmpty(raw["prompt.closeTag"], d.closeTag, "prompt.closeTag", errors);

    // A pair that cannot be told apart is unusable; keep both defaults
    if (openTag === closeTag) {
      errors.push({ field: "prompt", message: "Open and close tags must differ" });
      openTag = d.openTag;
      closeTag = d.closeTag;
    }

    return {
      openTag,
      closeTag,
      companionMarker: this.resolveNonEmpty(
        raw["prompt.companionMarker"],
        d.companionMarker,
        "prompt.companionMarker",
        errors
      ),
    };
  }

  private resolveGeneration(
    raw: Readonly<Record<string, unknown>>,
    errors: SettingsValidationError[]
  ): GenerationSettings {
    const d = DEFAULT_SETTINGS.generation;
    return {
      vendor: this.resolveNonEmpty(raw["generation.vendor"], d.vendor, "generation.vendor", errors),
      modelFamily: this.resolveNonEmpty(
        raw["generation.modelFamily"],
        d.modelFamily,
        "generation.modelFamily",
        errors
      ),
      additionalModelFamilies: this.resolveStringArray(
        raw["generation.additionalModelFamilies"],
        d.additionalModelFamilies,
        "generation.additionalModelFamilies",
        errors
      ),
      minConfidence: this.resolveFraction(
        raw["generation.minConfidence"],
        d.minConfidence,
        "generation.minConfidence",
        errors
      ),
    };
  }

  // -----------------------------------------------------------------------
  // Primitive resolvers
  // -----------------------------------------------------------------------

  private resolveInt(
    value: unknown,
    range: IntRange,
    fallback: number,
    field: string,
    errors: SettingsValidationError[]
  ): number {
    if (value === undefined || value === null) return fallback;
    const num = typeof value === "number" ? value : Number(value);
    if (!Number.isInteger(num) || num < range.min || num > range.max) {
      errors.push({ field, message: this.rangeMessage(String(value), range) });
      return fallback;
    }
    return num;
  }

  private resolveFraction(
    value: unknown,
    fallback: number,
    field: string,
    errors: SettingsValidationError[]
  ): number {
    if (value === undefined || value === null) return fallback;
    const num = typeof value === "number" ? value : Number(value);
    if (!Number.isFinite(num) || num < 0 || num > 1) {
      errors.push({ field, message: `Invalid value "${String(value)}". Must be a number between 0 and 1` });
      return fallback;
    }
    return num;
  }

  private resolveBool(value: unknown, fallback: boolean): boolean {
    if (typeof value === "boolean") return value;
    return fallback;
  }

  private resolveNonEmpty(
    value: unknown,
    fallback: string,
    field: string,
    errors: SettingsValidationError[]
  ): string {
    if (value === undefined || value === null) return fallback;
    if (typeof value === "string" && value.trim() !== "") return value;
    errors.push({ field, message: `Invalid value "${String(value)}". Must be a non-empty string` });
    return fallback;
  }

  private resolveStringArray(
    value: unknown,
    fallback: readonly string[],
    field: string,
    errors: SettingsValidationError[]
  ): readonly string[] {
    if (!Array.isArray(value)) return fallback;
    const result: string[] = [];
    for (const item of value) {
      if (typeof item === "string" && item.trim() !== "") {
        result.push(item);
      } else {
        errors.push({ field, message: `Ignoring invalid entry: "${String(item)}"` });
      }
    }
    return result;
  }

  // -----------------------------------------------------------------------
  // Validate helpers
  // -----------------------------------------------------------------------

  private checkInt(
    value: number,
    range: IntRange,
    field: string,
    errors: SettingsValidationError[]
  ): void {
    if (!Number.isInteger(value) || value < range.min || value > range.max) {
      errors.push({ field, message: this.rangeMessage(String(value), range) });
    }
  }

  private rangeMessage(value: string, range: IntRange): string {
    return range.max === Number.MAX_SAFE_INTEGER
      ? `Invalid value "${value}". Must be an integer of at least ${range.min}`
      : `Invalid value "${value}". Must be an integer between ${range.min} and ${range.max}`;
  }
}
