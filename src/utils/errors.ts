// ===========================================================================
// PromptPatch Error Hierarchy
//
// Typed Error classes with codes, user-friendly messages, and type guards.
// No VS Code imports.
// ===========================================================================

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

/** Base class for all PromptPatch errors. Carries a machine-readable code and
 *  a user-facing message safe for display in a notification. */
export class PromptPatchError extends Error {
  readonly code: string;
  readonly userMessage: string;

  constructor(code: string, message: string, userMessage?: string, cause?: unknown) {
    super(message);
    this.name = "PromptPatchError";
    this.code = code;
    this.userMessage = userMessage ?? "Something went wrong. Please try again.";
    this.cause = cause;
  }
}

// ---------------------------------------------------------------------------
// Concrete error types
// ---------------------------------------------------------------------------

/** Thrown when the target document of a patch is closed and cannot be reopened. */
export class BufferNotFoundError extends PromptPatchError {
  readonly path: string;

  constructor(path: string) {
    super(
      "buffer-not-found",
      `No open buffer for "${path}"`,
      `The file ${path} is no longer open. The generated code was not applied.`
    );
    this.name = "BufferNotFoundError";
    this.path = path;
  }
}

/** Thrown when one or more SEARCH blocks cannot be located in the target. */
export class SearchReplaceError extends PromptPatchError {
  readonly failedBlocks: readonly number[];

  constructor(detail: string, failedBlocks: readonly number[]) {
    super(
      "search-replace-failed",
      detail,
      "The suggested edit no longer matches the file. It was inserted without replacing anything."
    );
    this.name = "SearchReplaceError";
    this.failedBlocks = failedBlocks;
  }
}

/** Thrown when writing generated code into a buffer fails. */
export class InjectionError extends PromptPatchError {
  readonly patchId: string;

  constructor(patchId: string, detail: string, cause?: unknown) {
    super(
      "injection-failed",
      `Injection of patch ${patchId} failed: ${detail}`,
      `Could not insert the generated code: ${detail}`,
      cause
    );
    this.name = "InjectionError";
    this.patchId = patchId;
  }
}

/** Thrown when the language model request fails or returns nothing usable. */
export class GenerationError extends PromptPatchError {
  readonly providerId: string;

  constructor(providerId: string, detail: string, cause?: unknown) {
    super(
      "generation-failed",
      `Provider ${providerId} failed: ${detail}`,
      detail === "cancelled"
        ? "Code generation was cancelled."
        : `Code generation failed: ${detail}`,
      cause
    );
    this.name = "GenerationError";
    this.providerId = providerId;
  }
}

/** Thrown when persisted statistics cannot be saved or loaded. Logged, never fatal. */
export class StatePersistenceError extends PromptPatchError {
  constructor(operation: "save" | "load" | "delete", detail: string, cause?: unknown) {
    super(
      "state-persistence",
      `State ${operation} failed: ${detail}`,
      "Could not save provider statistics. They will reset on restart.",
      cause
    );
    this.name = "StatePersistenceError";
  }
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

/** Recognizes any PromptPatchError class instance. */
export function isPromptPatchError(err: unknown): err is PromptPatchError {
  return err instanceof PromptPatchError;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Converts any thrown value into a `PromptPatchError`.
 *
 * - Existing PromptPatchError → passthrough
 * - Native Error → wrapped PromptPatchError
 * - Anything else → stringified PromptPatchError
 */
export function normalizeError(err: unknown): PromptPatchError {
  if (err instanceof PromptPatchError) return err;

  if (err instanceof Error) {
    return new PromptPatchError(
      "unknown",
      err.message,
      `An unexpected error occurred: ${err.message}`,
      err
    );
  }

  const message = String(err);
  return new PromptPatchError("unknown", message, `An unexpected error occurred: ${message}`, err);
}

/**
 * Returns a user-facing message string safe for display.
 * Uses the `userMessage` from PromptPatchError or falls back to a generic message.
 */
export function getUserMessage(err: unknown): string {
  const normalized = normalizeError(err);
  return normalized.userMessage;
}
