import type { LineRange, LintMessage, LintResult } from "./types";

// ===========================================================================
// Lint fix requests
//
// Turns a lint result for freshly accepted code into a follow-up prompt
// over the affected lines. The prompt goes through the normal selection
// transform, so the fix is itself a reviewed patch.
// ===========================================================================

/** Lines of surrounding code included on each side of the reported lines. */
export const LINT_FIX_CONTEXT_LINES = 5;

export function formatLintMessage(message: LintMessage): string {
  return `[${message.severity.toUpperCase()}] Line ${message.line}: ${message.message}`;
}

export function summarizeLint(result: LintResult): string {
  return `${result.errorCount} error(s), ${result.warningCount} warning(s)`;
}

/** Reported lines widened by the context margin, clamped to the document. */
export function lintFixRange(result: LintResult, lineCount: number): LineRange | null {
  if (result.messages.length === 0) return null;

  let first = Number.MAX_SAFE_INTEGER;
  let last = 0;
  for (const { line } of result.messages) {
    first = Math.min(first, line);
    last = Math.max(last, line);
  }

  return {
    startLine: Math.max(1, first - LINT_FIX_CONTEXT_LINES),
    endLine: Math.min(Math.max(1, lineCount), last + LINT_FIX_CONTEXT_LINES),
  };
}

export function buildLintFixPrompt(result: LintResult): string {
  return [
    "Fix the following lint issues in this code:",
    ...result.messages.map(formatLintMessage),
    "Keep the behavior unchanged and only change what is needed to resolve them.",
  ].join("\n");
}
