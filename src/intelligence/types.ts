// ---------------------------------------------------------------------------
// Intent: what a prompt asks the assistant to do with the code
// ---------------------------------------------------------------------------

export type IntentType =
  | "complete"
  | "refactor"
  | "fix"
  | "add"
  | "document"
  | "test"
  | "optimize"
  | "explain";

export type ScopeHint = "function" | "class" | "block" | "file" | "selection";

/** Drives the default injection strategy. */
export type IntentAction = "replace" | "insert" | "append" | "none";

export interface Intent {
  readonly type: IntentType;
  /** Absent when the prompt could target anything (e.g. "add ..."). */
  readonly scopeHint?: ScopeHint;
  readonly action: IntentAction;
  /** 0–1, grows with the number of matched trigger keywords. */
  readonly confidence: number;
  readonly keywords: readonly string[];
}
