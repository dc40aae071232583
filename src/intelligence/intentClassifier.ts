import type { Intent, IntentAction, IntentType, ScopeHint } from "./types";

// ===========================================================================
// Intent Classifier
//
// Pure keyword heuristic with no model calls.
// Maps a prompt to a category, a scope hint and the action that decides how
// generated code is injected.
//
// Strategy:
//   1. Lower-case the prompt
//   2. Scan every trigger of every category in table order; a stronger
//      (lower) priority resets the best category, further triggers of the
//      best category accumulate
//   3. Look for an explicit scope phrase ("this class", ...)
//   4. Derive confidence from the number of matched triggers
// ===========================================================================

interface IntentRule {
  readonly type: IntentType;
  readonly triggers: readonly string[];
  readonly scopeHint?: ScopeHint;
  readonly action: IntentAction;
  /** Lower is stronger. */
  readonly priority: number;
}

const INTENT_RULES: readonly IntentRule[] = [
  {
    type: "complete",
    triggers: ["complete", "finish", "implement", "fill in", "fill out", "stub", "todo", "fixme"],
    scopeHint: "function",
    action: "replace",
    priority: 1,
  },
  {
    type: "fix",
    triggers: [
      "fix", "repair", "correct", "debug", "solve", "resolve", "patch", "bug",
      "error", "issue", "update", "modify", "change", "adjust", "tweak",
    ],
    scopeHint: "function",
    action: "replace",
    priority: 1,
  },
  {
    type: "refactor",
    triggers: ["refactor", "rewrite", "restructure", "reorganize", "clean up", "cleanup", "simplify", "improve"],
    scopeHint: "function",
    action: "replace",
    priority: 2,
  },
  {
    type: "document",
    triggers: ["document", "comment", "jsdoc", "docstring", "describe", "annotate", "type hint", "typehint"],
    scopeHint: "function",
    action: "replace",
    priority: 2,
  },
  {
    type: "optimize",
    triggers: ["optimize", "performance", "faster", "efficient", "speed up", "reduce", "minimize"],
    scopeHint: "function",
    action: "replace",
    priority: 2,
  },
  {
    type: "add",
    triggers: ["add", "create", "insert", "include", "append", "new", "generate", "write"],
    action: "insert",
    priority: 3,
  },
  {
    type: "test",
    triggers: ["test", "spec", "unit test", "integration test", "coverage"],
    scopeHint: "file",
    action: "append",
    priority: 3,
  },
  {
    type: "explain",
    triggers: ["explain", "what does", "how does", "why", "describe", "walk through", "understand"],
    scopeHint: "function",
    action: "none",
    priority: 4,
  },
];

/** First phrase found wins. */
const SCOPE_PHRASES: readonly (readonly [string, ScopeHint])[] = [
  ["this function", "function"],
  ["this method", "function"],
  ["the function", "function"],
  ["the method", "function"],
  ["this class", "class"],
  ["the class", "class"],
  ["this file", "file"],
  ["the file", "file"],
  ["this block", "block"],
  ["the block", "block"],
  ["this selection", "selection"],
  ["selected", "selection"],
];

const MODIFIERS: Readonly<Record<IntentType, string>> = {
  complete: [
    "You are completing an incomplete function.",
    "Return the complete function with all missing parts filled in.",
    "Keep the existing signature unless changes are required.",
    "Output only the code, no explanations.",
  ].join("\n"),
  refactor: [
    "You are refactoring existing code.",
    "Improve the code structure while maintaining the same behavior.",
    "Keep the function signature unchanged.",
    "Output only the refactored code, no explanations.",
  ].join("\n"),
  fix: [
    "You are fixing a bug in the code.",
    "Identify and correct the issue while minimizing changes.",
    "Preserve the original intent of the code.",
    "Output only the fixed code, no explanations.",
  ].join("\n"),
  add: [
    "You are adding new code.",
    "Follow the existing code style and conventions.",
    "Output only the new code to be inserted, no explanations.",
  ].join("\n"),
  document: [
    "You are adding documentation to the code.",
    "Add appropriate comments/docstrings for the function.",
    "Include parameter types, return types, and description.",
    "Output the complete function with documentation.",
  ].join("\n"),
  test: [
    "You are generating tests for the code.",
    "Create unit tests covering edge cases.",
    "Follow the testing conventions of the project.",
    "Output only the test code, no explanations.",
  ].join("\n"),
  optimize: [
    "You are optimizing code for performance.",
    "Improve efficiency while maintaining correctness.",
    "Document any significant algorithmic changes.",
    "Output only the optimized code, no explanations.",
  ].join("\n"),
  explain: [
    "You are explaining code to a developer.",
    "Provide a clear, concise explanation of what the code does.",
    "Include information about the algorithm and any edge cases.",
    "Do not output code, only explanation.",
  ].join("\n"),
};

const DEFAULT_RULE: IntentRule = {
  type: "add",
  triggers: [],
  action: "insert",
  priority: 3,
};

/**
 * Classify a prompt. Never throws: a prompt with no trigger is an `add`
 * with zero keywords and confidence 0.5.
 */
export function detectIntent(prompt: string): Intent {
  const lower = prompt.toLowerCase();

  let best: IntentRule | null = null;
  let keywords: string[] = [];

  for (const rule of INTENT_RULES) {
    for (const trigger of rule.triggers) {
      if (!lower.includes(trigger)) continue;

      if (best === null || rule.priority < best.priority) {
        best = rule;
        keywords = [trigger];
      } else if (rule === best) {
        keywords.push(trigger);
      }
    }
  }

  const rule = best ?? DEFAULT_RULE;
  if (best === null) keywords = [];

  const phrase = SCOPE_PHRASES.find(([text]) => lower.includes(text));
  const scopeHint = phrase ? phrase[1] : rule.scopeHint;

  return {
    type: rule.type,
    scopeHint,
    action: rule.action,
    confidence: Math.min(1, 0.5 + 0.15 * keywords.length),
    keywords,
  };
}

export function modifiesCode(intent: Intent): boolean {
  return intent.action !== "none";
}

export function isReplacement(intent: Intent): boolean {
  return intent.action === "replace";
}

export function isInsertion(intent: Intent): boolean {
  return intent.action === "insert" || intent.action === "append";
}

/** Instruction block added to the generation prompt for the intent's category. */
export function getPromptModifier(intent: Intent): string {
  return MODIFIERS[intent.type];
}

/** e.g. `fix (scope: function, action: replace, confidence: 0.65)` */
export function formatIntent(intent: Intent): string {
  return `${intent.type} (scope: ${intent.scopeHint ?? "auto"}, action: ${intent.action}, confidence: ${intent.confidence.toFixed(2)})`;
}
