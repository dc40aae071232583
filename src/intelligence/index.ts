export {
  detectIntent,
  formatIntent,
  getPromptModifier,
  isInsertion,
  isReplacement,
  modifiesCode,
} from "./intentClassifier";
export type { Intent, IntentAction, IntentType, ScopeHint } from "./types";
