// Errors
export {
  PromptPatchError,
  BufferNotFoundError,
  SearchReplaceError,
  InjectionError,
  GenerationError,
  StatePersistenceError,
  isPromptPatchError,
  normalizeError,
  getUserMessage,
} from "./errors";

// Logging
export type { Logger } from "./logger";
export { NullLogger } from "./logger";

// Telemetry
export type {
  PatchOutcome,
  PatchApplicationEvent,
  IApplicationRecorder,
  OutcomeFrequencyEntry,
} from "./telemetry";
export { NullApplicationRecorder, OutcomeFrequencyTracker } from "./telemetry";

// State persistence
export type { IStateStore } from "./stateStore";
