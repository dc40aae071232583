// ---------------------------------------------------------------------------
// State Persistence
// ---------------------------------------------------------------------------

/** Key/value persistence for state that outlives a session (backed by globalState). */
export interface IStateStore {
  save(key: string, state: unknown): Promise<void>;
  /** `null` when nothing is stored; callers validate the shape of anything else. */
  load(key: string): Promise<unknown>;
  delete(key: string): Promise<void>;
}
