// ===========================================================================
// Logger
//
// The subset of vscode.LogOutputChannel the core modules log through.
// The extension passes the real channel; tests pass NullLogger or a recorder.
// ===========================================================================

export interface Logger {
  trace(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(error: string | Error, ...args: unknown[]): void;
}

/** Silent logger. */
export class NullLogger implements Logger {
  trace(): void { /* no-op */ }
  debug(): void { /* no-op */ }
  info(): void { /* no-op */ }
  warn(): void { /* no-op */ }
  error(): void { /* no-op */ }
}
