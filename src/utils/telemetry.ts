import type { InjectionStrategy } from "../patching/types";
import type { IntentType } from "../intelligence/types";

// ===========================================================================
// Telemetry
//
// Application recorder interface + no-op implementation + local outcome
// frequency tracker. No VS Code imports.
// ===========================================================================

// ---------------------------------------------------------------------------
// Application recorder interface
// ---------------------------------------------------------------------------

export type PatchOutcome = "applied" | "stale" | "rejected" | "deferred" | "conflict";

/** One learning signal emitted when a patch leaves the pending state. */
export interface PatchApplicationEvent {
  readonly patchId: string;
  readonly outcome: PatchOutcome;
  readonly strategy: InjectionStrategy;
  readonly intentType?: IntentType;
  readonly reason?: string;
  readonly bodyLines?: number;
}

/** Receives patch outcomes. Never allowed to break an apply. */
export interface IApplicationRecorder {
  recordApplication(event: PatchApplicationEvent): void;
}

// ---------------------------------------------------------------------------
// No-op implementation
// ---------------------------------------------------------------------------

export class NullApplicationRecorder implements IApplicationRecorder {
  recordApplication(_event: PatchApplicationEvent): void { /* no-op */ }
}

// ---------------------------------------------------------------------------
// Outcome frequency tracker (always local, never transmitted)
// ---------------------------------------------------------------------------

export interface OutcomeFrequencyEntry {
  readonly code: string;
  count: number;
  readonly firstSeenAt: number;
  lastSeenAt: number;
}

/**
 * In-memory counter for patch outcomes and error codes.
 * Powers the "Show Patch Statistics" summary.
 */
export class OutcomeFrequencyTracker implements IApplicationRecorder {
  private readonly entries = new Map<string, OutcomeFrequencyEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  recordApplication(event: PatchApplicationEvent): void {
    this.record(event.outcome);
    if (event.reason) {
      this.record(`${event.outcome}:${event.reason}`);
    }
  }

  /** Record an occurrence of an arbitrary code. */
  record(code: string): void {
    const now = this.now();
    const existing = this.entries.get(code);
    if (existing) {
      existing.count++;
      existing.lastSeenAt = now;
    } else {
      this.entries.set(code, {
        code,
        count: 1,
        firstSeenAt: now,
        lastSeenAt: now,
      });
    }
  }

  getFrequencies(): readonly OutcomeFrequencyEntry[] {
    return [...this.entries.values()];
  }

  /** Get the top N most frequent codes. */
  getMostFrequent(topN: number = 5): readonly OutcomeFrequencyEntry[] {
    return [...this.entries.values()]
      .sort((a, b) => b.count - a.count)
      .slice(0, topN);
  }

  getEntry(code: string): OutcomeFrequencyEntry | undefined {
    return this.entries.get(code);
  }

  getTotalCount(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.count;
    }
    return total;
  }

  reset(): void {
    this.entries.clear();
  }
}
