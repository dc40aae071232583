import type { PatchStats } from "../patching/types";
import type { ProviderAccuracySummary } from "../generation/providerAccuracy";
import type { OutcomeFrequencyEntry } from "../utils/telemetry";

// ===========================================================================
// Statistics report
//
// Plain-text summary written to the output channel by "Show Patch
// Statistics". No VS Code imports.
// ===========================================================================

export interface StatsReportInput {
  readonly patches: PatchStats;
  readonly conflictMode: boolean;
  readonly inFlight: number;
  readonly outcomes: readonly OutcomeFrequencyEntry[];
  readonly providers: readonly ProviderAccuracySummary[];
}

function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

export function formatStatsReport(input: StatsReportInput): string[] {
  const { patches } = input;
  const lines = [
    `Patches: ${patches.total} total, ${patches.pending} pending, ${patches.applied} applied, ` +
      `${patches.stale} stale, ${patches.rejected} rejected, ${patches.cancelled} cancelled`,
    `Mode: ${input.conflictMode ? "conflict review" : "direct apply"}`,
    `Requests in flight: ${input.inFlight}`,
  ];

  if (input.outcomes.length > 0) {
    lines.push("Outcomes:");
    for (const entry of [...input.outcomes].sort((a, b) => b.count - a.count)) {
      lines.push(`  ${entry.code}: ${entry.count}`);
    }
  }

  if (input.providers.length > 0) {
    lines.push("Provider accuracy:");
    for (const p of input.providers) {
      lines.push(`  ${p.providerId}: ${p.correct}/${p.total} accepted (${percent(p.accuracy)})`);
    }
  }

  return lines;
}

/** One-line version for a notification. */
export function formatStatsSummary(patches: PatchStats): string {
  return `${patches.pending} pending, ${patches.applied} applied, ${patches.stale} stale, ${patches.rejected} rejected`;
}
