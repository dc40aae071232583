import type { Logger } from "../utils/logger";
import { NullLogger } from "../utils/logger";
import { StatePersistenceError, normalizeError } from "../utils/errors";
import type { IStateStore } from "../utils/stateStore";
import type { IGenerationProvider } from "./types";

// ===========================================================================
// Provider accuracy
//
// How often each provider's suggestions were kept when reviewed as
// conflicts. Owned by the extension, persisted through an IStateStore, and
// consulted when choosing which provider serves the next prompt.
// ===========================================================================

export const ACCURACY_STATE_KEY = "provider-accuracy";

/** Below this many reviewed suggestions a provider scores neutral. */
const MIN_SAMPLES = 5;
const NEUTRAL_CONFIDENCE = 0.5;

export interface ProviderAccuracy {
  readonly correct: number;
  readonly total: number;
}

export interface ProviderAccuracySummary extends ProviderAccuracy {
  readonly providerId: string;
  readonly accuracy: number;
}

function isAccuracyRecord(value: unknown): value is ProviderAccuracy {
  if (typeof value !== "object" || value === null) return false;
  const correct: unknown = Reflect.get(value, "correct");
  const total: unknown = Reflect.get(value, "total");
  return typeof correct === "number" && typeof total === "number" && correct >= 0 && correct <= total;
}

export class ProviderAccuracyStats {
  private readonly stats = new Map<string, ProviderAccuracy>();
  private readonly logger: Logger;

  constructor(
    private readonly store: IStateStore,
    logger?: Logger
  ) {
    this.logger = logger ?? new NullLogger();
  }

  /** Replace in-memory counts with the persisted ones. Malformed entries are dropped. */
  async load(): Promise<void> {
    let saved: unknown;
    try {
      saved = await this.store.load(ACCURACY_STATE_KEY);
    } catch (err) {
      this.logger.warn(new StatePersistenceError("load", normalizeError(err).message, err).message);
      return;
    }

    this.stats.clear();
    if (typeof saved !== "object" || saved === null) return;
    for (const [providerId, entry] of Object.entries(saved)) {
      if (isAccuracyRecord(entry)) this.stats.set(providerId, { correct: entry.correct, total: entry.total });
    }
  }

  async save(): Promise<void> {
    try {
      await this.store.save(ACCURACY_STATE_KEY, Object.fromEntries(this.stats));
    } catch (err) {
      throw new StatePersistenceError("save", normalizeError(err).message, err);
    }
  }

  /** Count one reviewed suggestion and persist in the background. */
  recordOutcome(providerId: string, accepted: boolean): void {
    const current = this.stats.get(providerId) ?? { correct: 0, total: 0 };
    this.stats.set(providerId, {
      correct: current.correct + (accepted ? 1 : 0),
      total: current.total + 1,
    });

    void this.save().catch((err: unknown) => {
      this.logger.warn(normalizeError(err).message);
    });
  }

  get(providerId: string): ProviderAccuracy {
    return this.stats.get(providerId) ?? { correct: 0, total: 0 };
  }

  /** Neutral until enough samples exist, then accuracy boosted by 20% and capped at 1. */
  historicalConfidence(providerId: string): number {
    const { correct, total } = this.get(providerId);
    if (total < MIN_SAMPLES) return NEUTRAL_CONFIDENCE;
    return Math.min(1, (correct / total) * 1.2);
  }

  summary(): ProviderAccuracySummary[] {
    return [...this.stats.entries()].map(([providerId, { correct, total }]) => ({
      providerId,
      correct,
      total,
      accuracy: total > 0 ? correct / total : 0,
    }));
  }

  reset(): void {
    this.stats.clear();
  }
}

/**
 * The first provider is the default; another one is chosen only when its
 * historical confidence is strictly higher.
 */
export function selectProvider(
  providers: readonly IGenerationProvider[],
  stats: ProviderAccuracyStats
): IGenerationProvider | undefined {
  let best: IGenerationProvider | undefined;
  let bestScore = -1;
  for (const provider of providers) {
    const score = stats.historicalConfidence(provider.id);
    if (score > bestScore) {
      best = provider;
      bestScore = score;
    }
  }
  return best;
}
