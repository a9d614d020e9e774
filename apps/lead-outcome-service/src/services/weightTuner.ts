import { ScoringConfigStore } from "../db/types";
import { ScoringConfig, ScoringThresholds } from "../types/outcomes";
import { OutcomeFeedbackSink } from "./stageTransitions";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Smoothing factor applied to every weight nudge */
export const EMA_ALPHA = 0.1;

/** Each nudge moves a weight by EMA_ALPHA * 5% of its value */
const ADJUSTMENT_RATE = 0.05;

export const MIN_WEIGHT = 0.01;

export const POSITIVE_OUTCOMES: ReadonlySet<string> = new Set(["booked_demo", "closed_won"]);
export const NEGATIVE_OUTCOMES: ReadonlySet<string> = new Set([
  "no_response",
  "closed_lost",
  "disqualified",
]);

export const DEFAULT_WEIGHTS: Readonly<Record<string, number>> = {
  urgency: 0.25,
  budget: 0.2,
  company_size: 0.15,
  pain_point: 0.15,
  job_title: 0.1,
  industry: 0.1,
  source: 0.05,
};

export const DEFAULT_THRESHOLDS: Readonly<ScoringThresholds> = { hot: 70, warm: 40 };

const LEARNING_USER = "learning_system";

// ============================================================================
// PURE HELPERS
// ============================================================================

export type AdjustmentDirection = "increase" | "decrease";

/**
 * Apply one EMA nudge to every weight. Decreases never go below MIN_WEIGHT.
 * The result is not normalized.
 */
export function adjustWeights(
  weights: Record<string, number>,
  direction: AdjustmentDirection
): Record<string, number> {
  const adjusted: Record<string, number> = {};

  for (const key of Object.keys(weights).sort()) {
    const old = weights[key];
    const delta = EMA_ALPHA * old * ADJUSTMENT_RATE;
    adjusted[key] = direction === "increase" ? old + delta : Math.max(MIN_WEIGHT, old - delta);
  }

  return adjusted;
}

/**
 * Scale weights to sum to 1.0, keys in sorted order. A weight pushed under
 * `floor` is pinned to it and the rest re-normalized over what remains.
 */
export function normalizeWeights(
  weights: Record<string, number>,
  floor: number = MIN_WEIGHT
): Record<string, number> {
  const keys = Object.keys(weights).sort();
  if (keys.length === 0) return {};

  // Not enough mass to honor the floor for every key
  if (keys.length * floor >= 1) {
    return Object.fromEntries(keys.map((k) => [k, 1 / keys.length]));
  }

  const pinned = new Set<string>();
  let result: Record<string, number> = {};

  for (;;) {
    const free = keys.filter((k) => !pinned.has(k));
    const freeTotal = free.reduce((sum, k) => sum + weights[k], 0);
    const remaining = 1 - pinned.size * floor;

    result = {};
    for (const key of keys) {
      result[key] = pinned.has(key)
        ? floor
        : freeTotal > 0
          ? (weights[key] / freeTotal) * remaining
          : remaining / free.length;
    }

    const under = free.filter((k) => result[k] < floor);
    if (under.length === 0) return result;
    under.forEach((k) => pinned.add(k));
  }
}

function mergeWeights(
  current: Record<string, number>,
  update: Record<string, number> | undefined
): Record<string, number> {
  const merged = { ...current, ...update };
  return Object.fromEntries(Object.keys(merged).sort().map((k) => [k, merged[k]]));
}

// ============================================================================
// TUNER
// ============================================================================

export interface ScoringConfigUpdate {
  weights?: Record<string, number>;
  thresholds?: Partial<ScoringThresholds>;
}

/**
 * Versioned scoring configuration plus the feedback loop that nudges its
 * weights when an outcome contradicts the lead's score.
 *
 * This is not model training: a positive outcome on a low score raises all
 * weights slightly, a negative outcome on a high score lowers them.
 */
export class AdaptiveWeightTuner implements OutcomeFeedbackSink {
  constructor(private readonly configs: ScoringConfigStore) {}

  /**
   * Active config. The defaults are persisted as the first version when
   * nothing has been stored yet.
   */
  async getConfig(): Promise<ScoringConfig> {
    const latest = await this.configs.getLatest();
    if (latest) return latest;

    console.log("[weightTuner] No scoring config found, creating default");
    return this.configs.create({
      weights: { ...DEFAULT_WEIGHTS },
      thresholds: { ...DEFAULT_THRESHOLDS },
      updated_by: "system",
    });
  }

  /**
   * Merge the given weights/thresholds onto the active config and store the
   * result as a new version
   */
  async updateConfig(update: ScoringConfigUpdate, user: string = "system"): Promise<ScoringConfig> {
    console.log("[weightTuner] Updating scoring config", {
      user,
      has_weights: update.weights !== undefined,
      has_thresholds: update.thresholds !== undefined,
    });

    const current = await this.getConfig();

    const created = await this.configs.create({
      weights: mergeWeights(current.weights, update.weights),
      thresholds: { ...current.thresholds, ...update.thresholds },
      updated_by: user,
    });

    console.log("[weightTuner] Scoring config updated", { config_id: created.id });
    return created;
  }

  async updateFromFeedback(outcome: string, leadScore: number): Promise<ScoringConfig> {
    console.log("[weightTuner] Processing feedback for weight adjustment", {
      outcome,
      score: leadScore,
    });

    const current = await this.getConfig();
    const isPositive = POSITIVE_OUTCOMES.has(outcome);
    const isNegative = NEGATIVE_OUTCOMES.has(outcome);

    if (!isPositive && !isNegative) {
      console.log("[weightTuner] Outcome not relevant for learning, skipping", { outcome });
      return current;
    }

    let direction: AdjustmentDirection | null = null;
    if (isPositive && leadScore < current.thresholds.warm) {
      direction = "increase"; // scored low, converted
    } else if (isNegative && leadScore >= current.thresholds.hot) {
      direction = "decrease"; // scored high, lost
    }

    if (!direction) {
      console.log("[weightTuner] No weight adjustment needed, score aligned with outcome");
      return current;
    }

    const weights = normalizeWeights(adjustWeights(current.weights, direction));
    const updated = await this.updateConfig({ weights }, LEARNING_USER);

    console.log("[weightTuner] Weights adjusted from feedback", { adjustment_type: direction });
    return updated;
  }

  /** Newest first */
  async history(limit: number = 20): Promise<ScoringConfig[]> {
    return this.configs.listRecent(limit);
  }
}
