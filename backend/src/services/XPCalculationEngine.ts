/**
 * XPCalculationEngine v1.0.0
 *
 * Pure reward math for reading quizzes. No I/O, no clock, no store.
 *
 *   complexity_factor  = reading_level / 10
 *   speed_multiplier   = (wpm_used / baseline_wpm) * complexity_factor
 *   accuracy_bonus     = score_pct / 100
 *   raw                = length_metric * speed_multiplier * accuracy_bonus
 *   perfect_bonus      = raw * 0.25 when score_pct == 100
 *   diminishing_factor = 0.5 ^ (attempt_number - 1)
 *   total              = floor((raw + perfect_bonus) * diminishing_factor)
 *
 * Scores below the pass threshold short-circuit to zero.
 */

import Decimal from 'decimal.js';
import { config, type XPFormulaConfig } from '../config';
import { parseOrThrow, rewardInputSchema, type RewardInput } from '../lib/validators';
import type { ContentMetrics, LengthMetric } from '../types';

// Fixed-point: 1000 * 0.8 must floor to 800, never 799
Decimal.set({
  precision: 30,
  rounding: Decimal.ROUND_DOWN,
});

// ============================================================================
// TYPES
// ============================================================================

export interface RewardBreakdown {
  complexity_factor: number;
  speed_multiplier: number;
  accuracy_bonus: number;
  raw: number;
  perfect_bonus: number;
  diminishing_factor: number;
}

export interface RewardResult {
  xp_awarded: number;
  passed: boolean;
  perfect: boolean;
  /** null when the score is below the pass threshold */
  breakdown: RewardBreakdown | null;
}

// ============================================================================
// LEVELS
// ============================================================================

export const LEVEL_THRESHOLDS = [
  { level: 1, xpRequired: 0 },
  { level: 2, xpRequired: 100 },
  { level: 3, xpRequired: 300 },
  { level: 4, xpRequired: 700 },
  { level: 5, xpRequired: 1500 },
  { level: 6, xpRequired: 2700 },
  { level: 7, xpRequired: 4500 },
  { level: 8, xpRequired: 7000 },
  { level: 9, xpRequired: 10500 },
  { level: 10, xpRequired: 18500 },
] as const;

export function calculateLevel(accumulatedXP: number): number {
  for (let i = LEVEL_THRESHOLDS.length - 1; i >= 0; i--) {
    const threshold = LEVEL_THRESHOLDS[i];
    if (threshold && accumulatedXP >= threshold.xpRequired) {
      return threshold.level;
    }
  }
  return 1;
}

// ============================================================================
// REWARD
// ============================================================================

/**
 * The deployment's canonical length metric. Word and letter counts are never mixed.
 */
export function selectLengthMetric(metrics: ContentMetrics, metric: LengthMetric = config.xp.lengthMetric): number {
  return metric === 'letters' ? metrics.letter_count : metrics.word_count;
}

export function diminishingFactor(attemptNumber: number, base: string = config.xp.diminishingBase): Decimal {
  return new Decimal(base).pow(attemptNumber - 1);
}

/**
 * Throws ValidationError for negative or non-finite inputs, a score outside
 * 0-100, or an attempt number below 1.
 */
export function calculateReward(input: RewardInput, formula: XPFormulaConfig = config.xp): RewardResult {
  const { lengthMetric, readingLevel, scorePct, wpmUsed, attemptNumber } = parseOrThrow(
    rewardInputSchema,
    input,
    'reward input'
  );

  if (scorePct < formula.passThresholdPct) {
    return { xp_awarded: 0, passed: false, perfect: false, breakdown: null };
  }

  const perfect = scorePct === 100;

  const complexity = new Decimal(readingLevel).div(10);
  const speed = new Decimal(wpmUsed).div(formula.baselineWpm).mul(complexity);
  const accuracy = new Decimal(scorePct).div(100);
  const raw = new Decimal(lengthMetric).mul(speed).mul(accuracy);
  const perfectBonus = perfect ? raw.mul(formula.perfectBonusRate) : new Decimal(0);
  const diminishing = diminishingFactor(attemptNumber, formula.diminishingBase);

  const total = raw.plus(perfectBonus).mul(diminishing).floor();

  return {
    xp_awarded: total.toNumber(),
    passed: true,
    perfect,
    breakdown: {
      complexity_factor: complexity.toNumber(),
      speed_multiplier: speed.toNumber(),
      accuracy_bonus: accuracy.toNumber(),
      raw: raw.toNumber(),
      perfect_bonus: perfectBonus.toNumber(),
      diminishing_factor: diminishing.toNumber(),
    },
  };
}

/**
 * floor(amount * rate), used for author rewards.
 */
export function applyRate(amount: number, rate: string): number {
  return new Decimal(amount).mul(rate).floor().toNumber();
}
