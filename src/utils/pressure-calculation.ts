/**
 * Pressure Index Calculation
 *
 * Converts the current minute and score into a single bounded momentum
 * scalar. Only the immediately preceding snapshot is consulted.
 *
 * Rules:
 * - base = (minute / 90) * 20
 * - score impact = clamp((home - away) * 30, -60, 60)
 * - trend impact = +40 if home scored since the previous snapshot,
 *   -40 if away scored (both may apply), 0 without a previous snapshot
 * - pressure = clamp(base + score impact + trend impact, -100, 100)
 */

import { ScoreObservation } from '../models/snapshot';

export const PRESSURE_MIN = -100;
export const PRESSURE_MAX = 100;

const SCORE_IMPACT_PER_GOAL = 30;
const SCORE_IMPACT_LIMIT = 60;
const TREND_IMPACT = 40;

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Contribution of goals scored since the previous observation
 */
export function calculateTrendImpact(
  current: ScoreObservation,
  previous: Pick<ScoreObservation, 'score_home' | 'score_away'> | null
): number {
  if (!previous) {
    return 0;
  }

  let impact = 0;
  if (current.score_home > previous.score_home) {
    impact += TREND_IMPACT;
  }
  if (current.score_away > previous.score_away) {
    impact -= TREND_IMPACT;
  }
  return impact;
}

/**
 * Calculate the pressure index for a new snapshot
 *
 * @param current - Minute and score being recorded
 * @param previous - Most recent prior snapshot for the match, or null
 * @returns Pressure index in [-100, 100]
 */
export function calculatePressureIndex(
  current: ScoreObservation,
  previous: Pick<ScoreObservation, 'score_home' | 'score_away'> | null
): number {
  const basePressure = (current.minute / 90) * 20;
  const scoreDiff = current.score_home - current.score_away;
  const scoreImpact = clamp(scoreDiff * SCORE_IMPACT_PER_GOAL, -SCORE_IMPACT_LIMIT, SCORE_IMPACT_LIMIT);
  const trendImpact = calculateTrendImpact(current, previous);

  return clamp(basePressure + scoreImpact + trendImpact, PRESSURE_MIN, PRESSURE_MAX);
}
