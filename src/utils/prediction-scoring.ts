/**
 * Prediction Scoring
 *
 * Scoring Rules:
 * - Correct HOME or AWAY outcome = 100 points
 * - Correct DRAW outcome = 120 points
 * - Exact final score = 200 bonus points
 */

import { MatchOutcome } from '../models/user';

export const OUTCOME_POINTS = 100;
export const DRAW_POINTS = 120;
export const EXACT_SCORE_BONUS = 200;
export const REFERRAL_BONUS_POINTS = 50;

/**
 * Outcome of a final score
 */
export function determineOutcome(homeGoals: number, awayGoals: number): MatchOutcome {
  if (homeGoals > awayGoals) {
    return MatchOutcome.HOME;
  }
  if (awayGoals > homeGoals) {
    return MatchOutcome.AWAY;
  }
  return MatchOutcome.DRAW;
}

/**
 * Points earned by a prediction once the match is finished
 *
 * @example
 * ```typescript
 * scorePrediction(
 *   { outcome: MatchOutcome.HOME, homeGoals: 2, awayGoals: 1 },
 *   { homeGoals: 2, awayGoals: 1 }
 * ); // 300
 * ```
 */
export function scorePrediction(
  predicted: { outcome: MatchOutcome; homeGoals: number; awayGoals: number },
  actual: { homeGoals: number; awayGoals: number }
): number {
  const actualOutcome = determineOutcome(actual.homeGoals, actual.awayGoals);
  let points = 0;

  if (predicted.outcome === actualOutcome) {
    points += actualOutcome === MatchOutcome.DRAW ? DRAW_POINTS : OUTCOME_POINTS;
  }

  if (predicted.homeGoals === actual.homeGoals && predicted.awayGoals === actual.awayGoals) {
    points += EXACT_SCORE_BONUS;
  }

  return points;
}
