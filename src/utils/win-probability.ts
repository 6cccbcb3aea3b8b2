/**
 * Win Probability Heuristic
 *
 * Splits 100% between home, draw and away from the latest pressure index:
 * home = 33 + 0.3p, away = 33 - 0.3p (both truncated), draw takes the rest.
 */

import { WinProbability } from '../models/forecast';

const BASE_SHARE = 33;
const PRESSURE_WEIGHT = 0.3;

export function calculateWinProbability(currentPressure: number): WinProbability {
  const home = Math.trunc(BASE_SHARE + currentPressure * PRESSURE_WEIGHT);
  const away = Math.trunc(BASE_SHARE - currentPressure * PRESSURE_WEIGHT);

  return {
    home,
    away,
    draw: 100 - home - away,
    explanation: 'Based on current momentum slope and pressure intensity.',
  };
}
