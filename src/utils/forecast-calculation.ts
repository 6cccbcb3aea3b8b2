/**
 * Momentum Forecast Calculation
 *
 * Fits a least-squares line to the most recent pressure values and turns the
 * slope and volatility into a level, a probability and a short explanation.
 *
 * Rules:
 * - Fewer than 3 snapshots: Inconclusive, probability 0
 * - Window: last 10 pressure values, x = 0, 1, 2, ...
 * - volatility penalty = min(variance / 10, 20)
 * - probability = trunc(clamp(50 + slope * 10 - penalty, 0, 100))
 * - level: slope > 1 High, slope > -1 Moderate, otherwise Low
 */

import { Forecast, ForecastLevel, TrendFit } from '../models/forecast';
import { Snapshot } from '../models/snapshot';
import { clamp } from './pressure-calculation';

export const MIN_FORECAST_SNAPSHOTS = 3;
export const FORECAST_WINDOW = 10;

const MAX_VOLATILITY_PENALTY = 20;

export const INSUFFICIENT_DATA_FORECAST: Forecast = {
  level: ForecastLevel.INCONCLUSIVE,
  probability: 0,
  explanation: 'Insufficient data for trend analysis.',
};

export const NEUTRAL_FORECAST: Forecast = {
  level: ForecastLevel.MODERATE,
  probability: 50,
  explanation: 'Calculating...',
};

/**
 * Population variance (divisor n)
 */
export function variance(values: number[]): number {
  if (values.length === 0) {
    return NaN;
  }
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  return values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
}

/**
 * First-degree least-squares fit of values against their index
 */
export function fitTrend(values: number[]): TrendFit {
  const n = values.length;
  if (n < 2) {
    return { ok: false, reason: `Need at least 2 points to fit a line, got ${n}` };
  }
  if (values.some((value) => !Number.isFinite(value))) {
    return { ok: false, reason: 'Non-finite pressure value in window' };
  }

  const meanX = (n - 1) / 2;
  const meanY = values.reduce((sum, value) => sum + value, 0) / n;

  let sxy = 0;
  let sxx = 0;
  values.forEach((y, x) => {
    sxy += (x - meanX) * (y - meanY);
    sxx += (x - meanX) ** 2;
  });

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;
  const spread = variance(values);

  if (!Number.isFinite(slope) || !Number.isFinite(intercept) || !Number.isFinite(spread)) {
    return { ok: false, reason: 'Degenerate regression' };
  }

  return { ok: true, slope, intercept, variance: spread };
}

/**
 * Fixed-point formatting that settles exact ties to the even digit.
 * toFixed rounds them away from zero, so 0.25 would read 0.3.
 *
 * A double is an exact tie at `digits` places only when value * 2^(digits + 1)
 * is an odd integer; that product is exact since it scales by a power of two.
 */
export function formatFixed(value: number, digits: number): string {
  const halves = value * 2 ** (digits + 1);
  if (!Number.isInteger(halves) || Math.abs(halves % 2) !== 1) {
    return value.toFixed(digits);
  }

  const lower = Math.floor((halves * 5 ** digits) / 2);
  const even = lower % 2 === 0 ? lower : lower + 1;
  return (even / 10 ** digits).toFixed(digits);
}

export function forecastLevel(slope: number): ForecastLevel {
  if (slope > 1) {
    return ForecastLevel.HIGH;
  }
  if (slope > -1) {
    return ForecastLevel.MODERATE;
  }
  return ForecastLevel.LOW;
}

/**
 * Forecast momentum direction from a match's snapshot history
 *
 * @param snapshots - Snapshots ordered oldest to newest
 */
export function calculateForecast(snapshots: Pick<Snapshot, 'pressure_index'>[]): Forecast {
  if (snapshots.length < MIN_FORECAST_SNAPSHOTS) {
    return INSUFFICIENT_DATA_FORECAST;
  }

  const window = snapshots.slice(-FORECAST_WINDOW).map((snapshot) => snapshot.pressure_index);
  const fit = fitTrend(window);
  if (!fit.ok) {
    return NEUTRAL_FORECAST;
  }

  const volatilityPenalty = Math.min(fit.variance / 10, MAX_VOLATILITY_PENALTY);
  const probability = Math.trunc(clamp(50 + fit.slope * 10 - volatilityPenalty, 0, 100));
  const direction = fit.slope > 0 ? 'Upward trend.' : 'Downward pressure.';

  return {
    level: forecastLevel(fit.slope),
    probability,
    explanation: `Slope: ${formatFixed(fit.slope, 2)}, Var: ${formatFixed(fit.variance, 1)}. ${direction}`,
  };
}
