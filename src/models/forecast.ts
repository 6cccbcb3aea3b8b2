/**
 * Forecast Models
 * 
 * Output of the momentum forecast engine and the win-probability heuristic.
 */

export enum ForecastLevel {
  INCONCLUSIVE = 'Inconclusive',
  LOW = 'Low',
  MODERATE = 'Moderate',
  HIGH = 'High',
}

/**
 * Directional momentum estimate derived from the recent pressure trend
 */
export interface Forecast {
  level: ForecastLevel;
  probability: number;           // Integer in [0, 100]
  explanation: string;
}

/**
 * Least-squares trend fit over recent pressure values.
 * A failed fit is a value, not an exception.
 */
export type TrendFit =
  | { ok: true; slope: number; intercept: number; variance: number }
  | { ok: false; reason: string };

/**
 * Outcome split shown on the per-match prediction page (percentages sum to 100)
 */
export interface WinProbability {
  home: number;
  away: number;
  draw: number;
  explanation: string;
}
