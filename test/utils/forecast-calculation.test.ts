/**
 * Forecast Calculation Tests
 */

import { ForecastLevel } from '../../src/models/forecast';
import {
  calculateForecast,
  fitTrend,
  forecastLevel,
  formatFixed,
  variance,
} from '../../src/utils/forecast-calculation';

function series(values: number[]): { pressure_index: number }[] {
  return values.map((pressure_index) => ({ pressure_index }));
}

describe('Forecast Calculation', () => {
  describe('calculateForecast', () => {
    it('should be inconclusive with fewer than 3 snapshots', () => {
      const expected = {
        level: ForecastLevel.INCONCLUSIVE,
        probability: 0,
        explanation: 'Insufficient data for trend analysis.',
      };
      expect(calculateForecast([])).toEqual(expected);
      expect(calculateForecast(series([100, 100]))).toEqual(expected);
    });

    it('should return 50 / Moderate for a constant sequence', () => {
      expect(calculateForecast(series([20, 20, 20]))).toEqual({
        level: ForecastLevel.MODERATE,
        probability: 50,
        explanation: 'Slope: 0.00, Var: 0.0. Downward pressure.',
      });
    });

    it('should clamp a steep upward trend to 100 / High', () => {
      expect(calculateForecast(series([0, 10, 20]))).toEqual({
        level: ForecastLevel.HIGH,
        probability: 100,
        explanation: 'Slope: 10.00, Var: 66.7. Upward trend.',
      });
    });

    it('should clamp a steep downward trend to 0 / Low', () => {
      expect(calculateForecast(series([20, 10, 0]))).toEqual({
        level: ForecastLevel.LOW,
        probability: 0,
        explanation: 'Slope: -10.00, Var: 66.7. Downward pressure.',
      });
    });

    it('should treat a slope of exactly 1 as Moderate and -1 as Low', () => {
      expect(calculateForecast(series([10, 11, 12]))).toEqual({
        level: ForecastLevel.MODERATE,
        probability: 59,
        explanation: 'Slope: 1.00, Var: 0.7. Upward trend.',
      });
      expect(calculateForecast(series([12, 11, 10]))).toEqual({
        level: ForecastLevel.LOW,
        probability: 39,
        explanation: 'Slope: -1.00, Var: 0.7. Downward pressure.',
      });
    });

    it('should cap the volatility penalty at 20', () => {
      expect(calculateForecast(series([-100, 100, -100]))).toEqual({
        level: ForecastLevel.MODERATE,
        probability: 30,
        explanation: 'Slope: 0.00, Var: 8888.9. Downward pressure.',
      });
    });

    it('should round an exact variance tie to the even digit', () => {
      expect(calculateForecast(series([0, 1, 0, 1]))).toEqual({
        level: ForecastLevel.MODERATE,
        probability: 51,
        explanation: 'Slope: 0.20, Var: 0.2. Upward trend.',
      });
    });

    it('should only look at the last 10 snapshots', () => {
      const forecast = calculateForecast(series([100, -100, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0]));
      expect(forecast.probability).toBe(50);
      expect(forecast.level).toBe(ForecastLevel.MODERATE);
    });

    it('should fall back to a neutral forecast when the fit fails', () => {
      expect(calculateForecast(series([1, NaN, 3]))).toEqual({
        level: ForecastLevel.MODERATE,
        probability: 50,
        explanation: 'Calculating...',
      });
    });

    it('should always produce an integer probability in [0, 100]', () => {
      const forecast = calculateForecast(series([3.3, -7.1, 12.9, 40.2, -15.5]));
      expect(Number.isInteger(forecast.probability)).toBe(true);
      expect(forecast.probability).toBeGreaterThanOrEqual(0);
      expect(forecast.probability).toBeLessThanOrEqual(100);
    });
  });

  describe('fitTrend', () => {
    it('should fit slope and intercept by least squares', () => {
      const fit = fitTrend([1, 3, 5]);
      expect(fit.ok).toBe(true);
      if (fit.ok) {
        expect(fit.slope).toBeCloseTo(2);
        expect(fit.intercept).toBeCloseTo(1);
        expect(fit.variance).toBeCloseTo(8 / 3);
      }
    });

    it('should report a failure for a single point', () => {
      expect(fitTrend([5])).toEqual({ ok: false, reason: 'Need at least 2 points to fit a line, got 1' });
    });

    it('should report a failure for non-finite values', () => {
      expect(fitTrend([1, Infinity, 2])).toEqual({ ok: false, reason: 'Non-finite pressure value in window' });
    });
  });

  describe('variance', () => {
    it('should use the population divisor', () => {
      expect(variance([2, 4, 4, 4, 5, 5, 7, 9])).toBe(4);
    });

    it('should be NaN for an empty list', () => {
      expect(variance([])).toBeNaN();
    });
  });

  describe('forecastLevel', () => {
    it('should map slopes to levels', () => {
      expect(forecastLevel(1.01)).toBe(ForecastLevel.HIGH);
      expect(forecastLevel(0)).toBe(ForecastLevel.MODERATE);
      expect(forecastLevel(-1.01)).toBe(ForecastLevel.LOW);
    });
  });

  describe('formatFixed', () => {
    it('should settle exact ties to the even digit', () => {
      expect(formatFixed(0.25, 1)).toBe('0.2');
      expect(formatFixed(0.75, 1)).toBe('0.8');
      expect(formatFixed(2.5, 0)).toBe('2');
      expect(formatFixed(-0.25, 1)).toBe('-0.2');
      expect(formatFixed(0.125, 2)).toBe('0.12');
    });

    it('should match toFixed when the value is not an exact tie', () => {
      expect(formatFixed(66.66666666666667, 1)).toBe('66.7');
      expect(formatFixed(0.2, 2)).toBe('0.20');
      expect(formatFixed(0, 1)).toBe('0.0');
      expect(formatFixed(8888.888888888889, 1)).toBe('8888.9');
    });
  });
});
