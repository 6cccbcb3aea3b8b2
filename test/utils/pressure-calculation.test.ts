/**
 * Pressure Calculation Tests
 */

import {
  calculatePressureIndex,
  calculateTrendImpact,
  clamp,
} from '../../src/utils/pressure-calculation';

describe('Pressure Calculation', () => {
  describe('clamp', () => {
    it('should keep values inside the range', () => {
      expect(clamp(5, -10, 10)).toBe(5);
      expect(clamp(-20, -10, 10)).toBe(-10);
      expect(clamp(20, -10, 10)).toBe(10);
    });
  });

  describe('calculatePressureIndex', () => {
    it('should scale the base pressure with the minute when scores are level', () => {
      expect(calculatePressureIndex({ minute: 45, score_home: 1, score_away: 1 }, null)).toBe(10);
      expect(calculatePressureIndex({ minute: 90, score_home: 0, score_away: 0 }, null)).toBe(20);
      expect(calculatePressureIndex({ minute: 9, score_home: 0, score_away: 0 }, null)).toBe(2);
    });

    it('should cap the score impact at 60', () => {
      // base 20 + clamp(150) = 80
      expect(calculatePressureIndex({ minute: 90, score_home: 5, score_away: 0 }, null)).toBe(80);
      // base 20 - 60 = -40
      expect(calculatePressureIndex({ minute: 90, score_home: 0, score_away: 5 }, null)).toBe(-40);
    });

    it('should add 40 when the home side scored since the previous snapshot', () => {
      // base 10 + 30 + 40
      const pressure = calculatePressureIndex(
        { minute: 45, score_home: 2, score_away: 1 },
        { score_home: 1, score_away: 1 }
      );
      expect(pressure).toBe(80);
    });

    it('should subtract 40 when the away side scored since the previous snapshot', () => {
      // base 10 - 30 - 40
      const pressure = calculatePressureIndex(
        { minute: 45, score_home: 0, score_away: 1 },
        { score_home: 0, score_away: 0 }
      );
      expect(pressure).toBe(-60);
    });

    it('should apply both trend bonuses when both sides scored', () => {
      const pressure = calculatePressureIndex(
        { minute: 45, score_home: 1, score_away: 1 },
        { score_home: 0, score_away: 0 }
      );
      expect(pressure).toBe(10);
    });

    it('should clamp the result to 100', () => {
      // 20 + 60 + 40 = 120
      const pressure = calculatePressureIndex(
        { minute: 90, score_home: 3, score_away: 0 },
        { score_home: 2, score_away: 0 }
      );
      expect(pressure).toBe(100);
    });
  });

  describe('calculateTrendImpact', () => {
    it('should be 0 without a previous snapshot', () => {
      expect(calculateTrendImpact({ minute: 50, score_home: 3, score_away: 0 }, null)).toBe(0);
    });

    it('should be 0 when neither score changed', () => {
      expect(
        calculateTrendImpact({ minute: 50, score_home: 1, score_away: 2 }, { score_home: 1, score_away: 2 })
      ).toBe(0);
    });

    it('should return +40 and -40 for home and away goals', () => {
      expect(
        calculateTrendImpact({ minute: 50, score_home: 2, score_away: 0 }, { score_home: 1, score_away: 0 })
      ).toBe(40);
      expect(
        calculateTrendImpact({ minute: 50, score_home: 0, score_away: 1 }, { score_home: 0, score_away: 0 })
      ).toBe(-40);
    });
  });
});
