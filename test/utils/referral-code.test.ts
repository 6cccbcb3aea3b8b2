/**
 * Referral Code Tests
 */

import { generateReferralCode, isReferralCode } from '../../src/utils/referral-code';

describe('Referral Codes', () => {
  it('should generate 8 uppercase alphanumeric characters', () => {
    for (let i = 0; i < 20; i++) {
      expect(generateReferralCode()).toMatch(/^[A-Z0-9]{8}$/);
    }
  });

  it('should honour a custom length', () => {
    expect(generateReferralCode(4)).toHaveLength(4);
  });

  it('should recognise well-formed codes', () => {
    expect(isReferralCode('AB12CD34')).toBe(true);
    expect(isReferralCode('ab12cd34')).toBe(false);
    expect(isReferralCode('AB12')).toBe(false);
  });
});
