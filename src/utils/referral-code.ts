import { randomInt } from 'crypto';

const REFERRAL_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const REFERRAL_CODE_LENGTH = 8;

/**
 * Generate a referral code from a CSPRNG, e.g. "K7Q2ZP0D"
 */
export function generateReferralCode(length: number = REFERRAL_CODE_LENGTH): string {
  let code = '';
  for (let i = 0; i < length; i++) {
    code += REFERRAL_ALPHABET[randomInt(REFERRAL_ALPHABET.length)];
  }
  return code;
}

export function isReferralCode(value: string): boolean {
  return new RegExp(`^[A-Z0-9]{${REFERRAL_CODE_LENGTH}}$`).test(value);
}
