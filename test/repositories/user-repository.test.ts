/**
 * User Repository Tests
 */

import {
  REFERRAL_CODE_CONSTRAINT,
  ReferralRepository,
  USERNAME_CONSTRAINT,
  UserRepository,
} from '../../src/repositories/user-repository';
import { ConflictError } from '../../src/models/errors';

const CREATED_AT = new Date('2024-05-01T12:00:00Z');

const USER_ROW = {
  id: 1,
  username: 'striker9',
  referral_code: 'ABCD1234',
  referred_by_code: null,
  points: null,
  created_at: CREATED_AT,
};

function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505', constraint });
}

describe('UserRepository', () => {
  let db: { query: jest.Mock };
  let repository: UserRepository;

  beforeEach(() => {
    db = { query: jest.fn().mockResolvedValue({ rows: [] }) };
    repository = new UserRepository(db);
  });

  describe('create', () => {
    it('should insert the player and default points to zero', async () => {
      db.query.mockResolvedValue({ rows: [USER_ROW] });

      const user = await repository.create({ username: 'striker9', referral_code: 'ABCD1234', referred_by_code: null });

      expect(user).toEqual({ ...USER_ROW, points: 0 });
      expect(db.query.mock.calls[0][1]).toEqual(['striker9', 'ABCD1234', null]);
    });

    it('should map a username collision to a conflict', async () => {
      db.query.mockRejectedValue(uniqueViolation(USERNAME_CONSTRAINT));

      const error = await repository
        .create({ username: 'striker9', referral_code: 'ABCD1234', referred_by_code: null })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConflictError);
      expect(error).toMatchObject({ message: 'Username is already taken', constraint: USERNAME_CONSTRAINT });
    });

    it('should skip a row whose referral code is taken instead of failing the statement', async () => {
      await expect(
        repository.create({ username: 'striker9', referral_code: 'ABCD1234', referred_by_code: null })
      ).rejects.toMatchObject({ message: 'Referral code already in use', constraint: REFERRAL_CODE_CONSTRAINT });

      expect(db.query).toHaveBeenCalledTimes(1);
      expect(db.query.mock.calls[0][0]).toContain('ON CONFLICT (referral_code) DO NOTHING');
    });

    it('should allow another insert on the same executor after a referral code collision', async () => {
      db.query.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [{ ...USER_ROW, referral_code: 'WXYZ9876' }] });

      await expect(
        repository.create({ username: 'striker9', referral_code: 'ABCD1234', referred_by_code: null })
      ).rejects.toBeInstanceOf(ConflictError);
      const user = await repository.create({ username: 'striker9', referral_code: 'WXYZ9876', referred_by_code: null });

      expect(user.referral_code).toBe('WXYZ9876');
      expect(db.query.mock.calls[1][1]).toEqual(['striker9', 'WXYZ9876', null]);
    });

    it('should rethrow other errors', async () => {
      db.query.mockRejectedValue(new Error('Connection timeout'));

      await expect(
        repository.create({ username: 'striker9', referral_code: 'ABCD1234', referred_by_code: null })
      ).rejects.toThrow('Connection timeout');
    });
  });

  describe('lookups', () => {
    it('should find by referral code', async () => {
      db.query.mockResolvedValue({ rows: [{ ...USER_ROW, points: 50 }] });

      await expect(repository.findByReferralCode('ABCD1234')).resolves.toMatchObject({ id: 1, points: 50 });
      expect(db.query.mock.calls[0][1]).toEqual(['ABCD1234']);
    });

    it('should return null for an unknown username', async () => {
      await expect(repository.findByUsername('nobody')).resolves.toBeNull();
    });

    it('should return null for an unknown id', async () => {
      await expect(repository.findById(42)).resolves.toBeNull();
    });
  });

  describe('addPoints', () => {
    it('should increment points in place', async () => {
      await repository.addPoints(1, 120);

      expect(db.query).toHaveBeenCalledWith('UPDATE users SET points = points + $2 WHERE id = $1', [1, 120]);
    });
  });

  describe('leaderboard', () => {
    it('should return usernames and points with the limit applied', async () => {
      db.query.mockResolvedValue({ rows: [{ username: 'rookie', points: 120 }, { username: 'captain', points: 0 }] });

      const entries = await repository.leaderboard(50);

      expect(entries).toEqual([
        { username: 'rookie', points: 120 },
        { username: 'captain', points: 0 },
      ]);
      expect(db.query.mock.calls[0][1]).toEqual([50]);
    });
  });
});

describe('ReferralRepository', () => {
  it('should record the referral with its bonus', async () => {
    const referral = { id: 1, referrer_user_id: 1, referred_user_id: 2, bonus_points: 50, created_at: CREATED_AT };
    const db = { query: jest.fn().mockResolvedValue({ rows: [referral] }) };

    await expect(new ReferralRepository(db).create(1, 2, 50)).resolves.toEqual(referral);
    expect(db.query.mock.calls[0][1]).toEqual([1, 2, 50]);
  });
});
