/**
 * User Repository
 * 
 * Players of the prediction game and the referral ledger.
 */

import { QueryExecutor, poolExecutor, isUniqueViolation } from '../config/database';
import { ConflictError } from '../models/errors';
import { LeaderboardEntry, Referral, User, UserRow, mapUserRow } from '../models/user';

export const USERNAME_CONSTRAINT = 'users_username_key';
export const REFERRAL_CODE_CONSTRAINT = 'users_referral_code_key';

export interface UserCreateData {
  username: string;
  referral_code: string;
  referred_by_code: string | null;
}

export interface UserStore {
  create(data: UserCreateData): Promise<User>;
  findById(userId: number): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByReferralCode(code: string): Promise<User | null>;
  addPoints(userId: number, points: number): Promise<void>;
  leaderboard(limit: number): Promise<LeaderboardEntry[]>;
}

export interface ReferralStore {
  create(referrerUserId: number, referredUserId: number, bonusPoints: number): Promise<Referral>;
}

const USER_COLUMNS = 'id, username, referral_code, referred_by_code, points, created_at';

export class UserRepository implements UserStore {
  constructor(private db: QueryExecutor = poolExecutor) {}

  /**
   * A referral code collision skips the row instead of raising, so the
   * surrounding transaction stays usable for another attempt
   *
   * @throws ConflictError when the username or referral code is taken
   */
  async create(data: UserCreateData): Promise<User> {
    const result = await this.db
      .query<UserRow>(
        `
        INSERT INTO users (username, referral_code, referred_by_code)
        VALUES ($1, $2, $3)
        ON CONFLICT (referral_code) DO NOTHING
        RETURNING ${USER_COLUMNS}
        `,
        [data.username, data.referral_code, data.referred_by_code]
      )
      .catch((error: unknown) => {
        if (isUniqueViolation(error)) {
          throw new ConflictError('Username is already taken', USERNAME_CONSTRAINT);
        }
        throw error;
      });

    if (result.rows.length === 0) {
      throw new ConflictError('Referral code already in use', REFERRAL_CODE_CONSTRAINT);
    }
    return mapUserRow(result.rows[0]);
  }

  async findById(userId: number): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [userId]
    );
    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  async findByReferralCode(code: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE referral_code = $1`,
      [code]
    );
    return result.rows.length > 0 ? mapUserRow(result.rows[0]) : null;
  }

  async addPoints(userId: number, points: number): Promise<void> {
    await this.db.query(
      'UPDATE users SET points = points + $2 WHERE id = $1',
      [userId, points]
    );
  }

  /**
   * Top players by points; ties keep sign-up order
   */
  async leaderboard(limit: number): Promise<LeaderboardEntry[]> {
    const result = await this.db.query<{ username: string; points: number }>(
      `
      SELECT username, points
      FROM users
      ORDER BY points DESC, id ASC
      LIMIT $1
      `,
      [limit]
    );
    return result.rows.map((row) => ({ username: row.username, points: row.points }));
  }
}

export class ReferralRepository implements ReferralStore {
  constructor(private db: QueryExecutor = poolExecutor) {}

  async create(referrerUserId: number, referredUserId: number, bonusPoints: number): Promise<Referral> {
    const result = await this.db.query<Referral>(
      `
      INSERT INTO referrals (referrer_user_id, referred_user_id, bonus_points)
      VALUES ($1, $2, $3)
      RETURNING id, referrer_user_id, referred_user_id, bonus_points, created_at
      `,
      [referrerUserId, referredUserId, bonusPoints]
    );
    return result.rows[0];
  }
}
