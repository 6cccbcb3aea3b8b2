/**
 * Prediction Game Models
 * 
 * Users, predictions and referrals of the prediction mini-game.
 */

/**
 * Predicted or actual match outcome
 */
export enum MatchOutcome {
  HOME = 'HOME',
  DRAW = 'DRAW',
  AWAY = 'AWAY',
}

export enum PredictionStatus {
  PENDING = 'PENDING',
  SCORED = 'SCORED',
}

/**
 * Player of the prediction game
 */
export interface User {
  id: number;
  username: string;
  referral_code: string;
  referred_by_code: string | null;
  points: number;
  created_at: Date;
}

export interface UserRow {
  id: number;
  username: string;
  referral_code: string;
  referred_by_code: string | null;
  points: number | null;
  created_at: Date;
}

/**
 * Leaderboard line
 */
export interface LeaderboardEntry {
  username: string;
  points: number;
}

export interface Prediction {
  id: number;
  user_id: number;
  match_id: number;
  predicted_outcome: MatchOutcome;
  predicted_home_goals: number;
  predicted_away_goals: number;
  points_awarded: number;
  status: PredictionStatus;
  created_at: Date;
}

export interface PredictionInsertData {
  user_id: number;
  match_id: number;
  predicted_outcome: MatchOutcome;
  predicted_home_goals: number;
  predicted_away_goals: number;
}

/**
 * Pending prediction joined with the final score of its finished match
 */
export interface PendingPredictionResult {
  prediction_id: number;
  user_id: number;
  predicted_outcome: MatchOutcome;
  predicted_home_goals: number;
  predicted_away_goals: number;
  actual_home: number;
  actual_away: number;
}

export interface Referral {
  id: number;
  referrer_user_id: number;
  referred_user_id: number;
  bonus_points: number;
  created_at: Date;
}

/**
 * Convert database row to User model
 */
export function mapUserRow(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    referral_code: row.referral_code,
    referred_by_code: row.referred_by_code,
    points: row.points ?? 0,
    created_at: row.created_at,
  };
}
