/**
 * Prediction Repository
 */

import { QueryExecutor, poolExecutor, isUniqueViolation } from '../config/database';
import { BadRequestError } from '../models/errors';
import { MatchStatus } from '../models/match';
import {
  PendingPredictionResult,
  Prediction,
  PredictionInsertData,
  PredictionStatus,
} from '../models/user';

export const DUPLICATE_PREDICTION_MESSAGE = 'You already predicted this match!';

export interface PredictionStore {
  create(data: PredictionInsertData): Promise<Prediction>;
  findMatchIdsByUser(userId: number): Promise<number[]>;
  findPendingForFinished(): Promise<PendingPredictionResult[]>;
  markScored(predictionId: number, points: number): Promise<void>;
}

export class PredictionRepository implements PredictionStore {
  constructor(private db: QueryExecutor = poolExecutor) {}

  /**
   * @throws BadRequestError when the user already predicted the match
   */
  async create(data: PredictionInsertData): Promise<Prediction> {
    try {
      const result = await this.db.query<Prediction>(
        `
        INSERT INTO predictions (
          user_id, match_id, predicted_outcome, predicted_home_goals, predicted_away_goals
        )
        VALUES ($1, $2, $3, $4, $5)
        RETURNING id, user_id, match_id, predicted_outcome, predicted_home_goals,
          predicted_away_goals, points_awarded, status, created_at
        `,
        [
          data.user_id,
          data.match_id,
          data.predicted_outcome,
          data.predicted_home_goals,
          data.predicted_away_goals,
        ]
      );
      return result.rows[0];
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new BadRequestError(DUPLICATE_PREDICTION_MESSAGE);
      }
      throw error;
    }
  }

  async findMatchIdsByUser(userId: number): Promise<number[]> {
    const result = await this.db.query<{ match_id: number }>(
      'SELECT match_id FROM predictions WHERE user_id = $1',
      [userId]
    );
    return result.rows.map((row) => row.match_id);
  }

  /**
   * Pending predictions whose match has finished, joined with the final score
   */
  async findPendingForFinished(): Promise<PendingPredictionResult[]> {
    const result = await this.db.query<PendingPredictionResult>(
      `
      SELECT
        p.id AS prediction_id,
        p.user_id,
        p.predicted_outcome,
        p.predicted_home_goals,
        p.predicted_away_goals,
        COALESCE(m.score_home, 0) AS actual_home,
        COALESCE(m.score_away, 0) AS actual_away
      FROM predictions p
      INNER JOIN matches m ON p.match_id = m.id
      WHERE p.status = $1 AND m.status = $2
      ORDER BY p.id ASC
      `,
      [PredictionStatus.PENDING, MatchStatus.FINISHED]
    );
    return result.rows;
  }

  async markScored(predictionId: number, points: number): Promise<void> {
    await this.db.query(
      'UPDATE predictions SET points_awarded = $2, status = $3 WHERE id = $1',
      [predictionId, points, PredictionStatus.SCORED]
    );
  }
}
