/**
 * Match Repository
 * 
 * Data access layer for the live match state. Every statement is
 * parameterized and runs on the supplied executor, so the poll cycle can
 * drive it inside a transaction.
 */

import { QueryExecutor, poolExecutor } from '../config/database';
import {
  ACTIVE_MATCH_STATUSES,
  LIVE_MATCH_STATUSES,
  PREDICTABLE_MATCH_STATUSES,
  MatchState,
  MatchRow,
  MatchStatus,
  MatchUpsertData,
  mapMatchRow,
} from '../models/match';

export interface MatchStore {
  upsert(data: MatchUpsertData): Promise<MatchState>;
  markMissingAsFinished(seenIds: number[]): Promise<number>;
  findById(matchId: number): Promise<MatchState | null>;
  findLive(): Promise<MatchState[]>;
  findPredictable(): Promise<MatchState[]>;
}

const MATCH_COLUMNS = `
  id,
  name,
  home_team,
  away_team,
  status,
  utc_date,
  competition_id,
  score_home,
  score_away,
  last_updated
`;

export class MatchRepository implements MatchStore {
  constructor(private db: QueryExecutor = poolExecutor) {}

  /**
   * Insert a match on first sighting, otherwise refresh its status and score.
   * Names, kickoff and competition are kept from the first insert.
   */
  async upsert(data: MatchUpsertData): Promise<MatchState> {
    const result = await this.db.query<MatchRow>(
      `
      INSERT INTO matches (
        id, name, home_team, away_team, status, utc_date, competition_id, score_home, score_away
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      ON CONFLICT (id) DO UPDATE SET
        status = EXCLUDED.status,
        score_home = EXCLUDED.score_home,
        score_away = EXCLUDED.score_away,
        last_updated = NOW()
      RETURNING ${MATCH_COLUMNS}
      `,
      [
        data.id,
        data.name,
        data.home_team,
        data.away_team,
        data.status,
        data.utc_date,
        data.competition_id,
        data.score_home,
        data.score_away,
      ]
    );

    return mapMatchRow(result.rows[0]);
  }

  /**
   * Mark active matches that dropped out of the feed as FINISHED
   * 
   * @param seenIds - Match ids present in the current feed
   * @returns Number of matches transitioned
   */
  async markMissingAsFinished(seenIds: number[]): Promise<number> {
    const result = await this.db.query<{ id: number }>(
      `
      UPDATE matches
      SET status = $1, last_updated = NOW()
      WHERE status = ANY($2::text[])
        AND NOT (id = ANY($3::integer[]))
      RETURNING id
      `,
      [MatchStatus.FINISHED, [...ACTIVE_MATCH_STATUSES], seenIds]
    );

    return result.rowCount ?? result.rows.length;
  }

  async findById(matchId: number): Promise<MatchState | null> {
    const result = await this.db.query<MatchRow>(
      `SELECT ${MATCH_COLUMNS} FROM matches WHERE id = $1`,
      [matchId]
    );

    return result.rows.length > 0 ? mapMatchRow(result.rows[0]) : null;
  }

  /**
   * Matches currently in play, most recently updated first
   */
  async findLive(): Promise<MatchState[]> {
    const result = await this.db.query<MatchRow>(
      `
      SELECT ${MATCH_COLUMNS}
      FROM matches
      WHERE status = ANY($1::text[])
      ORDER BY last_updated DESC, id ASC
      `,
      [[...LIVE_MATCH_STATUSES]]
    );

    return result.rows.map(mapMatchRow);
  }

  /**
   * Matches still open for predictions, by kickoff
   */
  async findPredictable(): Promise<MatchState[]> {
    const result = await this.db.query<MatchRow>(
      `
      SELECT ${MATCH_COLUMNS}
      FROM matches
      WHERE status = ANY($1::text[])
      ORDER BY utc_date ASC, id ASC
      `,
      [[...PREDICTABLE_MATCH_STATUSES]]
    );

    return result.rows.map(mapMatchRow);
  }
}
