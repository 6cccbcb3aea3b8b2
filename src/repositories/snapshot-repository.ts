/**
 * Snapshot Repository
 * 
 * Append-only pressure history per match. Rows are never updated; the only
 * delete is the retention trim, which keeps the most recent K rows by
 * capture time (ties broken by id).
 */

import { QueryExecutor, poolExecutor } from '../config/database';
import { Snapshot, SnapshotInsertData, SnapshotRow, mapSnapshotRow } from '../models/snapshot';

export interface SnapshotStore {
  insert(data: SnapshotInsertData): Promise<Snapshot>;
  findLatest(matchId: number): Promise<Snapshot | null>;
  findRecent(matchId: number, limit: number): Promise<Snapshot[]>;
  findAllAscending(matchId: number): Promise<Snapshot[]>;
  trimToLatest(matchId: number, keep: number): Promise<number>;
}

const SNAPSHOT_COLUMNS = 'id, match_id, captured_at, minute, score_home, score_away, pressure_index';

export class SnapshotRepository implements SnapshotStore {
  constructor(private db: QueryExecutor = poolExecutor) {}

  async insert(data: SnapshotInsertData): Promise<Snapshot> {
    const result = await this.db.query<SnapshotRow>(
      `
      INSERT INTO snapshots (match_id, minute, score_home, score_away, pressure_index)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING ${SNAPSHOT_COLUMNS}
      `,
      [data.match_id, data.minute, data.score_home, data.score_away, data.pressure_index]
    );

    return mapSnapshotRow(result.rows[0]);
  }

  async findLatest(matchId: number): Promise<Snapshot | null> {
    const recent = await this.findRecent(matchId, 1);
    return recent.length > 0 ? recent[0] : null;
  }

  /**
   * Most recent snapshots for a match, newest first
   */
  async findRecent(matchId: number, limit: number): Promise<Snapshot[]> {
    const result = await this.db.query<SnapshotRow>(
      `
      SELECT ${SNAPSHOT_COLUMNS}
      FROM snapshots
      WHERE match_id = $1
      ORDER BY captured_at DESC, id DESC
      LIMIT $2
      `,
      [matchId, limit]
    );

    return result.rows.map(mapSnapshotRow);
  }

  /**
   * Full history of a match, oldest first
   */
  async findAllAscending(matchId: number): Promise<Snapshot[]> {
    const result = await this.db.query<SnapshotRow>(
      `
      SELECT ${SNAPSHOT_COLUMNS}
      FROM snapshots
      WHERE match_id = $1
      ORDER BY captured_at ASC, id ASC
      `,
      [matchId]
    );

    return result.rows.map(mapSnapshotRow);
  }

  /**
   * Delete everything but the `keep` most recent snapshots of a match
   * 
   * @returns Number of rows deleted
   */
  async trimToLatest(matchId: number, keep: number): Promise<number> {
    const result = await this.db.query(
      `
      DELETE FROM snapshots
      WHERE match_id = $1
        AND id NOT IN (
          SELECT id
          FROM snapshots
          WHERE match_id = $1
          ORDER BY captured_at DESC, id DESC
          LIMIT $2
        )
      `,
      [matchId, keep]
    );

    return result.rowCount ?? 0;
  }
}
