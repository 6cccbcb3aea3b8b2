/**
 * Database Diagnostics
 * 
 * Prints row counts per table and the five most recent snapshots.
 */

import { QueryExecutor, poolExecutor, closePool } from '../config/database';
import { SnapshotRow, Snapshot, mapSnapshotRow } from '../models/snapshot';
import { log, LogLevel } from '../utils/logger';

export const CHECKED_TABLES = ['matches', 'snapshots', 'users', 'predictions', 'referrals'] as const;

export interface DatabaseReport {
  counts: Record<string, number>;
  latest_snapshots: Snapshot[];
}

export async function checkDatabase(db: QueryExecutor = poolExecutor): Promise<DatabaseReport> {
  const counts: Record<string, number> = {};

  for (const table of CHECKED_TABLES) {
    const result = await db.query<{ count: number }>(`SELECT COUNT(*)::int AS count FROM ${table}`);
    counts[table] = result.rows[0]?.count ?? 0;
  }

  const latest = await db.query<SnapshotRow>(
    `
    SELECT id, match_id, captured_at, minute, score_home, score_away, pressure_index
    FROM snapshots
    ORDER BY captured_at DESC, id DESC
    LIMIT 5
    `
  );

  return {
    counts,
    latest_snapshots: latest.rows.map(mapSnapshotRow),
  };
}

if (require.main === module) {
  checkDatabase()
    .then(async (report) => {
      log(LogLevel.INFO, 'Database report', { ...report });
      await closePool();
    })
    .catch((error: unknown) => {
      log(LogLevel.ERROR, 'Database check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
}
