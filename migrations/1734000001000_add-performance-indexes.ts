/**
 * Performance Indexes Migration (V002)
 * 
 * Indexes for the hot paths: latest snapshots per match (poll cycle, chart,
 * retention trim), live match listing, pending prediction scoring and the
 * leaderboard.
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  // Scanned backwards for newest-first reads
  pgm.createIndex('snapshots', ['match_id', 'captured_at', 'id'], {
    name: 'idx_snapshots_match_captured',
  });

  pgm.createIndex('matches', ['status', 'last_updated'], {
    name: 'idx_matches_status_updated',
  });

  pgm.createIndex('predictions', ['status', 'match_id'], {
    name: 'idx_predictions_status_match',
  });

  pgm.createIndex('users', ['points', 'id'], {
    name: 'idx_users_points',
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  // Drop indexes in reverse order
  pgm.dropIndex('users', ['points', 'id'], {
    name: 'idx_users_points',
  });

  pgm.dropIndex('predictions', ['status', 'match_id'], {
    name: 'idx_predictions_status_match',
  });

  pgm.dropIndex('matches', ['status', 'last_updated'], {
    name: 'idx_matches_status_updated',
  });

  pgm.dropIndex('snapshots', ['match_id', 'captured_at', 'id'], {
    name: 'idx_snapshots_match_captured',
  });
}
