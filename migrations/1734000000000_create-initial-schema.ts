/**
 * Initial Schema Migration (V001)
 * 
 * Tables created:
 * - matches: live match state, upserted by upstream id
 * - snapshots: append-only pressure history per match
 * - users: players of the prediction game
 * - predictions: one per player and match
 * - referrals: referral bonus ledger
 * - poll_status: single row with the last poll cycle status
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createTable('matches', {
    id: { type: 'integer', primaryKey: true },
    name: { type: 'text', notNull: true },
    home_team: { type: 'text', notNull: true },
    away_team: { type: 'text', notNull: true },
    status: { type: 'varchar(32)', notNull: true },
    utc_date: { type: 'text' },
    competition_id: { type: 'integer' },
    score_home: { type: 'integer', default: 0 },
    score_away: { type: 'integer', default: 0 },
    last_updated: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createTable('snapshots', {
    id: 'id',
    match_id: {
      type: 'integer',
      notNull: true,
      references: 'matches',
      onDelete: 'CASCADE',
    },
    captured_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
    minute: {
      type: 'integer',
      notNull: true,
      check: 'minute BETWEEN 1 AND 120',
    },
    score_home: { type: 'integer', notNull: true },
    score_away: { type: 'integer', notNull: true },
    pressure_index: {
      type: 'double precision',
      notNull: true,
      check: 'pressure_index BETWEEN -100 AND 100',
    },
  });

  pgm.createTable('users', {
    id: 'id',
    username: { type: 'varchar(20)', notNull: true, unique: true },
    referral_code: { type: 'varchar(8)', notNull: true, unique: true },
    referred_by_code: { type: 'varchar(64)' },
    points: { type: 'integer', notNull: true, default: 0 },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createTable(
    'predictions',
    {
      id: 'id',
      user_id: {
        type: 'integer',
        notNull: true,
        references: 'users',
        onDelete: 'CASCADE',
      },
      match_id: {
        type: 'integer',
        notNull: true,
        references: 'matches',
        onDelete: 'CASCADE',
      },
      predicted_outcome: {
        type: 'varchar(4)',
        notNull: true,
        check: "predicted_outcome IN ('HOME', 'DRAW', 'AWAY')",
      },
      predicted_home_goals: { type: 'integer', notNull: true, default: 0 },
      predicted_away_goals: { type: 'integer', notNull: true, default: 0 },
      points_awarded: { type: 'integer', notNull: true, default: 0 },
      status: { type: 'varchar(16)', notNull: true, default: 'PENDING' },
      created_at: {
        type: 'timestamp with time zone',
        notNull: true,
        default: pgm.func('NOW()'),
      },
    },
    {
      constraints: {
        unique: [['user_id', 'match_id']],
      },
    }
  );

  pgm.createTable('referrals', {
    id: 'id',
    referrer_user_id: {
      type: 'integer',
      notNull: true,
      references: 'users',
      onDelete: 'CASCADE',
    },
    referred_user_id: {
      type: 'integer',
      notNull: true,
      references: 'users',
      onDelete: 'CASCADE',
    },
    bonus_points: { type: 'integer', notNull: true },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createTable('poll_status', {
    id: { type: 'integer', primaryKey: true, check: 'id = 1' },
    status: { type: 'varchar(32)', notNull: true },
    last_check: { type: 'timestamp with time zone' },
    error: { type: 'text' },
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  // Drop tables in reverse order to respect foreign key constraints
  pgm.dropTable('poll_status', { ifExists: true });
  pgm.dropTable('referrals', { cascade: true });
  pgm.dropTable('predictions', { cascade: true });
  pgm.dropTable('users', { cascade: true });
  pgm.dropTable('snapshots', { cascade: true });
  pgm.dropTable('matches', { cascade: true });
}
