/**
 * Database Migration Runner
 * 
 * Creates the schema with idempotent DDL. Mirrors the node-pg-migrate
 * files under migrations/ so it can run inside a Lambda without the CLI.
 * Can be invoked as a Lambda function or run locally.
 */

import { getPool, closePool } from '../config/database';
import { log, LogLevel } from '../utils/logger';

export interface MigrationResult {
  success: boolean;
  message: string;
  error?: string;
}

/**
 * Ordered DDL statements, each safe to re-run
 */
export const SCHEMA_STATEMENTS: readonly { name: string; sql: string }[] = [
  {
    name: 'matches',
    sql: `
      CREATE TABLE IF NOT EXISTS matches (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        home_team TEXT NOT NULL,
        away_team TEXT NOT NULL,
        status VARCHAR(32) NOT NULL,
        utc_date TEXT,
        competition_id INTEGER,
        score_home INTEGER DEFAULT 0,
        score_away INTEGER DEFAULT 0,
        last_updated TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `,
  },
  {
    name: 'snapshots',
    sql: `
      CREATE TABLE IF NOT EXISTS snapshots (
        id SERIAL PRIMARY KEY,
        match_id INTEGER NOT NULL REFERENCES matches(id) ON DELETE CASCADE,
        captured_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        minute INTEGER NOT NULL CHECK (minute BETWEEN 1 AND 120),
        score_home INTEGER NOT NULL,
        score_away INTEGER NOT NULL,
        pressure_index DOUBLE PRECISION NOT NULL CHECK (pressure_index BETWEEN -100 AND 100)
      )
    `,
  },
  {
    name: 'users',
    sql: `
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        username VARCHAR(20) NOT NULL UNIQUE,
        referral_code VARCHAR(8) NOT NULL UNIQUE,
        referred_by_code VARCHAR(64),
        points INTEGER NOT NULL DEFAULT 0,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `,
  },
  {
    name: 'predictions',
    sql: `
      CREATE TABLE IF NOT EXISTS predictions (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        match_id INTEGER NOT NULL REFERENCES matches(id) ON DELETE CASCADE,
        predicted_outcome VARCHAR(4) NOT NULL CHECK (predicted_outcome IN ('HOME', 'DRAW', 'AWAY')),
        predicted_home_goals INTEGER NOT NULL DEFAULT 0,
        predicted_away_goals INTEGER NOT NULL DEFAULT 0,
        points_awarded INTEGER NOT NULL DEFAULT 0,
        status VARCHAR(16) NOT NULL DEFAULT 'PENDING',
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (user_id, match_id)
      )
    `,
  },
  {
    name: 'referrals',
    sql: `
      CREATE TABLE IF NOT EXISTS referrals (
        id SERIAL PRIMARY KEY,
        referrer_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        referred_user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        bonus_points INTEGER NOT NULL,
        created_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `,
  },
  {
    name: 'poll_status',
    sql: `
      CREATE TABLE IF NOT EXISTS poll_status (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        status VARCHAR(32) NOT NULL,
        last_check TIMESTAMP WITH TIME ZONE,
        error TEXT
      )
    `,
  },
  {
    name: 'idx_snapshots_match_captured',
    sql: 'CREATE INDEX IF NOT EXISTS idx_snapshots_match_captured ON snapshots (match_id, captured_at, id)',
  },
  {
    name: 'idx_matches_status_updated',
    sql: 'CREATE INDEX IF NOT EXISTS idx_matches_status_updated ON matches (status, last_updated)',
  },
  {
    name: 'idx_predictions_status_match',
    sql: 'CREATE INDEX IF NOT EXISTS idx_predictions_status_match ON predictions (status, match_id)',
  },
  {
    name: 'idx_users_points',
    sql: 'CREATE INDEX IF NOT EXISTS idx_users_points ON users (points, id)',
  },
];

/**
 * Run database migrations
 */
export async function runMigrations(): Promise<MigrationResult> {
  try {
    log(LogLevel.INFO, 'Starting database migrations');
    const pool = await getPool();

    await pool.query('SELECT NOW()');

    for (const statement of SCHEMA_STATEMENTS) {
      await pool.query(statement.sql);
      log(LogLevel.INFO, 'Applied schema statement', { statement: statement.name });
    }

    return {
      success: true,
      message: `Applied ${SCHEMA_STATEMENTS.length} schema statements`,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log(LogLevel.ERROR, 'Migration failed', { error: message });
    return {
      success: false,
      message: 'Migration failed',
      error: message,
    };
  }
}

// Allow running directly with ts-node
if (require.main === module) {
  runMigrations()
    .then(async (result) => {
      log(result.success ? LogLevel.INFO : LogLevel.ERROR, result.message, { error: result.error });
      await closePool();
      process.exit(result.success ? 0 : 1);
    })
    .catch((error: unknown) => {
      log(LogLevel.ERROR, 'Fatal error', { error: error instanceof Error ? error.message : String(error) });
      process.exit(1);
    });
}
