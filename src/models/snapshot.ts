/**
 * Snapshot Models
 * 
 * A snapshot is one timestamped observation of a match's minute, score and
 * pressure index. Snapshots are append-only; the store only ever trims the
 * oldest ones.
 */

/**
 * Pressure snapshot entity from database
 */
export interface Snapshot {
  id: number;
  match_id: number;
  captured_at: Date;
  minute: number;                // Estimated minute, clamped to [1, 120]
  score_home: number;
  score_away: number;
  pressure_index: number;        // Clamped to [-100, 100]
}

/**
 * Snapshot database row (matches PostgreSQL schema)
 */
export interface SnapshotRow {
  id: number;
  match_id: number;
  captured_at: Date;
  minute: number;
  score_home: number;
  score_away: number;
  pressure_index: number | string;   // double precision may arrive as string from some drivers
}

/**
 * Data required to append a snapshot
 */
export interface SnapshotInsertData {
  match_id: number;
  minute: number;
  score_home: number;
  score_away: number;
  pressure_index: number;
}

/**
 * Score state used by the pressure calculation
 */
export interface ScoreObservation {
  minute: number;
  score_home: number;
  score_away: number;
}

/**
 * Convert database row to Snapshot model
 */
export function mapSnapshotRow(row: SnapshotRow): Snapshot {
  return {
    id: row.id,
    match_id: row.match_id,
    captured_at: row.captured_at,
    minute: row.minute,
    score_home: row.score_home,
    score_away: row.score_away,
    pressure_index: Number(row.pressure_index),
  };
}
