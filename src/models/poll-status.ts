/**
 * Poll Status Models
 * 
 * Health of the upstream feed as observed by the most recent poll cycle.
 */

export enum PollHealth {
  UNKNOWN = 'Unknown',
  HEALTHY = 'Healthy',
  DEMO_MODE = 'Demo Mode',
  API_ERROR = 'API Error',
  CONNECTION_ERROR = 'Connection Error',
  STORAGE_ERROR = 'Storage Error',
}

export interface PollStatus {
  status: PollHealth;
  last_check: string | null;     // ISO-8601 timestamp of the last cycle start
  error: string | null;
}

/**
 * Outcome of one poll cycle
 */
export interface PollCycleResult {
  status: PollStatus;
  matches_processed: number;
  matches_finished: number;
  predictions_scored: number;
  duration_ms: number;
}

/**
 * Status before the first cycle has run
 */
export const INITIAL_POLL_STATUS: PollStatus = {
  status: PollHealth.UNKNOWN,
  last_check: null,
  error: null,
};

export interface PollStatusRow {
  status: string;
  last_check: Date | null;
  error: string | null;
}

function parsePollHealth(value: string): PollHealth {
  const known = Object.values(PollHealth).find((health) => health === value);
  return known ?? PollHealth.UNKNOWN;
}

export function mapPollStatusRow(row: PollStatusRow): PollStatus {
  return {
    status: parsePollHealth(row.status),
    last_check: row.last_check ? row.last_check.toISOString() : null,
    error: row.error,
  };
}
