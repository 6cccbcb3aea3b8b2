/**
 * Match Models
 * 
 * Type definitions for the live match state tracked from the upstream feed.
 * A match is created on first sighting and updated in place on every poll.
 */

/**
 * Known upstream match status values.
 * Any other status string from the feed is stored as-is.
 */
export enum MatchStatus {
  SCHEDULED = 'SCHEDULED',
  TIMED = 'TIMED',
  LIVE = 'LIVE',
  IN_PLAY = 'IN_PLAY',
  PAUSED = 'PAUSED',
  FINISHED = 'FINISHED',
  STARTING = 'STARTING',
}

/**
 * Statuses considered active for FINISHED detection: a match in one of
 * these states that drops out of the live feed is marked FINISHED.
 */
export const ACTIVE_MATCH_STATUSES: readonly MatchStatus[] = [
  MatchStatus.LIVE,
  MatchStatus.IN_PLAY,
  MatchStatus.TIMED,
  MatchStatus.STARTING,
];

/**
 * Statuses shown on the live page
 */
export const LIVE_MATCH_STATUSES: readonly MatchStatus[] = [
  MatchStatus.LIVE,
  MatchStatus.IN_PLAY,
  MatchStatus.PAUSED,
];

/**
 * Statuses still open for predictions
 */
export const PREDICTABLE_MATCH_STATUSES: readonly MatchStatus[] = [
  ...LIVE_MATCH_STATUSES,
  MatchStatus.SCHEDULED,
  MatchStatus.TIMED,
];

/**
 * Match entity from database
 */
export interface MatchState {
  id: number;                    // Upstream match identifier
  name: string;                  // "<home> vs <away>"
  home_team: string;
  away_team: string;
  status: string;                // MatchStatus value or opaque upstream string
  utc_date: string;              // Kickoff timestamp as received from the feed
  competition_id: number | null;
  score_home: number;
  score_away: number;
  last_updated: Date;
}

/**
 * Match database row (matches PostgreSQL schema)
 */
export interface MatchRow {
  id: number;
  name: string;
  home_team: string;
  away_team: string;
  status: string;
  utc_date: string | null;
  competition_id: number | null;
  score_home: number | null;
  score_away: number | null;
  last_updated: Date;
}

/**
 * Canonical match record produced by the feed normalizer, ready for upsert
 */
export interface MatchUpsertData {
  id: number;
  name: string;
  home_team: string;
  away_team: string;
  status: string;
  utc_date: string;
  competition_id: number;
  score_home: number;
  score_away: number;
}

/**
 * Convert database row to MatchState model
 */
export function mapMatchRow(row: MatchRow): MatchState {
  return {
    id: row.id,
    name: row.name,
    home_team: row.home_team,
    away_team: row.away_team,
    status: row.status,
    utc_date: row.utc_date ?? '',
    competition_id: row.competition_id,
    score_home: row.score_home ?? 0,
    score_away: row.score_away ?? 0,
    last_updated: row.last_updated,
  };
}
