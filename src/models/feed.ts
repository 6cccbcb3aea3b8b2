/**
 * Upstream Feed Models
 * 
 * Shape of the football-data.org v4 match records consumed by the poller.
 * Only the fields the normalizer reads are declared; the feed carries many more.
 */

export interface FeedTeam {
  name: string;
}

export interface FeedScoreLine {
  home?: number | null;
  away?: number | null;
}

export interface FeedScore {
  fullTime?: FeedScoreLine | null;
}

export interface FeedCompetition {
  id: number;
  name?: string | null;
}

/**
 * One match record from GET /matches
 */
export interface FeedMatch {
  id: number;
  homeTeam: FeedTeam;
  awayTeam: FeedTeam;
  status: string;
  score?: FeedScore | null;
  utcDate?: string | null;
  competition: FeedCompetition;
}

/**
 * Result of fetching the live feed. Failures are values so the poll cycle
 * can record a status without exception plumbing.
 */
export type FeedFetchResult =
  | { ok: true; matches: unknown[] }
  | { ok: false; kind: 'http'; statusCode: number; message: string }
  | { ok: false; kind: 'network'; message: string };
