/**
 * Feed Normalization
 *
 * Maps upstream match records (or the synthetic demo records) onto the
 * canonical match state stored by the poller.
 */

import { FeedMatch } from '../models/feed';
import { MatchStatus, MatchUpsertData } from '../models/match';
import { describeFeedMatchErrors, isFeedMatch } from './payload-validation';
import { log, LogLevel } from './logger';

export const DEMO_MODE_MESSAGE = 'Using synthetic data. Add a real API key to see live matches.';

/**
 * Synthetic live matches used when no API key is configured
 *
 * @param competitionId - Competition the demo matches are filed under
 * @param now - Kickoff time for both matches
 */
export function buildDemoMatches(competitionId: number, now: Date = new Date()): FeedMatch[] {
  const kickoff = now.toISOString();
  return [
    {
      id: 1001,
      homeTeam: { name: 'Demo United' },
      awayTeam: { name: 'Mock City' },
      status: MatchStatus.LIVE,
      score: { fullTime: { home: 2, away: 1 } },
      utcDate: kickoff,
      competition: { id: competitionId },
    },
    {
      id: 1002,
      homeTeam: { name: 'Synthetic FC' },
      awayTeam: { name: 'Silicon Real' },
      status: MatchStatus.LIVE,
      score: { fullTime: { home: 0, away: 0 } },
      utcDate: kickoff,
      competition: { id: competitionId },
    },
  ];
}

/**
 * Keep only well-formed records from allow-listed competitions.
 * Malformed records are logged and skipped.
 */
export function filterFeedMatches(entries: unknown[], competitionIds: number[]): FeedMatch[] {
  const allowed = new Set(competitionIds);
  const accepted: FeedMatch[] = [];

  for (const entry of entries) {
    if (!isFeedMatch(entry)) {
      log(LogLevel.WARN, 'Skipping malformed feed record', {
        errors: describeFeedMatchErrors(entry),
      });
      continue;
    }
    if (allowed.has(entry.competition.id)) {
      accepted.push(entry);
    }
  }

  return accepted;
}

/**
 * Convert one feed record to the canonical match state.
 * A missing full-time score side counts as 0.
 */
export function normalizeFeedMatch(match: FeedMatch): MatchUpsertData {
  const fullTime = match.score?.fullTime;
  const homeName = match.homeTeam.name;
  const awayName = match.awayTeam.name;

  return {
    id: match.id,
    name: `${homeName} vs ${awayName}`,
    home_team: homeName,
    away_team: awayName,
    status: match.status,
    utc_date: match.utcDate ?? '',
    competition_id: match.competition.id,
    score_home: fullTime?.home ?? 0,
    score_away: fullTime?.away ?? 0,
  };
}
