/**
 * Match Service
 * 
 * Read side of the pipeline: view models for the live list, the per-match
 * dashboard, the chart, the win-probability analysis and upcoming fixtures.
 * Reads tolerate a poll cycle writing concurrently; snapshots are never
 * updated in place, so a reader only ever misses the newest one.
 */

import { Repositories } from '../repositories/unit-of-work';
import { MatchFeed } from './feed-client';
import { NotFoundError } from '../models/errors';
import { MatchState, MatchUpsertData } from '../models/match';
import { Snapshot } from '../models/snapshot';
import { Forecast, WinProbability } from '../models/forecast';
import { PollStatus } from '../models/poll-status';
import { calculateForecast } from '../utils/forecast-calculation';
import { renderPressureChart, renderSparkline } from '../utils/chart-rendering';
import { calculateWinProbability } from '../utils/win-probability';
import { filterFeedMatches, normalizeFeedMatch } from '../utils/feed-normalizer';
import { log, LogLevel } from '../utils/logger';

export const DASHBOARD_SNAPSHOT_COUNT = 12;
export const UPCOMING_DEMO_NOTE = 'API Key required for upcoming matches.';

export interface TimelineEvent {
  time: string;
  event: string;
  desc: string;
}

/**
 * Illustrative timeline shown on every dashboard; there is no event feed
 */
export const MATCH_TIMELINE: readonly TimelineEvent[] = [
  { time: "85'", event: 'Substitution', desc: 'Fresh legs for the final push.' },
  { time: "72'", event: 'Yellow Card', desc: 'High intensity foul.' },
  { time: "45'", event: 'Half Time', desc: 'Teams regrouping.' },
];

export interface LiveMatchView extends MatchState {
  sparkline: string;
  is_followed: boolean;
  seconds_ago: number;
}

export interface LiveMatchesView {
  matches: LiveMatchView[];
  featured_match: LiveMatchView | null;
}

export interface MatchDashboardView {
  match: MatchState;
  snapshots: Snapshot[];
  chart_svg: string;
  forecast: Forecast;
  current_pressure: number;
  is_followed: boolean;
  events: readonly TimelineEvent[];
}

export interface MatchAnalysisView {
  match: MatchState;
  analysis: WinProbability;
}

export interface UpcomingMatchesView {
  matches: MatchUpsertData[];
  note: string | null;
}

export interface MatchServiceOptions {
  demoMode: boolean;
  competitionIds: number[];
}

function latestPressure(snapshots: Snapshot[]): number {
  return snapshots.length > 0 ? snapshots[snapshots.length - 1].pressure_index : 0;
}

export class MatchService {
  constructor(
    private repositories: Repositories,
    private feed: MatchFeed,
    private options: MatchServiceOptions,
    private clock: () => Date = () => new Date()
  ) {}

  async getPollStatus(): Promise<PollStatus> {
    return this.repositories.pollStatus.get();
  }

  /**
   * Live matches, most recently updated first; the first one is featured
   */
  async getLiveMatches(followed: number[]): Promise<LiveMatchesView> {
    const now = this.clock().getTime();
    const matches = await this.repositories.matches.findLive();

    const views = await Promise.all(
      matches.map(async (match): Promise<LiveMatchView> => {
        const snapshots = await this.repositories.snapshots.findAllAscending(match.id);
        return {
          ...match,
          sparkline: renderSparkline(snapshots),
          is_followed: followed.includes(match.id),
          seconds_ago: Math.max(0, Math.floor((now - match.last_updated.getTime()) / 1000)),
        };
      })
    );

    return {
      matches: views,
      featured_match: views.length > 0 ? views[0] : null,
    };
  }

  /**
   * @throws NotFoundError if the match does not exist
   */
  async getDashboard(matchId: number, followed: number[]): Promise<MatchDashboardView> {
    const match = await this.requireMatch(matchId);
    const snapshots = await this.repositories.snapshots.findAllAscending(matchId);

    return {
      match,
      snapshots: snapshots.slice(-DASHBOARD_SNAPSHOT_COUNT).reverse(),
      chart_svg: renderPressureChart(snapshots),
      forecast: calculateForecast(snapshots),
      current_pressure: latestPressure(snapshots),
      is_followed: followed.includes(matchId),
      events: MATCH_TIMELINE,
    };
  }

  /**
   * Full-size chart markup; empty string when the match has no snapshots
   * 
   * @throws NotFoundError if the match does not exist
   */
  async getChart(matchId: number): Promise<string> {
    await this.requireMatch(matchId);
    const snapshots = await this.repositories.snapshots.findAllAscending(matchId);
    return renderPressureChart(snapshots);
  }

  /**
   * @throws NotFoundError if the match does not exist
   */
  async getAnalysis(matchId: number): Promise<MatchAnalysisView> {
    const match = await this.requireMatch(matchId);
    const latest = await this.repositories.snapshots.findLatest(matchId);

    return {
      match,
      analysis: calculateWinProbability(latest ? latest.pressure_index : 0),
    };
  }

  /**
   * Scheduled fixtures for the coming week. Feed failures yield an empty list.
   */
  async getUpcoming(): Promise<UpcomingMatchesView> {
    if (this.options.demoMode) {
      return { matches: [], note: UPCOMING_DEMO_NOTE };
    }

    const fetched = await this.feed.fetchUpcomingMatches(this.clock());
    if (!fetched.ok) {
      log(LogLevel.ERROR, 'Error fetching upcoming matches', {
        failure_kind: fetched.kind,
        error: fetched.message,
      });
      return { matches: [], note: null };
    }

    return {
      matches: filterFeedMatches(fetched.matches, this.options.competitionIds).map(normalizeFeedMatch),
      note: null,
    };
  }

  private async requireMatch(matchId: number): Promise<MatchState> {
    const match = await this.repositories.matches.findById(matchId);
    if (!match) {
      throw new NotFoundError('Match not found');
    }
    return match;
  }
}
