/**
 * Poll Service
 * 
 * One poll cycle: fetch the live feed (or the demo records), normalize it,
 * then in a single transaction mark vanished matches FINISHED, upsert every
 * match and record its pressure snapshot. Predictions are scored afterwards.
 * The cycle reports its outcome as an explicit PollStatus and never throws.
 */

import { UnitOfWork } from '../repositories/unit-of-work';
import { MatchFeed } from './feed-client';
import { SnapshotService } from './snapshot-service';
import { scorePendingPredictions } from './prediction-service';
import { FeedFetchResult } from '../models/feed';
import { MatchUpsertData } from '../models/match';
import { PollCycleResult, PollHealth, PollStatus } from '../models/poll-status';
import {
  DEMO_MODE_MESSAGE,
  buildDemoMatches,
  filterFeedMatches,
  normalizeFeedMatch,
} from '../utils/feed-normalizer';
import { logPollCycle, LogLevel } from '../utils/logger';
import { emitFeedUnavailable, emitMatchesProcessed, emitPollCycleDuration } from '../utils/metrics';

export interface PollServiceOptions {
  competitionIds: number[];
  snapshotRetention: number;
  demoMode: boolean;
}

type FeedFailure = Exclude<FeedFetchResult, { ok: true }>;

interface CycleCounts {
  processed: number;
  finished: number;
  scored: number;
}

const NO_WORK: CycleCounts = { processed: 0, finished: 0, scored: 0 };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Status recorded for an unavailable feed
 */
export function feedFailureStatus(failure: FeedFailure, checkedAt: string): PollStatus {
  if (failure.kind === 'http') {
    return {
      status: PollHealth.API_ERROR,
      last_check: checkedAt,
      error: `Error ${failure.statusCode}: ${failure.message}`,
    };
  }
  return {
    status: PollHealth.CONNECTION_ERROR,
    last_check: checkedAt,
    error: `Failed to connect to API: ${failure.message}`,
  };
}

export class PollService {
  constructor(
    private feed: MatchFeed,
    private unitOfWork: UnitOfWork,
    private options: PollServiceOptions,
    private clock: () => Date = () => new Date()
  ) {}

  async runCycle(): Promise<PollCycleResult> {
    const startTime = Date.now();
    const now = this.clock();
    const checkedAt = now.toISOString();

    let entries: unknown[];
    let status: PollStatus;

    if (this.options.demoMode) {
      entries = buildDemoMatches(this.options.competitionIds[0], now);
      status = { status: PollHealth.DEMO_MODE, last_check: checkedAt, error: DEMO_MODE_MESSAGE };
    } else {
      const fetched = await this.feed.fetchLiveMatches();
      if (!fetched.ok) {
        await emitFeedUnavailable(fetched.kind);
        return this.finish(feedFailureStatus(fetched, checkedAt), NO_WORK, startTime);
      }
      entries = fetched.matches;
      status = { status: PollHealth.HEALTHY, last_check: checkedAt, error: null };
    }

    const matches = filterFeedMatches(entries, this.options.competitionIds).map(normalizeFeedMatch);

    let persisted: Pick<CycleCounts, 'processed' | 'finished'>;
    try {
      persisted = await this.persist(matches, now);
    } catch (error) {
      return this.finish(
        { status: PollHealth.STORAGE_ERROR, last_check: checkedAt, error: `Storage failure: ${errorMessage(error)}` },
        NO_WORK,
        startTime
      );
    }

    let scored = 0;
    try {
      scored = await this.unitOfWork((repositories) =>
        scorePendingPredictions(repositories.predictions, repositories.users)
      );
    } catch (error) {
      return this.finish(
        { status: PollHealth.STORAGE_ERROR, last_check: checkedAt, error: `Scoring failure: ${errorMessage(error)}` },
        { ...persisted, scored: 0 },
        startTime
      );
    }

    return this.finish(status, { ...persisted, scored }, startTime);
  }

  /**
   * Persist one feed in a single transaction
   */
  private async persist(
    matches: MatchUpsertData[],
    now: Date
  ): Promise<Pick<CycleCounts, 'processed' | 'finished'>> {
    return this.unitOfWork(async (repositories) => {
      const finished = await repositories.matches.markMissingAsFinished(matches.map((match) => match.id));
      const snapshots = new SnapshotService(repositories.snapshots, this.options.snapshotRetention);

      for (const match of matches) {
        await repositories.matches.upsert(match);
        await snapshots.record(match, now);
      }

      return { processed: matches.length, finished };
    });
  }

  private async finish(status: PollStatus, counts: CycleCounts, startTime: number): Promise<PollCycleResult> {
    const duration = Date.now() - startTime;

    logPollCycle({
      status: status.status,
      matchesProcessed: counts.processed,
      matchesFinished: counts.finished,
      predictionsScored: counts.scored,
      durationMs: duration,
      error: status.status === PollHealth.DEMO_MODE ? null : status.error,
      level: status.status === PollHealth.STORAGE_ERROR ? LogLevel.ERROR : undefined,
    });

    await emitPollCycleDuration(status.status, duration);
    if (counts.processed > 0) {
      await emitMatchesProcessed(counts.processed);
    }

    return {
      status,
      matches_processed: counts.processed,
      matches_finished: counts.finished,
      predictions_scored: counts.scored,
      duration_ms: duration,
    };
  }
}

