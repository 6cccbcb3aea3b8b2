/**
 * Snapshot Service
 * 
 * Turns one observed match state into a pressure snapshot: estimate the
 * minute from kickoff, compute the pressure index against the previous
 * snapshot, append it, then trim the match history to the retention cap.
 */

import { SnapshotStore } from '../repositories/snapshot-repository';
import { MatchUpsertData } from '../models/match';
import { Snapshot } from '../models/snapshot';
import { estimateMinute } from '../utils/minute-estimator';
import { calculatePressureIndex } from '../utils/pressure-calculation';
import { log, LogLevel } from '../utils/logger';

export const DEFAULT_SNAPSHOT_RETENTION = 2000;

export class SnapshotService {
  constructor(
    private snapshotRepository: SnapshotStore,
    private retention: number = DEFAULT_SNAPSHOT_RETENTION
  ) {}

  /**
   * Record a snapshot for the match as observed at `now`
   * 
   * @returns The stored snapshot
   */
  async record(match: MatchUpsertData, now: Date = new Date()): Promise<Snapshot> {
    const previous = await this.snapshotRepository.findLatest(match.id);

    const estimate = estimateMinute(match.utc_date, now);
    if (estimate.kind === 'fallback') {
      log(LogLevel.WARN, 'Could not estimate match minute, using fallback', {
        match_id: match.id,
        minute: estimate.minute,
        reason: estimate.reason,
      });
    }

    const observation = {
      minute: estimate.minute,
      score_home: match.score_home,
      score_away: match.score_away,
    };

    const snapshot = await this.snapshotRepository.insert({
      match_id: match.id,
      ...observation,
      pressure_index: calculatePressureIndex(observation, previous),
    });

    const trimmed = await this.snapshotRepository.trimToLatest(match.id, this.retention);
    if (trimmed > 0) {
      log(LogLevel.INFO, 'Trimmed snapshot history', {
        match_id: match.id,
        deleted: trimmed,
        retention: this.retention,
        operation: 'trimToLatest',
      });
    }

    return snapshot;
  }
}
