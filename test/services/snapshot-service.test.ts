/**
 * Snapshot Service Tests
 * 
 * Unit tests for snapshot recording: minute estimation, pressure against
 * the previous snapshot, and retention trimming.
 */

import { SnapshotService } from '../../src/services/snapshot-service';
import { MatchUpsertData } from '../../src/models/match';
import { InMemorySnapshotStore } from '../fakes/in-memory-stores';

describe('SnapshotService', () => {
  const now = new Date('2024-05-01T15:45:00Z');
  let store: InMemorySnapshotStore;
  let consoleLogSpy: jest.SpyInstance;

  const match = (overrides: Partial<MatchUpsertData> = {}): MatchUpsertData => ({
    id: 501,
    name: 'Harbour Town vs Valley Rovers',
    home_team: 'Harbour Town',
    away_team: 'Valley Rovers',
    status: 'IN_PLAY',
    utc_date: '2024-05-01T15:00:00Z',
    competition_id: 2021,
    score_home: 1,
    score_away: 0,
    ...overrides,
  });

  beforeEach(() => {
    store = new InMemorySnapshotStore();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('record', () => {
    it('should store the estimated minute, score and pressure', async () => {
      const service = new SnapshotService(store);

      const snapshot = await service.record(match(), now);

      // base 10 at minute 45, +30 for a one-goal lead
      expect(snapshot).toMatchObject({
        match_id: 501,
        minute: 45,
        score_home: 1,
        score_away: 0,
        pressure_index: 40,
      });
      expect(store.rows).toHaveLength(1);
    });

    it('should add the trend bonus against the previous snapshot', async () => {
      const service = new SnapshotService(store);

      await service.record(match(), now);
      const second = await service.record(match({ score_home: 2 }), now);

      // 10 + 60 + 40 clamped
      expect(second.pressure_index).toBe(100);
    });

    it('should fall back to minute 45 and warn for an unusable kickoff', async () => {
      const service = new SnapshotService(store);

      const snapshot = await service.record(match({ utc_date: '' }), now);

      expect(snapshot.minute).toBe(45);
      const entry = JSON.parse(consoleLogSpy.mock.calls[0][0]);
      expect(entry).toMatchObject({
        level: 'WARN',
        message: 'Could not estimate match minute, using fallback',
        match_id: 501,
        reason: 'Empty kickoff timestamp',
      });
    });

    it('should keep only the most recent snapshots of the match', async () => {
      const service = new SnapshotService(store, 3);

      for (let i = 0; i < 5; i++) {
        await service.record(match(), now);
      }
      await service.record(match({ id: 502 }), now);

      const kept = await store.findAllAscending(501);
      expect(kept.map((snapshot) => snapshot.id)).toEqual([3, 4, 5]);
      expect(await store.findAllAscending(502)).toHaveLength(1);

      const trimLogs = consoleLogSpy.mock.calls
        .map(([line]) => JSON.parse(line))
        .filter((entry) => entry.message === 'Trimmed snapshot history');
      expect(trimLogs).toHaveLength(2);
      expect(trimLogs[0]).toMatchObject({ match_id: 501, deleted: 1, retention: 3 });
    });
  });
});
