/**
 * Snapshot Repository Tests
 */

import { SnapshotRepository } from '../../src/repositories/snapshot-repository';

const CAPTURED_AT = new Date('2024-05-01T15:30:00Z');

function row(id: number, pressure: number | string) {
  return {
    id,
    match_id: 1001,
    captured_at: CAPTURED_AT,
    minute: 30,
    score_home: 1,
    score_away: 0,
    pressure_index: pressure,
  };
}

describe('SnapshotRepository', () => {
  let db: { query: jest.Mock };
  let repository: SnapshotRepository;

  beforeEach(() => {
    db = { query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }) };
    repository = new SnapshotRepository(db);
  });

  it('should insert a snapshot and coerce the pressure to a number', async () => {
    db.query.mockResolvedValue({ rows: [row(7, '42.5')] });

    const snapshot = await repository.insert({
      match_id: 1001,
      minute: 30,
      score_home: 1,
      score_away: 0,
      pressure_index: 42.5,
    });

    expect(snapshot.pressure_index).toBe(42.5);
    expect(db.query.mock.calls[0][1]).toEqual([1001, 30, 1, 0, 42.5]);
  });

  it('should read recent snapshots newest first with a limit', async () => {
    db.query.mockResolvedValue({ rows: [row(9, 30), row(8, 20)] });

    const snapshots = await repository.findRecent(1001, 10);

    expect(snapshots.map((snapshot) => snapshot.id)).toEqual([9, 8]);
    const [sql, params] = db.query.mock.calls[0];
    expect(sql).toContain('ORDER BY captured_at DESC, id DESC');
    expect(params).toEqual([1001, 10]);
  });

  it('should return the latest snapshot or null', async () => {
    db.query.mockResolvedValueOnce({ rows: [row(9, 30)] }).mockResolvedValueOnce({ rows: [] });

    await expect(repository.findLatest(1001)).resolves.toMatchObject({ id: 9, pressure_index: 30 });
    await expect(repository.findLatest(1001)).resolves.toBeNull();
    expect(db.query.mock.calls[0][1]).toEqual([1001, 1]);
  });

  it('should read the full history oldest first', async () => {
    await repository.findAllAscending(1001);

    const [sql, params] = db.query.mock.calls[0];
    expect(sql).toContain('ORDER BY captured_at ASC, id ASC');
    expect(params).toEqual([1001]);
  });

  it('should trim to the newest rows and report the deleted count', async () => {
    db.query.mockResolvedValue({ rows: [], rowCount: 3 });

    const deleted = await repository.trimToLatest(1001, 2000);

    expect(deleted).toBe(3);
    expect(db.query.mock.calls[0][1]).toEqual([1001, 2000]);
  });
});
