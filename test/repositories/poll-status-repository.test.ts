/**
 * Poll Status Repository Tests
 */

import { PollStatusRepository } from '../../src/repositories/poll-status-repository';
import { INITIAL_POLL_STATUS, PollHealth } from '../../src/models/poll-status';

describe('PollStatusRepository', () => {
  let db: { query: jest.Mock };
  let repository: PollStatusRepository;

  beforeEach(() => {
    db = { query: jest.fn().mockResolvedValue({ rows: [] }) };
    repository = new PollStatusRepository(db);
  });

  it('should report Unknown before the first cycle', async () => {
    await expect(repository.get()).resolves.toEqual(INITIAL_POLL_STATUS);
  });

  it('should map the stored row', async () => {
    db.query.mockResolvedValue({
      rows: [{ status: 'API Error', last_check: new Date('2024-05-01T15:30:00Z'), error: 'Error 429: Too Many Requests' }],
    });

    await expect(repository.get()).resolves.toEqual({
      status: PollHealth.API_ERROR,
      last_check: '2024-05-01T15:30:00.000Z',
      error: 'Error 429: Too Many Requests',
    });
  });

  it('should fall back to Unknown for an unrecognised status', async () => {
    db.query.mockResolvedValue({ rows: [{ status: 'Rebooting', last_check: null, error: null }] });

    await expect(repository.get()).resolves.toMatchObject({ status: PollHealth.UNKNOWN });
  });

  it('should upsert the single status row', async () => {
    await repository.save({ status: PollHealth.HEALTHY, last_check: '2024-05-01T15:30:00.000Z', error: null });

    const [sql, params] = db.query.mock.calls[0];
    expect(sql).toContain('ON CONFLICT (id) DO UPDATE SET');
    expect(params).toEqual([1, 'Healthy', '2024-05-01T15:30:00.000Z', null]);
  });
});
