/**
 * Poller Handler Tests
 */

import { ScheduledEvent } from 'aws-lambda';
import { createPollHandler } from '../../src/handlers/poll-handler';
import { PollCycleResult, PollHealth } from '../../src/models/poll-status';
import { PollStatusStore } from '../../src/repositories/poll-status-repository';
import { InMemoryPollStatusStore } from '../fakes/in-memory-stores';

const CYCLE: PollCycleResult = {
  status: { status: PollHealth.HEALTHY, last_check: '2024-05-01T15:30:00.000Z', error: null },
  matches_processed: 2,
  matches_finished: 1,
  predictions_scored: 0,
  duration_ms: 12,
};

describe('Poll Handler', () => {
  it('should run one cycle and persist its status', async () => {
    const pollStatus = new InMemoryPollStatusStore();
    const runCycle = jest.fn().mockResolvedValue(CYCLE);
    const handler = createPollHandler(() => ({ pollService: { runCycle }, pollStatus }));

    const result = await handler();

    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(result).toEqual(CYCLE);
    expect(pollStatus.current).toEqual(CYCLE.status);
  });

  it('should still return the cycle result when the status cannot be saved', async () => {
    const consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    const pollStatus: jest.Mocked<PollStatusStore> = {
      get: jest.fn(),
      save: jest.fn().mockRejectedValue(new Error('connection terminated')),
    };
    const handler = createPollHandler(() => ({
      pollService: { runCycle: jest.fn().mockResolvedValue(CYCLE) },
      pollStatus,
    }));

    const result = await handler({ id: 'evt-1' } as ScheduledEvent);

    expect(result).toEqual(CYCLE);
    const entry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
    expect(entry).toMatchObject({
      level: 'ERROR',
      message: 'Failed to persist poll status',
      event_id: 'evt-1',
      status: 'Healthy',
      error: 'connection terminated',
    });
    consoleErrorSpy.mockRestore();
  });
});
