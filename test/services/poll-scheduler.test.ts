/**
 * Poll Scheduler Tests
 */

import { PollScheduler } from '../../src/services/poll-scheduler';
import { PollCycleResult, PollHealth } from '../../src/models/poll-status';

function cycleResult(status: PollHealth): PollCycleResult {
  return {
    status: { status, last_check: '2024-05-01T15:30:00.000Z', error: null },
    matches_processed: 0,
    matches_finished: 0,
    predictions_scored: 0,
    duration_ms: 5,
  };
}

describe('PollScheduler', () => {
  let runner: { runCycle: jest.Mock<Promise<PollCycleResult>, []> };
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    runner = { runCycle: jest.fn() };
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    jest.useRealTimers();
  });

  const createScheduler = (onCycle?: (result: PollCycleResult) => Promise<void>): PollScheduler =>
    new PollScheduler(runner, 60000, onCycle);

  it('should start with an unknown status', () => {
    expect(createScheduler().getStatus()).toEqual({ status: PollHealth.UNKNOWN, last_check: null, error: null });
  });

  it('should record the status of each completed cycle and notify the listener', async () => {
    const result = cycleResult(PollHealth.HEALTHY);
    runner.runCycle.mockResolvedValue(result);
    const onCycle = jest.fn().mockResolvedValue(undefined);
    const scheduler = createScheduler(onCycle);

    await expect(scheduler.tick()).resolves.toBe(true);

    expect(scheduler.getStatus().status).toBe(PollHealth.HEALTHY);
    expect(onCycle).toHaveBeenCalledWith(result);
  });

  it('should skip a tick while the previous cycle is still running', async () => {
    let finishCycle: (result: PollCycleResult) => void = () => undefined;
    runner.runCycle.mockReturnValue(
      new Promise<PollCycleResult>((resolve) => {
        finishCycle = resolve;
      })
    );
    const scheduler = createScheduler();

    const first = scheduler.tick();
    expect(scheduler.isRunning()).toBe(true);

    await expect(scheduler.tick()).resolves.toBe(false);
    expect(runner.runCycle).toHaveBeenCalledTimes(1);
    expect(JSON.parse(consoleLogSpy.mock.calls[0][0]).message).toBe(
      'Skipping poll tick, previous cycle still running'
    );

    finishCycle(cycleResult(PollHealth.DEMO_MODE));
    await expect(first).resolves.toBe(true);
    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getStatus().status).toBe(PollHealth.DEMO_MODE);
  });

  it('should survive a cycle that throws', async () => {
    runner.runCycle.mockRejectedValue(new Error('unexpected'));
    const scheduler = createScheduler();

    await expect(scheduler.tick()).resolves.toBe(true);

    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getStatus().status).toBe(PollHealth.UNKNOWN);
    expect(JSON.parse(consoleErrorSpy.mock.calls[0][0])).toMatchObject({
      message: 'Poll cycle failed unexpectedly',
      error: 'unexpected',
    });
  });

  it('should run immediately on start and then every interval until stopped', async () => {
    jest.useFakeTimers();
    runner.runCycle.mockResolvedValue(cycleResult(PollHealth.HEALTHY));
    const scheduler = createScheduler();

    scheduler.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(runner.runCycle).toHaveBeenCalledTimes(1);
    expect(scheduler.isStarted()).toBe(true);

    await jest.advanceTimersByTimeAsync(60000);
    expect(runner.runCycle).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await jest.advanceTimersByTimeAsync(120000);
    expect(runner.runCycle).toHaveBeenCalledTimes(2);
    expect(scheduler.isStarted()).toBe(false);
  });
});
