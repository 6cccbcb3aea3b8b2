/**
 * Poll Scheduler
 * 
 * Drives poll cycles on a fixed interval for long-running hosts and owns the
 * process-wide feed status. A tick that fires while a cycle is still running
 * is skipped, so cycles never overlap.
 */

import { INITIAL_POLL_STATUS, PollCycleResult, PollStatus } from '../models/poll-status';
import { log, LogLevel } from '../utils/logger';

export interface PollRunner {
  runCycle(): Promise<PollCycleResult>;
}

/**
 * Called after each completed cycle, e.g. to persist the status
 */
export type PollCycleListener = (result: PollCycleResult) => Promise<void>;

export class PollScheduler {
  private status: PollStatus = { ...INITIAL_POLL_STATUS };
  private running = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private pollService: PollRunner,
    private intervalMs: number,
    private onCycle?: PollCycleListener
  ) {}

  getStatus(): PollStatus {
    return { ...this.status };
  }

  isRunning(): boolean {
    return this.running;
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one cycle immediately, then every interval
   */
  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Run one cycle unless one is in flight. Never rejects.
   * 
   * @returns false when the tick was skipped
   */
  async tick(): Promise<boolean> {
    if (this.running) {
      log(LogLevel.WARN, 'Skipping poll tick, previous cycle still running');
      return false;
    }

    this.running = true;
    try {
      const result = await this.pollService.runCycle();
      this.status = result.status;
      if (this.onCycle) {
        await this.onCycle(result);
      }
    } catch (error) {
      log(LogLevel.ERROR, 'Poll cycle failed unexpectedly', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.running = false;
    }
    return true;
  }
}
