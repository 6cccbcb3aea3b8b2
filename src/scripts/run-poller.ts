/**
 * Local Poller
 * 
 * Runs the poll cycle on a fixed interval from a long-running process,
 * persisting each cycle's status for the API. Stops cleanly on SIGINT/SIGTERM.
 */

import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { closePool } from '../config/database';
import { PollScheduler } from '../services/poll-scheduler';
import { createServices } from '../services/service-container';
import { log, LogLevel } from '../utils/logger';

export function startPoller(): PollScheduler {
  const config = loadEnvironmentConfig();
  validateEnvironmentConfig(config);
  const services = createServices(config);

  const scheduler = new PollScheduler(
    services.pollService,
    config.pollIntervalSeconds * 1000,
    (result) => services.repositories.pollStatus.save(result.status)
  );

  scheduler.start();
  log(LogLevel.INFO, 'Poller started', { interval_seconds: config.pollIntervalSeconds });
  return scheduler;
}

if (require.main === module) {
  const scheduler = startPoller();

  const shutdown = (signal: string): void => {
    scheduler.stop();
    log(LogLevel.INFO, 'Poller stopped', { signal });
    closePool()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log(LogLevel.ERROR, 'Failed to close database pool', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
