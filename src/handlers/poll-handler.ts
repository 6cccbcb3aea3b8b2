/**
 * Poller Lambda Handler
 * 
 * Invoked by the EventBridge schedule once a minute. Reserved concurrency of
 * one keeps cycles from overlapping; each cycle's status is persisted so the
 * API function can report feed health.
 */

import { ScheduledEvent } from 'aws-lambda';
import { loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { PollCycleResult } from '../models/poll-status';
import { PollStatusStore } from '../repositories/poll-status-repository';
import { PollRunner } from '../services/poll-scheduler';
import { createServices } from '../services/service-container';
import { log, LogLevel } from '../utils/logger';

export interface PollHandlerDependencies {
  pollService: PollRunner;
  pollStatus: PollStatusStore;
}

let dependencies: PollHandlerDependencies | null = null;

function getDependencies(): PollHandlerDependencies {
  if (!dependencies) {
    const config = loadEnvironmentConfig();
    validateEnvironmentConfig(config);
    const services = createServices(config);
    dependencies = {
      pollService: services.pollService,
      pollStatus: services.repositories.pollStatus,
    };
  }
  return dependencies;
}

export function createPollHandler(
  dependenciesFactory: () => PollHandlerDependencies
): (event?: ScheduledEvent) => Promise<PollCycleResult> {
  return async (event) => {
    const { pollService, pollStatus } = dependenciesFactory();
    const result = await pollService.runCycle();

    try {
      await pollStatus.save(result.status);
    } catch (error) {
      log(LogLevel.ERROR, 'Failed to persist poll status', {
        event_id: event?.id,
        status: result.status.status,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return result;
  };
}

export const handler = createPollHandler(getDependencies);
