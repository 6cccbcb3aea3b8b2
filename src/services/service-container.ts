/**
 * Service wiring shared by the Lambda handlers and the local scripts
 */

import { EnvironmentConfig, isDemoMode } from '../config/environment';
import { Repositories, UnitOfWork, createRepositories, pgUnitOfWork } from '../repositories/unit-of-work';
import { FootballDataClient, MatchFeed } from './feed-client';
import { MatchService } from './match-service';
import { PollService } from './poll-service';
import { PredictionService } from './prediction-service';

export interface Services {
  repositories: Repositories;
  matchService: MatchService;
  predictionService: PredictionService;
  pollService: PollService;
  sessionSecret: string;
}

export function createServices(
  config: EnvironmentConfig,
  repositories: Repositories = createRepositories(),
  unitOfWork: UnitOfWork = pgUnitOfWork,
  feed: MatchFeed = new FootballDataClient({
    apiKey: config.footballDataApiKey,
    baseUrl: config.footballDataBaseUrl,
    timeoutMs: config.feedTimeoutMs,
    competitionIds: config.competitionIds,
  })
): Services {
  const demoMode = isDemoMode(config);

  return {
    repositories,
    matchService: new MatchService(repositories, feed, {
      demoMode,
      competitionIds: config.competitionIds,
    }),
    predictionService: new PredictionService(repositories, unitOfWork, config.publicBaseUrl),
    pollService: new PollService(feed, unitOfWork, {
      competitionIds: config.competitionIds,
      snapshotRetention: config.snapshotRetention,
      demoMode,
    }),
    sessionSecret: config.sessionSecret,
  };
}
