/**
 * Repository bundle and unit of work
 * 
 * Services receive every store through one bundle. Work that must be atomic
 * runs through a UnitOfWork, which hands it a bundle bound to a single
 * transaction client.
 */

import { QueryExecutor, clientExecutor, poolExecutor, transaction } from '../config/database';
import { MatchRepository, MatchStore } from './match-repository';
import { SnapshotRepository, SnapshotStore } from './snapshot-repository';
import { ReferralRepository, ReferralStore, UserRepository, UserStore } from './user-repository';
import { PredictionRepository, PredictionStore } from './prediction-repository';
import { PollStatusRepository, PollStatusStore } from './poll-status-repository';

export interface Repositories {
  matches: MatchStore;
  snapshots: SnapshotStore;
  users: UserStore;
  referrals: ReferralStore;
  predictions: PredictionStore;
  pollStatus: PollStatusStore;
}

export type UnitOfWork = <T>(work: (repositories: Repositories) => Promise<T>) => Promise<T>;

export function createRepositories(db: QueryExecutor = poolExecutor): Repositories {
  return {
    matches: new MatchRepository(db),
    snapshots: new SnapshotRepository(db),
    users: new UserRepository(db),
    referrals: new ReferralRepository(db),
    predictions: new PredictionRepository(db),
    pollStatus: new PollStatusRepository(db),
  };
}

/**
 * Run the work in one PostgreSQL transaction; any rejection rolls it back
 */
export const pgUnitOfWork: UnitOfWork = (work) =>
  transaction((client) => work(createRepositories(clientExecutor(client))));
