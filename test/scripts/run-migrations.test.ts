/**
 * Schema Migration Runner Tests
 */

import { runMigrations, SCHEMA_STATEMENTS } from '../../src/scripts/run-migrations';
import { Pool } from 'pg';
import { getPool } from '../../src/config/database';

jest.mock('../../src/config/database');

const mockedGetPool = getPool as jest.MockedFunction<typeof getPool>;

describe('runMigrations', () => {
  let poolQuery: jest.Mock;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    poolQuery = jest.fn().mockResolvedValue({ rows: [] });
    mockedGetPool.mockResolvedValue({ query: poolQuery } as unknown as Pool);
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should apply every schema statement in order', async () => {
    const result = await runMigrations();

    expect(result).toEqual({
      success: true,
      message: `Applied ${SCHEMA_STATEMENTS.length} schema statements`,
    });
    expect(poolQuery).toHaveBeenCalledTimes(SCHEMA_STATEMENTS.length + 1);
    expect(poolQuery.mock.calls[0][0]).toBe('SELECT NOW()');
    expect(poolQuery.mock.calls[1][0]).toBe(SCHEMA_STATEMENTS[0].sql);
  });

  it('should create tables before the indexes that reference them', () => {
    const names = SCHEMA_STATEMENTS.map((statement) => statement.name);

    expect(names.indexOf('snapshots')).toBeLessThan(names.indexOf('idx_snapshots_match_captured'));
    expect(names.indexOf('matches')).toBeLessThan(names.indexOf('snapshots'));
    expect(names.indexOf('users')).toBeLessThan(names.indexOf('predictions'));
  });

  it('should report the failure instead of throwing', async () => {
    poolQuery.mockResolvedValueOnce({ rows: [] }).mockRejectedValueOnce(new Error('permission denied'));

    const result = await runMigrations();

    expect(result).toEqual({ success: false, message: 'Migration failed', error: 'permission denied' });
    const entry = JSON.parse(consoleErrorSpy.mock.calls[0][0]);
    expect(entry).toMatchObject({ level: 'ERROR', message: 'Migration failed', error: 'permission denied' });
  });
});
