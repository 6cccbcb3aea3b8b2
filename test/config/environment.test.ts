/**
 * Environment Configuration Tests
 */

import {
  DEFAULT_COMPETITION_IDS,
  isDemoMode,
  loadEnvironmentConfig,
  parseCompetitionIds,
  validateEnvironmentConfig,
} from '../../src/config/environment';

describe('Environment Configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.FOOTBALL_DATA_API_KEY;
    delete process.env.FOOTBALL_DATA_COMPETITIONS;
    delete process.env.POLL_INTERVAL_SECONDS;
    delete process.env.SNAPSHOT_RETENTION;
    delete process.env.DB_PORT;
    process.env.DB_HOST = 'localhost';
    process.env.DB_NAME = 'momentum_test';
    process.env.SESSION_SECRET = 'test-secret';
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('loadEnvironmentConfig', () => {
    it('should apply defaults', () => {
      const config = loadEnvironmentConfig();

      expect(config.dbPort).toBe(5432);
      expect(config.footballDataBaseUrl).toBe('https://api.football-data.org/v4');
      expect(config.competitionIds).toEqual([2021, 2014, 2001, 2002, 2019, 2015]);
      expect(config.pollIntervalSeconds).toBe(60);
      expect(config.snapshotRetention).toBe(2000);
      expect(config.feedTimeoutMs).toBe(10000);
    });

    it('should fall back on non-positive numbers', () => {
      process.env.SNAPSHOT_RETENTION = '-5';
      process.env.POLL_INTERVAL_SECONDS = 'soon';

      const config = loadEnvironmentConfig();

      expect(config.snapshotRetention).toBe(2000);
      expect(config.pollIntervalSeconds).toBe(60);
    });

    it('should read the competition allow-list', () => {
      process.env.FOOTBALL_DATA_COMPETITIONS = '2021,2001';

      expect(loadEnvironmentConfig().competitionIds).toEqual([2021, 2001]);
    });
  });

  describe('parseCompetitionIds', () => {
    it('should ignore blanks and junk', () => {
      expect(parseCompetitionIds(' 2021, ,PL,2014 ')).toEqual([2021, 2014]);
      expect(parseCompetitionIds(DEFAULT_COMPETITION_IDS)).toHaveLength(6);
    });
  });

  describe('validateEnvironmentConfig', () => {
    it('should accept a complete configuration', () => {
      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).not.toThrow();
    });

    it('should list missing required variables', () => {
      delete process.env.DB_HOST;
      delete process.env.SESSION_SECRET;

      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).toThrow(
        'Missing required environment variables: dbHost, sessionSecret'
      );
    });

    it('should require at least one competition', () => {
      process.env.FOOTBALL_DATA_COMPETITIONS = 'none';

      expect(() => validateEnvironmentConfig(loadEnvironmentConfig())).toThrow(
        'FOOTBALL_DATA_COMPETITIONS must list at least one competition id'
      );
    });
  });

  describe('isDemoMode', () => {
    it('should be on without a key or with the placeholder key', () => {
      expect(isDemoMode(loadEnvironmentConfig())).toBe(true);

      process.env.FOOTBALL_DATA_API_KEY = 'your_api_key_here';
      expect(isDemoMode(loadEnvironmentConfig())).toBe(true);
    });

    it('should be off with a real-looking key', () => {
      process.env.FOOTBALL_DATA_API_KEY = 'test-api-key';

      expect(isDemoMode(loadEnvironmentConfig())).toBe(false);
    });
  });
});
