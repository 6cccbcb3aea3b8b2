/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

/**
 * Top competitions polled by default:
 * PL (2021), PD (2014), CL (2001), BL1 (2002), SA (2019), FL1 (2015)
 */
export const DEFAULT_COMPETITION_IDS = '2021,2014,2001,2002,2019,2015';

/**
 * Marker left in sample .env files; a key containing it counts as unset
 */
const PLACEHOLDER_API_KEY = 'your_api_key_here';

export interface EnvironmentConfig {
  // Database configuration
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbSecretArn: string;
  dbUser: string;
  dbPassword: string;
  dbSsl: boolean;

  // Upstream feed configuration
  footballDataApiKey: string;
  footballDataBaseUrl: string;
  competitionIds: number[];
  feedTimeoutMs: number;

  // Poller configuration
  pollIntervalSeconds: number;
  snapshotRetention: number;

  // Web configuration
  sessionSecret: string;
  publicBaseUrl: string;

  // Application configuration
  metricsEnabled: boolean;
  logLevel: string;
  nodeEnv: string;
}

/**
 * Parse a comma-separated list of competition ids, ignoring blanks and junk
 */
export function parseCompetitionIds(raw: string): number[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map((part) => parseInt(part, 10));
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dbHost: process.env.DB_HOST || '',
    dbPort: parsePositiveInt(process.env.DB_PORT, 5432),
    dbName: process.env.DB_NAME || '',
    dbSecretArn: process.env.DB_SECRET_ARN || '',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSsl: process.env.DB_SSL === 'true',
    footballDataApiKey: process.env.FOOTBALL_DATA_API_KEY || '',
    footballDataBaseUrl: process.env.FOOTBALL_DATA_BASE_URL || 'https://api.football-data.org/v4',
    competitionIds: parseCompetitionIds(process.env.FOOTBALL_DATA_COMPETITIONS || DEFAULT_COMPETITION_IDS),
    feedTimeoutMs: parsePositiveInt(process.env.FEED_TIMEOUT_MS, 10000),
    pollIntervalSeconds: parsePositiveInt(process.env.POLL_INTERVAL_SECONDS, 60),
    snapshotRetention: parsePositiveInt(process.env.SNAPSHOT_RETENTION, 2000),
    sessionSecret: process.env.SESSION_SECRET || '',
    publicBaseUrl: process.env.PUBLIC_BASE_URL || '',
    metricsEnabled: process.env.METRICS_ENABLED !== 'false',
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = [
    'dbHost',
    'dbName',
    'sessionSecret',
  ];

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  if (config.competitionIds.length === 0) {
    throw new Error('FOOTBALL_DATA_COMPETITIONS must list at least one competition id');
  }
}

/**
 * Demo mode runs the poller on synthetic matches when no usable API key is set
 */
export function isDemoMode(config: EnvironmentConfig): boolean {
  return !config.footballDataApiKey || config.footballDataApiKey.includes(PLACEHOLDER_API_KEY);
}
