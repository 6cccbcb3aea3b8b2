/**
 * Database Connection Pool Module
 *
 * Provides PostgreSQL connection pooling with connection reuse across Lambda
 * invocations, parameterized queries, and transaction support for the poll
 * cycle and the prediction scorer.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { loadEnvironmentConfig, EnvironmentConfig } from './environment';
import { logDatabase } from '../utils/logger';

// Global pool instance for Lambda warm starts
let pool: Pool | null = null;
let cachedCredentials: DatabaseCredentials | null = null;

interface DatabaseCredentials {
  username: string;
  password: string;
}

/**
 * Anything that can run a parameterized query: the pool or a transaction client
 */
export interface QueryExecutor {
  query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * PostgreSQL unique_violation
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * Detect a unique constraint violation raised by pg, optionally on a given constraint
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof Error) || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return false;
  }
  if (constraint === undefined) {
    return true;
  }
  return 'constraint' in error && error.constraint === constraint;
}

/**
 * Database connection pool configuration
 */
interface PoolConfig {
  min: number;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

/**
 * Default pool configuration optimized for Lambda
 */
const DEFAULT_POOL_CONFIG: PoolConfig = {
  min: 0,
  max: 5,
  idleTimeoutMillis: 30000, // 30 seconds
  connectionTimeoutMillis: 5000, // 5 seconds
};

function isCredentialSecret(value: unknown): value is DatabaseCredentials {
  return (
    typeof value === 'object' &&
    value !== null &&
    'username' in value &&
    'password' in value &&
    typeof value.username === 'string' &&
    typeof value.password === 'string'
  );
}

/**
 * Fetch database credentials from AWS Secrets Manager
 */
async function getCredentialsFromSecretsManager(secretArn: string): Promise<DatabaseCredentials> {
  if (cachedCredentials) {
    return cachedCredentials;
  }

  const client = new SecretsManagerClient({ region: process.env.AWS_REGION || 'us-east-1' });

  try {
    const command = new GetSecretValueCommand({ SecretId: secretArn });
    const response = await client.send(command);

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    const secret: unknown = JSON.parse(response.SecretString);
    if (!isCredentialSecret(secret)) {
      throw new Error('Secret is missing username or password');
    }

    cachedCredentials = {
      username: secret.username,
      password: secret.password,
    };

    return cachedCredentials;
  } catch (error) {
    throw new Error(`Failed to fetch database credentials: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

/**
 * Resolve credentials: Secrets Manager when an ARN is configured, plain env otherwise
 */
async function resolveCredentials(config: EnvironmentConfig): Promise<DatabaseCredentials> {
  if (config.dbSecretArn) {
    return getCredentialsFromSecretsManager(config.dbSecretArn);
  }
  return { username: config.dbUser, password: config.dbPassword };
}

/**
 * Get or create the database connection pool
 * Reuses pool across Lambda invocations for performance
 */
export async function getPool(): Promise<Pool> {
  if (!pool) {
    const config = loadEnvironmentConfig();
    const credentials = await resolveCredentials(config);

    pool = new Pool({
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: credentials.username,
      password: credentials.password,
      min: DEFAULT_POOL_CONFIG.min,
      max: DEFAULT_POOL_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POOL_CONFIG.connectionTimeoutMillis,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined, // RDS uses self-signed certificates
    });

    pool.on('error', (err) => {
      logDatabase({
        errorMessage: err.message,
        query: 'Pool error',
        operation: 'POOL_ERROR',
      });
    });
  }

  return pool;
}

/**
 * Execute a parameterized query
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Array of parameter values
 */
export async function query<T extends QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const activePool = await getPool();
  return activePool.query<T>(text, params);
}

/**
 * Executor backed by the shared pool
 */
export const poolExecutor: QueryExecutor = { query };

/**
 * Wrap a checked-out client so repositories can run inside a transaction
 */
export function clientExecutor(client: PoolClient): QueryExecutor {
  return {
    query: <T extends QueryResultRow>(text: string, params?: unknown[]) =>
      client.query<T>(text, params),
  };
}

/**
 * Transaction helper for atomic operations
 * Automatically handles BEGIN, COMMIT, and ROLLBACK
 *
 * @param callback - Function to execute within transaction
 * @returns Result from callback
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const activePool = await getPool();
  const client = await activePool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close the database pool
 * Should be called during shutdown or testing cleanup
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Reset pool instance (for testing only)
 * @internal
 */
export function resetPool(): void {
  pool = null;
  cachedCredentials = null;
}

/**
 * Check if pool is healthy
 */
export async function isPoolHealthy(): Promise<boolean> {
  try {
    const result = await query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows.length === 1 && result.rows[0].health_check === 1;
  } catch (error) {
    logDatabase({
      errorMessage: error instanceof Error ? error.message : 'Unknown error',
      query: 'SELECT 1 as health_check',
      operation: 'HEALTH_CHECK',
    });
    return false;
  }
}
