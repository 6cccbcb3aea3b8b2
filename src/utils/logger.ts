/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the application. All logs include a timestamp, a level and relevant context.
 * Player identifiers are sanitized out of free-form context.
 */

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
  user_id?: number;
}

/**
 * API request log entry
 */
interface RequestLogEntry extends BaseLogEntry {
  log_type: 'API_REQUEST';
  method: string;
  path: string;
  status_code: number;
  latency_ms: number;
}

/**
 * Session check log entry
 */
interface AuthenticationLogEntry extends BaseLogEntry {
  log_type: 'AUTHENTICATION';
  success: boolean;
  reason?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

/**
 * Poll cycle log entry
 */
interface PollCycleLogEntry extends BaseLogEntry {
  log_type: 'POLL_CYCLE';
  status: string;
  matches_processed: number;
  matches_finished: number;
  predictions_scored: number;
  duration_ms: number;
  error?: string;
}

type LogEntry = BaseLogEntry & Record<string, unknown>;

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may identify a player and should be excluded
 */
const PII_FIELDS = [
  'username',
  'candidate_username',
  'referral_code',
  'referred_by',
  'referred_by_code',
  'email',
  'phone',
  'ip_address',
  'session',
  'cookie',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (isPlainObject(value)) {
    return sanitizeObject(value);
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
function sanitizeObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.INFO]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.ERROR]: 2,
};

/**
 * Lowest level written, from LOG_LEVEL (default info)
 */
function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || 'info').toUpperCase();
  return Object.values(LogLevel).find((level) => level === configured) ?? LogLevel.INFO;
}

/**
 * Write log entry to console (CloudWatch)
 */
function writeLog(entry: BaseLogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[minimumLevel()]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log API request
 *
 * @example
 * ```typescript
 * logRequest({
 *   requestId: 'abc-123',
 *   method: 'GET',
 *   path: '/live',
 *   statusCode: 200,
 *   latencyMs: 45
 * });
 * ```
 */
export function logRequest(params: {
  requestId: string;
  method: string;
  path: string;
  userId?: number;
  statusCode: number;
  latencyMs: number;
}): void {
  const entry: RequestLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.statusCode >= 500 ? LogLevel.ERROR : params.statusCode >= 400 ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'API_REQUEST',
    request_id: params.requestId,
    user_id: params.userId,
    method: params.method,
    path: params.path,
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
  };

  writeLog(entry);
}

/**
 * Log a session cookie check. Rejected cookies are logged at WARN.
 */
export function logAuthentication(params: {
  requestId?: string;
  success: boolean;
  userId?: number;
  reason?: string;
}): void {
  const entry: AuthenticationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHENTICATION',
    request_id: params.requestId,
    user_id: params.userId,
    success: params.success,
    reason: params.reason,
  };

  writeLog(entry);
}

/**
 * Log database error
 *
 * Logs database errors with sanitized query preview and error message.
 *
 * @example
 * ```typescript
 * logDatabase({
 *   errorMessage: 'Connection timeout',
 *   query: 'SELECT * FROM snapshots WHERE match_id = $1',
 *   operation: 'SELECT'
 * });
 * ```
 */
export function logDatabase(params: {
  requestId?: string;
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query);

  // Truncate query for logging (first 200 characters)
  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    request_id: params.requestId,
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog(entry);
}

/**
 * Log the outcome of one poll cycle. Cycles that did not reach a healthy
 * feed are logged at WARN, storage failures at ERROR.
 */
export function logPollCycle(params: {
  status: string;
  matchesProcessed: number;
  matchesFinished: number;
  predictionsScored: number;
  durationMs: number;
  error?: string | null;
  level?: LogLevel;
}): void {
  const entry: PollCycleLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.level ?? (params.error ? LogLevel.WARN : LogLevel.INFO),
    log_type: 'POLL_CYCLE',
    status: params.status,
    matches_processed: params.matchesProcessed,
    matches_finished: params.matchesFinished,
    predictions_scored: params.predictionsScored,
    duration_ms: params.durationMs,
    error: params.error ?? undefined,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.WARN, 'Minute estimate fell back to default', {
 *   match_id: 1001,
 *   reason: 'Empty kickoff timestamp'
 * });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry: LogEntry = {
    ...sanitizedContext,
    timestamp: new Date().toISOString(),
    level,
    message,
  };

  writeLog(entry);
}
