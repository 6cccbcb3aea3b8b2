/**
 * Error Handling Middleware
 *
 * Turns whatever a route threw into an error envelope. Application errors
 * carry their own code; session failures become 401; a lost database
 * connection becomes 503; everything else is logged and reported as 500.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { AuthError } from '../models/auth';
import { AppError, ValidationError } from '../models/errors';
import { ErrorCode } from '../models/response';
import { errorResponse } from '../utils/response-formatter';
import { log, LogLevel } from '../utils/logger';

const CONNECTION_FAILURE_PATTERNS = [
  'econnrefused',
  'etimedout',
  'enotfound',
  'connection terminated',
  'connection refused',
  'connect timeout',
];

/**
 * Whether the error means the database could not be reached, as opposed to
 * a query that failed
 */
export function isDatabaseConnectionError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return CONNECTION_FAILURE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * @example
 * ```typescript
 * try {
 *   return await route(context);
 * } catch (error) {
 *   return handleError(error, requestId);
 * }
 * ```
 */
export function handleError(error: unknown, requestId: string): APIGatewayProxyResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AuthError) {
    return errorResponse(ErrorCode.AUTHENTICATION_ERROR, err.message, undefined, requestId);
  }

  if (err instanceof AppError) {
    const details = err instanceof ValidationError ? err.details : undefined;
    return errorResponse(err.code, err.message, details, requestId);
  }

  if (isDatabaseConnectionError(err)) {
    log(LogLevel.ERROR, 'Database unreachable', { request_id: requestId, error: err.message });
    return errorResponse(ErrorCode.SERVICE_UNAVAILABLE, 'Database connection failed', undefined, requestId);
  }

  log(LogLevel.ERROR, 'Unhandled error', {
    request_id: requestId,
    error: err.message,
    stack: err.stack,
  });

  return errorResponse(
    ErrorCode.INTERNAL_ERROR,
    'Internal server error',
    process.env.NODE_ENV === 'development' ? { error: err.message } : undefined,
    requestId
  );
}
