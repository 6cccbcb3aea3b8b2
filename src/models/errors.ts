/**
 * Application Error Models
 *
 * Every error a route may raise on purpose extends AppError and names the
 * response code it becomes. Anything else is reported as a 500.
 */

import { ErrorCode } from './response';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
}

export class NotFoundError extends AppError {
  readonly code = ErrorCode.NOT_FOUND;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * Request that is well formed but not acceptable, e.g. a second prediction
 * on the same match
 */
export class BadRequestError extends AppError {
  readonly code = ErrorCode.VALIDATION_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Body failed schema validation; details map field names to messages
 */
export class ValidationError extends AppError {
  readonly code = ErrorCode.VALIDATION_ERROR;

  constructor(message: string, readonly details?: Record<string, string>) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Unique constraint hit; `constraint` names the index
 */
export class ConflictError extends AppError {
  readonly code = ErrorCode.CONFLICT;

  constructor(message: string, readonly constraint?: string) {
    super(message);
    this.name = 'ConflictError';
  }
}
