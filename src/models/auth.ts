/**
 * Authentication Models
 * 
 * Type definitions for the signed session cookie of the prediction game.
 */

/**
 * Claims carried in the session token
 */
export interface SessionClaims {
  sub: string;                    // User ID
  username: string;
  iat?: number;
  exp?: number;
}

/**
 * Signed-in player context extracted from the session cookie
 */
export interface SessionContext {
  user_id: number;
  username: string;
}

/**
 * Authentication error types
 */
export enum AuthErrorCode {
  MISSING_TOKEN = 'MISSING_TOKEN',
  INVALID_TOKEN = 'INVALID_TOKEN',
  EXPIRED_TOKEN = 'EXPIRED_TOKEN',
  INVALID_CLAIMS = 'INVALID_CLAIMS',
}

/**
 * Authentication error
 */
export class AuthError extends Error {
  constructor(
    public code: AuthErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
