/**
 * Session Middleware
 * 
 * Signs and verifies the HS256 session token carried in the "session"
 * cookie of the prediction game. A missing or rejected token means the
 * visitor is anonymous.
 */

import * as jwt from 'jsonwebtoken';
import { SessionClaims, SessionContext, AuthError, AuthErrorCode } from '../models/auth';
import { logAuthentication } from '../utils/logger';
import { ONE_YEAR_SECONDS } from '../utils/cookies';

export const SESSION_TTL_SECONDS = ONE_YEAR_SECONDS;

/**
 * Issue a session token for a registered player
 */
export function signSessionToken(context: SessionContext, secret: string): string {
  const claims: SessionClaims = {
    sub: String(context.user_id),
    username: context.username,
  };
  return jwt.sign(claims, secret, {
    algorithm: 'HS256',
    expiresIn: SESSION_TTL_SECONDS,
  });
}

function toSessionContext(payload: string | jwt.JwtPayload): SessionContext {
  if (typeof payload === 'string') {
    throw new AuthError(AuthErrorCode.INVALID_CLAIMS, 'Token payload must be an object');
  }

  const userId = Number(payload.sub);
  const username: unknown = payload.username;
  if (!Number.isInteger(userId) || userId <= 0 || typeof username !== 'string' || !username) {
    throw new AuthError(AuthErrorCode.INVALID_CLAIMS, 'Token missing sub or username claim');
  }

  return { user_id: userId, username };
}

/**
 * Verify a session token and extract the player context
 * 
 * @throws AuthError for missing, expired, tampered or malformed tokens
 */
export function verifySessionToken(token: string | undefined, secret: string): SessionContext {
  if (!token) {
    throw new AuthError(AuthErrorCode.MISSING_TOKEN, 'Session cookie is missing');
  }

  try {
    return toSessionContext(jwt.verify(token, secret, { algorithms: ['HS256'] }));
  } catch (error) {
    if (error instanceof AuthError) {
      throw error;
    }
    if (error instanceof jwt.TokenExpiredError) {
      throw new AuthError(AuthErrorCode.EXPIRED_TOKEN, 'Token has expired');
    }
    if (error instanceof jwt.JsonWebTokenError) {
      throw new AuthError(AuthErrorCode.INVALID_TOKEN, `Invalid token: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Resolve the signed-in player, or null for anonymous visitors.
 * Rejected tokens are logged; an absent cookie is not.
 */
export function readSession(
  token: string | undefined,
  secret: string,
  requestId?: string
): SessionContext | null {
  if (!token) {
    return null;
  }

  try {
    const context = verifySessionToken(token, secret);
    logAuthentication({ requestId, success: true, userId: context.user_id });
    return context;
  } catch (error) {
    if (error instanceof AuthError) {
      logAuthentication({ requestId, success: false, reason: error.message });
      return null;
    }
    throw error;
  }
}
