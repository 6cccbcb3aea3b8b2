/**
 * Cookie Utilities
 *
 * Minimal Cookie header parsing and Set-Cookie serialization for the
 * theme, follow list, referral and session cookies.
 */

export interface CookieOptions {
  maxAgeSeconds?: number;
  httpOnly?: boolean;
  path?: string;
}

export const THEME_COOKIE = 'theme';
export const FOLLOWED_MATCHES_COOKIE = 'followed_matches';
export const REFERRED_BY_COOKIE = 'referred_by';
export const SESSION_COOKIE = 'session';

export const ONE_HOUR_SECONDS = 60 * 60;
export const ONE_YEAR_SECONDS = 365 * 24 * ONE_HOUR_SECONDS;

/**
 * Percent-decode, keeping the raw value when the escape is malformed
 */
export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Parse a Cookie request header into name/value pairs.
 * The first occurrence of a name wins.
 */
export function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) {
    return cookies;
  }

  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const name = part.substring(0, separator).trim();
    const value = part.substring(separator + 1).trim().replace(/^"(.*)"$/, '$1');
    if (name && !(name in cookies)) {
      cookies[name] = safeDecode(value);
    }
  }

  return cookies;
}

/**
 * Build a Set-Cookie header value
 *
 * @example
 * ```typescript
 * serializeCookie('theme', 'light', { maxAgeSeconds: ONE_YEAR_SECONDS });
 * // 'theme=light; Max-Age=31536000; Path=/; SameSite=Lax'
 * ```
 */
export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  const parts = [`${name}=${encodeURIComponent(value)}`];

  if (options.maxAgeSeconds !== undefined) {
    parts.push(`Max-Age=${options.maxAgeSeconds}`);
  }
  parts.push(`Path=${options.path ?? '/'}`);
  if (options.httpOnly) {
    parts.push('HttpOnly');
  }
  parts.push('SameSite=Lax');

  return parts.join('; ');
}

/**
 * Parse the followed-matches cookie ("1001,1002") into match ids
 */
export function parseFollowedMatches(value: string | undefined): number[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map((part) => parseInt(part, 10));
}

/**
 * Add the id when absent, remove it when present
 */
export function toggleFollowedMatch(followed: number[], matchId: number): number[] {
  return followed.includes(matchId)
    ? followed.filter((id) => id !== matchId)
    : [...followed, matchId];
}
