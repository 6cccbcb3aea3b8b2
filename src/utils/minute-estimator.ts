/**
 * Minute Estimation
 *
 * Derives the elapsed match minute from the kickoff timestamp. Estimation is
 * best-effort: a bad timestamp must never abort the rest of the feed, so a
 * failure is returned as a fallback value rather than thrown.
 */

export const MIN_MINUTE = 1;
export const MAX_MINUTE = 120;
export const FALLBACK_MINUTE = 45;

/**
 * ISO-8601 date-time with `T` or space separator and optional zone.
 * Groups: date, time, zone.
 */
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Whether the wall-clock fields name a real instant. Date.parse rolls
 * Feb 30 over to Mar 1 and 24:00 over to the next day.
 */
function isCalendarValid(date: string, time: string): boolean {
  const [year, month, day] = date.split('-').map(Number);
  const [hour, minute, second = 0] = time.split(':').map((part) => Math.floor(Number(part)));

  const check = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return (
    check.getUTCFullYear() === year &&
    check.getUTCMonth() === month - 1 &&
    check.getUTCDate() === day &&
    check.getUTCHours() === hour &&
    check.getUTCMinutes() === minute &&
    check.getUTCSeconds() === second
  );
}

export type MinuteEstimate =
  | { kind: 'estimated'; minute: number }
  | { kind: 'fallback'; minute: number; reason: string };

/**
 * Parse a kickoff timestamp as UTC. Timestamps without a zone are read as UTC.
 *
 * @returns epoch milliseconds, or null when the value is not a usable timestamp
 */
export function parseKickoff(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }

  const match = ISO_DATE_TIME.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, date, time, zone] = match;
  if (!isCalendarValid(date, time)) {
    return null;
  }
  const normalizedZone = zone === undefined || zone.toUpperCase() === 'Z'
    ? 'Z'
    : zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;

  const epochMs = Date.parse(`${date}T${time}${normalizedZone}`);
  return Number.isNaN(epochMs) ? null : epochMs;
}

/**
 * Clamp a raw minute into the supported range
 */
export function clampMinute(minute: number): number {
  return Math.max(MIN_MINUTE, Math.min(minute, MAX_MINUTE));
}

/**
 * Estimate the current match minute
 *
 * minute = floor((now - kickoff) in minutes), clamped to [1, 120].
 * Missing or malformed kickoff values fall back to minute 45.
 *
 * @param kickoff - Kickoff timestamp from the feed (ISO-8601, UTC)
 * @param now - Wall-clock time
 */
export function estimateMinute(kickoff: unknown, now: Date = new Date()): MinuteEstimate {
  if (kickoff === undefined || kickoff === null || kickoff === '') {
    return { kind: 'fallback', minute: FALLBACK_MINUTE, reason: 'Empty kickoff timestamp' };
  }

  const kickoffMs = parseKickoff(kickoff);
  if (kickoffMs === null) {
    return {
      kind: 'fallback',
      minute: FALLBACK_MINUTE,
      reason: `Unparseable kickoff timestamp: ${String(kickoff)}`,
    };
  }

  const elapsedMinutes = Math.floor((now.getTime() - kickoffMs) / 60000);
  return { kind: 'estimated', minute: clampMinute(elapsedMinutes) };
}
