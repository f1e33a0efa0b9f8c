import { MalformedTimestampError } from '../../types/errors.js';

// YYYY-MM-DD, optionally followed by [T| ]HH:MM[:SS[.fraction]] and a Z or ±HH[:MM] zone marker
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)?$/;

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * Normalize an ISO-8601-like timestamp to `YYYY-MM-DD HH:MM:SS`
 *
 * The wall-clock fields are kept as written: a zone marker is accepted and dropped, never
 * converted. A bare date is zero-filled.
 *
 * @throws {MalformedTimestampError} When the value does not match or names an impossible date/time
 */
export function normalizeTimestamp(raw: string): string {
  const value = raw.trim();
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    throw new MalformedTimestampError(raw);
  }

  const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;

  if (!isCalendarDate(Number(year), Number(month), Number(day))) {
    throw new MalformedTimestampError(raw);
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    throw new MalformedTimestampError(raw);
  }

  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

/**
 * Like normalizeTimestamp, passing null through
 */
export function normalizeOptionalTimestamp(raw: string | null): string | null {
  return raw === null ? null : normalizeTimestamp(raw);
}
