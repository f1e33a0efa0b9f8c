/**
 * Calendar-day helpers for the retrieval loop
 * Days are plain `YYYY-MM-DD` strings; no time zone conversion is applied anywhere.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Query window sent to the retrieval API, both bounds inclusive
 */
export interface TimeWindow {
  start: string;
  end: string;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

function formatDay(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * Validate a `YYYY-MM-DD` string and return it unchanged
 *
 * @throws Error if the format is invalid or the date does not exist
 */
export function parseCalendarDay(value: string): string {
  const trimmed = value.trim();
  const match = trimmed.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid date format: ${value}. Expected format: YYYY-MM-DD`);
  }

  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  if (formatDay(date) !== trimmed) {
    throw new Error(`Invalid calendar date: ${value}`);
  }

  return trimmed;
}

/**
 * All days from `from` to `to`, inclusive
 */
export function enumerateCalendarDays(from: string, to: string): string[] {
  const start = Date.parse(`${parseCalendarDay(from)}T00:00:00Z`);
  const end = Date.parse(`${parseCalendarDay(to)}T00:00:00Z`);
  if (end < start) {
    throw new Error(`End date ${to} is before start date ${from}`);
  }

  const days: string[] = [];
  for (let time = start; time <= end; time += DAY_MS) {
    days.push(formatDay(new Date(time)));
  }
  return days;
}

/**
 * Split a day into consecutive windows of `windowHours` hours
 * e.g. 2 hours gives 00:00:00.000–01:59:59.999, 02:00:00.000–03:59:59.999, ...
 */
export function buildTimeWindows(day: string, windowHours: number): TimeWindow[] {
  if (!Number.isInteger(windowHours) || windowHours < 1 || 24 % windowHours !== 0) {
    throw new Error(`Invalid window size: ${windowHours}. Must be a whole divisor of 24 hours.`);
  }

  const windows: TimeWindow[] = [];
  for (let hour = 0; hour < 24; hour += windowHours) {
    windows.push({
      start: `${day}T${pad(hour)}:00:00.000Z`,
      end: `${day}T${pad(hour + windowHours - 1)}:59:59.999Z`,
    });
  }
  return windows;
}

/**
 * Directory segments for a day: ['2024', '12', '09']
 */
export function calendarDaySegments(day: string): [string, string, string] {
  const [year, month, date] = parseCalendarDay(day).split('-');
  return [year, month, date];
}
