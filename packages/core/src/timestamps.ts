/**
 * Flexible timestamp parsing
 *
 * Sources publish times in a handful of shapes. Parsing never throws: a value
 * that matches none of them is reported as `null` (unknown publication time).
 * Naive strings carry no zone and are read as UTC wall-clock time.
 */

export type TimestampInput = string | number | Date | null | undefined;

const UTC_Z_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?Z$/;
const OFFSET_RE =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?([+-])(\d{2})(?::?(\d{2}))?$/;
const NAIVE_ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2})(?::(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?)?$/;
const SPACE_FALLBACK_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function fractionToMillis(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number((fraction + '00').slice(0, 3));
}

function readWallClock(match: RegExpExecArray): WallClock {
  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? 0),
    minute: Number(match[5] ?? 0),
    second: Number(match[6] ?? 0),
    millisecond: fractionToMillis(match[7]),
  };
}

/**
 * Build a UTC Date from wall-clock fields, rejecting out-of-range values
 * (Feb 30, hour 24, ...) instead of letting Date roll them over.
 */
function wallClockToUtc(clock: WallClock, offsetMinutes = 0): Date | null {
  const { year, month, day, hour, minute, second, millisecond } = clock;
  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const ms = Date.UTC(year, month - 1, day, hour, minute, second, millisecond);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return new Date(ms - offsetMinutes * 60_000);
}

function parseOffset(sign: string, hours: string, minutes: string | undefined): number | null {
  const h = Number(hours);
  const m = Number(minutes ?? 0);
  if (h > 23 || m > 59) return null;
  const total = h * 60 + m;
  return sign === '-' ? -total : total;
}

function parseTimestampString(value: string): Date | null {
  const text = value.trim();

  if (text.endsWith('Z')) {
    const match = UTC_Z_RE.exec(text);
    return match ? wallClockToUtc(readWallClock(match)) : null;
  }

  // A sign after the date part means an explicit offset
  if (/[+-]/.test(text.slice(10))) {
    const match = OFFSET_RE.exec(text);
    if (!match) return null;
    const offset = parseOffset(match[8], match[9], match[10]);
    return offset === null ? null : wallClockToUtc(readWallClock(match), offset);
  }

  const naive = NAIVE_ISO_RE.exec(text);
  if (naive) {
    return wallClockToUtc(readWallClock(naive));
  }

  const fallback = SPACE_FALLBACK_RE.exec(text);
  if (fallback) {
    return wallClockToUtc(readWallClock(fallback));
  }

  return null;
}

/**
 * Parse a timestamp from any of the supported shapes.
 *
 * - `Date` values are returned unchanged
 * - numbers are epoch milliseconds when > 1e12, otherwise epoch seconds
 * - `2023-10-26T00:00:00Z`, `2023-07-15T20:38:13.044Z`
 * - `2024-03-01T12:00:00+02:00`
 * - `2023-10-26T00:00:00`, `2023-10-26`
 * - `2021-07-20 16:00:00`
 */
export function parseFlexibleTimestamp(value: TimestampInput): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const ms = value > 1e12 ? value : value * 1000;
    return new Date(ms);
  }
  return parseTimestampString(value);
}

/**
 * Normalize a record timestamp: valid Dates are absolute instants already,
 * invalid ones (NaN time) become unknown.
 */
export function normalizeToUtc(value: Date | null | undefined): Date | null {
  if (!value) return null;
  const time = value.getTime();
  return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Comparator: newest first, unknown timestamps last
 */
export function compareNewestFirst(a: Date | null, b: Date | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b.getTime() - a.getTime();
}
