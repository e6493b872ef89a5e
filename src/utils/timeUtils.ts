import { MalformedTimestampError } from '../types/errors';
import type { Scalar } from '../types/TimeSeries';

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Format a date the way the JDBC bridge expects it in a where clause:
 * "YYYY-MM-DD HH:MM:SS" (UTC)
 */
export function formatJdbcDate(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

// Day plus optional time, with or without a "T" and colons: "15", "15130000", "15T13:00:00"
const DAY_TIME_TAIL = /^(\d{2})(?:T?(\d{2}):?(\d{2}):?(\d{2})(?:\.\d+)?)?$/;

/**
 * Parse the compact remote timestamp (e.g. "20080115130000" or "20080115T13:00:00").
 * First four characters are the year, next two the month, the rest day and time.
 * Timestamps without a zone are taken as UTC.
 */
export function parseJdbcTimestamp(raw: string): Date {
  const year = raw.slice(0, 4);
  const month = raw.slice(4, 6);
  const match = DAY_TIME_TAIL.exec(raw.slice(6));

  if (!/^\d{4}$/.test(year) || !/^\d{2}$/.test(month) || !match) {
    throw new MalformedTimestampError(raw);
  }

  const [, day, hours = '00', minutes = '00', seconds = '00'] = match;
  const parts = [year, month, day, hours, minutes, seconds].map(Number);
  const [y, mo, d, h, mi, s] = parts;
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));

  // Date.UTC rolls over out-of-range fields (month 13, hour 25); reject those
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== mi ||
    date.getUTCSeconds() !== s
  ) {
    throw new MalformedTimestampError(raw);
  }

  return date;
}

/**
 * Timestamp cell from a time series row; the transport may already have decoded it
 */
export function toTimestamp(value: Scalar): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new MalformedTimestampError(String(value));
    }
    return value;
  }
  return parseJdbcTimestamp(value === null ? '' : String(value));
}
