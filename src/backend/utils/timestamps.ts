/**
 * Date and time helpers.
 *
 * IMPORTANT: Last.fm timestamps are Unix seconds (10 digits), and all
 * scrobble timestamps in this project stay in seconds. Calendar days are
 * always interpreted in the server's local time zone.
 */

import { ListeningTime } from '../../shared/types';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
];

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** Get current time as Unix seconds */
export const nowUnixSeconds = (): number => Math.floor(Date.now() / 1000);

/** Convert a Date to Unix seconds */
export const toUnixSeconds = (date: Date): number =>
  Math.floor(date.getTime() / 1000);

/**
 * Parses a YYYY-MM-DD string into local midnight of that day.
 * Returns null for malformed strings and impossible dates (e.g. 2024-02-30).
 */
export function parseLocalDate(dateStr: string): Date | null {
  const match = ISO_DATE_PATTERN.exec(dateStr);
  if (!match) {
    return null;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(year, month - 1, day);

  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }
  return date;
}

/**
 * Get local date string (YYYY-MM-DD) for a Date.
 */
export function getLocalDateString(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** Local midnight `days` calendar days after `date` (DST-safe). */
export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * Inclusive Unix-second window covering one local calendar day:
 * local midnight up to one second before the next local midnight.
 */
export function getLocalDayWindow(dateStr: string): { from: number; to: number } {
  const start = parseLocalDate(dateStr);
  if (!start) {
    throw new Error(`Invalid date: ${dateStr}`);
  }
  const next = addDays(start, 1);
  return {
    from: toUnixSeconds(start),
    to: toUnixSeconds(next) - 1,
  };
}

export function getWeekdayName(date: Date): string {
  return WEEKDAY_NAMES[date.getDay()];
}

/** MM/DD */
export function formatShortDate(date: Date): string {
  return `${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}`;
}

/** YYYY-MM-DD → MM-DD-YYYY; anything unparsable is returned unchanged */
export function formatDisplayDate(dateStr: string): string {
  const date = parseLocalDate(dateStr);
  if (!date) {
    return dateStr;
  }
  return `${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}-${date.getFullYear()}`;
}

/** Unix seconds → local HH:MM:SS */
export function formatTimeOfDay(timestamp: number): string {
  const date = new Date(timestamp * 1000);
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
}

/**
 * Splits a number of seconds into hours, minutes and seconds.
 */
export function secondsToListeningTime(totalSeconds: number): ListeningTime {
  const hours = Math.floor(totalSeconds / 3600);
  const remainder = totalSeconds % 3600;
  return {
    hours,
    minutes: Math.floor(remainder / 60),
    seconds: remainder % 60,
    totalSeconds,
  };
}
