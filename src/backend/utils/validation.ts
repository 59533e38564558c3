/**
 * Input validation for query parameters
 */

import { parseLocalDate } from './timestamps';

/**
 * Validates Last.fm username format
 * Allows alphanumeric, underscore, and hyphen characters
 * Length between 1-64 characters
 */
export function validateUsername(username: string): boolean {
  const USERNAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
  return Boolean(username && USERNAME_PATTERN.test(username));
}

/**
 * Validates a YYYY-MM-DD calendar date
 */
export function validateIsoDate(date: string): boolean {
  return parseLocalDate(date) !== null;
}

/**
 * Parses a query value as a positive integer.
 * Returns the fallback when the value is absent, null when it is invalid.
 */
export function parsePositiveInteger(
  value: unknown,
  fallback: number
): number | null {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  const parsed = parseInt(value, 10);
  return parsed > 0 ? parsed : null;
}

/**
 * Reads a single string query parameter, trimming whitespace
 */
export function getQueryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}
