import { Response } from 'express';

import { getErrorMessage, isUpstreamError } from './errors';

/**
 * Standard API response helpers.
 * Every endpoint answers { success: true, data } or { success: false, error }.
 */

interface ErrorResponseOptions {
  /** Additional data to include alongside the error */
  data?: unknown;
}

export function sendError(
  res: Response,
  statusCode: number,
  message: string,
  options?: ErrorResponseOptions
): void {
  const body: Record<string, unknown> = { success: false, error: message };
  if (options?.data !== undefined) {
    body.data = options.data;
  }
  res.status(statusCode).json(body);
}

export function sendSuccess(
  res: Response,
  data?: unknown,
  statusCode = 200
): void {
  res.status(statusCode).json({ success: true, data });
}

/**
 * Maps a failed aggregation to a response: Last.fm failures are a bad
 * gateway (502), anything else an internal error (500).
 */
export function sendAggregationError(res: Response, error: unknown): void {
  const statusCode = isUpstreamError(error) ? 502 : 500;
  sendError(res, statusCode, `Error: ${getErrorMessage(error)}`);
}
