import type { Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import type { Logger } from '../../services/logger.js';
import { isTimelineError, type TimelineErrorCode } from '../../services/timeline/errors.js';
import { formatZodError } from '../schemas.js';
import type { ApiErrorBody } from '../types.js';

/** Request-level failure with an explicit status (missing upload, bad parameter). */
export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'HttpError';
  }
}

const CLIENT_ERROR_CODES: ReadonlySet<TimelineErrorCode> = new Set<TimelineErrorCode>([
  'MALFORMED_TIMESTAMP',
  'INVALID_TIME_SPAN',
  'NO_SEGMENTS',
  'CONFIG_ERROR',
]);

export function statusForError(error: unknown): number {
  if (error instanceof HttpError) return error.status;
  if (error instanceof ZodError || error instanceof multer.MulterError || error instanceof RangeError) {
    return 400;
  }
  if (isTimelineError(error)) {
    if (error.code === 'SESSION_NOT_FOUND') return 404;
    return CLIENT_ERROR_CODES.has(error.code) ? 400 : 500;
  }
  // body-parser errors (malformed JSON, oversized body) carry their own status
  if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return 500;
}

export function errorMessage(error: unknown): string {
  if (error instanceof ZodError) return formatZodError(error);
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Answer `{ success: false, error }` with the status the error maps to.
 * Server faults log at ERROR, rejected requests at WARN.
 */
export function sendError(res: Response, error: unknown, log: Logger, action: string): void {
  const status = statusForError(error);
  const message = errorMessage(error);

  if (status >= 500) {
    log.error(`${action} error:`, error);
  } else {
    log.warn(`${action} rejected (${status}): ${message}`);
  }

  const body: ApiErrorBody = { success: false, error: message };
  res.status(status).json(body);
}
