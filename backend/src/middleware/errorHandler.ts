/**
 * API errors and the final error middleware.
 *
 * Status mapping:
 * - ZodError (malformed readings or maintenance bodies) → 400 with one issue per field
 * - ApiError → its own status code
 * - fix log database unreachable → 503
 * - snapshot storage or memory exhausted → 507
 * - anything else → 500, message hidden in production
 */

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { isFatalError } from '../services/explorer/errors.js';

export interface ApiError extends Error {
  statusCode: number;
  details?: unknown;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export function createError(message: string, statusCode: number, details?: unknown): ApiError {
  return Object.assign(new Error(message), { statusCode, details });
}

export function serviceUnavailable(message = 'Service unavailable', details?: unknown): ApiError {
  return createError(message, 503, details);
}

function isApiError(err: Error): err is ApiError {
  return 'statusCode' in err && typeof err.statusCode === 'number';
}

function isFixLogUnreachable(err: Error): boolean {
  return ('code' in err && (err.code === 'ECONNREFUSED' || err.code === 'ETIMEDOUT'))
    || err.message.includes('Connection terminated');
}

/** `readings.3.latitude: Number must be less than 90` style issues */
export function toValidationIssues(err: ZodError): ValidationIssue[] {
  return err.errors.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'Validation error', details: toValidationIssues(err) });
    return;
  }

  if (isApiError(err)) {
    if (err.statusCode >= 500) console.error('[API]', err.message);
    res.status(err.statusCode).json({
      error: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return;
  }

  console.error('[API] Unhandled error:', err);

  if (isFixLogUnreachable(err)) {
    res.status(503).json({
      error: 'Fix log unavailable',
      message: 'Unable to reach the fix log database. Please ensure PostgreSQL is running.',
    });
    return;
  }

  if (isFatalError(err)) {
    res.status(507).json({ error: 'Snapshot storage exhausted' });
    return;
  }

  res.status(500).json({
    error: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message || 'Internal server error',
  });
}
