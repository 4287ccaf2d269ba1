/**
 * =============================================================================
 * GLOBAL ERROR HANDLER MIDDLEWARE
 * =============================================================================
 *
 * PURPOSE:
 *   Catches ALL unhandled errors from route handlers and middleware, and
 *   transforms them into consistent JSON error responses. This is the last
 *   middleware in the pipeline.
 *
 * ERROR HIERARCHY:
 *   AppError (base)       → Custom application error with HTTP status code
 *   ├─ ValidationError    → 400 Bad Request (invalid load test parameters)
 *   ├─ NotFoundError      → 404 Not Found (unknown or finished run)
 *   ├─ ConflictError      → 409 Conflict (a run is already active)
 *   └─ SpawnError         → 500 (stressor missing or not executable)
 *   SyntaxError           → 400 Bad Request (malformed JSON body)
 *   Error (any other)     → 500 Internal Server Error
 *
 * A stressor that starts and then exits non-zero is NOT an HTTP error; it
 * only shows up as a failed run in later /status reads.
 *
 * RESPONSE FORMAT:
 *   All errors return: { error: string, message: string, details?: object }
 *
 * @module middleware/error-handler
 */

import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../types';

/**
 * Custom application error with HTTP status code.
 *
 * Base class for all application-specific errors. Carries an HTTP status code
 * and optional structured details for the error response body.
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid input parameters. Returns HTTP 400.
 *
 * The `details` field can include the field name, min/max, and received value.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(400, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Not found error for missing resources. Returns HTTP 404.
 */
export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

/**
 * A load test is already running (or starting). Returns HTTP 409.
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(409, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * The stressor could not be launched. Returns HTTP 500.
 *
 * The failed run is recorded before this is thrown, so /status shows it.
 */
export class SpawnError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(500, message, details);
    this.name = 'SpawnError';
  }
}

/**
 * Global error handler middleware.
 *
 * Catches all errors and returns a consistent JSON error response.
 *
 * @param err - Error object
 * @param _req - Express request (unused)
 * @param res - Express response
 * @param _next - Express next function (unused but required for Express error handler signature)
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const isClientError = err instanceof AppError && err.statusCode < 500;

  if (isClientError) {
    console.warn(`[WARN] ${err.name}: ${err.message}`);
  } else {
    console.error(`[ERROR] ${err.name}: ${err.message}`);
    if (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
      console.error(err.stack);
    }
  }

  let statusCode = 500;
  let errorResponse: ApiError = {
    error: 'Internal Server Error',
    message: 'An unexpected error occurred',
  };

  if (err instanceof AppError) {
    statusCode = err.statusCode;
    errorResponse = {
      error: err.name,
      message: err.message,
      ...(err.details && { details: err.details }),
    };
  } else if (err instanceof SyntaxError && 'body' in err) {
    // JSON parsing error
    statusCode = 400;
    errorResponse = {
      error: 'Bad Request',
      message: 'Invalid JSON in request body',
    };
  }

  res.status(statusCode).json(errorResponse);
}
