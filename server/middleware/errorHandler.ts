/**
 * Global error handling middleware for Express
 *
 * Catches every error raised while handling a request and answers with a
 * standard JSON body. The status code follows the error class.
 */

import type { NextFunction, Request, Response } from 'express';
import { ApiError, AppError, NetworkError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ErrorResponseBody {
  error: {
    message: string;
    type: string;
    statusCode: number;
    timestamp: string;
    stack?: string;
  };
}

export interface ErrorResponse {
  statusCode: number;
  body: ErrorResponseBody;
}

/**
 * Map an error to its HTTP status and response body
 */
export function toErrorResponse(err: Error, includeStack = false): ErrorResponse {
  let statusCode = 500;
  let message = err.message || 'Internal server error';
  let timestamp = new Date().toISOString();

  if (err instanceof ValidationError) {
    statusCode = 400;
  } else if (err instanceof ApiError) {
    const apiResponse = err.toResponse();
    statusCode = apiResponse.error.statusCode;
    message = apiResponse.error.message;
    timestamp = apiResponse.error.timestamp;
  } else if (err instanceof NetworkError) {
    statusCode = 502;
    message = 'Upstream settlement data service unavailable';
  } else if (!(err instanceof AppError)) {
    // Hide unexpected internals
    message = 'Internal server error';
  }

  const body: ErrorResponseBody = {
    error: { message, type: err.name, statusCode, timestamp }
  };

  if (includeStack) {
    body.error.stack = err.stack || '';
  }

  return { statusCode, body };
}

/**
 * Global API error handler middleware
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const { statusCode, body } = toErrorResponse(err, process.env.NODE_ENV === 'development');
  const context = { path: req.path, method: req.method, statusCode };

  if (err instanceof AppError) {
    logger.logError(err, { module: err.category, context });
  } else {
    logger.error(`Unexpected Error: ${err.message}`, { module: 'server', context, error: err });
  }

  res.status(statusCode).json(body);
}
