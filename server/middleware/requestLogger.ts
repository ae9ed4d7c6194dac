/**
 * Request logging middleware
 *
 * Logs each incoming request and, once the response has been sent, its
 * status and duration.
 */

import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();

  // Request id for correlating the two log lines
  const requestId = `req_${startTime}_${Math.random().toString(36).substring(2, 15)}`;
  req.headers['x-request-id'] = requestId;

  logger.info(`Request received: ${req.method} ${req.path}`, {
    module: 'api',
    context: {
      requestId,
      method: req.method,
      path: req.originalUrl || req.url,
      ip: req.ip,
      userAgent: req.headers['user-agent'],
      query: req.query
    }
  });

  res.on('finish', () => {
    const responseTime = Date.now() - startTime;
    const message = `Request completed: ${req.method} ${req.path} ${res.statusCode} (${responseTime}ms)`;
    const options = {
      module: 'api',
      context: {
        requestId,
        method: req.method,
        path: req.originalUrl || req.url,
        statusCode: res.statusCode,
        responseTime
      }
    };

    if (res.statusCode >= 500) {
      logger.error(message, options);
    } else if (res.statusCode >= 400) {
      logger.warning(message, options);
    } else {
      logger.info(message, options);
    }
  });

  next();
}
