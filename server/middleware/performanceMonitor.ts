/**
 * Performance monitoring middleware
 *
 * Flags slow and oversized API responses. An analysis run fetches one
 * upstream request per day, so the thresholds are generous.
 */

import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';

export const THRESHOLD_WARNING_MS = 5000;
export const THRESHOLD_ERROR_MS = 30000;
export const THRESHOLD_SIZE_KB = 2048;

export type ResponseTimeClass = 'ok' | 'slow' | 'very-slow';

export function classifyResponseTime(responseTime: number): ResponseTimeClass {
  if (responseTime > THRESHOLD_ERROR_MS) return 'very-slow';
  if (responseTime > THRESHOLD_WARNING_MS) return 'slow';
  return 'ok';
}

/**
 * Middleware to monitor API performance
 */
export function performanceMonitor(req: Request, res: Response, next: NextFunction) {
  // Skip for non-API routes
  if (!req.path.startsWith('/api')) {
    return next();
  }

  const startTime = Date.now();

  res.on('finish', () => {
    const responseTime = Date.now() - startTime;
    const responseSize = Number(res.getHeader('content-length') ?? 0);
    const context = {
      method: req.method,
      path: req.path,
      responseTime,
      responseSize,
      statusCode: res.statusCode
    };

    switch (classifyResponseTime(responseTime)) {
      case 'very-slow':
        logger.error(`SLOW API: ${req.method} ${req.path} took ${responseTime}ms to complete`, {
          module: 'performance',
          context
        });
        break;
      case 'slow':
        logger.warning(`Slow API: ${req.method} ${req.path} took ${responseTime}ms to complete`, {
          module: 'performance',
          context
        });
        break;
      default:
        break;
    }

    if (responseSize > THRESHOLD_SIZE_KB * 1024) {
      logger.warning(`Large API response: ${req.method} ${req.path} returned ${Math.round(responseSize / 1024)}KB`, {
        module: 'performance',
        context
      });
    }
  });

  next();
}
