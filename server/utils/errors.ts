/**
 * Standard error handling utilities for the settlement analytics service
 *
 * Every failure the service reports is an AppError subclass, so callers can
 * branch on category and the logger can pick a level from severity.
 */

import type { ZodError } from 'zod';

export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  API = 'api',
  VALIDATION = 'validation',
  NETWORK = 'network',
  DATA_PROCESSING = 'data_processing',
  ANALYSIS = 'analysis',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

export type ErrorContext = Record<string, unknown>;

export interface ErrorOptions {
  severity?: ErrorSeverity;
  category?: ErrorCategory;
  context?: ErrorContext;
  originalError?: Error;
}

/**
 * Base application error class with standardized properties
 */
export class AppError extends Error {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
  timestamp: Date;
  originalError?: Error;

  constructor(message: string, options: ErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.severity = options.severity || ErrorSeverity.ERROR;
    this.category = options.category || ErrorCategory.UNKNOWN;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
  }

  /**
   * Format error for logging
   */
  toLogFormat(): string {
    return `[${this.severity.toUpperCase()}] [${this.category}] ${this.message}`;
  }
}

/**
 * Raised by the cleaning pipeline. No partial result accompanies it.
 */
export class DataProcessingError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.DATA_PROCESSING
    });
  }
}

/**
 * Raised by the statistics and reporting layer
 */
export class AnalysisError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.ANALYSIS
    });
  }
}

/**
 * API-related error
 */
export class ApiError extends AppError {
  statusCode: number;

  constructor(message: string, statusCode: number = 500, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.API
    });
    this.statusCode = statusCode;
  }

  /**
   * Format as API response
   */
  toResponse() {
    return {
      error: {
        message: this.message,
        statusCode: this.statusCode,
        timestamp: this.timestamp.toISOString()
      }
    };
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.VALIDATION,
      severity: options.severity || ErrorSeverity.WARNING
    });
  }

  /**
   * Create from Zod error
   */
  static fromZodError(error: ZodError, context: ErrorContext = {}): ValidationError {
    const issue = error.issues[0];
    const message = issue
      ? `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`
      : 'Validation failed';

    return new ValidationError(message, {
      context: {
        ...context,
        validationErrors: error.issues
      },
      originalError: error
    });
  }
}

/**
 * Network-related error
 */
export class NetworkError extends AppError {
  status?: number;

  constructor(message: string, options: ErrorOptions & { status?: number } = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.NETWORK
    });
    this.status = options.status;
  }

  /**
   * Create from an axios (or fetch) failure
   */
  static fromFetchError(
    error: Error,
    url: string,
    status?: number,
    context: ErrorContext = {}
  ): NetworkError {
    const message = error.message || `Request to ${url} failed`;
    const isTimeout = message.includes('timeout') || message.includes('ETIMEDOUT');

    return new NetworkError(message, {
      severity: isTimeout ? ErrorSeverity.WARNING : ErrorSeverity.ERROR,
      status,
      context: {
        ...context,
        url,
        status
      },
      originalError: error
    });
  }
}

/**
 * Configuration error
 */
export class ConfigurationError extends AppError {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, {
      ...options,
      category: ErrorCategory.CONFIGURATION,
      severity: options.severity || ErrorSeverity.CRITICAL
    });
  }
}

/**
 * Extract error message from error object or value
 */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
