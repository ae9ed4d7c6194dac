/**
 * Service configuration
 *
 * Values come from the environment (a .env file is loaded by the entry points
 * through dotenv) and are validated once with zod.
 */

import { z } from 'zod';
import { ConfigurationError } from './utils/errors';
import { LogLevel } from './utils/logger';

export const DEFAULT_ELEXON_BASE_URL = 'https://data.elexon.co.uk/bmrs/api/v1';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  ELEXON_API_BASE_URL: z.string().url().default(DEFAULT_ELEXON_BASE_URL),
  ELEXON_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ELEXON_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  ELEXON_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(5000),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),
  LOG_DIR: z.string().min(1).default('./logs'),
  LOG_TO_FILE: booleanFlag.default('false'),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.INFO),
  DASHBOARD_OUTPUT: z.string().min(1).default('settlement_dashboard.html')
});

export interface AppConfig {
  port: number;
  elexon: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    concurrency: number;
  };
  logging: {
    dir: string;
    toFile: boolean;
    level: LogLevel;
  };
  dashboardOutput: string;
}

/**
 * Build the configuration from an environment map.
 * Throws ConfigurationError naming the first offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? issue.path.join('.') : 'environment';
    throw new ConfigurationError(`Invalid configuration for ${variable}: ${issue ? issue.message : 'unknown error'}`, {
      context: { issues: parsed.error.issues },
      originalError: parsed.error
    });
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    elexon: {
      baseUrl: values.ELEXON_API_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: values.ELEXON_REQUEST_TIMEOUT_MS,
      maxRetries: values.ELEXON_MAX_RETRIES,
      retryDelayMs: values.ELEXON_RETRY_DELAY_MS,
      concurrency: values.FETCH_CONCURRENCY
    },
    logging: {
      dir: values.LOG_DIR,
      toFile: values.LOG_TO_FILE,
      level: values.LOG_LEVEL
    },
    dashboardOutput: values.DASHBOARD_OUTPUT
  };
}
