/**
 * Analysis Controller
 *
 * Handles API requests for settlement data and analysis runs, and delegates
 * the work to the services. Failures are passed to the error handler.
 */

import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { summarize, cleanAndProcess } from '../services/dataProcessor';
import { renderDashboardHtml } from '../services/dashboardService';
import { SettlementAnalysis } from '../services/analysisService';
import type { SettlementDataSource } from '../services/elexon';
import type { PriceRow, QualitySummary, VolumeRow } from '../models/settlement';
import { isValidDateString } from '../utils/dates';
import { ApiError, ValidationError } from '../utils/errors';

const dateString = z
  .string({ required_error: 'is required' })
  .refine(isValidDateString, { message: 'must be a valid date in YYYY-MM-DD format' });

const dateParamsSchema = z.object({ date: dateString });

const rangeQuerySchema = z.object({
  start: dateString,
  end: dateString
});

export type DateRangeQuery = z.infer<typeof rangeQuerySchema>;

/**
 * Validate route params carrying a settlement date
 */
export function parseDateParams(params: unknown): string {
  const parsed = dateParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, { source: 'params' });
  }
  return parsed.data.date;
}

/**
 * Validate ?start=&end= query parameters
 */
export function parseRangeQuery(query: unknown): DateRangeQuery {
  const parsed = rangeQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, { source: 'query' });
  }
  return parsed.data;
}

export interface SettlementDay {
  date: string;
  prices: PriceRow[];
  volumes: VolumeRow[];
  quality: QualitySummary;
}

/**
 * Cleaned rows for one settlement date. The upstream failure for the day is
 * passed on as it is.
 */
export async function loadSettlementDay(dataSource: SettlementDataSource, date: string): Promise<SettlementDay> {
  const records = await dataSource.fetchSystemPrices(date);
  if (records.length === 0) {
    throw new ApiError(`No data returned for ${date}`, 404, { context: { date } });
  }

  const { prices, volumes } = cleanAndProcess(records);
  return { date, prices, volumes, quality: summarize(prices, volumes) };
}

export interface AnalysisController {
  getSystemPrices(req: Request, res: Response, next: NextFunction): Promise<void>;
  getAnalysis(req: Request, res: Response, next: NextFunction): Promise<void>;
  getDashboard(req: Request, res: Response, next: NextFunction): Promise<void>;
}

export function createAnalysisController(dataSource: SettlementDataSource): AnalysisController {
  const analysis = new SettlementAnalysis(dataSource);

  return {
    /**
     * Cleaned price and volume rows for one settlement date
     */
    async getSystemPrices(req, res, next) {
      try {
        const date = parseDateParams(req.params);
        res.json(await loadSettlementDay(dataSource, date));
      } catch (error) {
        next(error);
      }
    },

    /**
     * Full analysis result for a date window
     */
    async getAnalysis(req, res, next) {
      try {
        const { start, end } = parseRangeQuery(req.query);
        const run = await analysis.runAnalysis(start, end);
        res.json(run.result);
      } catch (error) {
        next(error);
      }
    },

    /**
     * Dashboard HTML for a date window
     */
    async getDashboard(req, res, next) {
      try {
        const { start, end } = parseRangeQuery(req.query);
        const run = await analysis.runAnalysis(start, end);
        res.type('html').send(renderDashboardHtml(run));
      } catch (error) {
        next(error);
      }
    }
  };
}
