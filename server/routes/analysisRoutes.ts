/**
 * Settlement Analysis Routes
 */

import express from 'express';
import type { AnalysisController } from '../controllers/analysisController';

export function createAnalysisRoutes(controller: AnalysisController): express.Router {
  const router = express.Router();

  /**
   * Cleaned system prices and imbalance volumes for one settlement date
   *
   * @route GET /api/system-prices/:date
   * @param {string} date.path.required - Settlement date in YYYY-MM-DD format
   */
  router.get('/system-prices/:date', controller.getSystemPrices);

  /**
   * Peak hours, imbalance costs and data quality for a date window
   *
   * @route GET /api/analysis
   * @param {string} start.query.required - First date, YYYY-MM-DD
   * @param {string} end.query.required - Last date, YYYY-MM-DD (at most 31 days after start)
   */
  router.get('/analysis', controller.getAnalysis);

  /**
   * Interactive dashboard for a date window
   *
   * @route GET /api/dashboard
   * @param {string} start.query.required - First date, YYYY-MM-DD
   * @param {string} end.query.required - Last date, YYYY-MM-DD
   */
  router.get('/dashboard', controller.getDashboard);

  return router;
}
