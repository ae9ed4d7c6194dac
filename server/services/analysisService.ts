/**
 * Settlement Analysis Service
 *
 * Runs the whole analysis for a date window: fetch, clean, analyse volumes
 * and costs, and measure data quality.
 */

import type { AnalysisResult, AnalysisRun, QualityRates } from '../models/analysis';
import type { PriceRow, VolumeRow } from '../models/settlement';
import { percentage } from '../utils/calculations';
import { getDateRange, toUtcDateKey, validateDateRange } from '../utils/dates';
import { AnalysisError, AppError, extractErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { cleanAndProcess, summarize } from './dataProcessor';
import type { SettlementDataSource } from './elexon';
import { calculateDailyImbalanceMetrics, generateDailyReport, generateMultiDaySummary } from './imbalanceAnalysis';
import { analyseHourlyVolumes, generateDailyPeakReport } from './volumeAnalysis';

/**
 * Cell-level missing rates and row-level anomaly rates, in percent
 */
export function calculateQualityRates(prices: PriceRow[], volumes: VolumeRow[]): QualityRates {
  const priceCells = prices.flatMap(row => [row.systemSellPrice, row.systemBuyPrice, row.priceSpread]);
  const volumeCells = volumes.flatMap(row => [row.netImbalanceVolume, row.absImbalanceVolume]);

  return {
    prices: {
      missingRate: percentage(priceCells.filter(value => value === null).length, priceCells.length),
      anomalyRate: percentage(
        prices.filter(row => row.priceSpread !== null && row.priceSpread < 0).length,
        prices.length
      )
    },
    volumes: {
      missingRate: percentage(volumeCells.filter(value => value === null).length, volumeCells.length),
      zeroVolumeRate: percentage(volumes.filter(row => row.absImbalanceVolume === 0).length, volumes.length)
    }
  };
}

export class SettlementAnalysis {
  constructor(private readonly dataSource: SettlementDataSource) {}

  /**
   * Analyse every settlement period between two dates (inclusive, YYYY-MM-DD)
   */
  async runAnalysis(startDate: string, endDate: string): Promise<AnalysisRun> {
    validateDateRange(startDate, endDate);

    logger.info(`Starting analysis for period ${startDate} to ${endDate}`, { module: 'analysis' });

    try {
      const rawRecords = await this.dataSource.fetchSystemPricesForRange(startDate, endDate);
      const { prices, volumes } = cleanAndProcess(rawRecords);

      const volumeAnalysis = analyseHourlyVolumes(volumes);

      const datesWithData = new Set(volumes.map(row => toUtcDateKey(row.timestamp)));
      const reportDates = getDateRange(startDate, endDate).filter(date => datesWithData.has(date));

      const dailyReports: Record<string, string> = {};
      for (const date of reportDates) {
        dailyReports[date] = generateDailyPeakReport(volumes, date);
      }

      const dailyMetrics = calculateDailyImbalanceMetrics(prices, volumes);
      const imbalanceReports: Record<string, string> = {};
      for (const { date } of dailyMetrics) {
        imbalanceReports[date] = generateDailyReport(dailyMetrics, date);
      }

      const result: AnalysisResult = {
        startDate,
        endDate,
        hourlyStats: volumeAnalysis.hourlyStats,
        peakHoursReport: volumeAnalysis.report,
        dailyReports,
        dailyMetrics,
        imbalanceReports,
        imbalanceSummary: generateMultiDaySummary(dailyMetrics),
        dataQuality: {
          summary: summarize(prices, volumes),
          rates: calculateQualityRates(prices, volumes)
        }
      };

      logger.info(`Analysis completed: ${prices.length} periods over ${reportDates.length} days`, {
        module: 'analysis',
        context: { startDate, endDate }
      });

      return { result, prices, volumes };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new AnalysisError(`Analysis failed: ${extractErrorMessage(error)}`, {
        context: { startDate, endDate },
        originalError: error instanceof Error ? error : undefined
      });
    }
  }
}
