/**
 * Analysis Result Models
 *
 * Aggregates derived from the cleaned settlement series. Every statistic is
 * rounded to 2 decimal places; null means no value was available.
 */

import type { PriceRow, QualitySummary, VolumeRow } from './settlement';

export interface VolumeAggregate {
  mean: number | null;
  sum: number;
  std: number | null;
  min: number | null;
  max: number | null;
}

/**
 * Statistics for one UTC hour of the day (0-23)
 */
export interface HourlyVolumeStats {
  hour: number;
  absImbalanceVolume: VolumeAggregate;
  netImbalanceVolume: {
    mean: number | null;
    sum: number;
  };
}

export interface HourVolume {
  hour: number;
  volume: number;
}

export interface DailyHourVolume {
  /** UTC date, YYYY-MM-DD */
  date: string;
  hour: number;
  volume: number;
}

export interface HourFrequency {
  hour: number;
  count: number;
}

export interface PeakHours {
  /** Total absolute volume per hour, largest first */
  overallPeakHours: HourVolume[];
  /** Total absolute volume per (date, hour), largest first */
  dailyPeaks: DailyHourVolume[];
  /** How often each hour is among its day's three largest, most frequent first */
  top3Frequency: HourFrequency[];
}

export interface HourlyVolumeAnalysis {
  hourlyStats: HourlyVolumeStats[];
  peakHours: PeakHours;
  report: string;
}

export interface PriceStatistics {
  mean: number | null;
  min: number | null;
  max: number | null;
}

export interface DailyImbalanceMetrics {
  /** UTC date, YYYY-MM-DD */
  date: string;
  /** £; positive when the system was paid overall */
  imbalanceCost: number;
  netImbalanceVolume: number;
  absImbalanceVolume: number;
  systemSellPrice: PriceStatistics;
  systemBuyPrice: PriceStatistics;
  /** £/MWh; null when no volume was imbalanced */
  unitRate: number | null;
}

export interface QualityRates {
  prices: {
    missingRate: number;
    anomalyRate: number;
  };
  volumes: {
    missingRate: number;
    zeroVolumeRate: number;
  };
}

export interface DataQuality {
  summary: QualitySummary;
  rates: QualityRates;
}

export interface AnalysisResult {
  startDate: string;
  endDate: string;
  hourlyStats: HourlyVolumeStats[];
  peakHoursReport: string;
  /** Daily peak-hours report per date with data */
  dailyReports: Record<string, string>;
  dailyMetrics: DailyImbalanceMetrics[];
  /** Daily imbalance cost report per date with data */
  imbalanceReports: Record<string, string>;
  imbalanceSummary: string;
  dataQuality: DataQuality;
}

/**
 * A completed analysis together with the series it was computed from
 */
export interface AnalysisRun {
  result: AnalysisResult;
  prices: PriceRow[];
  volumes: VolumeRow[];
}
