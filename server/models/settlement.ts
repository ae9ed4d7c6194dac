/**
 * Settlement Data Models
 *
 * Raw per-period records as delivered by the system-prices feed, and the
 * cleaned, quality-flagged rows the pipeline derives from them.
 */

/**
 * A numeric field as it may arrive from upstream, before coercion
 */
export type RawNumeric = number | string | null | undefined;

/**
 * One settlement period as produced by the fetcher
 */
export interface RawPeriodRecord {
  /** UTC start of the period, ISO 8601 (e.g. "2024-03-01T00:00:00Z") */
  timestamp: string | Date | null | undefined;

  /** Settlement period index, 1-48 (up to 50 on a clock-change day) */
  settlementPeriod?: number | null;

  /** Settlement date in YYYY-MM-DD format */
  settlementDate?: string;

  /** System sell price in £/MWh */
  systemSellPrice?: RawNumeric;

  /** System buy price in £/MWh */
  systemBuyPrice?: RawNumeric;

  /** Net imbalance volume in MWh; positive means the system was long */
  netImbalanceVolume?: RawNumeric;
}

export type PriceQuality = 'Good' | 'Missing' | 'Interpolated' | 'Anomaly';

export type VolumeQuality = 'Good' | 'Missing' | 'Interpolated';

export interface PriceRow {
  /** Calendar slot, ISO 8601 UTC */
  timestamp: string;
  systemSellPrice: number | null;
  systemBuyPrice: number | null;
  /** systemBuyPrice - systemSellPrice */
  priceSpread: number | null;
  /** Sell price was missing before gap filling */
  isInterpolatedSell: boolean;
  /** Buy price was missing before gap filling */
  isInterpolatedBuy: boolean;
  priceQuality: PriceQuality;
}

export interface VolumeRow {
  timestamp: string;
  netImbalanceVolume: number | null;
  absImbalanceVolume: number | null;
  /** Volume was missing before gap filling */
  isInterpolatedVolume: boolean;
  volumeQuality: VolumeQuality;
}

/**
 * Output of the cleaning pipeline. Both series share one calendar.
 */
export interface CleanedSeries {
  prices: PriceRow[];
  volumes: VolumeRow[];
}

export interface SeriesQuality {
  totalPeriods: number;
  missingPeriods: number;
  missingPeriodsPct: number;
  interpolatedPeriods: number;
  interpolatedPeriodsPct: number;
}

export interface PriceSeriesQuality extends SeriesQuality {
  anomalies: number;
  anomaliesPct: number;
}

export interface QualitySummary {
  prices: PriceSeriesQuality;
  volumes: SeriesQuality;
}
