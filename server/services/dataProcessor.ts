/**
 * Settlement Data Processor
 *
 * Turns a batch of raw settlement-period records into two aligned series
 * (prices and volumes) on a complete half-hourly calendar. Short gaps are
 * filled by linear interpolation and every row carries a quality flag.
 */

import { DataProcessingError, extractErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { SETTLEMENT_PERIOD_MS, percentage, type NullableNumber } from '../utils/calculations';
import type {
  CleanedSeries,
  PriceQuality,
  PriceRow,
  QualitySummary,
  RawPeriodRecord,
  VolumeQuality,
  VolumeRow
} from '../models/settlement';

/** Longest run of consecutive missing slots that interpolation may fill */
export const MAX_INTERPOLATION_GAP = 2;

interface ParsedRecord {
  time: number;
  systemSellPrice: NullableNumber;
  systemBuyPrice: NullableNumber;
  netImbalanceVolume: NullableNumber;
}

/**
 * Coerce an upstream value to a finite number, or null
 */
export function coerceNumeric(value: unknown): NullableNumber {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
}

const DATE_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const ZONE_DESIGNATOR_PATTERN = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Date-times without an offset are UTC, whatever the process time zone
 */
export function toUtcTimestamp(value: string): string {
  const trimmed = value.trim();
  if (!DATE_TIME_PATTERN.test(trimmed) || ZONE_DESIGNATOR_PATTERN.test(trimmed)) {
    return trimmed;
  }
  return `${trimmed.replace(' ', 'T')}Z`;
}

function parseTimestamp(value: RawPeriodRecord['timestamp']): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const time = Date.parse(toUtcTimestamp(value));
    return Number.isNaN(time) ? null : time;
  }

  return null;
}

/**
 * Every 30-minute instant from first to last, inclusive
 */
export function buildCalendar(first: number, last: number): number[] {
  const calendar: number[] = [];
  for (let time = first; time <= last; time += SETTLEMENT_PERIOD_MS) {
    calendar.push(time);
  }
  return calendar;
}

/**
 * Linear interpolation restricted to interior gaps of at most maxGap slots.
 * Values are treated as equally spaced, which the calendar guarantees.
 */
export function interpolateGaps(values: NullableNumber[], maxGap = MAX_INTERPOLATION_GAP): NullableNumber[] {
  const filled = [...values];
  let index = 0;

  while (index < filled.length) {
    if (filled[index] !== null) {
      index++;
      continue;
    }

    const gapStart = index;
    while (index < filled.length && filled[index] === null) {
      index++;
    }
    const gapEnd = index; // exclusive
    const gapLength = gapEnd - gapStart;

    const left = gapStart > 0 ? filled[gapStart - 1] : null;
    const right = gapEnd < filled.length ? filled[gapEnd] : null;

    if (left === null || right === null || gapLength > maxGap) {
      continue;
    }

    const step = (right - left) / (gapLength + 1);
    for (let offset = 1; offset <= gapLength; offset++) {
      filled[gapStart + offset - 1] = left + step * offset;
    }
  }

  return filled;
}

export function classifyPrice(
  sell: NullableNumber,
  buy: NullableNumber,
  spread: NullableNumber,
  wasInterpolated: boolean
): PriceQuality {
  if (sell === null || buy === null) return 'Missing';
  if (wasInterpolated) return 'Interpolated';
  if (spread !== null && spread < 0) return 'Anomaly';
  return 'Good';
}

export function classifyVolume(volume: NullableNumber, wasInterpolated: boolean): VolumeQuality {
  if (volume === null) return 'Missing';
  if (wasInterpolated) return 'Interpolated';
  return 'Good';
}

function parseRecords(rawRecords: RawPeriodRecord[]): ParsedRecord[] {
  const parsed: ParsedRecord[] = [];

  for (const record of rawRecords) {
    const time = parseTimestamp(record.timestamp);
    if (time === null) continue;

    parsed.push({
      time,
      systemSellPrice: coerceNumeric(record.systemSellPrice),
      systemBuyPrice: coerceNumeric(record.systemBuyPrice),
      netImbalanceVolume: coerceNumeric(record.netImbalanceVolume)
    });
  }

  return parsed;
}

function buildSeries(rawRecords: RawPeriodRecord[]): CleanedSeries {
  const records = parseRecords(rawRecords);

  if (records.length === 0) {
    throw new DataProcessingError('No record carries a parseable timestamp', {
      context: { recordCount: rawRecords.length }
    });
  }

  if (records.length < rawRecords.length) {
    logger.warning(`Dropped ${rawRecords.length - records.length} records without a parseable timestamp`, {
      module: 'dataProcessor'
    });
  }

  records.sort((a, b) => a.time - b.time);

  const calendar = buildCalendar(records[0].time, records[records.length - 1].time);

  // Left join onto the calendar; the first record wins for a repeated slot
  const bySlot = new Map<number, ParsedRecord>();
  let duplicates = 0;
  for (const record of records) {
    if (bySlot.has(record.time)) {
      duplicates++;
      continue;
    }
    bySlot.set(record.time, record);
  }

  const aligned = calendar.map(time => bySlot.get(time));
  const matched = aligned.filter(record => record !== undefined).length;
  const offCalendar = bySlot.size - matched;

  if (duplicates > 0 || offCalendar > 0) {
    logger.warning('Some records could not be placed on the settlement calendar', {
      module: 'dataProcessor',
      context: { duplicates, offCalendar }
    });
  }

  const rawSell = aligned.map(record => record?.systemSellPrice ?? null);
  const rawBuy = aligned.map(record => record?.systemBuyPrice ?? null);
  const rawVolume = aligned.map(record => record?.netImbalanceVolume ?? null);

  const sell = interpolateGaps(rawSell);
  const buy = interpolateGaps(rawBuy);
  const volume = interpolateGaps(rawVolume);

  const prices: PriceRow[] = [];
  const volumes: VolumeRow[] = [];

  calendar.forEach((time, index) => {
    const timestamp = new Date(time).toISOString();
    const isInterpolatedSell = rawSell[index] === null;
    const isInterpolatedBuy = rawBuy[index] === null;
    const isInterpolatedVolume = rawVolume[index] === null;
    const sellPrice = sell[index];
    const buyPrice = buy[index];
    const spread = sellPrice !== null && buyPrice !== null ? buyPrice - sellPrice : null;
    const net = volume[index];

    prices.push({
      timestamp,
      systemSellPrice: sellPrice,
      systemBuyPrice: buyPrice,
      priceSpread: spread,
      isInterpolatedSell,
      isInterpolatedBuy,
      priceQuality: classifyPrice(sellPrice, buyPrice, spread, isInterpolatedSell || isInterpolatedBuy)
    });

    volumes.push({
      timestamp,
      netImbalanceVolume: net,
      absImbalanceVolume: net === null ? null : Math.abs(net),
      isInterpolatedVolume,
      volumeQuality: classifyVolume(net, isInterpolatedVolume)
    });
  });

  logger.debug(`Processed ${records.length} records onto ${calendar.length} calendar slots`, {
    module: 'dataProcessor'
  });

  return { prices, volumes };
}

/**
 * Clean and process raw settlement records.
 * Throws DataProcessingError; never returns a partial result.
 */
export function cleanAndProcess(rawRecords: RawPeriodRecord[]): CleanedSeries {
  if (!Array.isArray(rawRecords) || rawRecords.length === 0) {
    throw new DataProcessingError('Cannot process an empty batch of settlement records');
  }

  try {
    return buildSeries(rawRecords);
  } catch (error) {
    if (error instanceof DataProcessingError) {
      throw error;
    }
    throw new DataProcessingError(`Error processing data: ${extractErrorMessage(error)}`, {
      originalError: error instanceof Error ? error : undefined
    });
  }
}

/**
 * Count quality flags per series
 */
export function summarize(prices: PriceRow[], volumes: VolumeRow[]): QualitySummary {
  const priceTotal = prices.length;
  const priceMissing = prices.filter(row => row.priceQuality === 'Missing').length;
  const priceInterpolated = prices.filter(row => row.priceQuality === 'Interpolated').length;
  const anomalies = prices.filter(row => row.priceQuality === 'Anomaly').length;

  const volumeTotal = volumes.length;
  const volumeMissing = volumes.filter(row => row.volumeQuality === 'Missing').length;
  const volumeInterpolated = volumes.filter(row => row.volumeQuality === 'Interpolated').length;

  return {
    prices: {
      totalPeriods: priceTotal,
      missingPeriods: priceMissing,
      missingPeriodsPct: percentage(priceMissing, priceTotal),
      interpolatedPeriods: priceInterpolated,
      interpolatedPeriodsPct: percentage(priceInterpolated, priceTotal),
      anomalies,
      anomaliesPct: percentage(anomalies, priceTotal)
    },
    volumes: {
      totalPeriods: volumeTotal,
      missingPeriods: volumeMissing,
      missingPeriodsPct: percentage(volumeMissing, volumeTotal),
      interpolatedPeriods: volumeInterpolated,
      interpolatedPeriodsPct: percentage(volumeInterpolated, volumeTotal)
    }
  };
}
