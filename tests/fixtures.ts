import type { RawPeriodRecord, VolumeRow, PriceRow } from '../server/models/settlement';

const HALF_HOUR_MS = 30 * 60 * 1000;

export function slot(date: string, index: number): string {
  return new Date(Date.parse(`${date}T00:00:00.000Z`) + index * HALF_HOUR_MS).toISOString();
}

/**
 * Complete half-hourly records starting at midnight UTC of the given date.
 * Sell price is 50 + i, buy price 60 + i, volume alternates +i / -i.
 */
export function buildRecords(date: string, count: number): RawPeriodRecord[] {
  return Array.from({ length: count }, (_, index) => ({
    timestamp: slot(date, index),
    settlementDate: date,
    settlementPeriod: (index % 48) + 1,
    systemSellPrice: 50 + index,
    systemBuyPrice: 60 + index,
    netImbalanceVolume: index % 2 === 0 ? index + 1 : -(index + 1)
  }));
}

export function volumeRow(timestamp: string, net: number | null): VolumeRow {
  return {
    timestamp,
    netImbalanceVolume: net,
    absImbalanceVolume: net === null ? null : Math.abs(net),
    isInterpolatedVolume: false,
    volumeQuality: net === null ? 'Missing' : 'Good'
  };
}

export function priceRow(timestamp: string, sell: number | null, buy: number | null): PriceRow {
  const spread = sell !== null && buy !== null ? buy - sell : null;
  return {
    timestamp,
    systemSellPrice: sell,
    systemBuyPrice: buy,
    priceSpread: spread,
    isInterpolatedSell: false,
    isInterpolatedBuy: false,
    priceQuality: sell === null || buy === null ? 'Missing' : spread !== null && spread < 0 ? 'Anomaly' : 'Good'
  };
}
