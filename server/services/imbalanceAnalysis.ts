/**
 * Imbalance Cost Analysis Service
 *
 * Daily imbalance costs and unit rates from aligned price and volume rows.
 * A long system (net >= 0) is settled at the sell price, a short one at the
 * buy price.
 */

import type { DailyImbalanceMetrics, PriceStatistics } from '../models/analysis';
import type { PriceRow, VolumeRow } from '../models/settlement';
import { groupBy, max, mean, min, round, roundNullable, sum, type NullableNumber } from '../utils/calculations';
import { daysBetween, toUtcDateKey } from '../utils/dates';
import { AnalysisError } from '../utils/errors';
import { REPORT_RULE, formatCurrency, formatNumber } from '../utils/formatting';

interface CostedPeriod {
  date: string;
  imbalanceCost: NullableNumber;
  netImbalanceVolume: NullableNumber;
  absImbalanceVolume: NullableNumber;
  systemSellPrice: NullableNumber;
  systemBuyPrice: NullableNumber;
}

export function periodImbalanceCost(net: NullableNumber, sell: NullableNumber, buy: NullableNumber): NullableNumber {
  if (net === null) return null;
  const price = net >= 0 ? sell : buy;
  return price === null ? null : net * price;
}

function priceStatistics(values: NullableNumber[]): PriceStatistics {
  return {
    mean: roundNullable(mean(values)),
    min: roundNullable(min(values)),
    max: roundNullable(max(values))
  };
}

/**
 * Per-date cost, volume and price statistics
 */
export function calculateDailyImbalanceMetrics(prices: PriceRow[], volumes: VolumeRow[]): DailyImbalanceMetrics[] {
  const volumeByTimestamp = new Map(volumes.map(row => [row.timestamp, row]));
  const periods: CostedPeriod[] = [];

  for (const price of prices) {
    const volume = volumeByTimestamp.get(price.timestamp);
    if (!volume) continue;

    periods.push({
      date: toUtcDateKey(price.timestamp),
      imbalanceCost: periodImbalanceCost(volume.netImbalanceVolume, price.systemSellPrice, price.systemBuyPrice),
      netImbalanceVolume: volume.netImbalanceVolume,
      absImbalanceVolume: volume.absImbalanceVolume,
      systemSellPrice: price.systemSellPrice,
      systemBuyPrice: price.systemBuyPrice
    });
  }

  if (periods.length === 0) {
    throw new AnalysisError('Error calculating imbalance metrics: no matching price and volume periods', {
      context: { prices: prices.length, volumes: volumes.length }
    });
  }

  return [...groupBy(periods, period => period.date).entries()].map(([date, rows]) => {
    const imbalanceCost = round(sum(rows.map(row => row.imbalanceCost)));
    const absImbalanceVolume = round(sum(rows.map(row => row.absImbalanceVolume)));

    return {
      date,
      imbalanceCost,
      netImbalanceVolume: round(sum(rows.map(row => row.netImbalanceVolume))),
      absImbalanceVolume,
      systemSellPrice: priceStatistics(rows.map(row => row.systemSellPrice)),
      systemBuyPrice: priceStatistics(rows.map(row => row.systemBuyPrice)),
      unitRate: absImbalanceVolume === 0 ? null : round(imbalanceCost / absImbalanceVolume)
    };
  });
}

/**
 * Formatted imbalance report for one date
 */
export function generateDailyReport(metrics: DailyImbalanceMetrics[], date: string): string {
  const day = metrics.find(entry => entry.date === date);

  if (!day) {
    throw new AnalysisError(`Error generating report: no imbalance metrics for ${date}`, {
      context: { date }
    });
  }

  const position = day.netImbalanceVolume > 0 ? 'LONG' : 'SHORT';
  const avgSell = day.systemSellPrice.mean;
  const avgBuy = day.systemBuyPrice.mean;
  const spread = avgSell !== null && avgBuy !== null ? avgBuy - avgSell : null;
  const unitRate = day.unitRate === null ? null : Math.abs(day.unitRate);

  return [
    `Daily Imbalance Report for ${date}`,
    REPORT_RULE,
    '',
    `Total Daily Position: ${position}`,
    `Net Imbalance Volume: ${formatNumber(day.netImbalanceVolume)} MWh`,
    `Total Imbalance Volume: ${formatNumber(day.absImbalanceVolume)} MWh`,
    '',
    `Total Imbalance Cost: ${formatCurrency(Math.abs(day.imbalanceCost))}`,
    `Average Unit Rate: ${formatCurrency(unitRate)}/MWh`,
    '',
    'Price Statistics:',
    '  System Sell Price (£/MWh):',
    `    Average: ${formatCurrency(day.systemSellPrice.mean)}`,
    `    Min: ${formatCurrency(day.systemSellPrice.min)}`,
    `    Max: ${formatCurrency(day.systemSellPrice.max)}`,
    '  System Buy Price (£/MWh):',
    `    Average: ${formatCurrency(day.systemBuyPrice.mean)}`,
    `    Min: ${formatCurrency(day.systemBuyPrice.min)}`,
    `    Max: ${formatCurrency(day.systemBuyPrice.max)}`,
    '',
    `Average Price Spread: ${formatCurrency(spread)}/MWh`
  ].join('\n');
}

/**
 * Summary across every date in the metrics
 */
export function generateMultiDaySummary(metrics: DailyImbalanceMetrics[]): string {
  if (metrics.length === 0) {
    throw new AnalysisError('Error generating summary: no daily metrics supplied');
  }

  const dates = metrics.map(entry => entry.date).sort();
  const startDate = dates[0];
  const endDate = dates[dates.length - 1];
  const numDays = daysBetween(startDate, endDate) + 1;

  const totalCost = sum(metrics.map(entry => entry.imbalanceCost));
  const totalVolume = sum(metrics.map(entry => entry.absImbalanceVolume));
  const avgUnitRate = totalVolume === 0 ? null : Math.abs(totalCost / totalVolume);

  return [
    'Imbalance Summary Report',
    REPORT_RULE,
    `Period: ${startDate} to ${endDate} (${numDays} days)`,
    '',
    'Total Statistics:',
    `  Total Imbalance Cost: ${formatCurrency(Math.abs(totalCost))}`,
    `  Total Imbalance Volume: ${formatNumber(totalVolume)} MWh`,
    `  Average Daily Cost: ${formatCurrency(Math.abs(totalCost / numDays))}`,
    `  Average Unit Rate: ${formatCurrency(avgUnitRate)}/MWh`,
    '',
    'Daily Averages:',
    `  System Sell Price: ${formatCurrency(mean(metrics.map(entry => entry.systemSellPrice.mean)))}/MWh`,
    `  System Buy Price: ${formatCurrency(mean(metrics.map(entry => entry.systemBuyPrice.mean)))}/MWh`,
    `  Imbalance Volume: ${formatNumber(mean(metrics.map(entry => entry.absImbalanceVolume)))} MWh`
  ].join('\n');
}
