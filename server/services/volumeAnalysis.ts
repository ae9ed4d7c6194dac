/**
 * Volume Analysis Service
 *
 * Hourly statistics and peak-hour detection over net imbalance volumes.
 * Hours and days are taken in UTC.
 */

import type {
  DailyHourVolume,
  HourFrequency,
  HourVolume,
  HourlyVolumeAnalysis,
  HourlyVolumeStats,
  PeakHours
} from '../models/analysis';
import type { VolumeRow } from '../models/settlement';
import {
  argExtreme,
  groupBy,
  max,
  mean,
  min,
  round,
  roundNullable,
  sortDescending,
  standardDeviation,
  sum
} from '../utils/calculations';
import { toUtcDateKey, toUtcHour } from '../utils/dates';
import { AnalysisError } from '../utils/errors';
import { REPORT_RULE, formatHourRange, formatNumber } from '../utils/formatting';

const TOP_N = 3;

function hourlyStatistics(volumes: VolumeRow[]): HourlyVolumeStats[] {
  const byHour = groupBy(volumes, row => toUtcHour(row.timestamp));

  return [...byHour.entries()].map(([hour, rows]) => {
    const abs = rows.map(row => row.absImbalanceVolume);
    const net = rows.map(row => row.netImbalanceVolume);

    return {
      hour,
      absImbalanceVolume: {
        mean: roundNullable(mean(abs)),
        sum: round(sum(abs)),
        std: roundNullable(standardDeviation(abs)),
        min: roundNullable(min(abs)),
        max: roundNullable(max(abs))
      },
      netImbalanceVolume: {
        mean: roundNullable(mean(net)),
        sum: round(sum(net))
      }
    };
  });
}

/**
 * Rank hours by total absolute volume, overall and per day
 */
export function identifyPeakHours(volumes: VolumeRow[]): PeakHours {
  const byHour = groupBy(volumes, row => toUtcHour(row.timestamp));
  const overallPeakHours: HourVolume[] = sortDescending(
    [...byHour.entries()].map(([hour, rows]) => ({
      hour,
      volume: sum(rows.map(row => row.absImbalanceVolume))
    })),
    entry => entry.volume
  );

  const byDateHour = groupBy(
    volumes,
    row => `${toUtcDateKey(row.timestamp)}T${String(toUtcHour(row.timestamp)).padStart(2, '0')}`
  );
  const dailyPeaks: DailyHourVolume[] = sortDescending(
    [...byDateHour.values()].map(rows => ({
      date: toUtcDateKey(rows[0].timestamp),
      hour: toUtcHour(rows[0].timestamp),
      volume: sum(rows.map(row => row.absImbalanceVolume))
    })),
    entry => entry.volume
  );

  // dailyPeaks is already ordered, so each day's first three entries are its largest
  const taken = new Map<string, number>();
  const counts = new Map<number, number>();
  for (const peak of dailyPeaks) {
    const used = taken.get(peak.date) ?? 0;
    if (used >= TOP_N) continue;
    taken.set(peak.date, used + 1);
    counts.set(peak.hour, (counts.get(peak.hour) ?? 0) + 1);
  }

  const top3Frequency: HourFrequency[] = sortDescending(
    [...counts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([hour, count]) => ({ hour, count })),
    entry => entry.count
  );

  return { overallPeakHours, dailyPeaks, top3Frequency };
}

function generatePeakHoursReport(peakHours: PeakHours, hourlyStats: HourlyVolumeStats[]): string {
  const statsByHour = new Map(hourlyStats.map(stats => [stats.hour, stats]));
  const highest = peakHours.dailyPeaks[0];

  const lines = [
    'Imbalance Volume Peak Hours Analysis',
    REPORT_RULE,
    '',
    'Top 3 Hours by Total Volume:'
  ];

  for (const { hour, volume } of peakHours.overallPeakHours.slice(0, TOP_N)) {
    lines.push(`  ${formatHourRange(hour)}: ${formatNumber(volume)} MWh`);
  }

  lines.push('', 'Most Frequent Peak Hours:');
  for (const { hour, count } of peakHours.top3Frequency.slice(0, TOP_N)) {
    const average = statsByHour.get(hour)?.absImbalanceVolume.mean ?? null;
    lines.push(
      `  ${formatHourRange(hour)}: ${count} day${count === 1 ? '' : 's'}, Avg Volume: ${formatNumber(average)} MWh`
    );
  }

  const stdByHour = hourlyStats.map((stats): [number, number | null] => [stats.hour, stats.absImbalanceVolume.std]);
  const netByHour = hourlyStats.map((stats): [number, number | null] => [stats.hour, stats.netImbalanceVolume.mean]);

  lines.push(
    '',
    'Highest Single Hour:',
    `  Date: ${highest.date}`,
    `  Time: ${formatHourRange(highest.hour)}`,
    `  Volume: ${formatNumber(highest.volume)} MWh`,
    '',
    'Hourly Pattern Analysis:',
    `  Most Volatile Hour: ${formatHourRange(argExtreme(stdByHour, 'max'))}`,
    `  Most Consistent Hour: ${formatHourRange(argExtreme(stdByHour, 'min'))}`,
    `  Largest Average Net Short: ${formatHourRange(argExtreme(netByHour, 'min'))}`,
    `  Largest Average Net Long: ${formatHourRange(argExtreme(netByHour, 'max'))}`
  );

  return lines.join('\n');
}

/**
 * Hourly statistics, peak hours and the peak-hours report
 */
export function analyseHourlyVolumes(volumes: VolumeRow[]): HourlyVolumeAnalysis {
  if (volumes.length === 0) {
    throw new AnalysisError('Error analysing hourly volumes: no volume data supplied');
  }

  const hourlyStats = hourlyStatistics(volumes);
  const peakHours = identifyPeakHours(volumes);
  const report = generatePeakHoursReport(peakHours, hourlyStats);

  return { hourlyStats, peakHours, report };
}

/**
 * Peak hours report for a single UTC date
 */
export function generateDailyPeakReport(volumes: VolumeRow[], date: string): string {
  const rows = volumes.filter(row => toUtcDateKey(row.timestamp) === date);

  if (rows.length === 0) {
    throw new AnalysisError(`Error generating daily peak report: no volume data for ${date}`, {
      context: { date }
    });
  }

  const hourly = [...groupBy(rows, row => toUtcHour(row.timestamp)).entries()].map(([hour, hourRows]) => {
    const abs = hourRows.map(row => row.absImbalanceVolume);
    return {
      hour,
      total: round(sum(abs)),
      average: roundNullable(mean(abs)),
      net: round(sum(hourRows.map(row => row.netImbalanceVolume)))
    };
  });

  let report = `Daily Peak Hours Report for ${date}\n${REPORT_RULE}\n\nTop 3 Hours by Volume:\n`;

  for (const entry of sortDescending(hourly, item => item.total).slice(0, TOP_N)) {
    const position = entry.net > 0 ? 'LONG' : 'SHORT';
    report +=
      `  ${formatHourRange(entry.hour)}\n` +
      `    Total Volume: ${formatNumber(entry.total)} MWh\n` +
      `    Net Position: ${position} (${formatNumber(Math.abs(entry.net))} MWh)\n` +
      `    Average Volume: ${formatNumber(entry.average)} MWh\n`;
  }

  return report;
}
