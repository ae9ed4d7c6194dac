/**
 * Console rendering of a completed analysis
 */

import type { AnalysisResult, DataQuality } from '../models/analysis';
import { REPORT_RULE, formatPercentage } from './formatting';

function section(title: string): string[] {
  return ['', `${title}:`, REPORT_RULE];
}

export function formatQualityMetrics(quality: DataQuality): string[] {
  const { summary, rates } = quality;

  return [
    '',
    'Prices:',
    `  periods: ${summary.prices.totalPeriods}`,
    `  missing: ${formatPercentage(summary.prices.missingPeriodsPct)}`,
    `  interpolated: ${formatPercentage(summary.prices.interpolatedPeriodsPct)}`,
    `  anomalies: ${formatPercentage(summary.prices.anomaliesPct)}`,
    `  missing_rate: ${formatPercentage(rates.prices.missingRate)}`,
    `  anomaly_rate: ${formatPercentage(rates.prices.anomalyRate)}`,
    '',
    'Volumes:',
    `  periods: ${summary.volumes.totalPeriods}`,
    `  missing: ${formatPercentage(summary.volumes.missingPeriodsPct)}`,
    `  interpolated: ${formatPercentage(summary.volumes.interpolatedPeriodsPct)}`,
    `  missing_rate: ${formatPercentage(rates.volumes.missingRate)}`,
    `  zero_volume_rate: ${formatPercentage(rates.volumes.zeroVolumeRate)}`
  ];
}

/**
 * Peak hours, daily reports, imbalance reports and data quality as one block of text
 */
export function formatAnalysisResults(result: AnalysisResult): string {
  const lines: string[] = [...section('Peak Hours Analysis'), result.peakHoursReport];

  lines.push(...section('Daily Reports'));
  for (const [date, report] of Object.entries(result.dailyReports)) {
    lines.push('', `Report for ${date}:`, report);
  }

  lines.push(...section('Imbalance Reports'));
  for (const report of Object.values(result.imbalanceReports)) {
    lines.push('', report);
  }

  lines.push('', result.imbalanceSummary);

  lines.push(...section('Data Quality Metrics'), ...formatQualityMetrics(result.dataQuality));

  return lines.join('\n');
}
