/**
 * Dashboard Service
 *
 * Renders an analysis run as a standalone HTML page. Charts are drawn in the
 * browser by Plotly, loaded from its CDN; the figure is embedded as JSON.
 */

import { writeFile } from 'fs/promises';
import path from 'path';
import type { AnalysisRun, DataQuality } from '../models/analysis';
import type { VolumeRow } from '../models/settlement';
import { groupBy, mean, round, roundNullable, standardDeviation } from '../utils/calculations';
import { toUtcDateKey } from '../utils/dates';
import { formatPercentage } from '../utils/formatting';
import { logger } from '../utils/logger';

export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.35.2.min.js';

const ROWS = 4;
const COLS = 2;
const GAP = 0.06;

export const PANEL_TITLES = [
  'System Prices Over Time',
  'Imbalance Volumes',
  'Hourly Volume Statistics',
  'Volume Distribution',
  'Price-Volume Correlation',
  'Daily Statistics',
  'Data Quality Metrics',
  'Peak Hours Analysis'
] as const;

export type PlotlyTrace = Record<string, unknown>;

export interface DashboardFigure {
  data: PlotlyTrace[];
  layout: Record<string, unknown>;
}

interface PanelDomain {
  x: [number, number];
  y: [number, number];
}

/**
 * Domain of panel n (0-based), filled left to right, top to bottom
 */
function panelDomain(panel: number): PanelDomain {
  const row = Math.floor(panel / COLS);
  const col = panel % COLS;
  const width = (1 - GAP * (COLS - 1)) / COLS;
  const height = (1 - GAP * (ROWS - 1)) / ROWS;
  const x0 = col * (width + GAP);
  const y1 = 1 - row * (height + GAP);

  return {
    x: [round(x0, 4), round(x0 + width, 4)],
    y: [round(y1 - height, 4), round(y1, 4)]
  };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Split report lines of the form "label: value" into table rows
 */
export function reportToTableRows(report: string): Array<[string, string]> {
  const rows: Array<[string, string]> = [];

  for (const line of report.split('\n')) {
    const separator = line.indexOf(': ');
    if (separator === -1) continue;
    rows.push([line.slice(0, separator).trim(), line.slice(separator + 2).trim()]);
  }

  return rows;
}

export function qualityTableRows(quality: DataQuality): Array<[string, string]> {
  const { prices, volumes } = quality.summary;

  return [
    ['Price periods', String(prices.totalPeriods)],
    ['Price missing', formatPercentage(prices.missingPeriodsPct)],
    ['Price interpolated', formatPercentage(prices.interpolatedPeriodsPct)],
    ['Price anomalies', formatPercentage(prices.anomaliesPct)],
    ['Price missing cells', formatPercentage(quality.rates.prices.missingRate)],
    ['Volume periods', String(volumes.totalPeriods)],
    ['Volume missing', formatPercentage(volumes.missingPeriodsPct)],
    ['Volume interpolated', formatPercentage(volumes.interpolatedPeriodsPct)],
    ['Volume missing cells', formatPercentage(quality.rates.volumes.missingRate)],
    ['Zero volume', formatPercentage(quality.rates.volumes.zeroVolumeRate)]
  ];
}

function dailyVolumeStatistics(volumes: VolumeRow[]) {
  return [...groupBy(volumes, row => toUtcDateKey(row.timestamp)).entries()].map(([date, rows]) => {
    const net = rows.map(row => row.netImbalanceVolume);
    return {
      date,
      mean: roundNullable(mean(net)),
      std: roundNullable(standardDeviation(net))
    };
  });
}

function tableTrace(rows: Array<[string, string]>, domain: PanelDomain): PlotlyTrace {
  return {
    type: 'table',
    domain,
    header: { values: ['Metric', 'Value'], fill: { color: 'paleturquoise' }, align: 'left' },
    cells: {
      values: [rows.map(([metric]) => metric), rows.map(([, value]) => value)],
      fill: { color: 'lavender' },
      align: 'left'
    }
  };
}

/**
 * Plotly figure with the eight dashboard panels
 */
export function buildDashboardFigure(run: AnalysisRun): DashboardFigure {
  const { result, prices, volumes } = run;
  const timestamps = prices.map(row => row.timestamp);
  const daily = dailyVolumeStatistics(volumes);

  const layout: Record<string, unknown> = {
    title: { text: `Settlement Analysis Dashboard: ${result.startDate} to ${result.endDate}` },
    height: 1600,
    width: 1600,
    showlegend: true,
    annotations: PANEL_TITLES.map((title, panel) => {
      const domain = panelDomain(panel);
      return {
        text: title,
        showarrow: false,
        xref: 'paper',
        yref: 'paper',
        x: (domain.x[0] + domain.x[1]) / 2,
        y: domain.y[1],
        xanchor: 'center',
        yanchor: 'bottom',
        font: { size: 14 }
      };
    })
  };

  // The first six panels are charts with their own axis pair
  for (let panel = 0; panel < 6; panel++) {
    const suffix = panel === 0 ? '' : String(panel + 1);
    const domain = panelDomain(panel);
    layout[`xaxis${suffix}`] = { domain: domain.x, anchor: `y${suffix}` };
    layout[`yaxis${suffix}`] = { domain: domain.y, anchor: `x${suffix}` };
  }

  const data: PlotlyTrace[] = [
    {
      type: 'scatter',
      mode: 'lines',
      name: 'Buy Price',
      x: timestamps,
      y: prices.map(row => row.systemBuyPrice),
      line: { color: '#1f77b4' },
      xaxis: 'x',
      yaxis: 'y'
    },
    {
      type: 'scatter',
      mode: 'lines',
      name: 'Sell Price',
      x: timestamps,
      y: prices.map(row => row.systemSellPrice),
      line: { color: '#ff7f0e' },
      xaxis: 'x',
      yaxis: 'y'
    },
    {
      type: 'scatter',
      mode: 'lines',
      name: 'Net Imbalance Volume',
      x: volumes.map(row => row.timestamp),
      y: volumes.map(row => row.netImbalanceVolume),
      line: { color: '#2ca02c' },
      xaxis: 'x2',
      yaxis: 'y2'
    },
    {
      type: 'box',
      name: 'Hourly Volume Distribution',
      y: result.hourlyStats.map(stats => stats.absImbalanceVolume.sum),
      boxmean: true,
      xaxis: 'x3',
      yaxis: 'y3'
    },
    {
      type: 'histogram',
      name: 'Volume Distribution',
      x: volumes.map(row => row.netImbalanceVolume),
      nbinsx: 30,
      histnorm: 'probability',
      xaxis: 'x4',
      yaxis: 'y4'
    },
    {
      type: 'scatter',
      mode: 'markers',
      name: 'Price vs Volume',
      x: volumes.map(row => row.netImbalanceVolume),
      y: prices.map(row => row.systemBuyPrice),
      marker: {
        size: 8,
        color: prices.map(row => row.systemBuyPrice),
        colorscale: 'Viridis',
        showscale: true
      },
      xaxis: 'x5',
      yaxis: 'y5'
    },
    {
      type: 'bar',
      name: 'Daily Mean Volume',
      x: daily.map(day => day.date),
      y: daily.map(day => day.mean),
      error_y: { type: 'data', array: daily.map(day => day.std), visible: true },
      xaxis: 'x6',
      yaxis: 'y6'
    },
    tableTrace(qualityTableRows(result.dataQuality), panelDomain(6)),
    tableTrace(reportToTableRows(result.peakHoursReport), panelDomain(7))
  ];

  return { data, layout };
}

/**
 * JSON safe to place inside a <script> element
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function renderDashboardHtml(run: AnalysisRun): string {
  const figure = buildDashboardFigure(run);
  const title = escapeHtml(`Settlement Analysis ${run.result.startDate} to ${run.result.endDate}`);

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${title}</title>
<script src="${PLOTLY_CDN_URL}"></script>
</head>
<body>
<h1>${title}</h1>
<div id="dashboard"></div>
<pre id="imbalance-summary">${escapeHtml(run.result.imbalanceSummary)}</pre>
<script>
const figure = ${toScriptJson(figure)};
Plotly.newPlot('dashboard', figure.data, figure.layout);
</script>
</body>
</html>
`;
}

/**
 * Write the dashboard to a file and return its absolute path
 */
export async function saveDashboard(run: AnalysisRun, filename: string): Promise<string> {
  const target = path.resolve(filename);
  await writeFile(target, renderDashboardHtml(run), 'utf8');
  logger.info(`Dashboard saved to ${target}`, { module: 'dashboard' });
  return target;
}
