import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { AnalysisRun } from '../server/models/analysis';
import { SettlementAnalysis } from '../server/services/analysisService';
import {
  PLOTLY_CDN_URL,
  buildDashboardFigure,
  escapeHtml,
  renderDashboardHtml,
  reportToTableRows,
  saveDashboard,
  toScriptJson
} from '../server/services/dashboardService';
import { buildRecords } from './fixtures';

async function sampleRun(): Promise<AnalysisRun> {
  const analysis = new SettlementAnalysis({
    fetchSystemPrices: async () => buildRecords('2024-03-01', 48),
    fetchSystemPricesForRange: async () => buildRecords('2024-03-01', 48)
  });
  return analysis.runAnalysis('2024-03-01', '2024-03-01');
}

describe('escapeHtml', () => {
  test('escapes markup characters', () => {
    expect(escapeHtml(`<b>"x" & 'y'</b>`)).toBe('&lt;b&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/b&gt;');
  });
});

describe('toScriptJson', () => {
  test('cannot close the surrounding script element', () => {
    expect(toScriptJson({ text: '</script>' })).toBe('{"text":"\\u003c/script>"}');
  });
});

describe('reportToTableRows', () => {
  test('keeps only label: value lines', () => {
    expect(reportToTableRows('Highest Single Hour:\n  Date: 2024-03-01\n  Time: 01:00-02:00')).toEqual([
      ['Date', '2024-03-01'],
      ['Time', '01:00-02:00']
    ]);
  });
});

describe('buildDashboardFigure', () => {
  test('draws eight panels', async () => {
    const figure = buildDashboardFigure(await sampleRun());

    expect(figure.data.map(trace => trace.type)).toEqual([
      'scatter',
      'scatter',
      'scatter',
      'box',
      'histogram',
      'scatter',
      'bar',
      'table',
      'table'
    ]);
    expect(figure.data[0].x).toHaveLength(48);
    expect(figure.layout.xaxis6).toBeDefined();
    expect(figure.layout.annotations).toHaveLength(8);
  });
});

describe('renderDashboardHtml', () => {
  test('loads Plotly from the CDN and embeds the figure', async () => {
    const html = renderDashboardHtml(await sampleRun());

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain(`<script src="${PLOTLY_CDN_URL}"></script>`);
    expect(html).toContain('<title>Settlement Analysis 2024-03-01 to 2024-03-01</title>');
    expect(html).toContain("Plotly.newPlot('dashboard', figure.data, figure.layout);");
    expect(html.split('</script>')).toHaveLength(3);
  });
});

describe('saveDashboard', () => {
  test('writes the page to disk', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'dashboard-'));
    try {
      const run = await sampleRun();
      const target = await saveDashboard(run, path.join(dir, 'out.html'));

      expect(target).toBe(path.join(dir, 'out.html'));
      expect(await readFile(target, 'utf8')).toBe(renderDashboardHtml(run));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
