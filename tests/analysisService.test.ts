import type { RawPeriodRecord } from '../server/models/settlement';
import { SettlementAnalysis, calculateQualityRates } from '../server/services/analysisService';
import type { SettlementDataSource } from '../server/services/elexon';
import { AnalysisError, ApiError, ValidationError } from '../server/utils/errors';
import { buildRecords, priceRow, slot, volumeRow } from './fixtures';

class FakeDataSource implements SettlementDataSource {
  calls: Array<[string, string]> = [];

  constructor(private readonly respond: () => Promise<RawPeriodRecord[]>) {}

  async fetchSystemPrices(date: string): Promise<RawPeriodRecord[]> {
    return this.fetchSystemPricesForRange(date, date);
  }

  async fetchSystemPricesForRange(startDate: string, endDate: string): Promise<RawPeriodRecord[]> {
    this.calls.push([startDate, endDate]);
    return this.respond();
  }
}

describe('SettlementAnalysis.runAnalysis', () => {
  test('analyses every day of the window', async () => {
    const source = new FakeDataSource(async () => buildRecords('2024-03-01', 96));
    const analysis = new SettlementAnalysis(source);

    const { result, prices, volumes } = await analysis.runAnalysis('2024-03-01', '2024-03-02');

    expect(source.calls).toEqual([['2024-03-01', '2024-03-02']]);
    expect(prices).toHaveLength(96);
    expect(volumes).toHaveLength(96);
    expect(result.startDate).toBe('2024-03-01');
    expect(result.endDate).toBe('2024-03-02');
    expect(result.hourlyStats).toHaveLength(24);
    expect(Object.keys(result.dailyReports)).toEqual(['2024-03-01', '2024-03-02']);
    expect(Object.keys(result.imbalanceReports)).toEqual(['2024-03-01', '2024-03-02']);
    expect(result.dailyMetrics.map(day => day.date)).toEqual(['2024-03-01', '2024-03-02']);
    expect(result.peakHoursReport.split('\n')[0]).toBe('Imbalance Volume Peak Hours Analysis');
    expect(result.imbalanceSummary.split('\n')[2]).toBe('Period: 2024-03-01 to 2024-03-02 (2 days)');
    expect(result.dataQuality.summary.prices).toMatchObject({
      totalPeriods: 96,
      missingPeriods: 0,
      interpolatedPeriods: 0,
      anomalies: 0
    });
    expect(result.dataQuality.rates.prices.missingRate).toBe(0);
  });

  test('only reports days that have data', async () => {
    const source = new FakeDataSource(async () => buildRecords('2024-03-02', 48));

    const { result } = await new SettlementAnalysis(source).runAnalysis('2024-03-01', '2024-03-03');

    expect(Object.keys(result.dailyReports)).toEqual(['2024-03-02']);
  });

  test('validates the window before fetching', async () => {
    const source = new FakeDataSource(async () => buildRecords('2024-03-01', 4));
    const analysis = new SettlementAnalysis(source);

    await expect(analysis.runAnalysis('2024-03-05', '2024-03-01')).rejects.toThrow(ValidationError);
    await expect(analysis.runAnalysis('2024-01-01', '2024-02-15')).rejects.toThrow('Date range cannot exceed 31 days');
    await expect(analysis.runAnalysis('2024-3-1', '2024-03-02')).rejects.toThrow(ValidationError);
    expect(source.calls).toHaveLength(0);
  });

  test('passes application errors through', async () => {
    const failure = new ApiError('No data retrieved for the specified date range', 502);
    const source = new FakeDataSource(async () => {
      throw failure;
    });

    await expect(new SettlementAnalysis(source).runAnalysis('2024-03-01', '2024-03-01')).rejects.toBe(failure);
  });

  test('wraps unexpected errors in an AnalysisError', async () => {
    const source = new FakeDataSource(async () => {
      throw new Error('socket closed');
    });

    const error = await new SettlementAnalysis(source).runAnalysis('2024-03-01', '2024-03-01').catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(AnalysisError);
    expect(error).toMatchObject({ message: 'Analysis failed: socket closed' });
  });
});

describe('calculateQualityRates', () => {
  test('counts missing cells, anomalies and zero volumes', () => {
    const prices = [
      priceRow(slot('2024-03-01', 0), null, 60),
      priceRow(slot('2024-03-01', 1), 65, 60),
      priceRow(slot('2024-03-01', 2), 50, 60),
      priceRow(slot('2024-03-01', 3), 50, 60)
    ];
    const volumes = [
      volumeRow(slot('2024-03-01', 0), null),
      volumeRow(slot('2024-03-01', 1), 0),
      volumeRow(slot('2024-03-01', 2), 10),
      volumeRow(slot('2024-03-01', 3), -10)
    ];

    expect(calculateQualityRates(prices, volumes)).toEqual({
      prices: { missingRate: (2 / 12) * 100, anomalyRate: 25 },
      volumes: { missingRate: 25, zeroVolumeRate: 25 }
    });
  });

  test('is zero for empty series', () => {
    expect(calculateQualityRates([], [])).toEqual({
      prices: { missingRate: 0, anomalyRate: 0 },
      volumes: { missingRate: 0, zeroVolumeRate: 0 }
    });
  });
});
