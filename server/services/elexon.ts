/**
 * Elexon BMRS system-prices client
 *
 * Fetches system sell/buy prices and net imbalance volumes per settlement
 * period and hands them on as RawPeriodRecords. Cleaning is not done here.
 */

import axios, { type AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import { DEFAULT_ELEXON_BASE_URL } from '../config';
import type { RawPeriodRecord } from '../models/settlement';
import { systemPriceRecordSchema, systemPricesResponseSchema, type ElexonSystemPriceRecord } from '../types/elexon';
import { getDateRange, isValidDateString } from '../utils/dates';
import { ApiError, NetworkError, ValidationError, extractErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Anything able to supply raw settlement records for a date range
 */
export interface SettlementDataSource {
  /** One settlement date; failures propagate */
  fetchSystemPrices(date: string): Promise<RawPeriodRecord[]>;
  /** An inclusive range; days that fail are skipped */
  fetchSystemPricesForRange(startDate: string, endDate: string): Promise<RawPeriodRecord[]>;
}

export interface ElexonClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  concurrency?: number;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
}

export async function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function toRawRecord(record: ElexonSystemPriceRecord): RawPeriodRecord {
  return {
    timestamp: record.startTime,
    settlementDate: record.settlementDate,
    settlementPeriod: record.settlementPeriod,
    systemSellPrice: record.systemSellPrice,
    systemBuyPrice: record.systemBuyPrice,
    netImbalanceVolume: record.netImbalanceVolume
  };
}

export class ElexonClient implements SettlementDataSource {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly concurrency: number;
  private readonly http: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ElexonClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_ELEXON_BASE_URL).replace(/\/+$/, '');
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5000;
    this.concurrency = options.concurrency ?? 4;
    this.sleep = options.sleep ?? delay;
    this.http = options.http ?? axios.create({
      timeout: options.timeoutMs ?? 30000,
      headers: { Accept: 'application/json' }
    });
  }

  /**
   * Fetch system prices for one settlement date (YYYY-MM-DD)
   */
  async fetchSystemPrices(date: string): Promise<RawPeriodRecord[]> {
    if (!isValidDateString(date)) {
      throw new ValidationError(`Invalid date format: '${date}'. Expected format: YYYY-MM-DD`);
    }

    const url = `${this.baseUrl}/balancing/settlement/system-prices/${date}`;
    logger.info(`Fetching system prices data for ${date}`, { module: 'elexon' });

    const body = await this.request(url, date);
    const envelope = systemPricesResponseSchema.safeParse(body);

    if (!envelope.success) {
      throw new ApiError(`No data returned for ${date}`, 502, {
        context: { date, url }
      });
    }

    const records: ElexonSystemPriceRecord[] = [];
    let rejected = 0;
    for (const item of envelope.data.data) {
      const parsed = systemPriceRecordSchema.safeParse(item);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        rejected++;
      }
    }

    if (rejected > 0) {
      logger.warning(`Skipped ${rejected} malformed system price records for ${date}`, {
        module: 'elexon',
        context: { date, rejected }
      });
    }

    records.sort((a, b) =>
      a.settlementDate.localeCompare(b.settlementDate) || a.settlementPeriod - b.settlementPeriod
    );

    logger.info(`Successfully retrieved ${records.length} periods for ${date}`, { module: 'elexon' });

    return records.map(toRawRecord);
  }

  /**
   * Fetch every day of an inclusive range. Days that fail are skipped;
   * the range fails only when no day returns data.
   */
  async fetchSystemPricesForRange(startDate: string, endDate: string): Promise<RawPeriodRecord[]> {
    const dates = getDateRange(startDate, endDate);
    const limit = pLimit(this.concurrency);

    const perDay = await Promise.all(
      dates.map(date =>
        limit(async () => {
          try {
            return await this.fetchSystemPrices(date);
          } catch (error) {
            logger.warning(`Failed to fetch data for ${date}: ${extractErrorMessage(error)}`, {
              module: 'elexon',
              context: { date }
            });
            return [];
          }
        })
      )
    );

    const records = perDay.flat();
    if (records.length === 0) {
      throw new ApiError('No data retrieved for the specified date range', 502, {
        context: { startDate, endDate }
      });
    }

    const daysWithData = perDay.filter(day => day.length > 0).length;
    logger.info(`Successfully retrieved data for ${daysWithData} of ${dates.length} days`, {
      module: 'elexon',
      context: { startDate, endDate, records: records.length }
    });

    return records.sort((a, b) => Date.parse(String(a.timestamp)) - Date.parse(String(b.timestamp)));
  }

  private async request(url: string, date: string, attempt = 0): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(url, { params: { format: 'json' } });
      return response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const retryable = status === 429 || (status !== undefined && status >= 500);

      if (retryable && attempt < this.maxRetries) {
        const waitMs = this.retryDelayMs * Math.pow(2, attempt);
        logger.warning(`[${date}] HTTP ${status}, retrying after ${waitMs}ms (${attempt + 1}/${this.maxRetries})`, {
          module: 'elexon'
        });
        await this.sleep(waitMs);
        return this.request(url, date, attempt + 1);
      }

      const cause = error instanceof Error ? error : new Error(String(error));
      throw NetworkError.fromFetchError(cause, url, status, { date, attempts: attempt + 1 });
    }
  }
}
