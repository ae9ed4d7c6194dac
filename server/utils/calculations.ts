/**
 * Utility functions for the calculations used throughout the application
 *
 * Aggregates take (number | null)[] and skip nulls, so a missing settlement
 * period never drags a mean or a sum.
 */

export const SETTLEMENT_PERIOD_MS = 30 * 60 * 1000;

// The long clock-change day in October runs to 50 periods
export const MAX_SETTLEMENT_PERIODS = 50;

export type NullableNumber = number | null;

/**
 * Check a settlement period is an integer between 1 and 50
 */
export function isValidSettlementPeriod(period: number): boolean {
  return Number.isInteger(period) && period >= 1 && period <= MAX_SETTLEMENT_PERIODS;
}

function present(values: NullableNumber[]): number[] {
  return values.filter((value): value is number => value !== null && Number.isFinite(value));
}

/**
 * Sum of present values; 0 when there are none
 */
export function sum(values: NullableNumber[]): number {
  return present(values).reduce((total, value) => total + value, 0);
}

export function mean(values: NullableNumber[]): NullableNumber {
  const valid = present(values);
  if (valid.length === 0) return null;
  return sum(valid) / valid.length;
}

/**
 * Sample standard deviation (n - 1); null below two values
 */
export function standardDeviation(values: NullableNumber[]): NullableNumber {
  const valid = present(values);
  if (valid.length < 2) return null;

  const avg = sum(valid) / valid.length;
  const squares = valid.reduce((total, value) => total + (value - avg) ** 2, 0);
  return Math.sqrt(squares / (valid.length - 1));
}

export function min(values: NullableNumber[]): NullableNumber {
  const valid = present(values);
  return valid.length === 0 ? null : Math.min(...valid);
}

export function max(values: NullableNumber[]): NullableNumber {
  const valid = present(values);
  return valid.length === 0 ? null : Math.max(...valid);
}

/**
 * Round half away from zero to a number of decimal places
 */
export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  const rounded = Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
  // Avoid -0 leaking into reports
  return rounded === 0 ? 0 : rounded;
}

export function roundNullable(value: NullableNumber, decimals = 2): NullableNumber {
  return value === null ? null : round(value, decimals);
}

/**
 * Percentage of part in total; 0 for an empty total
 */
export function percentage(part: number, total: number): number {
  return total === 0 ? 0 : (part / total) * 100;
}

/**
 * Group items into a Map keyed by the given selector, keys sorted ascending
 */
export function groupBy<T, K extends string | number>(items: T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();

  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }

  const keys = [...groups.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return new Map(keys.map(key => [key, groups.get(key) ?? []]));
}

/**
 * Stable descending sort by a numeric selector; equal values keep input order
 */
export function sortDescending<T>(items: T[], valueOf: (item: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => valueOf(b.item) - valueOf(a.item) || a.index - b.index)
    .map(entry => entry.item);
}

/**
 * First key whose value is the largest (or smallest) present value
 */
export function argExtreme<K>(entries: Array<[K, NullableNumber]>, mode: 'max' | 'min'): K | null {
  let best: K | null = null;
  let bestValue: number | null = null;

  for (const [key, value] of entries) {
    if (value === null) continue;
    if (bestValue === null || (mode === 'max' ? value > bestValue : value < bestValue)) {
      best = key;
      bestValue = value;
    }
  }

  return best;
}
