/**
 * Text formatting helpers shared by the report generators
 */

import type { NullableNumber } from './calculations';

export const REPORT_RULE = '='.repeat(50);

const numberFormat = new Intl.NumberFormat('en-GB', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

/**
 * 1234.5 -> "1,234.50"; null -> "n/a"
 */
export function formatNumber(value: NullableNumber): string {
  if (value === null || !Number.isFinite(value)) return 'n/a';
  return numberFormat.format(value);
}

/**
 * 1234.5 -> "£1,234.50"; null -> "n/a"
 */
export function formatCurrency(value: NullableNumber): string {
  if (value === null || !Number.isFinite(value)) return 'n/a';
  return `£${numberFormat.format(value)}`;
}

/**
 * 7 -> "07:00-08:00"
 */
export function formatHourRange(hour: number | null): string {
  if (hour === null) return 'n/a';
  const pad = (h: number) => String(h).padStart(2, '0');
  return `${pad(hour)}:00-${pad(hour + 1)}:00`;
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(2)}%`;
}
