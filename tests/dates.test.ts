import {
  getDateRange,
  isValidDateString,
  parseDate,
  toUtcDateKey,
  toUtcHour,
  validateDateRange
} from '../server/utils/dates';
import { ValidationError } from '../server/utils/errors';

describe('isValidDateString', () => {
  test('accepts real calendar dates only', () => {
    expect(isValidDateString('2024-02-29')).toBe(true);
    expect(isValidDateString('2023-02-29')).toBe(false);
    expect(isValidDateString('2024-13-01')).toBe(false);
    expect(isValidDateString('01/03/2024')).toBe(false);
  });
});

describe('parseDate', () => {
  test('throws a ValidationError for malformed input', () => {
    expect(() => parseDate('2024-3-1')).toThrow(ValidationError);
    expect(() => parseDate('2024-3-1')).toThrow("Invalid date format: '2024-3-1'. Expected format: YYYY-MM-DD");
  });
});

describe('getDateRange', () => {
  test('lists every day inclusive, across a month end', () => {
    expect(getDateRange('2024-02-28', '2024-03-01')).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
  });

  test('rejects a reversed range', () => {
    expect(() => getDateRange('2024-03-02', '2024-03-01')).toThrow('End date must be on or after start date');
  });
});

describe('validateDateRange', () => {
  test('allows a span of 31 days', () => {
    expect(() => validateDateRange('2024-01-01', '2024-02-01')).not.toThrow();
    expect(() => validateDateRange('2024-01-01', '2024-01-01')).not.toThrow();
  });

  test('rejects longer spans', () => {
    expect(() => validateDateRange('2024-01-01', '2024-02-02')).toThrow('Date range cannot exceed 31 days');
  });

  test('rejects an end before the start', () => {
    expect(() => validateDateRange('2024-01-02', '2024-01-01')).toThrow(ValidationError);
  });
});

describe('UTC keys', () => {
  test('take date and hour in UTC', () => {
    expect(toUtcDateKey('2024-03-01T23:30:00.000Z')).toBe('2024-03-01');
    expect(toUtcHour('2024-03-01T23:30:00.000Z')).toBe(23);
    expect(toUtcHour('2024-03-02T00:00:00+01:00')).toBe(23);
  });
});
