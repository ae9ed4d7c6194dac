import {
  argExtreme,
  groupBy,
  mean,
  percentage,
  isValidSettlementPeriod,
  round,
  sortDescending,
  standardDeviation,
  sum
} from '../server/utils/calculations';

describe('aggregates', () => {
  test('skip null values', () => {
    expect(sum([1, null, 3])).toBe(4);
    expect(mean([1, null, 3])).toBe(2);
  });

  test('handle an all-null group', () => {
    expect(sum([null, null])).toBe(0);
    expect(mean([null])).toBeNull();
  });

  test('standardDeviation is the sample deviation', () => {
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.13809, 5);
    expect(standardDeviation([5])).toBeNull();
  });
});

describe('round', () => {
  test('rounds half away from zero', () => {
    expect(round(2.5, 0)).toBe(3);
    expect(round(-2.5, 0)).toBe(-3);
    expect(round(7.0710678)).toBe(7.07);
  });

  test('never returns negative zero', () => {
    expect(Object.is(round(-0.001), 0)).toBe(true);
  });
});

describe('percentage', () => {
  test('is 0 for an empty total', () => {
    expect(percentage(3, 0)).toBe(0);
    expect(percentage(3, 96)).toBe(3.125);
  });
});

describe('isValidSettlementPeriod', () => {
  test('accepts the 50 periods of a long clock-change day', () => {
    expect(isValidSettlementPeriod(1)).toBe(true);
    expect(isValidSettlementPeriod(50)).toBe(true);
  });

  test('rejects periods outside 1-50', () => {
    expect(isValidSettlementPeriod(0)).toBe(false);
    expect(isValidSettlementPeriod(51)).toBe(false);
    expect(isValidSettlementPeriod(2.5)).toBe(false);
  });
});

describe('groupBy', () => {
  test('orders keys ascending', () => {
    const groups = groupBy([3, 1, 13, 11], value => value % 10);

    expect([...groups.keys()]).toEqual([1, 3]);
    expect(groups.get(1)).toEqual([1, 11]);
  });
});

describe('sortDescending', () => {
  test('keeps input order for ties', () => {
    const items = [
      { id: 'a', value: 1 },
      { id: 'b', value: 2 },
      { id: 'c', value: 1 }
    ];

    expect(sortDescending(items, item => item.value).map(item => item.id)).toEqual(['b', 'a', 'c']);
  });
});

describe('argExtreme', () => {
  test('returns the first key holding the extreme value', () => {
    const entries: Array<[number, number | null]> = [[0, 5], [1, null], [2, 9], [3, 9], [4, 1]];

    expect(argExtreme(entries, 'max')).toBe(2);
    expect(argExtreme(entries, 'min')).toBe(4);
    expect(argExtreme<number>([[0, null]], 'max')).toBeNull();
  });
});
