import { describe, it, expect } from 'vitest';
import { isIsoDate, quarterOf, shiftDays, toIsoDate } from '../src/dates.js';

describe('isIsoDate', () => {
  it('accepts only real calendar dates in YYYY-MM-DD form', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-2-01')).toBe(false);
    expect(isIsoDate('2024-05-10T00:00:00Z')).toBe(false);
  });
});

describe('shiftDays', () => {
  it('crosses month and year boundaries in UTC', () => {
    expect(shiftDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(shiftDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(shiftDays('2024-05-10', -7)).toBe('2024-05-03');
  });
});

describe('quarterOf', () => {
  it('maps a date to its calendar quarter', () => {
    expect(quarterOf('2024-01-01')).toEqual({ year: 2024, quarter: 1 });
    expect(quarterOf('2024-05-10')).toEqual({ year: 2024, quarter: 2 });
    expect(quarterOf('2023-12-31')).toEqual({ year: 2023, quarter: 4 });
  });
});

describe('toIsoDate', () => {
  it('drops the time of day', () => {
    expect(toIsoDate(new Date('2024-05-10T23:59:59Z'))).toBe('2024-05-10');
  });
});
