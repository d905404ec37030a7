import { describe, it, expect } from 'vitest';
import { addDays, dateRange, daysBetween, isDateKey, maxDateKey, parseDateKey, toDateKey, todayKey } from './dates';

describe('parseDateKey', () => {
  it('accepts real calendar days', () => {
    expect(parseDateKey('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
    expect(isDateKey('2025-12-31')).toBe(true);
  });

  it('rejects malformed or impossible dates', () => {
    expect(parseDateKey('not-a-date')).toBeNull();
    expect(parseDateKey('2023-02-29')).toBeNull();
    expect(parseDateKey('2024-13-01')).toBeNull();
    expect(parseDateKey('2024-1-05')).toBeNull();
    expect(parseDateKey('0000-01-01')).toBeNull();
    expect(parseDateKey('2024-01-05T10:00')).toBeNull();
  });

  it('keeps two-digit years literal', () => {
    expect(parseDateKey('0099-03-01')?.getUTCFullYear()).toBe(99);
  });
});

describe('date arithmetic', () => {
  it('adds days across month and year boundaries', () => {
    expect(addDays('2024-12-30', 3)).toBe('2025-01-02');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('counts whole days between dates', () => {
    expect(daysBetween('2024-01-01', '2024-12-31')).toBe(365);
    expect(daysBetween('2024-01-10', '2024-01-01')).toBe(-9);
  });

  it('builds inclusive ranges', () => {
    expect(dateRange('2024-01-30', '2024-02-02')).toEqual(['2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02']);
    expect(dateRange('2024-01-02', '2024-01-01')).toEqual([]);
  });

  it('picks the later date', () => {
    expect(maxDateKey('2024-05-01', '2023-12-31')).toBe('2024-05-01');
  });

  it('uses the UTC calendar day of the clock', () => {
    expect(toDateKey(new Date('2024-06-01T23:30:00.000Z'))).toBe('2024-06-01');
    expect(todayKey(() => new Date('2024-06-02T00:00:01.000Z'))).toBe('2024-06-02');
  });

  it('throws on invalid input to arithmetic helpers', () => {
    expect(() => addDays('bogus', 1)).toThrow('Invalid calendar date: bogus');
  });
});
