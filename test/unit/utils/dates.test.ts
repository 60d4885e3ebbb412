import { describe, test, expect } from '@jest/globals';
import {
  formatIsoDate,
  isIsoDate,
  isValidCalendarDate,
  parseIsoDate,
  todayIsoDate,
} from '../../../src/utils/dates';

describe('dates', () => {
  test('parses strict YYYY-MM-DD strings', () => {
    expect(parseIsoDate('2026-01-17')).toEqual({ year: 2026, month: 1, day: 17 });
    expect(parseIsoDate('2026-1-17')).toBeNull();
    expect(parseIsoDate('2026-01-17T00:00:00Z')).toBeNull();
    expect(parseIsoDate('2025-02-29')).toBeNull();
  });

  test('accepts leap days only in leap years', () => {
    expect(isValidCalendarDate(2024, 2, 29)).toBe(true);
    expect(isValidCalendarDate(2100, 2, 29)).toBe(false);
    expect(isIsoDate('2000-02-29')).toBe(true);
  });

  test('keeps years below 100 literal when checking month length', () => {
    expect(isValidCalendarDate(0, 2, 29)).toBe(true);
    expect(isIsoDate('0000-02-29')).toBe(true);
    expect(formatIsoDate(0, 2, 29)).toBe('0000-02-29');
    expect(isValidCalendarDate(1, 2, 29)).toBe(false);
  });

  test('formats with zero padding', () => {
    expect(formatIsoDate(987, 3, 4)).toBe('0987-03-04');
  });

  test('refuses to format impossible dates', () => {
    expect(() => formatIsoDate(2026, 4, 31)).toThrow(RangeError);
  });

  test('formatting a parsed date yields the same calendar date', () => {
    for (const value of ['1999-12-31', '2024-02-29', '2026-07-04']) {
      const parsed = parseIsoDate(value);
      expect(parsed).not.toBeNull();
      if (parsed) {
        expect(formatIsoDate(parsed.year, parsed.month, parsed.day)).toBe(value);
      }
    }
  });

  test("formats today's local date", () => {
    expect(todayIsoDate(new Date(2026, 11, 1, 23, 30))).toBe('2026-12-01');
  });
});
