import { describe, it, expect } from 'vitest';
import {
  isLeapYear,
  daysInMonth,
  parseUSDate,
  isValidUSDate,
  formatUSDate,
  normalizeLongDate,
  compareUSDates,
  isDateWithinRange,
  completePartialDate,
} from '@ledgerline/types';

describe('isLeapYear', () => {
  it('should follow the gregorian rules', () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2023)).toBe(false);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2000)).toBe(true);
  });
});

describe('daysInMonth', () => {
  it('should return month lengths', () => {
    expect(daysInMonth(1, 2023)).toBe(31);
    expect(daysInMonth(4, 2023)).toBe(30);
    expect(daysInMonth(2, 2023)).toBe(28);
    expect(daysInMonth(2, 2024)).toBe(29);
  });
});

describe('parseUSDate', () => {
  it('should parse a valid MM/DD/YYYY date', () => {
    expect(parseUSDate('01/31/2023')).toEqual({ month: 1, day: 31, year: 2023 });
  });

  it('should reject 02/30/2023 instead of clamping it', () => {
    expect(parseUSDate('02/30/2023')).toBeNull();
  });

  it('should accept 02/29 only in leap years', () => {
    expect(parseUSDate('02/29/2024')).toEqual({ month: 2, day: 29, year: 2024 });
    expect(parseUSDate('02/29/2023')).toBeNull();
  });

  it('should reject month 13 and day 00', () => {
    expect(parseUSDate('13/01/2023')).toBeNull();
    expect(parseUSDate('01/00/2023')).toBeNull();
  });

  it('should reject other layouts', () => {
    expect(parseUSDate('1/5/2023')).toBeNull();
    expect(parseUSDate('2023-01-31')).toBeNull();
    expect(parseUSDate('01/31/23')).toBeNull();
  });
});

describe('isValidUSDate / formatUSDate', () => {
  it('should round-trip through formatting with zero padding', () => {
    expect(formatUSDate({ month: 3, day: 7, year: 2023 })).toBe('03/07/2023');
    expect(isValidUSDate('03/07/2023')).toBe(true);
    expect(isValidUSDate('04/31/2023')).toBe(false);
  });
});

describe('normalizeLongDate', () => {
  it('should normalize full and abbreviated month names', () => {
    expect(normalizeLongDate('January 31, 2023')).toBe('01/31/2023');
    expect(normalizeLongDate('Feb 1 2023')).toBe('02/01/2023');
    expect(normalizeLongDate('Sept. 15, 2023')).toBe('09/15/2023');
  });

  it('should return null for unknown months and impossible days', () => {
    expect(normalizeLongDate('Smarch 1, 2023')).toBeNull();
    expect(normalizeLongDate('February 30, 2023')).toBeNull();
  });
});

describe('compareUSDates', () => {
  it('should order dates across years', () => {
    expect(compareUSDates('12/31/2022', '01/01/2023')).toBeLessThan(0);
    expect(compareUSDates('01/31/2023', '01/01/2023')).toBeGreaterThan(0);
    expect(compareUSDates('01/31/2023', '01/31/2023')).toBe(0);
  });

  it('should throw on invalid input', () => {
    expect(() => compareUSDates('02/30/2023', '01/01/2023')).toThrow('Cannot compare invalid dates');
  });
});

describe('isDateWithinRange', () => {
  const range = { start: '01/01/2023', end: '01/31/2023' };

  it('should include both ends', () => {
    expect(isDateWithinRange('01/01/2023', range)).toBe(true);
    expect(isDateWithinRange('01/31/2023', range)).toBe(true);
    expect(isDateWithinRange('02/01/2023', range)).toBe(false);
  });
});

describe('completePartialDate', () => {
  it('should use the period year that places the row inside the period', () => {
    const period = { start: '12/15/2022', end: '01/14/2023' };
    expect(completePartialDate('12/20', 2023, period)).toBe('12/20/2022');
    expect(completePartialDate('01/05', 2023, period)).toBe('01/05/2023');
  });

  it('should fall back to the given year when the period cannot place the row', () => {
    expect(completePartialDate('03/10', 2023, { start: '01/01/2023', end: '01/31/2023' })).toBe('03/10/2023');
    expect(completePartialDate('03/10', 2021)).toBe('03/10/2021');
  });

  it('should reject impossible month/day pairs', () => {
    expect(completePartialDate('02/30', 2023)).toBeNull();
    expect(completePartialDate('2/3', 2023)).toBeNull();
  });
});
