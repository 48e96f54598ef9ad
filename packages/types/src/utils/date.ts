export interface CalendarDate {
  month: number;
  day: number;
  year: number;
}

export interface DateRange {
  start: string;
  end: string;
}

const US_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const PARTIAL_DATE_PATTERN = /^(\d{2})\/(\d{2})$/;
const LONG_DATE_PATTERN = /^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/;

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(month: number, year: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate({ month, day, year }: CalendarDate): boolean {
  if (!Number.isInteger(month) || !Number.isInteger(day) || !Number.isInteger(year)) {
    return false;
  }
  if (month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(month, year);
}

/**
 * Parses a strict MM/DD/YYYY string. Returns null for anything that is not a real
 * calendar date; `02/30/2023` is rejected, never clamped.
 */
export function parseUSDate(dateStr: string): CalendarDate | null {
  const match = US_DATE_PATTERN.exec(dateStr.trim());
  if (match === null) return null;
  const [, month, day, year] = match;
  if (month === undefined || day === undefined || year === undefined) return null;

  const date = { month: parseInt(month, 10), day: parseInt(day, 10), year: parseInt(year, 10) };
  return isValidCalendarDate(date) ? date : null;
}

export function isValidUSDate(dateStr: string): boolean {
  return parseUSDate(dateStr) !== null;
}

export function formatUSDate({ month, day, year }: CalendarDate): string {
  return `${String(month).padStart(2, '0')}/${String(day).padStart(2, '0')}/${String(year).padStart(4, '0')}`;
}

/**
 * "January 31, 2023" / "Jan 31 2023" -> "01/31/2023". Null when the month name is
 * unknown or the day does not exist.
 */
export function normalizeLongDate(dateStr: string): string | null {
  const match = LONG_DATE_PATTERN.exec(dateStr.trim());
  if (match === null) return null;
  const [, monthName, day, year] = match;
  if (monthName === undefined || day === undefined || year === undefined) return null;

  const month = MONTHS[monthName.slice(0, 3).toLowerCase()];
  if (month === undefined) return null;

  const date = { month, day: parseInt(day, 10), year: parseInt(year, 10) };
  return isValidCalendarDate(date) ? formatUSDate(date) : null;
}

function sortKey(date: CalendarDate): number {
  return date.year * 10000 + date.month * 100 + date.day;
}

/**
 * Orders two MM/DD/YYYY strings chronologically. Both must be valid dates.
 */
export function compareUSDates(a: string, b: string): number {
  const left = parseUSDate(a);
  const right = parseUSDate(b);
  if (left === null || right === null) {
    throw new Error(`Cannot compare invalid dates: ${a}, ${b}`);
  }
  return sortKey(left) - sortKey(right);
}

export function isDateWithinRange(date: string, range: DateRange): boolean {
  return compareUSDates(range.start, date) <= 0 && compareUSDates(date, range.end) <= 0;
}

/**
 * Completes an MM/DD row date with a year. The years of the statement period are tried
 * first so that a December row on a December-January statement gets the earlier year;
 * otherwise `fallbackYear` is used.
 */
export function completePartialDate(
  partial: string,
  fallbackYear: number,
  period?: DateRange
): string | null {
  const match = PARTIAL_DATE_PATTERN.exec(partial.trim());
  if (match === null) return null;
  const [, month, day] = match;
  if (month === undefined || day === undefined) return null;

  const candidateYears: number[] = [];
  if (period !== undefined) {
    const start = parseUSDate(period.start);
    const end = parseUSDate(period.end);
    if (start !== null && end !== null) {
      candidateYears.push(start.year);
      if (end.year !== start.year) candidateYears.push(end.year);
    }
  }

  for (const year of candidateYears) {
    const date = { month: parseInt(month, 10), day: parseInt(day, 10), year };
    if (period !== undefined && isValidCalendarDate(date) && isDateWithinRange(formatUSDate(date), period)) {
      return formatUSDate(date);
    }
  }

  const fallback = { month: parseInt(month, 10), day: parseInt(day, 10), year: fallbackYear };
  return isValidCalendarDate(fallback) ? formatUSDate(fallback) : null;
}
