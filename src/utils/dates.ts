/**
 * Calendar date helpers
 *
 * Birth dates are plain `YYYY-MM-DD` strings with no time zone. Arithmetic
 * goes through UTC day numbers so DST shifts never move a date.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface CalendarDate {
  year: number;
  month: number; // 1-12
  day: number;
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not
function utcMidnight(year: number, month: number, day: number): Date {
  const instant = new Date(0);
  instant.setUTCFullYear(year, month - 1, day);
  return instant;
}

/**
 * Parse `YYYY-MM-DD`, rejecting dates that do not exist (2023-02-30)
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const probe = utcMidnight(year, month, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
}

export function formatCalendarDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${String(date.year).padStart(4, '0')}-${mm}-${dd}`;
}

/**
 * Local calendar date of an instant
 */
export function calendarDateOf(instant: Date): CalendarDate {
  return {
    year: instant.getFullYear(),
    month: instant.getMonth() + 1,
    day: instant.getDate(),
  };
}

/**
 * Days since 1970-01-01. Out-of-range days roll over (Feb 29 → Mar 1).
 */
export function toDayNumber(date: CalendarDate): number {
  return utcMidnight(date.year, date.month, date.day).getTime() / MS_PER_DAY;
}

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return toDayNumber(a) - toDayNumber(b);
}
