import { format, getISOWeek, isValid, parse, parseISO, startOfDay } from "date-fns";
import { toZonedTime } from "date-fns-tz";

/** "2026-01-05": record date keys and per-day period labels */
export function toISODate(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/** "January" */
export function formatMonthName(date: Date): string {
  return format(date, "MMMM");
}

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

/**
 * Position of a full English month name in the calendar (1-12), or 0 when the
 * name is not a month.
 */
export function monthNumber(monthName: string): number {
  return MONTH_NAMES.findIndex((name) => name === monthName) + 1;
}

export interface CalendarParts {
  dateKey: string;
  year: number;
  month: number;
  monthName: string;
  isoWeek: number;
}

/**
 * Calendar fields derived from a record date. `year` is the calendar year, not
 * the ISO week-numbering year, so weeks are grouped as (year, isoWeek).
 */
export function getCalendarParts(date: Date): CalendarParts {
  return {
    dateKey: toISODate(date),
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    monthName: formatMonthName(date),
    isoWeek: getISOWeek(date),
  };
}

// ============================================
// TIMEZONE-AWARE FUNCTIONS
// ============================================

/**
 * Truncate a timestamp to its calendar day.
 * @param date - timestamp read from a sheet cell
 * @param timezone - IANA timezone (e.g., "Asia/Kolkata"); local time when omitted
 */
export function toCalendarDate(date: Date, timezone?: string): Date {
  const zoned = timezone ? toZonedTime(date, timezone) : date;
  return startOfDay(zoned);
}

const DAY_FIRST_PATTERN = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/;

/**
 * Parse a date cell written as text. Accepts ISO dates ("2026-01-05", with or
 * without a time part) and day-first dates ("05/01/2026", "5-1-2026", "05.01.2026").
 * Returns null when the text is not a valid date.
 */
export function parseDateText(text: string): Date | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  const dayFirst = trimmed.match(DAY_FIRST_PATTERN);
  if (dayFirst) {
    const [, day, month, year] = dayFirst;
    const parsed = parse(`${day}/${month}/${year}`, "d/M/yyyy", new Date());
    return isValid(parsed) ? parsed : null;
  }

  const iso = parseISO(trimmed);
  return isValid(iso) ? iso : null;
}
