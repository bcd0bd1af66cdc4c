import { toISODate } from "@/lib/date-utils";
import type { DatedRecord } from "@/lib/production-records";

export interface DateRange {
  start?: Date | null;
  end?: Date | null;
}

export interface FilterCriteria {
  readonly dateRange?: Readonly<DateRange> | null;
  readonly years: readonly number[];
  readonly months: readonly string[];
}

export const EMPTY_CRITERIA: FilterCriteria = Object.freeze({
  dateRange: null,
  years: Object.freeze([]),
  months: Object.freeze([]),
});

/** A range only counts once both endpoints are picked. */
export function hasDateRange(
  criteria: FilterCriteria,
): criteria is FilterCriteria & { dateRange: { start: Date; end: Date } } {
  return Boolean(criteria.dateRange?.start && criteria.dateRange?.end);
}

/**
 * Select the records matching the criteria. A complete date range wins over
 * year and month selections; otherwise years then months narrow the set.
 * Returns a new array; the input is never modified.
 */
export function filterRecords<T extends DatedRecord>(records: readonly T[], criteria: FilterCriteria): T[] {
  if (hasDateRange(criteria)) {
    const startKey = toISODate(criteria.dateRange.start);
    const endKey = toISODate(criteria.dateRange.end);
    return records.filter((r) => r.dateKey >= startKey && r.dateKey <= endKey);
  }

  let result = records.slice();

  if (criteria.years.length > 0) {
    const years = new Set(criteria.years);
    result = result.filter((r) => years.has(r.year));
  }

  if (criteria.months.length > 0) {
    const months = new Set(criteria.months);
    result = result.filter((r) => months.has(r.monthName));
  }

  return result;
}
