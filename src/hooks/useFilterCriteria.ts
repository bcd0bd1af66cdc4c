import { useCallback, useState } from "react";
import { EMPTY_CRITERIA, type DateRange, type FilterCriteria } from "@/lib/record-filters";

function toggle<T>(values: readonly T[], value: T): T[] {
  return values.includes(value) ? values.filter((v) => v !== value) : [...values, value];
}

/**
 * Holds the sidebar's filter criteria. Every setter replaces the value with a
 * new object, so memoized views recompute exactly when the criteria change.
 */
export function useFilterCriteria(initial: FilterCriteria = EMPTY_CRITERIA) {
  // First value only; later `initial` props do not move the reset target
  const [initialCriteria] = useState<FilterCriteria>(initial);
  const [criteria, setCriteria] = useState<FilterCriteria>(initial);

  const setYears = useCallback((years: readonly number[]) => {
    setCriteria((prev) => ({ ...prev, years: [...years] }));
  }, []);

  const toggleYear = useCallback((year: number) => {
    setCriteria((prev) => ({ ...prev, years: toggle(prev.years, year) }));
  }, []);

  const setMonths = useCallback((months: readonly string[]) => {
    setCriteria((prev) => ({ ...prev, months: [...months] }));
  }, []);

  const toggleMonth = useCallback((month: string) => {
    setCriteria((prev) => ({ ...prev, months: toggle(prev.months, month) }));
  }, []);

  const setDateRange = useCallback((range: DateRange | null) => {
    setCriteria((prev) => ({ ...prev, dateRange: range ? { ...range } : null }));
  }, []);

  const clearDateRange = useCallback(() => {
    setCriteria((prev) => ({ ...prev, dateRange: null }));
  }, []);

  const reset = useCallback(() => setCriteria(initialCriteria), [initialCriteria]);

  return { criteria, setYears, toggleYear, setMonths, toggleMonth, setDateRange, clearDateRange, reset };
}
