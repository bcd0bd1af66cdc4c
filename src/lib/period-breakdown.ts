import { groupBy, sum } from "@/lib/aggregation";
import type { MachineRecord } from "@/lib/production-records";
import { hasDateRange, type FilterCriteria } from "@/lib/record-filters";

export type AggregationLevel = "day" | "week" | "month";

export interface PeriodRow {
  label: string;
  year: number;
  /** Date key, ISO week or month number, depending on the level */
  subperiod: string | number;
  totalProduction: number;
}

export interface ProductionByPeriod {
  level: AggregationLevel;
  rows: PeriodRow[];
  /** Labels in row order; consumers must use this as the categorical axis order */
  categories: string[];
}

/**
 * One rule per request: an explicit date range gives days, exactly one selected
 * month gives ISO weeks, anything else gives months.
 */
export function resolveAggregationLevel(criteria: FilterCriteria): AggregationLevel {
  if (hasDateRange(criteria)) return "day";
  if (criteria.months.length === 1) return "week";
  return "month";
}

function comparePeriods(a: PeriodRow, b: PeriodRow): number {
  if (a.year !== b.year) return a.year - b.year;
  if (typeof a.subperiod === "number" && typeof b.subperiod === "number") return a.subperiod - b.subperiod;
  return String(a.subperiod).localeCompare(String(b.subperiod));
}

export function groupProductionByPeriod(
  records: readonly MachineRecord[],
  level: AggregationLevel,
): PeriodRow[] {
  const reducers = { totalProduction: sum((r: MachineRecord) => r.production) };
  let rows: PeriodRow[];

  switch (level) {
    case "day":
      rows = Array.from(groupBy(records, (r) => r.dateKey, reducers).values(), (g) => ({
        label: g.key,
        year: Number(g.key.slice(0, 4)),
        subperiod: g.key,
        totalProduction: g.totalProduction,
      }));
      break;
    case "week": {
      const weeks = groupBy(records, (r) => `${r.year}-W${r.isoWeek}`, {
        ...reducers,
        year: (items: readonly MachineRecord[]) => items[0].year,
        isoWeek: (items: readonly MachineRecord[]) => items[0].isoWeek,
      });
      rows = Array.from(weeks.values(), (g) => ({
        label: `Week ${g.isoWeek}`,
        year: g.year,
        subperiod: g.isoWeek,
        totalProduction: g.totalProduction,
      }));
      break;
    }
    case "month": {
      const months = groupBy(records, (r) => `${r.year}-${r.month}`, {
        ...reducers,
        year: (items: readonly MachineRecord[]) => items[0].year,
        month: (items: readonly MachineRecord[]) => items[0].month,
        monthName: (items: readonly MachineRecord[]) => items[0].monthName,
      });
      rows = Array.from(months.values(), (g) => ({
        label: `${g.monthName} ${g.year}`,
        year: g.year,
        subperiod: g.month,
        totalProduction: g.totalProduction,
      }));
      break;
    }
  }

  return rows.sort(comparePeriods);
}

export function productionByPeriod(records: readonly MachineRecord[], criteria: FilterCriteria): ProductionByPeriod {
  const level = resolveAggregationLevel(criteria);
  const rows = groupProductionByPeriod(records, level);
  return { level, rows, categories: rows.map((r) => r.label) };
}
