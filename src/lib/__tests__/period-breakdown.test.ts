import { describe, it, expect } from "vitest";
import { parseISO } from "date-fns";
import {
  groupProductionByPeriod,
  productionByPeriod,
  resolveAggregationLevel,
} from "../period-breakdown";
import { createProductionDataset } from "../production-records";
import { EMPTY_CRITERIA, filterRecords, type FilterCriteria } from "../record-filters";
import { machineInput, sampleDataset } from "@/test/factories";

const { machines } = sampleDataset();

function criteria(overrides: Partial<FilterCriteria>): FilterCriteria {
  return { ...EMPTY_CRITERIA, ...overrides };
}

describe("resolveAggregationLevel", () => {
  it("uses days for a date range, even with one month selected", () => {
    const range = { start: parseISO("2024-03-01"), end: parseISO("2024-03-31") };
    expect(resolveAggregationLevel(criteria({ dateRange: range, months: ["March"] }))).toBe("day");
  });

  it("uses weeks for exactly one month", () => {
    expect(resolveAggregationLevel(criteria({ months: ["March"] }))).toBe("week");
    expect(resolveAggregationLevel(criteria({ months: ["March"], dateRange: { start: parseISO("2024-03-01") } }))).toBe(
      "week",
    );
  });

  it("uses months otherwise", () => {
    expect(resolveAggregationLevel(EMPTY_CRITERIA)).toBe("month");
    expect(resolveAggregationLevel(criteria({ months: ["March", "April"] }))).toBe("month");
    expect(resolveAggregationLevel(criteria({ years: [2024] }))).toBe("month");
  });
});

describe("groupProductionByPeriod", () => {
  it("labels months with their year and sorts them chronologically", () => {
    const shuffled = [...machines].reverse();
    const rows = groupProductionByPeriod(shuffled, "month");

    expect(rows.map((r) => [r.label, r.totalProduction])).toEqual([
      ["January 2024", 16],
      ["February 2024", 8],
      ["March 2024", 26],
      ["January 2025", 11],
    ]);
  });

  it("splits a single month into ISO weeks that add up to the month", () => {
    const march = filterRecords(machines, criteria({ years: [2024], months: ["March"] }));
    const weeks = groupProductionByPeriod(march, "week");

    expect(weeks.map((r) => [r.label, r.totalProduction])).toEqual([
      ["Week 10", 12],
      ["Week 11", 14],
    ]);
    const monthTotal = groupProductionByPeriod(march, "month")[0].totalProduction;
    expect(weeks.reduce((total, r) => total + r.totalProduction, 0)).toBe(monthTotal);
  });

  it("groups weeks by calendar year and ISO week number", () => {
    const { machines: december } = createProductionDataset({
      machines: [
        machineInput("2024-12-30", 1, { production: 4 }),
        machineInput("2024-12-02", 1, { production: 6 }),
      ],
      operators: [],
    });

    expect(groupProductionByPeriod(december, "week").map((r) => [r.year, r.label])).toEqual([
      [2024, "Week 1"],
      [2024, "Week 49"],
    ]);
  });

  it("uses the date key as the label for days", () => {
    const rows = groupProductionByPeriod(machines.slice(0, 4), "day");
    expect(rows.map((r) => [r.label, r.totalProduction])).toEqual([
      ["2024-01-15", 16],
      ["2024-02-10", 8],
      ["2024-02-20", 0],
    ]);
  });
});

describe("productionByPeriod", () => {
  it("exposes the row labels as the category order", () => {
    const range = { start: parseISO("2024-01-15"), end: parseISO("2024-02-20") };
    const filter = criteria({ dateRange: range });
    const result = productionByPeriod(filterRecords(machines, filter), filter);

    expect(result.level).toBe("day");
    expect(result.categories).toEqual(["2024-01-15", "2024-02-10", "2024-02-20"]);
  });

  it("returns no rows for no records", () => {
    expect(productionByPeriod([], EMPTY_CRITERIA)).toEqual({ level: "month", rows: [], categories: [] });
  });
});
