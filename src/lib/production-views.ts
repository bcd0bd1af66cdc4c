import { average, groupBy, mean, sum } from "@/lib/aggregation";
import { DEFAULT_DASHBOARD_CONFIG, type DashboardConfig } from "@/lib/dashboard-config";
import { aggregateEfficiencyOf, averageRecordEfficiency, roundMetric, type Metric } from "@/lib/efficiency";
import { logInfo } from "@/lib/error-logger";
import { buildOperatorSummary, type OperatorSummaryRow } from "@/lib/operator-join";
import { productionByPeriod, type ProductionByPeriod } from "@/lib/period-breakdown";
import {
  compareMachineIds,
  SHIFTS,
  type MachineId,
  type MachineRecord,
  type OperatorRecord,
  type ProductionDataset,
  type Shift,
} from "@/lib/production-records";
import { bottomN, rankDescending, topN } from "@/lib/ranking";
import { filterRecords, type FilterCriteria } from "@/lib/record-filters";

export interface MachineEfficiencyRow {
  machineId: MachineId;
  avgEfficiencyPct: Metric;
  totalProduction: number;
}

export interface MachineProductionRow {
  machineId: MachineId;
  totalProduction: number;
}

export interface MachineSummaryRow {
  machineId: MachineId;
  avgRpm: number;
  totalRated: number;
  totalActual: number;
  totalProduction: number;
  efficiencyPct: Metric;
}

export interface DailyProductionRow {
  date: string;
  totalProduction: number;
}

export type ProductionTableMode = "machine" | "date";

export interface ProductionTableRow {
  groupKey: MachineId;
  totalProduction: number;
}

export interface OperatorProductionRow {
  operatorName: string;
  totalProduction: number;
}

export interface ShiftProductionRow {
  shift: Shift;
  totalProduction: number;
}

export interface ProductionOverview {
  totalProduction: number;
  avgDailyProduction: number;
}

// ============================================
// MACHINE VIEWS
// ============================================

/** Machines ranked by the mean of their per-record efficiencies, best first. */
export function rankMachinesByEfficiency(records: readonly MachineRecord[]): MachineEfficiencyRow[] {
  const grouped = groupBy(records, (r) => r.machineId, {
    avgEfficiencyPct: averageRecordEfficiency,
    totalProduction: sum((r: MachineRecord) => r.production),
  });
  const rows = Array.from(grouped.values(), (g) => ({
    machineId: g.key,
    avgEfficiencyPct: g.avgEfficiencyPct,
    totalProduction: g.totalProduction,
  }));
  return rankDescending(rows, (r) => r.avgEfficiencyPct, (a, b) => compareMachineIds(a.machineId, b.machineId));
}

export function topMachinesByEfficiency(records: readonly MachineRecord[], n: number): MachineEfficiencyRow[] {
  return topN(rankMachinesByEfficiency(records), n);
}

export function rollsByMachine(records: readonly MachineRecord[]): MachineProductionRow[] {
  const grouped = groupBy(records, (r) => r.machineId, {
    totalProduction: sum((r: MachineRecord) => r.production),
  });
  return Array.from(grouped.values(), (g) => ({ machineId: g.key, totalProduction: g.totalProduction })).sort((a, b) =>
    compareMachineIds(a.machineId, b.machineId),
  );
}

/**
 * Per-machine totals with efficiency recomputed from the summed counters, never
 * from averaging per-record ratios. Unrounded; see `roundMachineSummary`.
 */
export function machineSummary(records: readonly MachineRecord[]): MachineSummaryRow[] {
  const grouped = groupBy(records, (r) => r.machineId, {
    avgRpm: mean((r: MachineRecord) => r.rpm),
    totalRated: sum((r: MachineRecord) => r.ratedCounter),
    totalActual: sum((r: MachineRecord) => r.actualCounter),
    totalProduction: sum((r: MachineRecord) => r.production),
    efficiencyPct: aggregateEfficiencyOf,
  });
  return Array.from(grouped.values(), (g) => ({
    machineId: g.key,
    avgRpm: g.avgRpm,
    totalRated: g.totalRated,
    totalActual: g.totalActual,
    totalProduction: g.totalProduction,
    efficiencyPct: g.efficiencyPct,
  })).sort((a, b) => compareMachineIds(a.machineId, b.machineId));
}

export function roundMachineSummary(
  rows: readonly MachineSummaryRow[],
  rpmDecimals: number,
  efficiencyDecimals: number,
): MachineSummaryRow[] {
  return rows.map((row) => ({
    ...row,
    avgRpm: roundMetric(row.avgRpm, rpmDecimals) ?? row.avgRpm,
    efficiencyPct: roundMetric(row.efficiencyPct, efficiencyDecimals),
  }));
}

/**
 * Narrow the summary to one typed-in machine number. Digits are read as a
 * number ("01" finds machine 1); other text must equal a text id exactly.
 * Blank input, or text that names no machine, keeps every row.
 */
export function selectMachine<T extends { machineId: MachineId }>(rows: readonly T[], machineInput?: string): T[] {
  const wanted = machineInput?.trim() ?? "";
  if (!wanted) return [...rows];

  if (/^\d+$/.test(wanted)) {
    const id = Number(wanted);
    return rows.filter((row) => row.machineId === id);
  }

  const matches = rows.filter((row) => row.machineId === wanted);
  return matches.length > 0 ? matches : [...rows];
}

// ============================================
// PRODUCTION VIEWS
// ============================================

export function productionTrend(records: readonly MachineRecord[]): DailyProductionRow[] {
  const grouped = groupBy(records, (r) => r.dateKey, {
    totalProduction: sum((r: MachineRecord) => r.production),
  });
  return Array.from(grouped.values(), (g) => ({ date: g.key, totalProduction: g.totalProduction })).sort((a, b) =>
    a.date.localeCompare(b.date),
  );
}

/** Total production, and the mean of the per-day totals. */
export function productionOverview(records: readonly MachineRecord[]): ProductionOverview {
  const daily = productionTrend(records);
  return {
    totalProduction: sum((r: MachineRecord) => r.production)(records),
    avgDailyProduction: average(daily.map((d) => d.totalProduction)),
  };
}

export function productionTable(records: readonly MachineRecord[], mode: ProductionTableMode): ProductionTableRow[] {
  if (mode === "date") {
    return productionTrend(records).map((row) => ({ groupKey: row.date, totalProduction: row.totalProduction }));
  }
  return rollsByMachine(records).map((row) => ({ groupKey: row.machineId, totalProduction: row.totalProduction }));
}

// ============================================
// OPERATOR VIEWS
// ============================================

/** Operators by total production, highest first; ties by name. */
export function rankOperatorsByProduction(records: readonly OperatorRecord[]): OperatorProductionRow[] {
  const grouped = groupBy(records, (r) => r.operatorName, {
    totalProduction: sum((r: OperatorRecord) => r.production),
  });
  const rows = Array.from(grouped.values(), (g) => ({ operatorName: g.key, totalProduction: g.totalProduction }));
  return rankDescending(rows, (r) => r.totalProduction, (a, b) => a.operatorName.localeCompare(b.operatorName));
}

export function shiftSplit(records: readonly OperatorRecord[]): ShiftProductionRow[] {
  const grouped = groupBy(records, (r) => r.shift, {
    totalProduction: sum((r: OperatorRecord) => r.production),
  });
  return SHIFTS.flatMap((shift) => {
    const group = grouped.get(shift);
    return group ? [{ shift, totalProduction: group.totalProduction }] : [];
  });
}

export const ALL_OPERATORS = "All";

/** "All" (or nothing) keeps every operator; a name keeps that operator only. */
export function selectOperator(rows: readonly OperatorSummaryRow[], operator?: string): OperatorSummaryRow[] {
  if (!operator || operator === ALL_OPERATORS) return [...rows];
  return rows.filter((row) => row.operatorName === operator);
}

// ============================================
// FULL PASS
// ============================================

export interface ProductionViewOptions {
  topMachines?: number;
  topOperators?: number;
  bottomOperators?: number;
  /** Typed machine number narrowing the machine summary */
  machineInput?: string;
  tableMode?: ProductionTableMode;
  /** Operator name, or "All" */
  operator?: string;
  config?: DashboardConfig;
}

export interface MachineSection {
  topMachines: MachineEfficiencyRow[];
  rollsByMachine: MachineProductionRow[];
  machineSummary: MachineSummaryRow[];
}

export interface ProductionSection {
  overview: ProductionOverview;
  trend: DailyProductionRow[];
  byPeriod: ProductionByPeriod;
  table: ProductionTableRow[];
  tableMode: ProductionTableMode;
}

export type OperatorSection =
  | { status: "no_data"; message: string }
  | {
      status: "ok";
      topOperators: OperatorProductionRow[];
      bottomOperators: OperatorProductionRow[];
      shiftSplit: ShiftProductionRow[];
      operatorSummary: OperatorSummaryRow[];
      operatorNames: string[];
    };

export type ProductionViews =
  | { status: "no_data"; message: string }
  | {
      status: "ok";
      machine: MachineSection;
      production: ProductionSection;
      operator: OperatorSection;
    };

const NO_DATA_MESSAGE = "No data available for selected filters";
const NO_OPERATOR_DATA_MESSAGE = "No operator data available for selected filters";

function buildOperatorSection(
  operators: readonly OperatorRecord[],
  machines: readonly MachineRecord[],
  options: ProductionViewOptions,
  config: DashboardConfig,
): OperatorSection {
  if (operators.length === 0) {
    logInfo(NO_OPERATOR_DATA_MESSAGE, "production-views");
    return { status: "no_data", message: NO_OPERATOR_DATA_MESSAGE };
  }

  const ranked = rankOperatorsByProduction(operators);
  const summary = buildOperatorSummary(operators, machines, config.machinesHandledDelimiter).map((row) => ({
    ...row,
    efficiencyPct: roundMetric(row.efficiencyPct, config.efficiencyDecimals),
  }));

  return {
    status: "ok",
    topOperators: topN(ranked, options.topOperators ?? config.topOperators),
    bottomOperators: bottomN(ranked, options.bottomOperators ?? config.bottomOperators),
    shiftSplit: shiftSplit(operators),
    operatorSummary: selectOperator(summary, options.operator),
    operatorNames: summary.map((row) => row.operatorName).sort((a, b) => a.localeCompare(b)),
  };
}

/**
 * Recompute every view for one request. Both collections are filtered with the
 * same criteria; an empty machine selection ends the pass with no data.
 */
export function computeProductionViews(
  dataset: ProductionDataset,
  criteria: FilterCriteria,
  options: ProductionViewOptions = {},
): ProductionViews {
  const config = options.config ?? DEFAULT_DASHBOARD_CONFIG;
  const machines = filterRecords(dataset.machines, criteria);
  const operators = filterRecords(dataset.operators, criteria);

  if (machines.length === 0) {
    logInfo(NO_DATA_MESSAGE, "production-views", { criteria });
    return { status: "no_data", message: NO_DATA_MESSAGE };
  }

  const tableMode = options.tableMode ?? "machine";
  const summary = roundMachineSummary(machineSummary(machines), config.rpmDecimals, config.efficiencyDecimals);

  return {
    status: "ok",
    machine: {
      topMachines: topMachinesByEfficiency(machines, options.topMachines ?? config.topMachines),
      rollsByMachine: rollsByMachine(machines),
      machineSummary: selectMachine(summary, options.machineInput),
    },
    production: {
      overview: productionOverview(machines),
      trend: productionTrend(machines),
      byPeriod: productionByPeriod(machines, criteria),
      table: productionTable(machines, tableMode),
      tableMode,
    },
    operator: buildOperatorSection(operators, machines, options, config),
  };
}
