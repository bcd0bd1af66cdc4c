import { groupBy, sum, uniqueSorted } from "@/lib/aggregation";
import { aggregateEfficiency, type Metric } from "@/lib/efficiency";
import {
  compareMachineIds,
  type MachineId,
  type MachineRecord,
  type OperatorRecord,
} from "@/lib/production-records";

export interface OperatorEfficiency {
  totalActual: number;
  totalRated: number;
  efficiencyPct: Metric;
  machinesHandled: string;
  machineIds: MachineId[];
}

export interface OperatorSummaryRow {
  operatorName: string;
  totalProduction: number;
  machinesHandled: string;
  machineIds: MachineId[];
  efficiencyPct: Metric;
}

export const DEFAULT_MACHINES_DELIMITER = ", ";

function joinKey(dateKey: string, machineId: MachineId): string {
  return `${dateKey}|${String(machineId)}`;
}

interface JoinedRow {
  operatorName: string;
  actualCounter: number;
  ratedCounter: number;
}

/**
 * Left join operator records to machine records on (date, machine). Every match
 * yields a row; an unmatched operator record yields one row with zero counters.
 */
export function leftJoinMachineCounters(
  operatorRecords: readonly OperatorRecord[],
  machineRecords: readonly MachineRecord[],
): JoinedRow[] {
  const machinesByKey = new Map<string, MachineRecord[]>();
  for (const m of machineRecords) {
    const key = joinKey(m.dateKey, m.machineId);
    const existing = machinesByKey.get(key);
    if (existing) existing.push(m);
    else machinesByKey.set(key, [m]);
  }

  const rows: JoinedRow[] = [];
  for (const op of operatorRecords) {
    const matches = machinesByKey.get(joinKey(op.dateKey, op.machineId));
    if (!matches) {
      rows.push({ operatorName: op.operatorName, actualCounter: 0, ratedCounter: 0 });
      continue;
    }
    for (const m of matches) {
      rows.push({ operatorName: op.operatorName, actualCounter: m.actualCounter, ratedCounter: m.ratedCounter });
    }
  }
  return rows;
}

/** Distinct machines per operator from the operator records alone. */
export function machinesHandledByOperator(operatorRecords: readonly OperatorRecord[]): Map<string, MachineId[]> {
  const grouped = groupBy(operatorRecords, (r) => r.operatorName, {
    machineIds: uniqueSorted((r: OperatorRecord) => r.machineId, compareMachineIds),
  });
  return new Map(Array.from(grouped, ([name, row]): [string, MachineId[]] => [name, row.machineIds]));
}

export function formatMachinesHandled(ids: readonly MachineId[], delimiter = DEFAULT_MACHINES_DELIMITER): string {
  return ids.map(String).join(delimiter);
}

/**
 * Attribute machine efficiency to operators through the (date, machine) join,
 * using the aggregate formula over each operator's joined counters.
 */
export function joinOperatorEfficiency(
  operatorRecords: readonly OperatorRecord[],
  machineRecords: readonly MachineRecord[],
  delimiter = DEFAULT_MACHINES_DELIMITER,
): Map<string, OperatorEfficiency> {
  const joined = groupBy(leftJoinMachineCounters(operatorRecords, machineRecords), (r) => r.operatorName, {
    totalActual: sum((r: JoinedRow) => r.actualCounter),
    totalRated: sum((r: JoinedRow) => r.ratedCounter),
  });
  const machines = machinesHandledByOperator(operatorRecords);

  const result = new Map<string, OperatorEfficiency>();
  for (const [name, row] of joined) {
    const machineIds = machines.get(name) ?? [];
    result.set(name, {
      totalActual: row.totalActual,
      totalRated: row.totalRated,
      efficiencyPct: aggregateEfficiency(row.totalActual, row.totalRated),
      machinesHandled: formatMachinesHandled(machineIds, delimiter),
      machineIds,
    });
  }
  return result;
}

/**
 * Merge production totals, machines handled and joined efficiency on operator
 * name. Rows come out sorted by production, highest first, then by name.
 */
export function buildOperatorSummary(
  operatorRecords: readonly OperatorRecord[],
  machineRecords: readonly MachineRecord[],
  delimiter = DEFAULT_MACHINES_DELIMITER,
): OperatorSummaryRow[] {
  const production = groupBy(operatorRecords, (r) => r.operatorName, {
    totalProduction: sum((r: OperatorRecord) => r.production),
  });
  const machines = machinesHandledByOperator(operatorRecords);
  const efficiency = joinOperatorEfficiency(operatorRecords, machineRecords, delimiter);

  const rows: OperatorSummaryRow[] = [];
  for (const [name, row] of production) {
    const machineIds = machines.get(name) ?? [];
    rows.push({
      operatorName: name,
      totalProduction: row.totalProduction,
      machinesHandled: formatMachinesHandled(machineIds, delimiter),
      machineIds,
      efficiencyPct: efficiency.get(name)?.efficiencyPct ?? null,
    });
  }

  return rows.sort(
    (a, b) => b.totalProduction - a.totalProduction || a.operatorName.localeCompare(b.operatorName),
  );
}
