import { isValid } from "date-fns";
import { getCalendarParts, monthNumber, type CalendarParts } from "@/lib/date-utils";
import { InvalidRecordError } from "@/lib/errors";

export type MachineId = number | string;

export type Shift = "Day" | "Night";

export const SHIFTS: readonly Shift[] = ["Day", "Night"];

export interface MachineRecordInput {
  date: Date;
  machineId: MachineId;
  rpm: number;
  actualCounter: number;
  /** Counter value that represents 100% efficiency; may be zero */
  ratedCounter: number;
  production: number;
}

export interface OperatorRecordInput {
  date: Date;
  operatorName: string;
  machineId: MachineId;
  shift: Shift;
  production: number;
}

export type MachineRecord = Readonly<MachineRecordInput & CalendarParts>;

export type OperatorRecord = Readonly<OperatorRecordInput & CalendarParts>;

/** Fields every record carries, which is all the filter engine needs */
export type DatedRecord = Readonly<CalendarParts & { date: Date }>;

export interface ProductionDataset {
  readonly machines: readonly MachineRecord[];
  readonly operators: readonly OperatorRecord[];
}

function assertValidDate(date: Date, sheet: string) {
  if (!(date instanceof Date) || !isValid(date)) {
    throw new InvalidRecordError(sheet, null, ["date is missing or not a valid calendar date"]);
  }
}

export function createMachineRecord(input: MachineRecordInput): MachineRecord {
  assertValidDate(input.date, "machine records");
  return Object.freeze({ ...input, date: new Date(input.date.getTime()), ...getCalendarParts(input.date) });
}

export function createOperatorRecord(input: OperatorRecordInput): OperatorRecord {
  assertValidDate(input.date, "operator records");
  return Object.freeze({ ...input, date: new Date(input.date.getTime()), ...getCalendarParts(input.date) });
}

/**
 * Build the session's immutable entity store. Inputs may be raw record inputs or
 * records that were already created.
 */
export function createProductionDataset(data: {
  machines: readonly MachineRecordInput[];
  operators: readonly OperatorRecordInput[];
}): ProductionDataset {
  return Object.freeze({
    machines: Object.freeze(data.machines.map(createMachineRecord)),
    operators: Object.freeze(data.operators.map(createOperatorRecord)),
  });
}

/**
 * Orders machine ids: numbers numerically before strings, strings by locale.
 */
export function compareMachineIds(a: MachineId, b: MachineId): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  return a.localeCompare(b);
}

export interface FilterOptions {
  years: number[];
  months: string[];
}

/**
 * Selectable years (ascending) and month names (calendar order), taken from
 * the machine records.
 */
export function getFilterOptions(dataset: ProductionDataset): FilterOptions {
  const years = new Set<number>();
  const months = new Set<string>();

  for (const record of dataset.machines) {
    years.add(record.year);
    months.add(record.monthName);
  }

  return {
    years: Array.from(years).sort((a, b) => a - b),
    months: Array.from(months).sort((a, b) => monthNumber(a) - monthNumber(b)),
  };
}
