// Workbook ingestion: sheet rows → validated records → immutable dataset
// Header cleanup happens here once; the engines only ever see canonical names

import * as XLSX from "xlsx";
import { z } from "zod";
import { DEFAULT_DASHBOARD_CONFIG, type DashboardConfig } from "@/lib/dashboard-config";
import { parseDateText, toCalendarDate } from "@/lib/date-utils";
import { InvalidRecordError, MissingSheetError } from "@/lib/errors";
import { logDebug, logWarning } from "@/lib/error-logger";
import {
  createProductionDataset,
  type MachineRecordInput,
  type OperatorRecordInput,
  type ProductionDataset,
} from "@/lib/production-records";

export const MACHINE_COLUMNS = {
  date: "Date",
  machineId: "Machine Number",
  rpm: "Rpm",
  actualCounter: "Actual Counter",
  ratedCounter: "100% Efficiency",
  production: "Production",
} as const;

export const OPERATOR_COLUMNS = {
  date: "Date",
  operatorName: "Machine Operator",
  machineId: "Machine Number",
  shift: "Shift (Day/Night)",
  production: "Production",
} as const;

export type InvalidRecordMode = "throw" | "skip";

export interface IngestionOptions {
  config?: DashboardConfig;
  /** "throw" stops at the first bad row; "skip" drops it and reports it */
  onInvalidRecord?: InvalidRecordMode;
}

export interface WorkbookIngestionResult {
  dataset: ProductionDataset;
  rejected: InvalidRecordError[];
}

/**
 * Trim, then capitalize every letter that follows a non-letter and lower-case
 * the rest: " actual COUNTER " → "Actual Counter", "100% efficiency" →
 * "100% Efficiency".
 */
export function normalizeColumnName(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

function normalizeRowKeys(row: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[normalizeColumnName(key)] = value;
  }
  return normalized;
}

// ============================================
// CELL SCHEMAS
// ============================================

const ZONED_TIMESTAMP = /T\d{2}:\d{2}.*(Z|[+-]\d{2}:?\d{2})$/i;

const dateCode = z.object({ y: z.number().int(), m: z.number().int(), d: z.number().int() });

/**
 * Calendar day of an Excel date serial (45356 → 2024-03-05), built from the
 * serial's own day fields so the local zone never moves it.
 */
export function excelSerialToDate(serial: number): Date | null {
  if (!Number.isFinite(serial)) return null;
  const parsed = dateCode.safeParse(XLSX.SSF.parse_date_code(serial));
  if (!parsed.success) return null;
  const { y, m, d } = parsed.data;
  return new Date(y, m - 1, d);
}

/**
 * Date cells: Excel serials, Date objects, or text. Timestamps that carry a
 * zone are moved into the factory timezone before truncation to the day.
 */
function dateCell(timezone?: string) {
  return z
    .preprocess(
      (value) => {
        if (typeof value === "number") return excelSerialToDate(value) ?? value;
        if (typeof value !== "string") return value;
        const parsed = parseDateText(value);
        if (!parsed) return value;
        return timezone && ZONED_TIMESTAMP.test(value.trim()) ? toCalendarDate(parsed, timezone) : parsed;
      },
      z.date({ required_error: "date is required", invalid_type_error: "date is not a valid calendar date" }),
    )
    .transform((date) => toCalendarDate(date));
}

// Digit-only machine numbers become integers so both sheets compare equal
const machineIdCell = z
  .union([z.number().int().nonnegative(), z.string().trim().min(1)], {
    errorMap: () => ({ message: "machine number is required" }),
  })
  .transform((value) => (typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value));

const counterCell = z.coerce.number().finite().nonnegative();

const productionCell = z.coerce.number().int().nonnegative();

const shiftCell = z.preprocess(
  (value) => (typeof value === "string" ? normalizeColumnName(value) : value),
  z.enum(["Day", "Night"], { errorMap: () => ({ message: "shift must be Day or Night" }) }),
);

function machineRowSchema(timezone?: string) {
  return z
    .object({
      [MACHINE_COLUMNS.date]: dateCell(timezone),
      [MACHINE_COLUMNS.machineId]: machineIdCell,
      [MACHINE_COLUMNS.rpm]: counterCell,
      [MACHINE_COLUMNS.actualCounter]: counterCell,
      [MACHINE_COLUMNS.ratedCounter]: counterCell,
      [MACHINE_COLUMNS.production]: productionCell,
    })
    .transform(
      (row): MachineRecordInput => ({
        date: row[MACHINE_COLUMNS.date],
        machineId: row[MACHINE_COLUMNS.machineId],
        rpm: row[MACHINE_COLUMNS.rpm],
        actualCounter: row[MACHINE_COLUMNS.actualCounter],
        ratedCounter: row[MACHINE_COLUMNS.ratedCounter],
        production: row[MACHINE_COLUMNS.production],
      }),
    );
}

function operatorRowSchema(timezone?: string) {
  return z
    .object({
      [OPERATOR_COLUMNS.date]: dateCell(timezone),
      [OPERATOR_COLUMNS.operatorName]: z.string().trim().min(1, "operator name is required"),
      [OPERATOR_COLUMNS.machineId]: machineIdCell,
      [OPERATOR_COLUMNS.shift]: shiftCell,
      [OPERATOR_COLUMNS.production]: productionCell,
    })
    .transform(
      (row): OperatorRecordInput => ({
        date: row[OPERATOR_COLUMNS.date],
        operatorName: row[OPERATOR_COLUMNS.operatorName],
        machineId: row[OPERATOR_COLUMNS.machineId],
        shift: row[OPERATOR_COLUMNS.shift],
        production: row[OPERATOR_COLUMNS.production],
      }),
    );
}

// ============================================
// SHEETS
// ============================================

function sheetRowNumber(row: Record<string, unknown>, index: number): number {
  // The reader tags each row object with its 0-based sheet row
  const raw: unknown = Reflect.get(row, "__rowNum__");
  return typeof raw === "number" ? raw + 1 : index + 2;
}

function parseSheet<Out>(
  workbook: XLSX.WorkBook,
  sheetName: string,
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
  mode: InvalidRecordMode,
  rejected: InvalidRecordError[],
): Out[] {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new MissingSheetError(sheetName, workbook.SheetNames);
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { raw: true });
  const records: Out[] = [];

  rows.forEach((row, index) => {
    const result = schema.safeParse(normalizeRowKeys(row));
    if (result.success) {
      records.push(result.data);
      return;
    }

    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    const error = new InvalidRecordError(sheetName, sheetRowNumber(row, index), issues);
    if (mode === "throw") throw error;

    logWarning(error.message, "workbook-ingestion", { sheet: sheetName, row: error.rowNumber });
    rejected.push(error);
  });

  return records;
}

/**
 * Build the session dataset from an already-read workbook.
 */
export function parseProductionWorkbook(
  workbook: XLSX.WorkBook,
  options: IngestionOptions = {},
): WorkbookIngestionResult {
  const config = options.config ?? DEFAULT_DASHBOARD_CONFIG;
  const mode = options.onInvalidRecord ?? "throw";
  const rejected: InvalidRecordError[] = [];

  const machines = parseSheet(
    workbook,
    config.workbook.machineSheet,
    machineRowSchema(config.timezone),
    mode,
    rejected,
  );
  const operators = parseSheet(
    workbook,
    config.workbook.operatorSheet,
    operatorRowSchema(config.timezone),
    mode,
    rejected,
  );

  logDebug(
    `Loaded ${machines.length} machine records and ${operators.length} operator records`,
    "workbook-ingestion",
    { rejected: rejected.length },
  );

  return { dataset: createProductionDataset({ machines, operators }), rejected };
}

type WorkbookBytes = ArrayBuffer | Uint8Array;

const workbookCache = new WeakMap<WorkbookBytes, Map<string, WorkbookIngestionResult>>();

/**
 * Parse an .xlsx file's bytes. Results are memoized on the identity of the
 * buffer (and the options), so repeated renders over the same upload reuse one
 * dataset.
 */
export function readProductionWorkbook(bytes: WorkbookBytes, options: IngestionOptions = {}): WorkbookIngestionResult {
  const optionsKey = JSON.stringify([options.config ?? null, options.onInvalidRecord ?? "throw"]);
  let cached = workbookCache.get(bytes);
  const hit = cached?.get(optionsKey);
  if (hit) return hit;

  // Date cells stay serial numbers; see excelSerialToDate
  const workbook = XLSX.read(bytes, { type: "array", cellDates: false });
  const result = parseProductionWorkbook(workbook, options);

  if (!cached) {
    cached = new Map();
    workbookCache.set(bytes, cached);
  }
  cached.set(optionsKey, result);
  return result;
}
