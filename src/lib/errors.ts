/**
 * Raised at ingestion when a row cannot become a record: missing or malformed
 * date, a negative counter, an unknown shift, and so on.
 */
export class InvalidRecordError extends Error {
  readonly sheet: string;
  /** 1-based spreadsheet row, header row included; null for records built in code */
  readonly rowNumber: number | null;
  readonly issues: string[];

  constructor(sheet: string, rowNumber: number | null, issues: string[]) {
    const where = rowNumber === null ? sheet : `${sheet} row ${rowNumber}`;
    super(`Invalid record in ${where}: ${issues.join("; ")}`);
    this.name = "InvalidRecordError";
    this.sheet = sheet;
    this.rowNumber = rowNumber;
    this.issues = issues;
  }
}

/** Raised when the workbook lacks a sheet the dashboard reads. */
export class MissingSheetError extends Error {
  readonly sheet: string;

  constructor(sheet: string, available: string[]) {
    super(`Sheet "${sheet}" not found (available: ${available.join(", ") || "none"})`);
    this.name = "MissingSheetError";
    this.sheet = sheet;
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
