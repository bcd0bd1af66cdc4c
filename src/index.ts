export * from "./lib/production-records";
export * from "./lib/record-filters";
export * from "./lib/aggregation";
export * from "./lib/efficiency";
export * from "./lib/operator-join";
export * from "./lib/ranking";
export * from "./lib/period-breakdown";
export * from "./lib/production-views";
export * from "./lib/metric-format";
export * from "./lib/dashboard-config";
export * from "./lib/errors";
export {
  logError,
  logWarning,
  logInfo,
  logDebug,
  setErrorLogSink,
  setConsoleLogging,
  type ErrorLogEntry,
  type ErrorLogPayload,
  type ErrorLogSink,
} from "./lib/error-logger";
export { toISODate, getCalendarParts, MONTH_NAMES, type CalendarParts } from "./lib/date-utils";
export * from "./utils/workbookIngestion";
export { useFilterCriteria } from "./hooks/useFilterCriteria";
export { useProductionViews } from "./hooks/useProductionViews";
