type ErrorSeverity = "error" | "warning" | "info" | "debug";

export interface ErrorLogPayload {
  message: string;
  stack?: string;
  source?: string;
  severity?: ErrorSeverity;
  metadata?: Record<string, unknown>;
}

export interface ErrorLogEntry {
  message: string;
  stack: string | null;
  source: string | null;
  severity: ErrorSeverity;
  metadata: Record<string, unknown>;
  loggedAt: string;
}

export type ErrorLogSink = (entry: ErrorLogEntry) => void;

// Rate limiter state (sink forwarding only; the console always gets the line)
const RATE_LIMIT_WINDOW_MS = 60_000;
const RATE_LIMIT_MAX = 10;
let errorTimestamps: number[] = [];

function isRateLimited(): boolean {
  const now = Date.now();
  errorTimestamps = errorTimestamps.filter((t) => now - t < RATE_LIMIT_WINDOW_MS);
  if (errorTimestamps.length >= RATE_LIMIT_MAX) {
    return true;
  }
  errorTimestamps.push(now);
  return false;
}

let _sink: ErrorLogSink | null = null;
let _consoleEnabled = true;

/**
 * Forward log entries to an external collector (a dashboard's error panel, a
 * test spy). Pass null to detach. Resets the rate limiter.
 */
export function setErrorLogSink(sink: ErrorLogSink | null) {
  _sink = sink;
  errorTimestamps = [];
}

export function setConsoleLogging(enabled: boolean) {
  _consoleEnabled = enabled;
}

function consoleMethodFor(severity: ErrorSeverity): (...args: unknown[]) => void {
  switch (severity) {
    case "warning":
      return console.warn;
    case "info":
      return console.info;
    case "debug":
      return console.debug;
    default:
      return console.error;
  }
}

export function logError(payload: ErrorLogPayload): void {
  const { message, stack, source, severity = "error", metadata } = payload;

  if (_consoleEnabled) {
    consoleMethodFor(severity)(`[${severity.toUpperCase()}] ${source ?? "unknown"}:`, message, stack ?? "");
  }

  if (!_sink) return;

  if (isRateLimited()) {
    if (_consoleEnabled) console.warn("[errorLogger] Rate limited, skipping sink");
    return;
  }

  try {
    _sink({
      message: message.slice(0, 2000),
      stack: stack?.slice(0, 5000) ?? null,
      source: source ?? null,
      severity,
      metadata: metadata ?? {},
      loggedAt: new Date().toISOString(),
    });
  } catch (err) {
    console.error("[errorLogger] Sink failed:", err);
  }
}

export function logWarning(message: string, source?: string, metadata?: Record<string, unknown>) {
  return logError({ message, source, severity: "warning", metadata });
}

export function logInfo(message: string, source?: string, metadata?: Record<string, unknown>) {
  return logError({ message, source, severity: "info", metadata });
}

export function logDebug(message: string, source?: string, metadata?: Record<string, unknown>) {
  return logError({ message, source, severity: "debug", metadata });
}
