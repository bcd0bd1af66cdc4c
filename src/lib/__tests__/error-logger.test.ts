import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  logError,
  logInfo,
  logWarning,
  setConsoleLogging,
  setErrorLogSink,
  type ErrorLogEntry,
} from "../error-logger";

beforeEach(() => {
  setConsoleLogging(false);
});

afterEach(() => {
  setErrorLogSink(null);
  setConsoleLogging(true);
  vi.restoreAllMocks();
});

describe("sink forwarding", () => {
  it("forwards a normalized entry", () => {
    const entries: ErrorLogEntry[] = [];
    setErrorLogSink((entry) => entries.push(entry));

    logWarning("row skipped", "workbook-ingestion", { row: 4 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      message: "row skipped",
      stack: null,
      source: "workbook-ingestion",
      severity: "warning",
      metadata: { row: 4 },
    });
    expect(Number.isNaN(Date.parse(entries[0].loggedAt))).toBe(false);
  });

  it("defaults to error severity and empty metadata", () => {
    const sink = vi.fn();
    setErrorLogSink(sink);

    logError({ message: "boom", stack: "at line 1" });

    expect(sink).toHaveBeenCalledWith(
      expect.objectContaining({ severity: "error", source: null, stack: "at line 1", metadata: {} }),
    );
  });

  it("stops forwarding after ten entries a minute", () => {
    const sink = vi.fn();
    setErrorLogSink(sink);

    for (let i = 0; i < 12; i++) logInfo(`entry ${i}`);

    expect(sink).toHaveBeenCalledTimes(10);
  });

  it("resets the limit when a sink is attached", () => {
    const first = vi.fn();
    setErrorLogSink(first);
    for (let i = 0; i < 10; i++) logInfo(`entry ${i}`);

    const second = vi.fn();
    setErrorLogSink(second);
    logInfo("after reset");

    expect(second).toHaveBeenCalledTimes(1);
  });

  it("reports a failing sink on the console instead of throwing", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    setErrorLogSink(() => {
      throw new Error("collector down");
    });

    expect(() => logInfo("still fine")).not.toThrow();
    expect(consoleError).toHaveBeenCalledWith("[errorLogger] Sink failed:", expect.any(Error));
  });
});

describe("console output", () => {
  it("writes a tagged line through the matching console method", () => {
    setConsoleLogging(true);
    const consoleWarn = vi.spyOn(console, "warn").mockImplementation(() => {});

    logWarning("row skipped", "workbook-ingestion");

    expect(consoleWarn).toHaveBeenCalledWith("[WARNING] workbook-ingestion:", "row skipped", "");
  });

  it("stays silent when disabled", () => {
    const consoleInfo = vi.spyOn(console, "info").mockImplementation(() => {});

    logInfo("quiet");

    expect(consoleInfo).not.toHaveBeenCalled();
  });
});
