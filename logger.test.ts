import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import { Logger, createLogger, describeError, isLogLevel, runMain } from "./logger.ts";

describe("Logger", () => {
  it("appends lines at or above its level to the log file", () => {
    const logFile = join(mkdtempSync(join(tmpdir(), "sandwich-log-")), "nested", "trading.log");
    const logger = new Logger("bot", { level: "INFO", logFile, console: false });

    logger.debug("hidden");
    logger.info("entered", { legs: 7 });
    logger.child("strategy").warn(new Error("stale quote"));

    const lines = readFileSync(logFile, "utf8").trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - INFO - bot - entered \{"legs":7\}$/);
    expect(lines[1]).toMatch(/ - WARN - bot:strategy - stale quote$/);
  });

  it("leaves the file alone when trade logging is off", () => {
    const logger = createLogger({ level: "INFO", logFile: "/nonexistent/trading.log", enableTradeLogging: false });
    expect(() => logger.debug("nothing")).not.toThrow();
  });
});

describe("helpers", () => {
  it("recognises log levels", () => {
    expect(isLogLevel("WARN")).toBe(true);
    expect(isLogLevel("warn")).toBe(false);
  });

  it("describes unknown errors", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});

describe("runMain", () => {
  it("reports a failure and exits with status 1", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const exit = vi.fn();

    await runMain(async () => {
      throw new Error("Configuration validation failed: 1 errors");
    }, exit);

    expect(error).toHaveBeenCalledWith("Fatal error:", "Configuration validation failed: 1 errors");
    expect(exit).toHaveBeenCalledWith(1);
    error.mockRestore();
  });

  it("leaves the exit code alone on success", async () => {
    const exit = vi.fn();
    await runMain(async () => undefined, exit);
    expect(exit).not.toHaveBeenCalled();
  });
});
