/**
 * Console + file logging shared by the bot, the scheduler and the CLIs.
 */

import { appendFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

// ---- Types -----------------------------------------------------------------
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR"];

export interface LoggerOptions {
  level: LogLevel;
  /** Append every line to this file when set. */
  logFile?: string;
  console?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Runs a script's main function; anything it throws ends the process with status 1. */
export async function runMain(
  main: () => Promise<void>,
  exit: (code: number) => void = (code) => process.exit(code),
): Promise<void> {
  try {
    await main();
  } catch (e) {
    console.error("Fatal error:", describeError(e));
    exit(1);
  }
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.message;
  if (typeof arg === "object" && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

// ---- Logger ----------------------------------------------------------------
export class Logger {
  constructor(
    private readonly scope: string,
    private readonly options: LoggerOptions,
  ) {}

  static silent(): Logger {
    return new Logger("silent", { level: "ERROR", console: false });
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.options);
  }

  debug(...args: unknown[]): void {
    this.write("DEBUG", args);
  }

  info(...args: unknown[]): void {
    this.write("INFO", args);
  }

  warn(...args: unknown[]): void {
    this.write("WARN", args);
  }

  error(...args: unknown[]): void {
    this.write("ERROR", args);
  }

  private write(level: LogLevel, args: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.options.level)) return;

    const timestamp = new Date().toISOString();
    const message = `${timestamp} - ${level} - ${this.scope} - ${args.map(formatArg).join(" ")}`;

    if (this.options.console !== false) {
      if (level === "ERROR" || level === "WARN") {
        console.error(message);
      } else {
        console.log(message);
      }
    }

    if (this.options.logFile) {
      try {
        const dir = dirname(this.options.logFile);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }
        appendFileSync(this.options.logFile, message + "\n");
      } catch (e) {
        console.error("Failed to write log:", describeError(e));
      }
    }
  }
}

export function createLogger(
  logging: { level: LogLevel; logFile: string; enableTradeLogging: boolean },
  scope = "sandwich",
): Logger {
  return new Logger(scope, {
    level: logging.level,
    logFile: logging.enableTradeLogging ? logging.logFile : undefined,
  });
}
