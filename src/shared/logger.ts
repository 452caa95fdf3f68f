/**
 * Structured logger for bannerwatch.
 *
 * Writes JSON log lines to the configured log directory and human-readable
 * output to console.
 * Log format: {ts, level, component, msg}
 * Console format: [component] message
 */
import fs from "node:fs";
import path from "node:path";
import type { LogEntry, LogLevel } from "./types.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const SECRET_PATTERNS: RegExp[] = [
  /(authorization:\s*bearer\s+)[^\s"']+/gi,
  /((?:api[_-]?key|token|secret|password)\s*[=:]\s*)[^\s"'&]+/gi,
];

/** Mask credential-looking values before they reach a log file. */
export function sanitize(input: string): string {
  return SECRET_PATTERNS.reduce((out, pattern) => out.replace(pattern, "$1[REDACTED]"), input);
}

export interface LoggerContext {
  /** Emitting component (e.g. "supervisor", "daemon"). */
  component: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ./logs. */
  logDir?: string;
  /** Whether to write to file. Defaults to true. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly minLevel: number;
  private readonly logDir: string;
  private readonly fileOutput: boolean;
  private readonly consoleOutput: boolean;
  private logFilePath: string | null = null;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.minLevel = LOG_LEVEL_PRIORITY[this.level];
    this.logDir = options.logDir ?? path.resolve("logs");
    this.fileOutput = options.fileOutput ?? true;
    this.consoleOutput = options.consoleOutput ?? true;
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Create a child logger for another component, sharing the outputs. */
  child(component: string): Logger {
    return new Logger(
      { component },
      {
        level: this.level,
        logDir: this.logDir,
        fileOutput: this.fileOutput,
        consoleOutput: this.consoleOutput,
      },
    );
  }

  private log(level: LogLevel, msg: string): void {
    if (LOG_LEVEL_PRIORITY[level] > this.minLevel) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.context.component,
      msg,
    };

    if (this.consoleOutput) {
      this.writeConsole(entry);
    }

    if (this.fileOutput) {
      this.writeFile(entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const prefix = entry.component ? `[${entry.component}]` : "[bannerwatch]";
    const line = `${prefix} ${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = entry.ts.slice(0, 10);
        this.logFilePath = path.join(this.logDir, `bannerwatch-${date}.jsonl`);
      }
      const sanitized: LogEntry = { ...entry, msg: sanitize(entry.msg) };
      fs.appendFileSync(this.logFilePath, JSON.stringify(sanitized) + "\n");
    } catch (error: unknown) {
      // Log-file errors are reported on the console only.
      if (this.consoleOutput) {
        console.error(`[bannerwatch] log file write failed: ${String(error)}`);
      }
    }
  }
}

/** Create a logger with default context. */
export function createLogger(
  context: Partial<LoggerContext> = {},
  options: LoggerOptions = {},
): Logger {
  return new Logger({ component: context.component ?? "" }, options);
}
