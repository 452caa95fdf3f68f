/**
 * Shared TypeScript types for bannerwatch.
 *
 * Defines the process, readiness and logging structures used across
 * the supervisor, the daemon runner and the CLI.
 */

// ---------------------------------------------------------------------------
// Processes
// ---------------------------------------------------------------------------

export interface ProcessInfo {
  /** OS process id. */
  pid: number;
  /** Command line as started (for logs). */
  command: string;
  /** Epoch milliseconds when the OS reported the spawn. */
  startedAt: number;
}

export interface ProcessExit {
  /** Exit code when the process exited on its own, otherwise null. */
  code: number | null;
  /** Signal that terminated the process, otherwise null. */
  signal: NodeJS.Signals | null;
  /** Normalized status: `code`, or 128 + signal number. */
  exitCode: number;
}

// ---------------------------------------------------------------------------
// Readiness
// ---------------------------------------------------------------------------

export const READINESS_STRATEGIES = ["poll", "fixed-delay"] as const;

export type ReadinessStrategy = (typeof READINESS_STRATEGIES)[number];

export interface ReadinessResult {
  strategy: ReadinessStrategy;
  /** Number of health probes made (0 for fixed-delay). */
  attempts: number;
  /** Wall-clock time spent waiting. */
  elapsedMs: number;
}

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  /** ISO-8601 timestamp. */
  ts: string;
  /** Severity level. */
  level: LogLevel;
  /** Component that emitted the log (e.g. "daemon"). */
  component: string;
  /** Human-readable message. */
  msg: string;
}
