/**
 * Shared utilities for bannerwatch.
 */
export type {
  LogEntry,
  LogLevel,
  ProcessExit,
  ProcessInfo,
  ReadinessResult,
  ReadinessStrategy,
} from "./types.js";
export { LOG_LEVELS, READINESS_STRATEGIES } from "./types.js";
export { Logger, createLogger, sanitize } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
export { retry, sleep, RetryError } from "./retry.js";
export type { RetryOptions } from "./retry.js";
export {
  EXIT_CODES,
  SupervisorError,
  UsageError,
  ConfigError,
  DaemonStartError,
  DaemonExitedError,
  DaemonNotReadyError,
  WorkloadSpawnError,
  ModelPullError,
  InterruptedError,
  errorMessage,
  errnoCode,
} from "./errors.js";
