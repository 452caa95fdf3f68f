/**
 * Error types for bannerwatch.
 *
 * Every failure the supervisor reports on purpose carries the exit code
 * the process should end with.
 */

/** sysexits(3) codes plus the shell conventions for exec failures. */
export const EXIT_CODES = {
  usage: 64,
  unavailable: 69,
  config: 78,
  notExecutable: 126,
  notFound: 127,
} as const;

export class SupervisorError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = "SupervisorError";
    this.exitCode = exitCode;
  }
}

export class UsageError extends SupervisorError {
  constructor(message: string) {
    super(message, EXIT_CODES.usage);
    this.name = "UsageError";
  }
}

export class ConfigError extends SupervisorError {
  /** Dotted key of the offending field (e.g. "readiness.timeoutMs"). */
  readonly field: string;
  /** File or variable the value came from. */
  readonly source: string;

  constructor(field: string, source: string, reason: string) {
    super(`Invalid config "${field}" in ${source}: ${reason}`, EXIT_CODES.config);
    this.name = "ConfigError";
    this.field = field;
    this.source = source;
  }
}

export class DaemonStartError extends SupervisorError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super(`Failed to start daemon "${command}": ${errorMessage(cause)}`, EXIT_CODES.unavailable);
    this.name = "DaemonStartError";
    this.command = command;
    this.cause = cause;
  }
}

export class DaemonExitedError extends SupervisorError {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(code: number | null, signal: NodeJS.Signals | null) {
    const how = signal ? `signal ${signal}` : `code ${code ?? "unknown"}`;
    super(`Daemon exited with ${how} before becoming ready`, EXIT_CODES.unavailable);
    this.name = "DaemonExitedError";
    this.code = code;
    this.signal = signal;
  }
}

export class DaemonNotReadyError extends SupervisorError {
  readonly url: string;
  readonly attempts: number;
  readonly timeoutMs: number;

  constructor(url: string, attempts: number, timeoutMs: number) {
    super(
      `Daemon at ${url} not ready after ${timeoutMs}ms (${attempts} probe${attempts === 1 ? "" : "s"})`,
      EXIT_CODES.unavailable,
    );
    this.name = "DaemonNotReadyError";
    this.url = url;
    this.attempts = attempts;
    this.timeoutMs = timeoutMs;
  }
}

export class WorkloadSpawnError extends SupervisorError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    const notFound = errnoCode(cause) === "ENOENT";
    super(
      notFound
        ? `Workload command not found: ${command}`
        : `Failed to start workload "${command}": ${errorMessage(cause)}`,
      notFound ? EXIT_CODES.notFound : EXIT_CODES.notExecutable,
    );
    this.name = "WorkloadSpawnError";
    this.command = command;
    this.cause = cause;
  }
}

export class ModelPullError extends SupervisorError {
  readonly model: string;

  constructor(model: string, reason: string) {
    super(`Failed to pull model "${model}": ${reason}`, EXIT_CODES.unavailable);
    this.name = "ModelPullError";
    this.model = model;
  }
}

export class InterruptedError extends SupervisorError {
  readonly signal: NodeJS.Signals;

  constructor(signal: NodeJS.Signals, exitCode: number) {
    super(`Interrupted by ${signal}`, exitCode);
    this.name = "InterruptedError";
    this.signal = signal;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The `code` of a Node system error (e.g. "ENOENT"), if any. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
