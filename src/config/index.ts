/**
 * Configuration system for bannerwatch.
 *
 * Resolves supervisor settings from built-in defaults, an optional YAML file,
 * environment variables and CLI overrides (in increasing precedence).
 */
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ConfigError } from "../shared/errors.js";
import {
  LOG_LEVELS,
  READINESS_STRATEGIES,
  type LogLevel,
  type ReadinessStrategy,
} from "../shared/types.js";

const CONFIG_FILENAME = "bannerwatch.yaml";
const DAEMON_LOG_FILENAME = "ollama.log";

export const DEFAULT_DAEMON_HOST = "127.0.0.1:11434";
export const DEFAULT_MODEL = "llama3";

export interface DaemonConfig {
  /** Executable of the model-serving daemon. */
  command: string;
  /** Arguments passed to the daemon. */
  args: string[];
  /** Address the daemon listens on, in OLLAMA_HOST form. */
  host: string;
  /** File receiving the daemon's stdout and stderr. */
  logFile: string;
  /** Extra environment variables for the daemon. */
  env: Record<string, string>;
}

export interface ReadinessConfig {
  strategy: ReadinessStrategy;
  /** Warm-up interval: the whole wait for fixed-delay, a floor for poll. */
  delayMs: number;
  pollIntervalMs: number;
  /** Upper bound for the poll strategy. */
  timeoutMs: number;
  /** Per-probe HTTP timeout. */
  requestTimeoutMs: number;
  healthPath: string;
}

export interface SupervisorConfig {
  daemon: DaemonConfig;
  readiness: ReadinessConfig;
  shutdown: {
    /** Time between SIGTERM and SIGKILL when stopping the daemon. */
    graceMs: number;
  };
  paths: {
    outputDir: string;
    logDir: string;
  };
  model: {
    name: string;
  };
  workload: {
    /** Command used when `exec` receives no arguments. */
    command: string[];
  };
  logLevel: LogLevel;
}

/** Values a caller (usually the CLI) forces over file and environment. */
export interface ConfigOverrides {
  strategy?: ReadinessStrategy;
  delayMs?: number;
  timeoutMs?: number;
  logDir?: string;
  outputDir?: string;
  model?: string;
  logLevel?: LogLevel;
}

export interface LoadConfigOptions {
  /** Explicit YAML path; missing file is an error. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  overrides?: ConfigOverrides;
}

export function defaultConfig(cwd: string = process.cwd()): SupervisorConfig {
  const logDir = path.resolve(cwd, "logs");
  return {
    daemon: {
      command: "ollama",
      args: ["serve"],
      host: DEFAULT_DAEMON_HOST,
      logFile: path.join(logDir, DAEMON_LOG_FILENAME),
      env: {},
    },
    readiness: {
      strategy: "poll",
      delayMs: 5_000,
      pollIntervalMs: 500,
      timeoutMs: 60_000,
      requestTimeoutMs: 2_000,
      healthPath: "/api/version",
    },
    shutdown: { graceMs: 10_000 },
    paths: {
      outputDir: path.resolve(cwd, "output"),
      logDir,
    },
    model: { name: DEFAULT_MODEL },
    workload: { command: [] },
    logLevel: "info",
  };
}

/**
 * Find the YAML file to load: explicit path, then $BANNERWATCH_CONFIG,
 * then ./bannerwatch.yaml when present.
 */
export function resolveConfigPath(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string | null {
  if (explicit) return path.resolve(cwd, explicit);
  const fromEnv = env.BANNERWATCH_CONFIG?.trim();
  if (fromEnv) return path.resolve(cwd, fromEnv);
  const local = path.join(cwd, CONFIG_FILENAME);
  return fs.existsSync(local) ? local : null;
}

/** Load and validate the effective configuration. */
export function loadConfig(options: LoadConfigOptions = {}): SupervisorConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const config = defaultConfig(cwd);

  // The daemon log follows logDir unless a layer pins it explicitly.
  let logFilePinned = false;

  const filePath = resolveConfigPath(options.configPath, env, cwd);
  if (filePath) {
    logFilePinned = applyFile(config, filePath);
  }

  applyEnv(config, env, cwd);
  applyOverrides(config, options.overrides ?? {}, cwd);

  if (!logFilePinned) {
    config.daemon.logFile = path.join(config.paths.logDir, DAEMON_LOG_FILENAME);
  }

  return config;
}

/** Render a configuration the way `bannerwatch config` prints it. */
export function formatConfig(config: SupervisorConfig): string {
  return stringifyYaml(config);
}

/** Create the output and log directories if missing. */
export function ensureDirectories(config: SupervisorConfig): void {
  fs.mkdirSync(config.paths.outputDir, { recursive: true });
  fs.mkdirSync(config.paths.logDir, { recursive: true });
  fs.mkdirSync(path.dirname(config.daemon.logFile), { recursive: true });
}

// ---------------------------------------------------------------------------
// YAML layer
// ---------------------------------------------------------------------------

/** Merge a YAML file into `config`. Returns whether it set daemon.logFile. */
function applyFile(config: SupervisorConfig, filePath: string): boolean {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError("(file)", filePath, "config file not found");
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    throw new ConfigError("(file)", filePath, `not valid YAML (${String(error)})`);
  }

  if (parsed === null || parsed === undefined) return false;
  const root = requireRecord(parsed, "(root)", filePath);
  // Relative paths in the file resolve against the file's directory.
  const baseDir = path.dirname(filePath);
  let logFilePinned = false;

  const daemon = optionalRecord(root.daemon, "daemon", filePath);
  if (daemon) {
    const command = optionalString(daemon.command, "daemon.command", filePath);
    if (command !== undefined) config.daemon.command = command;
    const args = optionalStringArray(daemon.args, "daemon.args", filePath);
    if (args !== undefined) config.daemon.args = args;
    const host = optionalString(daemon.host, "daemon.host", filePath);
    if (host !== undefined) config.daemon.host = host;
    const logFile = optionalString(daemon.logFile, "daemon.logFile", filePath);
    if (logFile !== undefined) {
      config.daemon.logFile = path.resolve(baseDir, logFile);
      logFilePinned = true;
    }
    const extraEnv = optionalRecord(daemon.env, "daemon.env", filePath);
    if (extraEnv) {
      for (const [key, value] of Object.entries(extraEnv)) {
        if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
          throw new ConfigError(`daemon.env.${key}`, filePath, "must be a scalar");
        }
        config.daemon.env[key] = String(value);
      }
    }
  }

  const readiness = optionalRecord(root.readiness, "readiness", filePath);
  if (readiness) {
    const strategy = optionalString(readiness.strategy, "readiness.strategy", filePath);
    if (strategy !== undefined) {
      config.readiness.strategy = parseStrategy(strategy, "readiness.strategy", filePath);
    }
    const numericKeys = [
      "delayMs",
      "pollIntervalMs",
      "timeoutMs",
      "requestTimeoutMs",
    ] as const satisfies ReadonlyArray<keyof ReadinessConfig>;
    for (const key of numericKeys) {
      const value = optionalDuration(readiness[key], `readiness.${key}`, filePath);
      if (value !== undefined) config.readiness[key] = value;
    }
    const healthPath = optionalString(readiness.healthPath, "readiness.healthPath", filePath);
    if (healthPath !== undefined) {
      if (!healthPath.startsWith("/")) {
        throw new ConfigError("readiness.healthPath", filePath, "must start with '/'");
      }
      config.readiness.healthPath = healthPath;
    }
  }

  const shutdown = optionalRecord(root.shutdown, "shutdown", filePath);
  if (shutdown) {
    const graceMs = optionalDuration(shutdown.graceMs, "shutdown.graceMs", filePath);
    if (graceMs !== undefined) config.shutdown.graceMs = graceMs;
  }

  const paths = optionalRecord(root.paths, "paths", filePath);
  if (paths) {
    const outputDir = optionalString(paths.outputDir, "paths.outputDir", filePath);
    if (outputDir !== undefined) config.paths.outputDir = path.resolve(baseDir, outputDir);
    const logDir = optionalString(paths.logDir, "paths.logDir", filePath);
    if (logDir !== undefined) config.paths.logDir = path.resolve(baseDir, logDir);
  }

  const model = optionalRecord(root.model, "model", filePath);
  if (model) {
    const name = optionalString(model.name, "model.name", filePath);
    if (name !== undefined) config.model.name = name;
  }

  const workload = optionalRecord(root.workload, "workload", filePath);
  if (workload) {
    const command = optionalStringArray(workload.command, "workload.command", filePath);
    if (command !== undefined) config.workload.command = command;
  }

  const logLevel = optionalString(root.logLevel, "logLevel", filePath);
  if (logLevel !== undefined) config.logLevel = parseLogLevel(logLevel, "logLevel", filePath);

  return logFilePinned;
}

// ---------------------------------------------------------------------------
// Environment and override layers
// ---------------------------------------------------------------------------

function applyEnv(config: SupervisorConfig, env: NodeJS.ProcessEnv, cwd: string): void {
  const value = (name: string): string | undefined => {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
  };

  const command = value("BANNERWATCH_DAEMON_COMMAND");
  if (command) config.daemon.command = command;

  const host = value("OLLAMA_HOST");
  if (host) config.daemon.host = host;

  const strategy = value("BANNERWATCH_READINESS");
  if (strategy) {
    config.readiness.strategy = parseStrategy(strategy, "readiness.strategy", "BANNERWATCH_READINESS");
  }

  const delay = value("BANNERWATCH_READY_DELAY_MS");
  if (delay) {
    config.readiness.delayMs = parseDuration(delay, "readiness.delayMs", "BANNERWATCH_READY_DELAY_MS");
  }

  const timeout = value("BANNERWATCH_READY_TIMEOUT_MS");
  if (timeout) {
    config.readiness.timeoutMs = parseDuration(
      timeout,
      "readiness.timeoutMs",
      "BANNERWATCH_READY_TIMEOUT_MS",
    );
  }

  const outputDir = value("BANNERWATCH_OUTPUT_DIR");
  if (outputDir) config.paths.outputDir = path.resolve(cwd, outputDir);

  const logDir = value("BANNERWATCH_LOG_DIR");
  if (logDir) config.paths.logDir = path.resolve(cwd, logDir);

  const model = value("OLLAMA_MODEL");
  if (model) config.model.name = model;

  const logLevel = value("BANNERWATCH_LOG_LEVEL");
  if (logLevel) config.logLevel = parseLogLevel(logLevel, "logLevel", "BANNERWATCH_LOG_LEVEL");
}

function applyOverrides(config: SupervisorConfig, overrides: ConfigOverrides, cwd: string): void {
  if (overrides.strategy) config.readiness.strategy = overrides.strategy;
  if (overrides.delayMs !== undefined) config.readiness.delayMs = overrides.delayMs;
  if (overrides.timeoutMs !== undefined) config.readiness.timeoutMs = overrides.timeoutMs;
  if (overrides.logDir) config.paths.logDir = path.resolve(cwd, overrides.logDir);
  if (overrides.outputDir) config.paths.outputDir = path.resolve(cwd, overrides.outputDir);
  if (overrides.model) config.model.name = overrides.model;
  if (overrides.logLevel) config.logLevel = overrides.logLevel;
}

// ---------------------------------------------------------------------------
// Field validation
// ---------------------------------------------------------------------------

export function parseStrategy(raw: string, field: string, source: string): ReadinessStrategy {
  const match = READINESS_STRATEGIES.find((s) => s === raw);
  if (!match) {
    throw new ConfigError(field, source, `expected one of ${READINESS_STRATEGIES.join(", ")}, got "${raw}"`);
  }
  return match;
}

export function parseLogLevel(raw: string, field: string, source: string): LogLevel {
  const match = LOG_LEVELS.find((l) => l === raw);
  if (!match) {
    throw new ConfigError(field, source, `expected one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
  }
  return match;
}

/** Longest delay a Node timer takes; larger ones fire after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

/** Parse a non-negative integer millisecond value. */
export function parseDuration(raw: string, field: string, source: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(field, source, `expected a non-negative integer (ms), got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value > MAX_DURATION_MS) {
    throw new ConfigError(field, source, `must be at most ${MAX_DURATION_MS} (ms), got ${raw}`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, field: string, source: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(field, source, "must be a mapping");
  }
  return value;
}

function optionalRecord(
  value: unknown,
  field: string,
  source: string,
): Record<string, unknown> | undefined {
  if (value === undefined || value === null) return undefined;
  return requireRecord(value, field, source);
}

function optionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigError(field, source, "must be a non-empty string");
  }
  return value.trim();
}

function optionalStringArray(value: unknown, field: string, source: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigError(field, source, "must be a list of strings");
  }
  return value.map((item, i) => {
    if (typeof item !== "string") {
      throw new ConfigError(`${field}[${i}]`, source, "must be a string");
    }
    return item;
  });
}

function optionalDuration(value: unknown, field: string, source: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(field, source, "must be a non-negative integer (ms)");
  }
  if (value > MAX_DURATION_MS) {
    throw new ConfigError(field, source, `must be at most ${MAX_DURATION_MS} (ms), got ${value}`);
  }
  return value;
}
