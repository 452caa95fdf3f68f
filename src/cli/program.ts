/**
 * CLI program definition for bannerwatch.
 *
 * Uses Commander to define the command structure. Command handlers return
 * the exit code instead of calling process.exit so they stay testable.
 */
import { Command } from "commander";
import { VERSION } from "../version.js";
import {
  formatConfig,
  loadConfig,
  parseDuration,
  parseLogLevel,
  parseStrategy,
  type ConfigOverrides,
  type SupervisorConfig,
} from "../config/index.js";
import { createLogger, type Logger } from "../shared/logger.js";
import { SupervisorError, errorMessage } from "../shared/errors.js";
import { prefetchModel } from "../supervisor/prefetch.js";
import { Supervisor } from "../supervisor/supervisor.js";
import { createClient } from "../supervisor/daemon-factory.js";
import type { SignalSource } from "../process/workload.js";

export interface CommonOptions {
  config?: string;
  logDir?: string;
  outputDir?: string;
  logLevel?: string;
}

export interface ExecOptions extends CommonOptions {
  readiness?: string;
  delay?: string;
  readyTimeout?: string;
}

export interface PullOptions extends CommonOptions {
  force?: boolean;
}

/** Seams for tests; production uses the process and its environment. */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  signals?: SignalSource;
  /** Replaces the logger built from the config. */
  logger?: Logger;
}

function addCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "YAML config file (default: ./bannerwatch.yaml)")
    .option("--log-dir <dir>", "directory for daemon and supervisor logs")
    .option("--output-dir <dir>", "directory for workload output")
    .option("--log-level <level>", "fatal | error | warn | info | debug | trace");
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name("bannerwatch")
    .description("Run the cookie-consent analysis workload behind a local inference daemon")
    .version(VERSION)
    .enablePositionalOptions();

  addCommonOptions(
    program
      .command("exec")
      .description("start the daemon, wait until it is ready, then run the workload command")
      .argument("[command...]", "workload command and its arguments (default: workload.command)")
      .option("--readiness <strategy>", "poll | fixed-delay")
      .option("--delay <ms>", "warm-up interval before the hand-off (a floor when polling)")
      .option("--ready-timeout <ms>", "give up polling the daemon after this long"),
  )
    .passThroughOptions()
    .action(async (command: string[], opts: ExecOptions) => {
      process.exitCode = await handleExec(command, opts, deps);
    });

  addCommonOptions(
    program
      .command("pull")
      .description("start the daemon temporarily and pull a model into its store")
      .argument("[model]", "model name (default: model.name)")
      .option("--force", "pull even if the model is already installed"),
  ).action(async (model: string | undefined, opts: PullOptions) => {
    process.exitCode = await handlePull(model, opts, deps);
  });

  addCommonOptions(
    program.command("health").description("check whether the daemon answers"),
  ).action(async (opts: CommonOptions) => {
    process.exitCode = await handleHealth(opts, deps);
  });

  addCommonOptions(
    program.command("config").description("print the resolved configuration"),
  ).action((opts: CommonOptions) => {
    process.exitCode = handleConfig(opts, deps);
  });

  return program;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export async function handleExec(
  command: string[],
  opts: ExecOptions,
  deps: CliDeps = {},
): Promise<number> {
  return guarded(deps, async () => {
    const overrides: ConfigOverrides = commonOverrides(opts);
    if (opts.readiness) overrides.strategy = parseStrategy(opts.readiness, "readiness.strategy", "--readiness");
    if (opts.delay) overrides.delayMs = parseDuration(opts.delay, "readiness.delayMs", "--delay");
    if (opts.readyTimeout) {
      overrides.timeoutMs = parseDuration(opts.readyTimeout, "readiness.timeoutMs", "--ready-timeout");
    }

    const config = resolveConfig(opts, overrides, deps);
    const logger = deps.logger ?? loggerFor(config);
    const supervisor = new Supervisor(config, { logger, signals: deps.signals, workloadEnv: deps.env });
    const result = await supervisor.run(command);
    return result.exitCode;
  });
}

export async function handlePull(
  model: string | undefined,
  opts: PullOptions,
  deps: CliDeps = {},
): Promise<number> {
  return guarded(deps, async () => {
    const config = resolveConfig(opts, commonOverrides(opts), deps);
    const logger = deps.logger ?? loggerFor(config);
    const result = await prefetchModel(config, {
      model,
      force: opts.force,
      logger,
      signals: deps.signals,
    });
    if (result.skipped) {
      console.log(`[bannerwatch] ${result.model} is already installed.`);
    } else {
      console.log(`[bannerwatch] Pulled ${result.model}.`);
    }
    return 0;
  });
}

export async function handleHealth(opts: CommonOptions, deps: CliDeps = {}): Promise<number> {
  return guarded(deps, async () => {
    const config = resolveConfig(opts, commonOverrides(opts), deps);
    const client = createClient(config);
    try {
      const version = await client.version();
      console.log(`[bannerwatch] Daemon at ${client.baseUrl} is up (version ${version}).`);
      return 0;
    } catch (error: unknown) {
      console.error(`[bannerwatch] Daemon at ${client.baseUrl} is not reachable: ${errorMessage(error)}`);
      return 1;
    }
  });
}

export function handleConfig(opts: CommonOptions, deps: CliDeps = {}): number {
  try {
    const config = resolveConfig(opts, commonOverrides(opts), deps);
    console.log(formatConfig(config).trimEnd());
    return 0;
  } catch (error: unknown) {
    if (error instanceof SupervisorError) {
      console.error(`[bannerwatch] ${error.message}`);
      return error.exitCode;
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function commonOverrides(opts: CommonOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (opts.logDir) overrides.logDir = opts.logDir;
  if (opts.outputDir) overrides.outputDir = opts.outputDir;
  if (opts.logLevel) overrides.logLevel = parseLogLevel(opts.logLevel, "logLevel", "--log-level");
  return overrides;
}

function resolveConfig(
  opts: CommonOptions,
  overrides: ConfigOverrides,
  deps: CliDeps,
): SupervisorConfig {
  return loadConfig({
    configPath: opts.config,
    env: deps.env,
    cwd: deps.cwd,
    overrides,
  });
}

function loggerFor(config: SupervisorConfig): Logger {
  return createLogger({}, { level: config.logLevel, logDir: config.paths.logDir });
}

/** Map SupervisorErrors to their exit codes; anything else is a bug and propagates. */
async function guarded(deps: CliDeps, fn: () => Promise<number>): Promise<number> {
  try {
    return await fn();
  } catch (error: unknown) {
    if (error instanceof SupervisorError) {
      const logger = deps.logger ?? createLogger({}, { fileOutput: false });
      logger.error(error.message);
      return error.exitCode;
    }
    throw error;
  }
}
