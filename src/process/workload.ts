/**
 * Main workload runner.
 *
 * Spawns the workload as a monitored child with inherited stdio and the
 * received argument vector untouched, relays termination signals to it and
 * reports how it exited.
 */
import { spawn } from "node:child_process";
import { UsageError, WorkloadSpawnError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { ProcessExit, ProcessInfo } from "../shared/types.js";
import { normalizeExit } from "./exit.js";

/** Signals relayed from the supervisor to the workload. */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP", "SIGQUIT"];

/** Sent by the terminal (Ctrl-C, Ctrl-\) to its whole foreground process group. */
export const TERMINAL_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGQUIT"];

/** Where signals are received from; `process` in production. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface WorkloadOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  signals?: SignalSource;
  forwardSignals?: readonly NodeJS.Signals[];
  /**
   * The workload sits in the supervisor's foreground process group on a
   * terminal, so it already receives TERMINAL_SIGNALS itself; those are
   * caught but not relayed.
   */
  sharesTerminal?: boolean;
  /** Called once the OS confirms the spawn. */
  onSpawn?: (info: ProcessInfo) => void;
  logger?: Logger;
}

/**
 * Run `argv[0]` with `argv.slice(1)` and resolve with its exit.
 *
 * @throws UsageError for an empty argv.
 * @throws WorkloadSpawnError when the command cannot be started.
 */
export function runWorkload(argv: readonly string[], options: WorkloadOptions = {}): Promise<ProcessExit> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new UsageError("No workload command given"));
  }

  const signals = options.signals ?? process;
  const forwardSignals = options.forwardSignals ?? FORWARDED_SIGNALS;
  const sharesTerminal = options.sharesTerminal ?? false;
  const logger = options.logger;

  return new Promise<ProcessExit>((resolve, reject) => {
    let spawned = false;
    let settled = false;

    const child = spawn(command, args, {
      stdio: "inherit",
      env: options.env ?? process.env,
      cwd: options.cwd,
    });

    const forward = (signal: NodeJS.Signals) => {
      if (child.exitCode !== null || child.signalCode !== null) return;
      if (sharesTerminal && TERMINAL_SIGNALS.includes(signal)) {
        logger?.debug(`${signal} came from the terminal; the workload received it too`);
        return;
      }
      logger?.debug(`Forwarding ${signal} to workload (pid ${child.pid ?? "?"})`);
      child.kill(signal);
    };

    const detach = () => {
      for (const signal of forwardSignals) {
        signals.off(signal, forward);
      }
    };

    for (const signal of forwardSignals) {
      signals.on(signal, forward);
    }

    child.once("spawn", () => {
      spawned = true;
      options.onSpawn?.({
        pid: child.pid ?? -1,
        command: argv.join(" "),
        startedAt: Date.now(),
      });
    });

    child.on("error", (error) => {
      if (settled) return;
      if (!spawned) {
        settled = true;
        detach();
        reject(new WorkloadSpawnError(command, error));
        return;
      }
      logger?.warn(`Workload error: ${error.message}`);
    });

    child.once("exit", (code, signal) => {
      if (settled) return;
      settled = true;
      detach();
      resolve(normalizeExit(code, signal));
    });
  });
}
