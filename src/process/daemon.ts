/**
 * Background model-serving daemon.
 *
 * Starts the daemon with stdout/stderr redirected to a log file and keeps
 * the handle so the supervisor can watch for an early exit and stop it on
 * shutdown.
 */
import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { DaemonStartError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { ProcessExit, ProcessInfo } from "../shared/types.js";
import { normalizeExit } from "./exit.js";

export interface DaemonOptions {
  command: string;
  args: string[];
  /** Truncated on start, then receives both output streams. */
  logFile: string;
  /** Full environment of the daemon. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
}

export class DaemonProcess {
  private readonly options: DaemonOptions;
  private child: ChildProcess | null = null;
  private exitInfo: ProcessExit | null = null;
  private exitPromise: Promise<ProcessExit> | null = null;
  private processInfo: ProcessInfo | null = null;

  constructor(options: DaemonOptions) {
    this.options = options;
  }

  /** Command line for logs. */
  get commandLine(): string {
    return [this.options.command, ...this.options.args].join(" ");
  }

  /** Resolves when the daemon exits. Never rejects. */
  get exited(): Promise<ProcessExit> {
    if (!this.exitPromise) {
      throw new Error("Daemon has not been started");
    }
    return this.exitPromise;
  }

  /**
   * Spawn the daemon and wait for the OS to confirm it started.
   *
   * @throws DaemonStartError when the executable cannot be spawned.
   */
  async start(): Promise<ProcessInfo> {
    if (this.child) {
      throw new Error("Daemon already started");
    }

    const { command, args, logFile, logger } = this.options;
    fs.mkdirSync(path.dirname(logFile), { recursive: true });

    let child: ChildProcess;
    const fd = fs.openSync(logFile, "w");
    try {
      child = spawn(command, args, {
        stdio: ["ignore", fd, fd],
        env: this.options.env ?? process.env,
        cwd: this.options.cwd,
      });
    } catch (error: unknown) {
      throw new DaemonStartError(command, error);
    } finally {
      // The child holds its own copy of the descriptor.
      fs.closeSync(fd);
    }
    this.child = child;

    let resolveExit: (exit: ProcessExit) => void = () => {};
    this.exitPromise = new Promise<ProcessExit>((resolve) => {
      resolveExit = resolve;
    });
    const settle = (exit: ProcessExit) => {
      if (this.exitInfo) return;
      this.exitInfo = exit;
      resolveExit(exit);
    };

    child.on("exit", (code, signal) => {
      const exit = normalizeExit(code, signal);
      if (this.processInfo) {
        logger?.debug(`Daemon (pid ${this.processInfo.pid}) exited with status ${exit.exitCode}`);
      }
      settle(exit);
    });

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.on("error", (error) => {
        if (!this.processInfo) {
          settle({ code: null, signal: null, exitCode: 1 });
          reject(new DaemonStartError(command, error));
          return;
        }
        logger?.warn(`Daemon error: ${error.message}`);
      });
    });

    this.processInfo = {
      pid: child.pid ?? -1,
      command: this.commandLine,
      startedAt: Date.now(),
    };
    logger?.debug(`Daemon started (pid ${this.processInfo.pid}), logging to ${logFile}`);
    return this.processInfo;
  }

  /**
   * Stop the daemon: SIGTERM, then SIGKILL once `graceMs` has passed.
   * Returns null when the daemon was never started.
   */
  async stop(graceMs: number): Promise<ProcessExit | null> {
    const child = this.child;
    if (!child || !this.exitPromise) return null;
    if (this.exitInfo) return this.exitInfo;

    this.options.logger?.debug(`Stopping daemon (pid ${child.pid ?? "?"})`);
    child.kill("SIGTERM");

    const timer = setTimeout(() => {
      if (!this.exitInfo) {
        this.options.logger?.warn(`Daemon ignored SIGTERM for ${graceMs}ms, sending SIGKILL`);
        child.kill("SIGKILL");
      }
    }, graceMs);

    try {
      return await this.exitPromise;
    } finally {
      clearTimeout(timer);
    }
  }
}
