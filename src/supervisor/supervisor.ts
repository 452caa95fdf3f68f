/**
 * Inference server supervisor.
 *
 * Lifecycle of one container run:
 *   1. Create the output and log directories
 *   2. Start the model-serving daemon, output to its log file
 *   3. Wait until it is ready (fixed delay, or health polling held back
 *      until the warm-up interval has passed)
 *   4. Run the main workload with the received arguments, relaying signals
 *   5. Stop the daemon and report the workload's exit status
 *
 * A failure or interrupt before step 4 stops the daemon and surfaces as a
 * SupervisorError carrying the exit code.
 */
import { ensureDirectories, type SupervisorConfig } from "../config/index.js";
import type { InferenceClient } from "../inference/client.js";
import { waitForReady } from "../inference/readiness.js";
import { UsageError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import type { ProcessInfo, ReadinessResult } from "../shared/types.js";
import type { DaemonProcess } from "../process/daemon.js";
import { FORWARDED_SIGNALS, runWorkload, type SignalSource } from "../process/workload.js";
import { createClient, createDaemon } from "./daemon-factory.js";
import { ignoringSignals, withInterrupts } from "./interrupts.js";

export interface SupervisorDeps {
  logger: Logger;
  /** Defaults to `process`. */
  signals?: SignalSource;
  /** Defaults to a client built from the config. */
  client?: InferenceClient;
  /** Environment of the workload. Defaults to process.env. */
  workloadEnv?: NodeJS.ProcessEnv;
  /** Whether the workload shares the supervisor's terminal. Defaults to stdin being a TTY when signals come from `process`. */
  sharesTerminal?: boolean;
}

export interface SupervisorResult {
  /** Status the supervisor should exit with (the workload's). */
  exitCode: number;
  daemon: ProcessInfo;
  readiness: ReadinessResult;
  workload: ProcessInfo | null;
}

export class Supervisor {
  private readonly config: SupervisorConfig;
  private readonly logger: Logger;
  private readonly signals: SignalSource;
  private readonly client: InferenceClient;
  private readonly workloadEnv: NodeJS.ProcessEnv | undefined;
  private readonly sharesTerminal: boolean;

  constructor(config: SupervisorConfig, deps: SupervisorDeps) {
    this.config = config;
    this.logger = deps.logger;
    this.signals = deps.signals ?? process;
    this.client = deps.client ?? createClient(config);
    this.workloadEnv = deps.workloadEnv;
    this.sharesTerminal = deps.sharesTerminal ?? (this.signals === process && process.stdin.isTTY === true);
  }

  /**
   * Run the workload `argv` (or the configured default command when empty)
   * behind a ready daemon.
   */
  async run(argv: readonly string[]): Promise<SupervisorResult> {
    const command = argv.length > 0 ? [...argv] : [...this.config.workload.command];
    if (command.length === 0) {
      throw new UsageError("No workload command given and workload.command is not configured");
    }

    ensureDirectories(this.config);

    const log = this.logger.child("supervisor");
    const daemon = createDaemon(this.config, this.logger.child("daemon"));

    const { daemonInfo, readiness } = await this.startDaemon(daemon, log);

    let stopping = false;
    void daemon.exited.then((exit) => {
      if (!stopping) {
        log.warn(`Daemon exited unexpectedly with status ${exit.exitCode} while the workload runs`);
      }
    });

    log.info("Daemon ready. Running the main command...");
    log.debug(`Workload: ${command.join(" ")}`);

    let workloadInfo: ProcessInfo | null = null;
    try {
      const exit = await runWorkload(command, {
        signals: this.signals,
        env: this.workloadEnv,
        sharesTerminal: this.sharesTerminal,
        logger: log,
        onSpawn: (info) => {
          workloadInfo = info;
        },
      });
      log.info(`Workload exited with status ${exit.exitCode}`);
      return { exitCode: exit.exitCode, daemon: daemonInfo, readiness, workload: workloadInfo };
    } finally {
      stopping = true;
      // The workload's forwarders are gone by now; a signal must not cut the SIGKILL escalation short.
      await ignoringSignals(this.signals, log, FORWARDED_SIGNALS, () => daemon.stop(this.config.shutdown.graceMs));
      log.debug("Daemon stopped");
    }
  }

  private async startDaemon(
    daemon: DaemonProcess,
    log: Logger,
  ): Promise<{ daemonInfo: ProcessInfo; readiness: ReadinessResult }> {
    return withInterrupts(this.signals, log, async (signal) => {
      log.info("Starting inference daemon...");
      const daemonInfo = await daemon.start();
      log.info(`Daemon started (pid ${daemonInfo.pid}), log: ${this.config.daemon.logFile}`);

      try {
        const readiness = await waitForReady({
          readiness: this.config.readiness,
          probe: () => this.client.isHealthy(),
          probeUrl: this.client.healthUrl,
          daemonExited: daemon.exited,
          startedAt: daemonInfo.startedAt,
          signal,
          logger: log,
        });
        return { daemonInfo, readiness };
      } catch (error: unknown) {
        await daemon.stop(this.config.shutdown.graceMs);
        throw error;
      }
    });
  }
}
