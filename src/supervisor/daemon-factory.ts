import type { SupervisorConfig } from "../config/index.js";
import { InferenceClient } from "../inference/client.js";
import type { Logger } from "../shared/logger.js";
import { DaemonProcess } from "../process/daemon.js";

/** Environment of the daemon: ours, the configured extras, and its bind address. */
export function buildDaemonEnv(
  config: SupervisorConfig,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return {
    ...base,
    ...config.daemon.env,
    OLLAMA_HOST: config.daemon.host,
  };
}

export function createDaemon(config: SupervisorConfig, logger?: Logger): DaemonProcess {
  return new DaemonProcess({
    command: config.daemon.command,
    args: config.daemon.args,
    logFile: config.daemon.logFile,
    env: buildDaemonEnv(config),
    logger,
  });
}

export function createClient(config: SupervisorConfig): InferenceClient {
  return new InferenceClient({
    host: config.daemon.host,
    healthPath: config.readiness.healthPath,
    requestTimeoutMs: config.readiness.requestTimeoutMs,
  });
}
