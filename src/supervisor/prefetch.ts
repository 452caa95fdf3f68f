/**
 * Build-time model prefetch.
 *
 * Starts the daemon just long enough to pull a model into its store, so the
 * runtime container never has to download it.
 */
import { ensureDirectories, type SupervisorConfig } from "../config/index.js";
import type { InferenceClient, PullResult } from "../inference/client.js";
import { waitForReady } from "../inference/readiness.js";
import { ModelPullError, SupervisorError, errorMessage } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { retry, RetryError } from "../shared/retry.js";
import type { SignalSource } from "../process/workload.js";
import { createClient, createDaemon } from "./daemon-factory.js";
import { withInterrupts } from "./interrupts.js";

export interface PrefetchOptions {
  /** Model to pull. Defaults to config.model.name. */
  model?: string;
  /** Pull even when the model is already installed. */
  force?: boolean;
  logger: Logger;
  signals?: SignalSource;
  client?: InferenceClient;
  /** Retries for transport failures (not daemon rejections). Defaults to 2. */
  maxRetries?: number;
  retryDelayMs?: number;
}

export async function prefetchModel(
  config: SupervisorConfig,
  options: PrefetchOptions,
): Promise<PullResult> {
  const model = options.model ?? config.model.name;
  const client = options.client ?? createClient(config);
  const log = options.logger.child("prefetch");

  ensureDirectories(config);
  const daemon = createDaemon(config, options.logger.child("daemon"));

  return withInterrupts(options.signals ?? process, log, async (signal) => {
    await daemon.start();
    try {
      await waitForReady({
        // No workload follows, so there is no warm-up floor to honour.
        readiness: { ...config.readiness, strategy: "poll", delayMs: 0 },
        probe: () => client.isHealthy(),
        probeUrl: client.healthUrl,
        daemonExited: daemon.exited,
        signal,
        logger: log,
      });

      if (!options.force && (await client.hasModel(model))) {
        log.info(`Model ${model} already present, skipping pull`);
        return { model, status: "present", skipped: true };
      }

      log.info(`--- Pulling ${model} model... ---`);
      const result = await pullWithRetry(client, model, signal, log, options);
      log.info(`Model ${model} pulled`);
      return result;
    } finally {
      await daemon.stop(config.shutdown.graceMs);
    }
  });
}

async function pullWithRetry(
  client: InferenceClient,
  model: string,
  signal: AbortSignal,
  log: Logger,
  options: PrefetchOptions,
): Promise<PullResult> {
  try {
    return await retry(() => client.pullModel(model, signal), {
      maxRetries: options.maxRetries ?? 2,
      initialDelayMs: options.retryDelayMs ?? 2_000,
      isRetryable: (error) => !(error instanceof SupervisorError) && !signal.aborted,
      onRetry: (error, attempt, delayMs) =>
        log.warn(`Pull attempt ${attempt} failed (${errorMessage(error)}), retrying in ${Math.round(delayMs)}ms`),
      signal,
    });
  } catch (error: unknown) {
    if (!(error instanceof RetryError)) throw error;
    if (error.cause instanceof SupervisorError) throw error.cause;
    if (signal.aborted) throw signal.reason;
    throw new ModelPullError(model, errorMessage(error.cause));
  }
}
