/**
 * Daemon readiness.
 *
 * Two strategies:
 *   - fixed-delay: block for a constant warm-up interval, whatever the
 *     daemon does meanwhile.
 *   - poll: probe the health endpoint until it answers, bounded by a
 *     timeout, failing as soon as the daemon process exits. The warm-up
 *     interval still applies as a floor: an early answer waits out the rest
 *     of it before the hand-off.
 */
import type { ReadinessConfig } from "../config/index.js";
import { DaemonExitedError, DaemonNotReadyError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { sleep } from "../shared/retry.js";
import type { ProcessExit, ReadinessResult } from "../shared/types.js";

export interface WaitForReadyOptions {
  readiness: ReadinessConfig;
  /** One health check; resolves true when the daemon answers. */
  probe: () => Promise<boolean>;
  /** Shown in timeout errors. */
  probeUrl: string;
  /** Resolves when the daemon process exits. */
  daemonExited: Promise<ProcessExit>;
  /** When the daemon started; the warm-up interval counts from here. Defaults to the start of the wait. */
  startedAt?: number;
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => number;
}

/**
 * Wait until the daemon can take requests.
 *
 * @throws DaemonExitedError (poll) if the daemon exits before the hand-off.
 * @throws DaemonNotReadyError (poll) once `timeoutMs` has elapsed.
 * @throws the abort reason when `signal` aborts.
 */
export async function waitForReady(options: WaitForReadyOptions): Promise<ReadinessResult> {
  const { readiness } = options;
  if (readiness.strategy === "fixed-delay") {
    return waitFixedDelay(options);
  }
  return pollUntilReady(options);
}

async function waitFixedDelay(options: WaitForReadyOptions): Promise<ReadinessResult> {
  const { readiness, signal, logger } = options;
  const now = options.now ?? Date.now;
  const exitOf = trackExit(options.daemonExited);
  const start = options.startedAt ?? now();

  logger?.info(`Waiting ${readiness.delayMs}ms for the daemon to warm up...`);
  // Timers may fire a hair early against the wall clock; top up.
  let elapsed = 0;
  while ((elapsed = now() - start) < readiness.delayMs) {
    await sleep(readiness.delayMs - elapsed, signal);
  }

  const exit = exitOf();
  if (exit) {
    logger?.warn(`Daemon already exited with status ${exit.exitCode}; continuing anyway`);
  }

  return { strategy: "fixed-delay", attempts: 0, elapsedMs: elapsed };
}

async function pollUntilReady(options: WaitForReadyOptions): Promise<ReadinessResult> {
  const { readiness, probe, signal, logger } = options;
  const now = options.now ?? Date.now;
  const exitOf = trackExit(options.daemonExited);
  const start = now();
  const warmUntil = (options.startedAt ?? start) + readiness.delayMs;
  const deadline = start + readiness.timeoutMs;
  let attempts = 0;

  logger?.info(`Waiting for daemon at ${options.probeUrl} (timeout ${readiness.timeoutMs}ms)...`);

  for (;;) {
    signal?.throwIfAborted();
    throwIfExited(exitOf());

    attempts++;
    if (await probe()) {
      logger?.debug(`Daemon answered after ${attempts} probe(s), ${now() - start}ms`);
      let early = 0;
      while ((early = warmUntil - now()) > 0) {
        logger?.trace(`Holding the hand-off ${early}ms until the warm-up interval has passed`);
        await pauseUnlessExited(early, options.daemonExited, signal);
        throwIfExited(exitOf());
      }
      return { strategy: "poll", attempts, elapsedMs: now() - start };
    }
    throwIfExited(exitOf());

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new DaemonNotReadyError(options.probeUrl, attempts, readiness.timeoutMs);
    }

    logger?.trace(`Probe ${attempts} failed, retrying in ${readiness.pollIntervalMs}ms`);
    await pauseUnlessExited(Math.min(readiness.pollIntervalMs, remaining), options.daemonExited, signal);
  }
}

/** Sleep for `ms`, cut short when the daemon exits; rejects when `signal` aborts. */
async function pauseUnlessExited(
  ms: number,
  daemonExited: Promise<ProcessExit>,
  signal: AbortSignal | undefined,
): Promise<void> {
  const pause = new AbortController();
  const onAbort = () => pause.abort(signal?.reason);
  signal?.addEventListener("abort", onAbort, { once: true });
  try {
    await Promise.race([sleep(ms, pause.signal), daemonExited]);
  } finally {
    signal?.removeEventListener("abort", onAbort);
    // Cancels the pending sleep when the daemon exit won the race.
    if (!pause.signal.aborted) pause.abort();
  }
}

/** Synchronous view of an exit promise. */
function trackExit(exited: Promise<ProcessExit>): () => ProcessExit | null {
  let exit: ProcessExit | null = null;
  void exited.then((value) => {
    exit = value;
  });
  return () => exit;
}

function throwIfExited(exit: ProcessExit | null): void {
  if (exit) {
    throw new DaemonExitedError(exit.code, exit.signal);
  }
}
