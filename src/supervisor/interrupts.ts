import { InterruptedError } from "../shared/errors.js";
import type { Logger } from "../shared/logger.js";
import { signalExitCode } from "../process/exit.js";
import type { SignalSource } from "../process/workload.js";

/** Signals that cancel startup before the workload owns the terminal. */
export const STARTUP_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Run `fn` with an AbortSignal that aborts (with an InterruptedError) when
 * one of STARTUP_SIGNALS arrives. Listeners are removed when `fn` settles.
 */
export async function withInterrupts<T>(
  signals: SignalSource,
  logger: Logger,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.warn(`Received ${signal}, shutting down`);
    controller.abort(new InterruptedError(signal, signalExitCode(signal)));
  };

  for (const signal of STARTUP_SIGNALS) {
    signals.on(signal, interrupt);
  }
  try {
    return await fn(controller.signal);
  } finally {
    for (const signal of STARTUP_SIGNALS) {
      signals.off(signal, interrupt);
    }
  }
}

/**
 * Run `fn` with `toIgnore` caught and logged, so none of them takes its
 * default action (terminating the supervisor) while `fn` is pending.
 */
export async function ignoringSignals<T>(
  signals: SignalSource,
  logger: Logger,
  toIgnore: readonly NodeJS.Signals[],
  fn: () => Promise<T>,
): Promise<T> {
  const ignore = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal} while stopping the daemon; finishing shutdown`);
  };

  for (const signal of toIgnore) {
    signals.on(signal, ignore);
  }
  try {
    return await fn();
  } finally {
    for (const signal of toIgnore) {
      signals.off(signal, ignore);
    }
  }
}
