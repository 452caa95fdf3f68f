import os from "node:os";
import type { ProcessExit } from "../shared/types.js";

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/** Shell convention: a process killed by signal N reports 128 + N. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/** Build a ProcessExit from the values of a child's "exit" event. */
export function normalizeExit(code: number | null, signal: NodeJS.Signals | null): ProcessExit {
  if (code !== null) {
    return { code, signal: null, exitCode: code };
  }
  if (signal !== null) {
    return { code: null, signal, exitCode: signalExitCode(signal) };
  }
  return { code: null, signal: null, exitCode: 1 };
}
