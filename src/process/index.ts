/**
 * Process management for bannerwatch.
 *
 * Handles subprocess lifecycle and signal forwarding for the daemon and
 * the main workload.
 */
export { DaemonProcess } from "./daemon.js";
export type { DaemonOptions } from "./daemon.js";
export { runWorkload, FORWARDED_SIGNALS, TERMINAL_SIGNALS } from "./workload.js";
export type { SignalSource, WorkloadOptions } from "./workload.js";
export { normalizeExit, signalExitCode } from "./exit.js";
