export { Supervisor } from "./supervisor.js";
export type { SupervisorDeps, SupervisorResult } from "./supervisor.js";
export { prefetchModel } from "./prefetch.js";
export type { PrefetchOptions } from "./prefetch.js";
export { buildDaemonEnv, createClient, createDaemon } from "./daemon-factory.js";
export { ignoringSignals, withInterrupts, STARTUP_SIGNALS } from "./interrupts.js";
