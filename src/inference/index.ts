export { InferenceClient, resolveBaseUrl, modelMatches } from "./client.js";
export type { InferenceClientOptions, PullResult } from "./client.js";
export { waitForReady } from "./readiness.js";
export type { WaitForReadyOptions } from "./readiness.js";
