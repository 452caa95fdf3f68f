#!/usr/bin/env node
/**
 * bannerwatch: container entrypoint that runs the analysis workload behind
 * a local inference daemon.
 *
 * Installs last-resort error handlers and delegates to Commander.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";

const program = buildProgram();

process.on("uncaughtException", (error) => {
  console.error(
    "[bannerwatch] Uncaught exception:",
    error instanceof Error ? (error.stack ?? error.message) : error,
  );
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(
    "[bannerwatch] Unhandled rejection:",
    reason instanceof Error ? (reason.stack ?? reason.message) : reason,
  );
  process.exit(1);
});

void program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("[bannerwatch] CLI failed:", err instanceof Error ? (err.stack ?? err.message) : err);
  process.exit(1);
});
