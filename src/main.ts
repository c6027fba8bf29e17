#!/usr/bin/env node

import { runCli } from "./cli/run.js";
import { ExitCode } from "./core/errors/app-error.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { printShutdown } from "./shared/cli.js";

/**
 * Entry point — one run per invocation; the exit status tells the
 * scheduler (cron, k8s CronJob, compose restart policy) how it went.
 */
const controller = new AbortController();

const shutdown = (signal: NodeJS.Signals): void => {
  if (controller.signal.aborted) {
    // Second signal: stop waiting for the current attempt to unwind.
    process.exit(ExitCode.CANCELLED);
  }
  printShutdown(signal);
  controller.abort();
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// Unhandled rejection safety net
process.on("unhandledRejection", (reason) => {
  createLogger("fatal").fatal("Unhandled promise rejection", {
    error: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  process.exitCode = ExitCode.TASK_FAILED;
});

runCli(process.argv.slice(2), { env: process.env, signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`punchcard crashed: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
    process.exitCode = ExitCode.TASK_FAILED;
  });
