/**
 * Command submitter — the action collaborator is an external program
 * (e.g. the browser-automation script). Exit status 0 is a successful
 * submission; anything else is a failed attempt.
 */

import { ActionFailure } from "../../core/errors/action-failure.js";
import { type AppError, configurationError, errorMessage } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { Submitter } from "../../core/ports/submitter.js";
import { type Result, err, ok, tryCatchAsync } from "../../core/types/result.js";
import { type ProcessResult, type ProcessRunner, spawnProcess } from "./process-runner.js";

interface CommandSubmitterDeps {
  readonly name: string;
  /** Whitespace-separated; no shell is involved */
  readonly commandLine: string;
  readonly timeoutMs: number;
  readonly env: NodeJS.ProcessEnv;
  readonly logger: Logger;
  readonly runProcess?: ProcessRunner | undefined;
}

export interface ParsedCommand {
  readonly command: string;
  readonly args: readonly string[];
}

export const parseCommandLine = (line: string): Result<ParsedCommand, AppError> => {
  const [command, ...args] = line.trim().split(/\s+/);
  if (!command) {
    return err(configurationError("Command line is empty", { commandLine: line }));
  }
  return ok({ command, args });
};

const lastLines = (text: string, count: number): string[] =>
  text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .slice(-count);

const describeFailure = (result: ProcessResult, timeoutMs: number): string => {
  if (result.timedOut) return `timed out after ${timeoutMs}ms`;
  if (result.exitCode === null) return `terminated by ${result.signal ?? "unknown signal"}`;
  return `exited with code ${result.exitCode}`;
};

export const createCommandSubmitter = (deps: CommandSubmitterDeps): Result<Submitter, AppError> => {
  const parsed = parseCommandLine(deps.commandLine);
  if (!parsed.ok) return parsed;

  const { name, timeoutMs, env, logger } = deps;
  const { command, args } = parsed.value;
  const runProcess = deps.runProcess ?? spawnProcess;

  const submitter: Submitter = {
    name,

    async submit(signal: AbortSignal) {
      const startedAt = performance.now();
      const run = await tryCatchAsync(() => runProcess({ command, args, env, timeoutMs, signal }));
      const durationMs = Math.round(performance.now() - startedAt);

      if (!run.ok) {
        return err(
          new ActionFailure(`${name}: could not start ${command}: ${errorMessage(run.error)}`, { command }, {
            cause: run.error,
          }),
        );
      }

      const result = run.value;
      for (const line of lastLines(result.stdout, 20)) {
        logger.debug(line, { stream: "stdout", command });
      }

      if (result.exitCode === 0 && !result.timedOut) {
        return ok({ output: lastLines(result.stdout, 1).join(""), durationMs });
      }

      const stderrTail = lastLines(result.stderr, 3).join(" | ");
      const reason = describeFailure(result, timeoutMs);
      return err(
        new ActionFailure(`${name}: ${command} ${reason}${stderrTail ? ` (${stderrTail})` : ""}`, {
          command,
          exitCode: result.exitCode,
          signal: result.signal,
          timedOut: result.timedOut,
          durationMs,
        }),
      );
    },
  };

  return ok(submitter);
};
