import { type AppOverrides, createApp } from "../bootstrap.js";
import { TaskKind, TaskStatus } from "../core/entities/task.entity.js";
import { ExitCode, exitCodeFor } from "../core/errors/app-error.js";
import { type Env, parseConfig } from "../infrastructure/config/config.js";
import { printConfigError, printHelp, printRunBanner, printTaskSummary, printUnknownCommand } from "../shared/cli.js";

export const VERSION = "1.0.0";

export interface CliOptions {
  readonly env: Env;
  /** Aborted on SIGINT/SIGTERM */
  readonly signal: AbortSignal;
  readonly overrides?: AppOverrides | undefined;
}

/**
 * Route one command line to its handler and return the process exit code.
 *
 *   punchcard checkin | daily-report | schedule | version | help
 */
export const runCli = async (args: readonly string[], options: CliOptions): Promise<ExitCode> => {
  const command = args[0]?.toLowerCase() ?? "";

  let kind: TaskKind | null = null;
  switch (command) {
    case "checkin":
    case "check-in":
      kind = TaskKind.CHECKIN;
      break;

    case "daily-report":
    case "report":
      kind = TaskKind.DAILY_REPORT;
      break;

    case "schedule":
      break;

    case "version":
    case "-v":
    case "--version":
      process.stdout.write(`punchcard v${VERSION}\n`);
      return ExitCode.SUCCESS;

    case "":
    case "help":
    case "-h":
    case "--help":
      printHelp(VERSION);
      return ExitCode.SUCCESS;

    default:
      printUnknownCommand(command);
      return ExitCode.USAGE;
  }

  const config = parseConfig(options.env);
  if (!config.ok) {
    printConfigError(config.error.details ?? {});
    return ExitCode.CONFIG_ERROR;
  }

  const app = createApp(config.value, options.overrides);
  if (!app.ok) {
    printConfigError(app.error.details ?? { error: app.error.message });
    return exitCodeFor(app.error.code);
  }

  const { logger, notifier, tasks, scheduler } = app.value;
  printRunBanner({
    command,
    version: VERSION,
    username: config.value.username,
    now: new Date(),
    timeZone: config.value.timeZone,
    notifier: notifier.enabled ? notifier.name : "disabled",
  });

  // A stopped scheduler is its normal end, not an interrupted run.
  if (kind === null) {
    await scheduler.start(options.signal);
    return ExitCode.SUCCESS;
  }

  const result = await tasks[kind].execute(options.signal);
  if (!result.ok) {
    logger.error("Task did not complete", { task: kind, code: result.error.code, error: result.error.message });
    return exitCodeFor(result.error.code);
  }

  printTaskSummary(result.value);
  return result.value.status === TaskStatus.FAILED ? ExitCode.TASK_FAILED : ExitCode.SUCCESS;
};
