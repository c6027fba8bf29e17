import type { TaskOutcome } from "../core/entities/task.entity.js";
import { formatZonedDate, formatZonedTime } from "./utils/time.js";

// ── ANSI escape sequences (zero dependencies) ──────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const bold = (s: string) => `${esc("1")}${s}${reset}`;
const dim = (s: string) => `${esc("2")}${s}${reset}`;

const cyan = (s: string) => `${esc("36")}${s}${reset}`;
const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgCyan = (s: string) => `${esc("46")}${esc("30")} ${s} ${reset}`;
const bgGreen = (s: string) => `${esc("42")}${esc("30")} ${s} ${reset}`;
const bgYellow = (s: string) => `${esc("43")}${esc("30")} ${s} ${reset}`;
const bgMagenta = (s: string) => `${esc("45")}${esc("97")} ${s} ${reset}`;
const bgRed = (s: string) => `${esc("41")}${esc("97")} ${s} ${reset}`;

// ── ASCII Logo ──────────────────────────────────────────────────────────

const logo = (version: string): string => {
  const lines = [
    `${bold(cyan("  ┌─────────────────────────────────────────┐"))}`,
    `${bold(cyan("  │"))}   ${bold(white("⏱ punchcard"))}  ${dim(gray(`v${version}`))}${" ".repeat(Math.max(1, 25 - version.length))}${bold(cyan("│"))}`,
    `${bold(cyan("  │"))}   ${dim(gray("Scheduled check-in with retries"))}       ${bold(cyan("│"))}`,
    `${bold(cyan("  └─────────────────────────────────────────┘"))}`,
  ];
  return lines.join("\n");
};

// ── Public API ──────────────────────────────────────────────────────────

interface RunBannerInfo {
  readonly command: string;
  readonly version: string;
  readonly username: string;
  readonly now: Date;
  readonly timeZone: string;
  readonly notifier: string;
}

/**
 * Prints the startup banner: what runs, when, and for whom.
 */
export const printRunBanner = (info: RunBannerInfo): void => {
  const { now, timeZone } = info;
  const lines: string[] = [];

  lines.push("");
  lines.push(logo(info.version));
  lines.push("");
  lines.push(`  ${bgCyan(info.command.toUpperCase())}`);
  lines.push("");
  lines.push(
    `  ${gray("├─")} ${dim("Time")}       ${white(`${formatZonedDate(now, timeZone)} ${formatZonedTime(now, timeZone)}`)} ${dim(`(${timeZone})`)}`,
  );
  lines.push(`  ${gray("├─")} ${dim("User")}       ${white(info.username || "(not set)")}`);
  lines.push(`  ${gray("├─")} ${dim("Notifier")}   ${white(info.notifier)}`);
  lines.push(`  ${gray("└─")} ${dim("PID")}        ${white(String(process.pid))}`);
  lines.push("");

  process.stdout.write(lines.join("\n") + "\n");
};

const statusBadge = (status: TaskOutcome["status"]): string => {
  switch (status) {
    case "succeeded":
      return bgGreen("SUCCEEDED");
    case "failed":
      return bgRed("FAILED");
    case "skipped":
      return bgYellow("SKIPPED");
  }
};

/**
 * Prints a one-line summary of a finished task.
 */
export const printTaskSummary = (outcome: TaskOutcome): void => {
  const attempts = outcome.run ? `${dim("attempts")} ${bold(white(String(outcome.run.attemptsUsed)))}` : "";
  const error =
    outcome.run?.lastError !== undefined ? `  ${dim("error")} ${red(outcome.run.lastError.message)}` : "";
  process.stdout.write(`\n  ${statusBadge(outcome.status)} ${bold(white(outcome.kind))}  ${attempts}${error}\n\n`);
};

export const printHelp = (version: string): void => {
  const lines = [
    "",
    logo(version),
    "",
    `  ${bold(white("Usage"))}  ${cyan("punchcard")} ${yellow("<command>")}`,
    "",
    `  ${green("checkin")}        Submit the check-in once (morning or evening by local time)`,
    `  ${green("daily-report")}   Submit the daily report once`,
    `  ${green("schedule")}       Stay running and fire both tasks at their configured times`,
    `  ${green("version")}        Show version`,
    `  ${green("help")}           Show this help`,
    "",
    `  ${dim("Exit status: 0 succeeded or skipped, 1 failed, 2 bad configuration, 64 unknown command, 130 interrupted.")}`,
    "",
  ];
  process.stdout.write(lines.join("\n") + "\n");
};

export const printUnknownCommand = (command: string): void => {
  process.stderr.write(
    `\n  ${red("✗")} ${dim("Unknown command:")} ${bold(white(command))}\n  ${dim("Run")} ${cyan("punchcard help")} ${dim("to see available commands.")}\n\n`,
  );
};

/**
 * Prints a clean shutdown message.
 */
export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", stopping after the current step…")}\n\n`,
  );
};

/**
 * Prints a config validation error with hints.
 */
export const printConfigError = (errors: Record<string, unknown>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    const list = Array.isArray(messages) ? messages : [messages];
    for (const msg of list) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(String(msg))}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: check the environment variables passed to the container:")}`);
  lines.push(`  ${cyan("$ docker inspect --format '{{.Config.Env}}' <container>")}`);
  lines.push("");

  process.stderr.write(lines.join("\n") + "\n");
};
