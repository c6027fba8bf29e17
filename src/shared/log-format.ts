import type { LogLevel } from "../core/ports/logger.js";

// ── ANSI escape sequences ──────────────────────────────────────────────

const esc = (code: string) => `\x1b[${code}m`;
const reset = esc("0");

const dim = (s: string) => `${esc("2")}${s}${reset}`;

const green = (s: string) => `${esc("32")}${s}${reset}`;
const yellow = (s: string) => `${esc("33")}${s}${reset}`;
const red = (s: string) => `${esc("31")}${s}${reset}`;
const gray = (s: string) => `${esc("90")}${s}${reset}`;
const white = (s: string) => `${esc("97")}${s}${reset}`;

const bgRed = (s: string) => `${esc("41")}${esc("97")} ${s} ${reset}`;

// ── Helpers ─────────────────────────────────────────────────────────────

const timestamp = (): string => {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
};

const levelBadge = (level: LogLevel): string => {
  switch (level) {
    case "debug":
      return gray("DBG");
    case "info":
      return green("INF");
    case "warn":
      return yellow("WRN");
    case "error":
      return red("ERR");
    case "fatal":
      return bgRed("FTL");
  }
};

const formatValue = (v: unknown): string => {
  if (v instanceof Error) return v.message;
  if (typeof v === "object" && v !== null) return JSON.stringify(v);
  return String(v);
};

const formatMeta = (meta: Record<string, unknown>): string => {
  const entries = Object.entries(meta).filter(([, v]) => v !== undefined);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${dim(k)}${dim("=")}${white(formatValue(v))}`);
  return ` ${parts.join(" ")}`;
};

// ── Public formatters ───────────────────────────────────────────────────

/**
 * Format a structured log entry (used by the Logger port).
 *
 *   WRN 07:00:03.120 Attempt failed, retrying  task=checkin attempt=1 remaining=2 delaySeconds=90
 */
export const formatLogEntry = (
  level: LogLevel,
  msg: string,
  meta: Record<string, unknown>,
): string => {
  const ts = dim(gray(timestamp()));
  const badge = levelBadge(level);
  const metaStr = formatMeta(meta);
  return `  ${badge} ${ts} ${white(msg)}${metaStr}\n`;
};
