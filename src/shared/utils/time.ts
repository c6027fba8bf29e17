import type { Clock } from "../../core/ports/clock.js";

/**
 * Wall-clock helpers for a named IANA zone. The portal lives in
 * Asia/Shanghai regardless of where the container runs, so nothing here
 * consults the host time zone.
 */

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface ZonedTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

/** Throws a RangeError for an unknown zone. */
const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatters.get(timeZone);
  if (cached) return cached;
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
  formatters.set(timeZone, formatter);
  return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
};

export const toZoned = (date: Date, timeZone: string): ZonedTime => {
  const parts = formatterFor(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? 0);
  return {
    year: part("year"),
    month: part("month"),
    day: part("day"),
    hour: part("hour"),
    minute: part("minute"),
    second: part("second"),
  };
};

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** 2026-10-18 */
export const formatZonedDate = (date: Date, timeZone: string): string => {
  const z = toZoned(date, timeZone);
  return `${z.year}-${pad2(z.month)}-${pad2(z.day)}`;
};

/** 07:00:05 */
export const formatZonedTime = (date: Date, timeZone: string): string => {
  const z = toZoned(date, timeZone);
  return `${pad2(z.hour)}:${pad2(z.minute)}:${pad2(z.second)}`;
};
