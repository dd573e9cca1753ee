import { invalidEpoch } from "./errors/catalog.js";

// All calendar arithmetic is UTC; virtual time has no timezone.

export const DEFAULT_EPOCH_TEXT = "2024-01-01T00:00:00";

/** Calendar instant of virtual second zero unless configured otherwise. */
export const DEFAULT_EPOCH = new Date(Date.UTC(2024, 0, 1, 0, 0, 0));

// Date, optionally followed by a time, with no zone designator
const NAIVE_INSTANT = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Read a calendar instant, or `undefined` when `value` isn't one.
 * Strings without an offset are taken as UTC.
 */
export function readInstant(value: Date | string): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : new Date(value.getTime());
  }

  const text = value.trim();
  const naive = NAIVE_INSTANT.exec(text);
  if (naive) {
    const [, year, month, day, hour = "0", minute = "0", second = "0"] = naive;
    const date = new Date(
      Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second))
    );
    // Date.UTC rolls 2024-02-30 over to March
    if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
      return undefined;
    }
    return date;
  }

  const ms = Date.parse(text);
  return Number.isNaN(ms) ? undefined : new Date(ms);
}

/** {@link readInstant}, throwing `CONFIG_INVALID_EPOCH` on unreadable input. */
export function parseInstant(value: Date | string): Date {
  const instant = readInstant(value);
  if (instant === undefined) {
    throw invalidEpoch(value);
  }
  return instant;
}

export function addSeconds(epoch: Date, seconds: number): Date {
  return new Date(epoch.getTime() + seconds * 1000);
}

/** Whole seconds from `epoch` to `instant`, floored. */
export function secondsBetween(epoch: Date, instant: Date): number {
  return Math.floor((instant.getTime() - epoch.getTime()) / 1000);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Format as `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatInstant(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
