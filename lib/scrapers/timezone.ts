import { DEFAULT_TIMEZONE } from "@/types";
import type { CalendarDate } from "@/types";

export interface ZonedDateTimeParts {
  /** Full year, e.g. 2026 */
  year: number;
  /** Month 1-12 */
  month: number;
  /** Day 1-31 */
  day: number;
  /** 0-23 */
  hour?: number;
  /** 0-59 */
  minute?: number;
  /** 0-59 */
  second?: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone);
  if (existing) return existing;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/** Wall-clock parts of an instant as seen in timeZone. */
export function partsInTimeZone(date: Date, timeZone = DEFAULT_TIMEZONE): Required<ZonedDateTimeParts> {
  const parts = getFormatter(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number.parseInt(parts.find((p) => p.type === type)?.value ?? "", 10);
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
  };
}

/**
 * Convert a local date/time in an IANA timezone into a UTC Date.
 *
 * `new Date(y, m, d, h...)` would use the host's zone, and the generator usually runs in UTC.
 * Iterative correction similar to date-fns-tz's `zonedTimeToUtc`.
 */
export function dateFromZonedParts(parts: ZonedDateTimeParts, timeZone = DEFAULT_TIMEZONE): Date {
  const desiredLocalMillis = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour ?? 0,
    parts.minute ?? 0,
    parts.second ?? 0,
    0
  );

  // Initial guess: interpret desired local time as UTC, then correct (handles DST shifts).
  let utcMillis = desiredLocalMillis;
  for (let i = 0; i < 3; i++) {
    const got = partsInTimeZone(new Date(utcMillis), timeZone);
    const gotLocalMillis = Date.UTC(got.year, got.month - 1, got.day, got.hour, got.minute, got.second, 0);
    const diff = desiredLocalMillis - gotLocalMillis;
    if (diff === 0) break;
    utcMillis += diff;
  }

  return new Date(utcMillis);
}

/** Add hours to a local wall time, carrying into the date as needed. */
export function addLocalHours(parts: ZonedDateTimeParts, hours: number): Required<ZonedDateTimeParts> {
  const d = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, (parts.hour ?? 0) + hours, parts.minute ?? 0, parts.second ?? 0)
  );
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
  };
}

/** The calendar date of an instant in timeZone. */
export function calendarDateInTimeZone(date: Date, timeZone = DEFAULT_TIMEZONE): CalendarDate {
  const { year, month, day } = partsInTimeZone(date, timeZone);
  return { year, month, day };
}
