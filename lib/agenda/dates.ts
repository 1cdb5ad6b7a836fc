import type { CalendarDate, ClockTime } from "@/types";

const DMY_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{2,4})$/;
const CLOCK_RE = /^(\d{1,2}):(\d{2})$/;

/** Two-digit years belong to this century ("25" -> 2025). */
export function expandYear(year: number): number {
  return year < 100 ? year + 2000 : year;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function makeDate(year: number, month: number, day: number): CalendarDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

/** Parse an exact "D/M/Y" or "D/M/YY" string. Anything else, or an impossible date, is null. */
export function parseDmy(text: string): CalendarDate | null {
  const m = text.trim().match(DMY_RE);
  if (!m) return null;
  return makeDate(expandYear(Number.parseInt(m[3], 10)), Number.parseInt(m[2], 10), Number.parseInt(m[1], 10));
}

export function makeTime(hour: number, minute: number): ClockTime | null {
  if (!Number.isInteger(hour) || !Number.isInteger(minute)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null;
  return { hour, minute };
}

export function parseClock(text: string): ClockTime | null {
  const m = text.trim().match(CLOCK_RE);
  if (!m) return null;
  return makeTime(Number.parseInt(m[1], 10), Number.parseInt(m[2], 10));
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const d = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() };
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function minutesOfDay(time: ClockTime): number {
  return time.hour * 60 + time.minute;
}
