import type { CalendarDate, ClockTime } from "@/types";
import { cleanSpaces } from "@/lib/normalize/text";
import { compareDates, expandYear, makeDate, parseClock, parseDmy } from "./dates";

/**
 * Result of classifying one normalized line. A range with start === null is an
 * "until" header ("HASTA EL 04/01/26") whose start depends on parser context.
 */
export type LineTag =
  | { kind: "range"; start: CalendarDate | null; end: CalendarDate }
  | { kind: "dateSet"; dates: CalendarDate[] }
  | { kind: "timedTitle"; start: ClockTime; end: ClockTime | null; title: string }
  | { kind: "section" }
  | { kind: "plain"; text: string };

const DATE_FRAGMENT = String.raw`\d{1,2}/\d{1,2}/\d{2,4}`;
const DEL_HASTA_RE = new RegExp(String.raw`\bDEL\s+(${DATE_FRAGMENT})\s+HASTA\s+(${DATE_FRAGMENT})\b`, "i");
const HASTA_RE = new RegExp(String.raw`\bHASTA(?:\s+EL)?\s+(${DATE_FRAGMENT})\b`, "i");

const DAY_RANGE_RE = /^(\d{1,2})\s*[–-]\s*(\d{1,2})\s*\/\s*(\d{1,2})\s*\/\s*(\d{2,4})$/;
const DAY_LIST_RE = /^(.+?)\s*\/\s*(\d{1,2})\s*\/\s*(\d{2,4})$/;
// A clock time on the left means a timed title that ends in a date, not a header.
const CLOCK_RE = /\d{1,2}:\d{2}/;

const TIME_RANGE_RE = /^(\d{1,2}:\d{2})\s*(?:[–-]|a|hasta)\s*(\d{1,2}:\d{2})\s+(.+)$/i;
const TIME_START_RE = /^(\d{1,2}:\d{2})\s+(.+)$/;

const SECTION_HEADERS = new Set([
  "AGENDA",
  "ENERO",
  "FEBRERO",
  "MARZO",
  "ABRIL",
  "MAYO",
  "JUNIO",
  "JULIO",
  "AGOSTO",
  "SEPTIEMBRE",
  "OCTUBRE",
  "NOVIEMBRE",
  "DICIEMBRE",
  "BELENES",
  "SEMANALES",
  "EXPOSICIONES",
]);

export function parseRangeHeader(line: string): { start: CalendarDate | null; end: CalendarDate } | null {
  const del = line.match(DEL_HASTA_RE);
  if (del) {
    const start = parseDmy(del[1]);
    const end = parseDmy(del[2]);
    if (start && end && compareDates(start, end) <= 0) return { start, end };
  }
  const until = line.match(HASTA_RE);
  if (until) {
    const end = parseDmy(until[1]);
    if (end) return { start: null, end };
  }
  return null;
}

function datesForDays(days: Iterable<number>, year: number, month: number): CalendarDate[] {
  const sorted = [...new Set(days)].sort((a, b) => a - b);
  const out: CalendarDate[] = [];
  for (const day of sorted) {
    const date = makeDate(year, month, day);
    if (date) out.push(date);
  }
  return out;
}

/**
 * Parse a discrete-date-set header: "16/12/25", "15 – 19/12/25", "19-20 & 21/12/25", "09 & 10/01/26".
 * Words before the last "/M/Y" are ignored, so "Sábado 20/12/25" is [20 Dec].
 * Returns a non-empty ascending list, or null.
 */
export function parseDateSetHeader(line: string): CalendarDate[] | null {
  const l = line.trim();

  const exact = parseDmy(l);
  if (exact) return [exact];

  const range = l.match(DAY_RANGE_RE);
  if (range) {
    const from = Number.parseInt(range[1], 10);
    const to = Number.parseInt(range[2], 10);
    if (from > to) return null;
    const days: number[] = [];
    for (let d = from; d <= to; d++) days.push(d);
    const dates = datesForDays(days, expandYear(Number.parseInt(range[4], 10)), Number.parseInt(range[3], 10));
    return dates.length ? dates : null;
  }

  const list = l.match(DAY_LIST_RE);
  if (list) {
    const left = list[1].trim();
    if (CLOCK_RE.test(left)) return null;
    const days: number[] = [];
    for (const m of left.matchAll(/(\d{1,2})\s*[–-]\s*(\d{1,2})/g)) {
      const a = Number.parseInt(m[1], 10);
      const b = Number.parseInt(m[2], 10);
      for (let d = Math.min(a, b); d <= Math.max(a, b); d++) days.push(d);
    }
    for (const m of left.matchAll(/\b(\d{1,2})\b/g)) {
      days.push(Number.parseInt(m[1], 10));
    }
    const dates = datesForDays(days, expandYear(Number.parseInt(list[3], 10)), Number.parseInt(list[2], 10));
    return dates.length ? dates : null;
  }

  return null;
}

/** "18:00 TITLE" or "12:00 – 18:00 TITLE". Impossible clock values are not a match. */
export function parseTimedTitle(line: string): { start: ClockTime; end: ClockTime | null; title: string } | null {
  const l = line.trim();
  const ranged = l.match(TIME_RANGE_RE);
  if (ranged) {
    const start = parseClock(ranged[1]);
    const end = parseClock(ranged[2]);
    if (!start || !end) return null;
    return { start, end, title: cleanSpaces(ranged[3]) };
  }
  const single = l.match(TIME_START_RE);
  if (single) {
    const start = parseClock(single[1]);
    if (!start) return null;
    return { start, end: null, title: cleanSpaces(single[2]) };
  }
  return null;
}

export function isSectionHeader(line: string): boolean {
  return SECTION_HEADERS.has(line.trim().toUpperCase());
}

export function classifyLine(line: string): LineTag {
  const range = parseRangeHeader(line);
  if (range) return { kind: "range", ...range };

  const dates = parseDateSetHeader(line);
  if (dates) return { kind: "dateSet", dates };

  const timed = parseTimedTitle(line);
  if (timed) return { kind: "timedTitle", ...timed };

  if (isSectionHeader(line)) return { kind: "section" };

  return { kind: "plain", text: line };
}
