import type { CalendarDate, ClockTime } from "@/types";

/** Open multi-day span started by "DEL … HASTA …" or "HASTA …". end is inclusive. */
export interface PendingRange {
  start: CalendarDate;
  end: CalendarDate;
  /** null until the first content line after the header. */
  title: string | null;
  details: string[];
}

/** Fields of one timed event being read, applied to every date of the active set. */
export interface EventContext {
  dates: CalendarDate[];
  start: ClockTime;
  end: ClockTime | null;
  title: string;
  /** Sticky: set by the first location-looking line, never overwritten. */
  location: string | null;
  extra: string[];
}

/** How an "until" header without an explicit start picks one. */
export type UntilStartPolicy = "previousDate" | "referenceDate";

export interface ParseOptions {
  /** IANA zone the listing's wall times are in. */
  timeZone?: string;
  /** Fallback start for "until" headers. Defaults to today in timeZone. */
  referenceDate?: CalendarDate;
  untilStart?: UntilStartPolicy;
  excludeKeywords?: readonly string[];
  sourceDescription?: string;
}

export type ResolvedParseOptions = Required<ParseOptions>;
