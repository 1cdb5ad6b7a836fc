import { DEFAULT_EVENT_DURATION_HOURS, MAX_TITLE_LENGTH } from "@/types";
import type { CalendarDate, CalendarEvent, ClockTime, SkippedEntry } from "@/types";
import { addLocalHours, dateFromZonedParts } from "@/lib/scrapers/timezone";
import { cleanSpaces, isGarbageLine } from "@/lib/normalize/text";
import { addDays, minutesOfDay } from "./dates";
import type { EventContext, PendingRange } from "./types";

export interface MaterializeOptions {
  timeZone: string;
  sourceDescription: string;
}

export interface Materialized {
  events: CalendarEvent[];
  skipped: SkippedEntry[];
}

/** Clean spaces and cut to MAX_TITLE_LENGTH code points. */
export function normalizeTitle(title: string): string {
  return Array.from(cleanSpaces(title)).slice(0, MAX_TITLE_LENGTH).join("").trimEnd();
}

function buildDescription(sourceDescription: string, lines: readonly string[]): string {
  const kept = lines.map(cleanSpaces).filter((l) => !isGarbageLine(l));
  return [sourceDescription, ...kept].join("\n");
}

function zoned(date: CalendarDate, time: ClockTime, timeZone: string): Date {
  return dateFromZonedParts({ ...date, hour: time.hour, minute: time.minute }, timeZone);
}

const MIDNIGHT: ClockTime = { hour: 0, minute: 0 };

/**
 * A titled range becomes one event from start 00:00 to the midnight after the
 * inclusive end date. Untitled ranges produce nothing.
 */
export function materializeRange(range: PendingRange, opts: MaterializeOptions): Materialized {
  if (range.title === null) {
    return { events: [], skipped: [{ reason: "untitled_range" }] };
  }
  const title = normalizeTitle(range.title);
  if (!title) {
    return { events: [], skipped: [{ reason: "empty_title" }] };
  }
  const event: CalendarEvent = {
    title,
    startAt: zoned(range.start, MIDNIGHT, opts.timeZone),
    endAt: zoned(addDays(range.end, 1), MIDNIGHT, opts.timeZone),
    locationName: null,
    description: buildDescription(opts.sourceDescription, range.details),
  };
  return { events: [event], skipped: [] };
}

/**
 * One event per date of the context. Without an end time the event lasts
 * DEFAULT_EVENT_DURATION_HOURS; an end at or before the start is on the next day.
 */
export function materializeEventContext(ctx: EventContext, opts: MaterializeOptions): Materialized {
  const title = normalizeTitle(ctx.title);
  if (!title) {
    return { events: [], skipped: [{ reason: "empty_title", title: ctx.title }] };
  }
  const description = buildDescription(opts.sourceDescription, ctx.extra);
  const locationName = ctx.location ? cleanSpaces(ctx.location) : null;

  const out: Materialized = { events: [], skipped: [] };
  for (const date of ctx.dates) {
    const startAt = zoned(date, ctx.start, opts.timeZone);
    let endAt: Date;
    if (ctx.end === null) {
      const endLocal = addLocalHours({ ...date, hour: ctx.start.hour, minute: ctx.start.minute }, DEFAULT_EVENT_DURATION_HOURS);
      endAt = dateFromZonedParts(endLocal, opts.timeZone);
    } else {
      const endDate = minutesOfDay(ctx.end) <= minutesOfDay(ctx.start) ? addDays(date, 1) : date;
      endAt = zoned(endDate, ctx.end, opts.timeZone);
    }
    // Only reachable when a wall time falls in a DST gap.
    if (endAt.getTime() <= startAt.getTime()) {
      out.skipped.push({ reason: "invalid_interval", title });
      continue;
    }
    out.events.push({ title, startAt, endAt, locationName, description });
  }
  return out;
}
