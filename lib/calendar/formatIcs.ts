import { DEFAULT_TIMEZONE } from "@/types";
import type { CalendarEvent } from "@/types";
import { dedupeKey } from "@/lib/agenda/eventCollector";

const PRODID = "-//Agenda Calendar//ES";

/** 20251216T170000Z */
export function formatIcsDate(d: Date): string {
  return d.toISOString().replace(/[-:]/g, "").slice(0, 15) + "Z";
}

export function escapeIcsText(s: string): string {
  return s
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r?\n/g, "\\n");
}

/**
 * Stable UID from the same fields the collector dedupes on (title, interval,
 * location), so regenerating the calendar keeps the identity of each event.
 */
export function eventUid(event: CalendarEvent): string {
  const str = dedupeKey(event);
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const c = str.charCodeAt(i);
    hash = (hash << 5) - hash + c;
    hash |= 0;
  }
  return `agenda-${event.startAt.getTime().toString(36)}-${Math.abs(hash).toString(36)}@agenda-calendar`;
}

/** Build a single VEVENT. stamp becomes DTSTAMP. */
export function formatEventIcs(event: CalendarEvent, stamp: Date): string {
  const lines = [
    "BEGIN:VEVENT",
    `UID:${eventUid(event)}`,
    `DTSTAMP:${formatIcsDate(stamp)}`,
    `DTSTART:${formatIcsDate(event.startAt)}`,
    `DTEND:${formatIcsDate(event.endAt)}`,
    `SUMMARY:${escapeIcsText(event.title)}`,
  ];
  if (event.locationName) {
    lines.push(`LOCATION:${escapeIcsText(event.locationName)}`);
  }
  lines.push(`DESCRIPTION:${escapeIcsText(event.description)}`, "END:VEVENT");
  return lines.join("\r\n");
}

export function formatIcsCalendar(vevents: string[], timeZone = DEFAULT_TIMEZONE): string {
  const header = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${PRODID}`,
    "CALSCALE:GREGORIAN",
    "X-WR-TIMEZONE:" + timeZone,
  ];
  const footer = ["END:VCALENDAR"];
  return [...header, ...vevents, ...footer].join("\r\n") + "\r\n";
}

export function formatCalendar(events: readonly CalendarEvent[], stamp: Date, timeZone = DEFAULT_TIMEZONE): string {
  return formatIcsCalendar(
    events.map((e) => formatEventIcs(e, stamp)),
    timeZone
  );
}
