import type { CalendarEvent, SkippedEntry } from "@/types";
import { isExcludedTitle } from "./fieldHeuristics";

export function dedupeKey(event: CalendarEvent): string {
  return [event.title, event.startAt.toISOString(), event.endAt.toISOString(), event.locationName ?? ""].join("\u0000");
}

/** Order by start, then title, then end. */
export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  const byStart = a.startAt.getTime() - b.startAt.getTime();
  if (byStart !== 0) return byStart;
  if (a.title !== b.title) return a.title < b.title ? -1 : 1;
  return a.endAt.getTime() - b.endAt.getTime();
}

/**
 * Exclusion filter and deduplicator for one parse run.
 * The first event with a given (title, start, end, location) wins.
 */
export class EventCollector {
  private readonly seen = new Set<string>();
  private readonly events: CalendarEvent[] = [];
  private readonly skipped: SkippedEntry[] = [];

  constructor(private readonly excludeKeywords: readonly string[]) {}

  add(event: CalendarEvent): boolean {
    if (isExcludedTitle(event.title, this.excludeKeywords)) {
      this.skipped.push({ reason: "excluded", title: event.title });
      return false;
    }
    const key = dedupeKey(event);
    if (this.seen.has(key)) {
      this.skipped.push({ reason: "duplicate", title: event.title });
      return false;
    }
    this.seen.add(key);
    this.events.push(event);
    return true;
  }

  skip(entry: SkippedEntry): void {
    this.skipped.push(entry);
  }

  sortedEvents(): CalendarEvent[] {
    return [...this.events].sort(compareEvents);
  }

  skippedEntries(): SkippedEntry[] {
    return [...this.skipped];
  }
}
