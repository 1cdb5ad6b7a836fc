import { DEFAULT_EXCLUDE_KEYWORDS, DEFAULT_TIMEZONE, SOURCE_DESCRIPTION } from "@/types";
import type { ParseResult } from "@/types";
import { calendarDateInTimeZone } from "@/lib/scrapers/timezone";
import { cleanSpaces, isGarbageLine } from "@/lib/normalize/text";
import { classifyLine } from "./classifyLine";
import { ContextTracker } from "./contextTracker";
import { EventCollector } from "./eventCollector";
import type { ParseOptions, ResolvedParseOptions } from "./types";

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const timeZone = options.timeZone ?? DEFAULT_TIMEZONE;
  return {
    timeZone,
    referenceDate: options.referenceDate ?? calendarDateInTimeZone(new Date(), timeZone),
    untilStart: options.untilStart ?? "previousDate",
    excludeKeywords: options.excludeKeywords ?? DEFAULT_EXCLUDE_KEYWORDS,
    sourceDescription: options.sourceDescription ?? SOURCE_DESCRIPTION,
  };
}

/**
 * Walk the agenda's text lines once and return the finished events, deduplicated
 * and sorted by start (then title, then end).
 *
 * Every header and every new timed title flushes the open context, so no event
 * waits for the end of input. Pass referenceDate to make "until" headers
 * independent of the wall clock.
 */
export function parseAgendaLines(lines: Iterable<string>, options: ParseOptions = {}): ParseResult {
  const resolved = resolveParseOptions(options);
  const collector = new EventCollector(resolved.excludeKeywords);
  const tracker = new ContextTracker(collector, resolved);

  for (const raw of lines) {
    const line = cleanSpaces(raw);
    if (isGarbageLine(line)) continue;
    tracker.consume(classifyLine(line), line);
  }
  tracker.flush();

  return { events: collector.sortedEvents(), skipped: collector.skippedEntries() };
}
