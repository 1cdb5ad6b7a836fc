#!/usr/bin/env node
/**
 * Agenda Calendar CLI
 *
 * Fetches the agenda page, parses it into events and writes an .ics file.
 *
 * Usage:
 *   npx tsx scripts/generate-calendar.ts                       # Fetch and write agenda.ics
 *   npx tsx scripts/generate-calendar.ts --input page.html     # Parse a saved page
 *   npx tsx scripts/generate-calendar.ts --dry-run --verbose   # Show events, write nothing
 */

import { readFile } from "node:fs/promises";
import { getScraperById, getScraperIds } from "@/lib/scrapers/registry";
import { registerAllScrapers } from "@/lib/scrapers/sources";
import { getOutputPath, getParseOptions, getTimeZone } from "@/lib/scrapers/config";
import { writeCalendarFile } from "@/lib/calendar/writeCalendar";
import type { CalendarEvent, SkippedEntry } from "@/types";

interface CliOptions {
  source: string;
  input?: string;
  output: string;
  dryRun: boolean;
  verbose: boolean;
}

function printHelp(): void {
  console.log(`
Agenda Calendar CLI

Turns the public events agenda into an iCalendar file.

Usage:
  npx tsx scripts/generate-calendar.ts [options]

Options:
  --source <id>           Source to scrape (default: estepona; available: ${getScraperIds().join(", ")})
  --input <file>          Parse a saved HTML file instead of fetching
  --output <file>         Output path (default: $AGENDA_OUTPUT or agenda.ics)
  --dry-run               Parse and print the summary without writing
  --verbose, -v           List every event and every skipped line
  --help, -h              Show this help message

Environment:
  AGENDA_URL, AGENDA_OUTPUT, AGENDA_TIMEZONE, AGENDA_FETCH_TIMEOUT_MS,
  AGENDA_EXCLUDE_KEYWORDS, AGENDA_UNTIL_START (previousDate | referenceDate)
  `);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run with --help for usage information.");
  process.exit(1);
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { source: "estepona", output: getOutputPath(), dryRun: false, verbose: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      printHelp();
      process.exit(0);
    }

    if (arg === "--source" || arg === "--input" || arg === "--output") {
      const value = args[i + 1];
      if (!value) fail(`${arg} needs a value`);
      if (arg === "--source") options.source = value;
      else if (arg === "--input") options.input = value;
      else options.output = value;
      i++;
      continue;
    }

    if (arg === "--dry-run") {
      options.dryRun = true;
      continue;
    }

    if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
      continue;
    }

    fail(`Unknown argument: ${arg}`);
  }

  return options;
}

function formatLocal(date: Date, timeZone: string): string {
  return new Intl.DateTimeFormat("es-ES", {
    timeZone,
    dateStyle: "short",
    timeStyle: "short",
  }).format(date);
}

function printEvents(events: CalendarEvent[], timeZone: string): void {
  events.forEach((e, i) => {
    console.log(`${i + 1}. ${formatLocal(e.startAt, timeZone)} → ${formatLocal(e.endAt, timeZone)}  ${e.title}`);
    if (e.locationName) console.log(`   Location: ${e.locationName}`);
  });
}

function summarizeSkipped(skipped: SkippedEntry[], verbose: boolean): void {
  if (skipped.length === 0) return;
  const counts = new Map<string, number>();
  for (const s of skipped) counts.set(s.reason, (counts.get(s.reason) ?? 0) + 1);
  const summary = [...counts].map(([reason, n]) => `${reason}=${n}`).join(", ");
  console.log(`[generate] skipped ${skipped.length} candidates (${summary})`);
  if (verbose) {
    for (const s of skipped) {
      console.log(`   ${s.reason}: ${s.title ?? s.line ?? ""}`);
    }
  }
}

async function main(): Promise<void> {
  registerAllScrapers();
  const options = parseArgs(process.argv.slice(2));

  const scraper = getScraperById(options.source);
  if (!scraper) fail(`Unknown source: ${options.source}`);

  const timeZone = getTimeZone();
  const now = new Date();

  try {
    const html = options.input ? await readFile(options.input, "utf-8") : await scraper.fetch();
    const { events, skipped } = scraper.parse(html, getParseOptions(now));

    if (options.verbose) printEvents(events, timeZone);
    summarizeSkipped(skipped, options.verbose);
    console.log(`Parsed events: ${events.length}`);

    if (options.dryRun) {
      console.log("Dry run - nothing written");
      return;
    }

    await writeCalendarFile(options.output, events, { stamp: now, timeZone });
    console.log(`Wrote: ${options.output}`);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    console.error(`[generate] ${scraper.id} failed: ${msg}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error("[generate] unexpected failure:", error);
  process.exit(1);
});
