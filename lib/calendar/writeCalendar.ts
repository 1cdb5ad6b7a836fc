import { rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { CalendarEvent } from "@/types";
import { formatCalendar } from "./formatIcs";

export class EmptyCalendarError extends Error {
  constructor(readonly path: string) {
    super(`No events parsed; refusing to overwrite ${path}`);
    this.name = "EmptyCalendarError";
  }
}

export interface WriteCalendarOptions {
  stamp?: Date;
  timeZone?: string;
}

/**
 * Write the calendar next to its target and rename it into place. An empty
 * event list throws before touching the file.
 */
export async function writeCalendarFile(
  path: string,
  events: readonly CalendarEvent[],
  options: WriteCalendarOptions = {}
): Promise<void> {
  if (events.length === 0) throw new EmptyCalendarError(path);

  const ics = formatCalendar(events, options.stamp ?? new Date(), options.timeZone);
  const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await writeFile(tmpPath, ics, "utf-8");
    await rename(tmpPath, path);
  } catch (e) {
    await unlink(tmpPath).catch((cleanupError: unknown) => {
      const code = cleanupError instanceof Error && "code" in cleanupError ? cleanupError.code : undefined;
      if (code !== "ENOENT") {
        console.warn(`[calendar] could not remove ${tmpPath}:`, cleanupError);
      }
    });
    throw e;
  }
}
