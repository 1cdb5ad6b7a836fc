import type { CalendarDate } from "@/types";
import type { LineTag } from "./classifyLine";
import { compareDates } from "./dates";
import { looksLikeLocation } from "./fieldHeuristics";
import { materializeEventContext, materializeRange } from "./materialize";
import type { EventCollector } from "./eventCollector";
import type { EventContext, PendingRange, ResolvedParseOptions } from "./types";

/**
 * scanning: nothing open, no active dates.
 * dated:    active date set, no event open.
 * range:    a PendingRange is open (awaiting its title while title === null).
 * event:    an EventContext is open on the active date set.
 */
export type TrackerState =
  | { mode: "scanning" }
  | { mode: "dated"; dates: CalendarDate[] }
  | { mode: "range"; range: PendingRange }
  | { mode: "event"; dates: CalendarDate[]; event: EventContext };

export class ContextTracker {
  private state: TrackerState = { mode: "scanning" };
  /** Most recent date-set header, kept across ranges for "until" starts. */
  private lastDateSet: CalendarDate[] | null = null;

  constructor(
    private readonly collector: EventCollector,
    private readonly options: ResolvedParseOptions
  ) {}

  get current(): TrackerState {
    return this.state;
  }

  consume(tag: LineTag, line: string): void {
    switch (tag.kind) {
      case "range":
        this.flush();
        this.state = {
          mode: "range",
          range: { start: this.resolveRangeStart(tag.start, tag.end), end: tag.end, title: null, details: [] },
        };
        return;

      case "dateSet":
        this.flush();
        this.lastDateSet = tag.dates;
        this.state = { mode: "dated", dates: tag.dates };
        return;

      case "timedTitle":
        if (this.state.mode === "range") {
          this.addRangeLine(this.state.range, line);
          return;
        }
        this.flush();
        if (this.state.mode !== "dated") {
          this.collector.skip({ reason: "no_active_dates", title: tag.title, line });
          return;
        }
        this.state = {
          mode: "event",
          dates: this.state.dates,
          event: {
            dates: [...this.state.dates],
            start: tag.start,
            end: tag.end,
            title: tag.title,
            location: null,
            extra: [],
          },
        };
        return;

      case "section":
        return;

      case "plain":
        if (this.state.mode === "range") {
          this.addRangeLine(this.state.range, tag.text);
        } else if (this.state.mode === "event") {
          const event = this.state.event;
          if (event.location === null && looksLikeLocation(tag.text)) {
            event.location = tag.text;
          } else {
            event.extra.push(tag.text);
          }
        }
        return;
    }
  }

  /**
   * Materialize whatever is open and drop it. An open event falls back to its
   * date set; an open range leaves no active dates.
   */
  flush(): void {
    const opts = { timeZone: this.options.timeZone, sourceDescription: this.options.sourceDescription };
    switch (this.state.mode) {
      case "range": {
        const result = materializeRange(this.state.range, opts);
        result.events.forEach((e) => this.collector.add(e));
        result.skipped.forEach((s) => this.collector.skip(s));
        this.state = { mode: "scanning" };
        return;
      }
      case "event": {
        const result = materializeEventContext(this.state.event, opts);
        result.events.forEach((e) => this.collector.add(e));
        result.skipped.forEach((s) => this.collector.skip(s));
        this.state = { mode: "dated", dates: this.state.dates };
        return;
      }
      case "scanning":
      case "dated":
        return;
    }
  }

  private addRangeLine(range: PendingRange, line: string): void {
    if (range.title === null) {
      range.title = line;
    } else {
      range.details.push(line);
    }
  }

  private resolveRangeStart(start: CalendarDate | null, end: CalendarDate): CalendarDate {
    if (start) return start;
    let implicit = this.options.referenceDate;
    if (this.options.untilStart === "previousDate" && this.lastDateSet) {
      implicit = this.lastDateSet[0];
    }
    return compareDates(implicit, end) > 0 ? end : implicit;
  }
}
