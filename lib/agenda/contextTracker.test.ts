import { describe, it, expect } from "vitest";
import { ContextTracker } from "./contextTracker";
import { EventCollector } from "./eventCollector";
import { classifyLine } from "./classifyLine";
import { resolveParseOptions } from "./parseAgenda";
import type { ParseOptions } from "./types";

function setup(overrides: ParseOptions = {}) {
  const options = resolveParseOptions({ referenceDate: { year: 2025, month: 12, day: 1 }, ...overrides });
  const collector = new EventCollector(options.excludeKeywords);
  const tracker = new ContextTracker(collector, options);
  const feed = (...lines: string[]) => lines.forEach((l) => tracker.consume(classifyLine(l), l));
  return { tracker, collector, feed };
}

describe("ContextTracker transitions", () => {
  it("moves scanning → dated → event and flushes on the next timed title", () => {
    const { tracker, collector, feed } = setup();
    expect(tracker.current.mode).toBe("scanning");

    feed("16/12/25");
    expect(tracker.current.mode).toBe("dated");

    feed("18:00 CONCIERTO", "Plaza de las Flores");
    expect(tracker.current).toMatchObject({ mode: "event", event: { title: "CONCIERTO", location: "Plaza de las Flores" } });
    expect(collector.sortedEvents()).toHaveLength(0);

    feed("20:00 CINE");
    expect(collector.sortedEvents().map((e) => e.title)).toEqual(["CONCIERTO"]);
    expect(tracker.current).toMatchObject({ mode: "event", event: { title: "CINE" } });

    tracker.flush();
    expect(tracker.current.mode).toBe("dated");
    expect(collector.sortedEvents().map((e) => e.title)).toEqual(["CONCIERTO", "CINE"]);
  });

  it("keeps the first location and files later ones as extra text", () => {
    const { tracker, feed } = setup();
    feed("16/12/25", "18:00 CONCIERTO", "Plaza Mayor", "Teatro Felipe VI", "Entrada libre");
    expect(tracker.current).toMatchObject({
      mode: "event",
      event: { location: "Plaza Mayor", extra: ["Teatro Felipe VI", "Entrada libre"] },
    });
  });

  it("discards a timed title with no active dates", () => {
    const { tracker, collector, feed } = setup();
    feed("18:00 HUÉRFANO", "Plaza Mayor");
    expect(tracker.current.mode).toBe("scanning");
    tracker.flush();
    expect(collector.sortedEvents()).toEqual([]);
    expect(collector.skippedEntries()).toEqual([
      { reason: "no_active_dates", title: "HUÉRFANO", line: "18:00 HUÉRFANO" },
    ]);
  });

  it("ignores section headers without changing state", () => {
    const { tracker, feed } = setup();
    feed("16/12/25", "18:00 CONCIERTO", "DICIEMBRE");
    expect(tracker.current).toMatchObject({ mode: "event", event: { title: "CONCIERTO", extra: [] } });
  });
});

describe("ContextTracker ranges", () => {
  it("takes the first content line as title and the rest as details", () => {
    const { tracker, feed } = setup();
    feed("DEL 18/12/25 HASTA 12/01/26");
    expect(tracker.current).toMatchObject({ mode: "range", range: { title: null } });

    feed("ENERO", "BELÉN MUNICIPAL", "Horario: 10:00-20:00", "11:00 Visita guiada");
    expect(tracker.current).toMatchObject({
      mode: "range",
      range: { title: "BELÉN MUNICIPAL", details: ["Horario: 10:00-20:00", "11:00 Visita guiada"] },
    });
  });

  it("is closed by a date-set header, which becomes the active date set", () => {
    const { tracker, collector, feed } = setup();
    feed("DEL 18/12/25 HASTA 20/12/25", "MERCADO NAVIDEÑO", "19/12/25");
    expect(tracker.current).toEqual({ mode: "dated", dates: [{ year: 2025, month: 12, day: 19 }] });
    expect(collector.sortedEvents().map((e) => e.title)).toEqual(["MERCADO NAVIDEÑO"]);
  });

  it("clears the active dates", () => {
    const { tracker, collector, feed } = setup();
    feed("16/12/25", "DEL 18/12/25 HASTA 20/12/25");
    tracker.flush();
    expect(tracker.current.mode).toBe("scanning");
    feed("18:00 CONCIERTO");
    expect(collector.skippedEntries()).toEqual([
      { reason: "untitled_range" },
      { reason: "no_active_dates", title: "CONCIERTO", line: "18:00 CONCIERTO" },
    ]);
  });
});

describe("ContextTracker until headers", () => {
  it("starts at the most recent date-set header by default", () => {
    const { tracker, feed } = setup();
    feed("16/12/25", "18:00 CONCIERTO", "HASTA EL 04/01/26");
    expect(tracker.current).toMatchObject({
      mode: "range",
      range: { start: { year: 2025, month: 12, day: 16 }, end: { year: 2026, month: 1, day: 4 } },
    });
  });

  it("starts at the reference date without a previous date set", () => {
    const { tracker, feed } = setup();
    feed("HASTA 04/01/26");
    expect(tracker.current).toMatchObject({ mode: "range", range: { start: { year: 2025, month: 12, day: 1 } } });
  });

  it("starts at the reference date under the referenceDate policy", () => {
    const { tracker, feed } = setup({ untilStart: "referenceDate" });
    feed("16/12/25", "HASTA 04/01/26");
    expect(tracker.current).toMatchObject({ mode: "range", range: { start: { year: 2025, month: 12, day: 1 } } });
  });

  it("never starts after its end date", () => {
    const { tracker, feed } = setup({ referenceDate: { year: 2026, month: 2, day: 1 } });
    feed("HASTA 04/01/26");
    expect(tracker.current).toMatchObject({ mode: "range", range: { start: { year: 2026, month: 1, day: 4 } } });
  });
});
