import { describe, it, expect } from "vitest";
import {
  getAgendaUrl,
  getExcludeKeywords,
  getFetchTimeoutMs,
  getOutputPath,
  getParseOptions,
  getTimeZone,
  getUntilStartPolicy,
} from "./config";

describe("config", () => {
  it("falls back to defaults", () => {
    expect(getAgendaUrl({})).toBe("https://turismo.estepona.es/agenda/");
    expect(getOutputPath({ AGENDA_OUTPUT: "  " })).toBe("agenda.ics");
    expect(getTimeZone({})).toBe("Europe/Madrid");
    expect(getFetchTimeoutMs({})).toBe(90_000);
    expect(getExcludeKeywords({})).toEqual(["LOUIE LOUIE"]);
    expect(getUntilStartPolicy({})).toBe("previousDate");
  });

  it("reads overrides", () => {
    expect(getAgendaUrl({ AGENDA_URL: "https://example.com/agenda" })).toBe("https://example.com/agenda");
    expect(getOutputPath({ AGENDA_OUTPUT: "out/cal.ics" })).toBe("out/cal.ics");
    expect(getTimeZone({ AGENDA_TIMEZONE: "Atlantic/Canary" })).toBe("Atlantic/Canary");
    expect(getFetchTimeoutMs({ AGENDA_FETCH_TIMEOUT_MS: "5000" })).toBe(5000);
    expect(getExcludeKeywords({ AGENDA_EXCLUDE_KEYWORDS: "foo, bar ," })).toEqual(["foo", "bar"]);
    expect(getExcludeKeywords({ AGENDA_EXCLUDE_KEYWORDS: "" })).toEqual([]);
    expect(getUntilStartPolicy({ AGENDA_UNTIL_START: "referenceDate" })).toBe("referenceDate");
  });

  it("ignores invalid values", () => {
    expect(getTimeZone({ AGENDA_TIMEZONE: "Not/AZone" })).toBe("Europe/Madrid");
    expect(getFetchTimeoutMs({ AGENDA_FETCH_TIMEOUT_MS: "-5" })).toBe(90_000);
    expect(getFetchTimeoutMs({ AGENDA_FETCH_TIMEOUT_MS: "soon" })).toBe(90_000);
    expect(getUntilStartPolicy({ AGENDA_UNTIL_START: "today" })).toBe("previousDate");
  });

  it("builds parse options with today's date in the configured zone", () => {
    expect(getParseOptions(new Date("2025-12-31T23:30:00Z"), {})).toEqual({
      timeZone: "Europe/Madrid",
      referenceDate: { year: 2026, month: 1, day: 1 },
      untilStart: "previousDate",
      excludeKeywords: ["LOUIE LOUIE"],
    });
  });
});
