import { describe, it, expect } from "vitest";
import { isExcludedTitle, looksLikeLocation } from "./fieldHeuristics";

describe("looksLikeLocation", () => {
  it("matches place keywords in any casing", () => {
    expect(looksLikeLocation("Plaza de las Flores")).toBe(true);
    expect(looksLikeLocation("teatro Felipe VI")).toBe(true);
    expect(looksLikeLocation("Urbanización El Paraíso")).toBe(true);
    expect(looksLikeLocation("Avda. Juan Carlos I")).toBe(true);
  });

  it("ignores lines without a place keyword", () => {
    expect(looksLikeLocation("Entrada libre")).toBe(false);
    expect(looksLikeLocation("Horario: 10:00-20:00")).toBe(false);
  });
});

describe("isExcludedTitle", () => {
  it("matches denylisted substrings case-insensitively", () => {
    expect(isExcludedTitle("Louie Louie en directo", ["LOUIE LOUIE"])).toBe(true);
    expect(isExcludedTitle("CONCIERTO DE NAVIDAD", ["LOUIE LOUIE"])).toBe(false);
  });

  it("ignores blank keywords", () => {
    expect(isExcludedTitle("Cualquier cosa", [" ", ""])).toBe(false);
  });
});
