/**
 * Run configuration from the environment. Every setting has a default, so a bare
 * `npm run generate` works; invalid values fall back to the default.
 */
import { AGENDA_URL, DEFAULT_EXCLUDE_KEYWORDS, DEFAULT_TIMEZONE } from "@/types";
import type { ParseOptions, UntilStartPolicy } from "@/lib/agenda/types";
import { calendarDateInTimeZone, isValidTimeZone } from "./timezone";

type Env = Record<string, string | undefined>;

const DEFAULT_OUTPUT = "agenda.ics";
const DEFAULT_FETCH_TIMEOUT_MS = 90_000;

export function getAgendaUrl(env: Env = process.env): string {
  return env.AGENDA_URL?.trim() || AGENDA_URL;
}

export function getOutputPath(env: Env = process.env): string {
  return env.AGENDA_OUTPUT?.trim() || DEFAULT_OUTPUT;
}

export function getTimeZone(env: Env = process.env): string {
  const raw = env.AGENDA_TIMEZONE?.trim();
  if (!raw || !isValidTimeZone(raw)) return DEFAULT_TIMEZONE;
  return raw;
}

export function getFetchTimeoutMs(env: Env = process.env): number {
  const raw = env.AGENDA_FETCH_TIMEOUT_MS?.trim();
  if (!raw) return DEFAULT_FETCH_TIMEOUT_MS;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return DEFAULT_FETCH_TIMEOUT_MS;
  return n;
}

export function getExcludeKeywords(env: Env = process.env): string[] {
  const raw = env.AGENDA_EXCLUDE_KEYWORDS;
  if (raw === undefined) return [...DEFAULT_EXCLUDE_KEYWORDS];
  return raw
    .split(",")
    .map((k) => k.trim())
    .filter(Boolean);
}

export function getUntilStartPolicy(env: Env = process.env): UntilStartPolicy {
  return env.AGENDA_UNTIL_START?.trim() === "referenceDate" ? "referenceDate" : "previousDate";
}

export function getParseOptions(now = new Date(), env: Env = process.env): ParseOptions {
  const timeZone = getTimeZone(env);
  return {
    timeZone,
    referenceDate: calendarDateInTimeZone(now, timeZone),
    untilStart: getUntilStartPolicy(env),
    excludeKeywords: getExcludeKeywords(env),
  };
}
