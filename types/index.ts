/** A calendar date with no time of day. month is 1-12. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ClockTime {
  /** 0-23 */
  hour: number;
  /** 0-59 */
  minute: number;
}

/**
 * Finished event as emitted by the agenda parser.
 * startAt/endAt are instants; local wall time is resolved in the configured timezone.
 */
export interface CalendarEvent {
  readonly title: string;
  readonly startAt: Date;
  readonly endAt: Date;
  readonly locationName: string | null;
  readonly description: string;
}

export type SkipReason =
  | "no_active_dates"
  | "untitled_range"
  | "empty_title"
  | "excluded"
  | "duplicate"
  | "invalid_interval";

export interface SkippedEntry {
  reason: SkipReason;
  title?: string;
  line?: string;
}

export interface ParseResult {
  events: CalendarEvent[];
  skipped: SkippedEntry[];
}

export const DEFAULT_TIMEZONE = "Europe/Madrid";
export const DEFAULT_EVENT_DURATION_HOURS = 2;
export const MAX_TITLE_LENGTH = 200;

export const AGENDA_URL = "https://turismo.estepona.es/agenda/";
export const SOURCE_DESCRIPTION = "Fuente: turismo.estepona.es/agenda";
export const DEFAULT_EXCLUDE_KEYWORDS = ["LOUIE LOUIE"] as const;
