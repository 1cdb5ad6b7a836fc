import type { ParseResult } from "@/types";
import type { ParseOptions } from "@/lib/agenda/types";

export interface Scraper {
  id: string;
  name: string;
  /** Fetch the listing's HTML. Throws on any failure. */
  fetch(): Promise<string>;
  /** Parse HTML into calendar events (pure, sync). */
  parse(html: string, options?: ParseOptions): ParseResult;
}
