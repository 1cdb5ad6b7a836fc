import type { Scraper } from "./types";

const scrapers = new Map<string, Scraper>();

/** First registration of an id wins; later ones are ignored. */
export function registerScraper(scraper: Scraper): void {
  if (scrapers.has(scraper.id)) return;
  scrapers.set(scraper.id, scraper);
}

export function getScraperById(id: string): Scraper | undefined {
  return scrapers.get(id);
}

export function getScraperIds(): string[] {
  return [...scrapers.keys()];
}
