import { registerScraper } from "../registry";
import { esteponaScraper } from "./estepona";

export function registerAllScrapers(): void {
  registerScraper(esteponaScraper);
}

export { esteponaScraper };
