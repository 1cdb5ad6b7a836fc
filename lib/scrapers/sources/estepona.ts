import type { Scraper } from "../types";
import { fetchHtml } from "../fetchHtml";
import { getAgendaUrl, getFetchTimeoutMs, getParseOptions } from "../config";
import { htmlToLines } from "@/lib/normalize/htmlToLines";
import { parseAgendaLines } from "@/lib/agenda/parseAgenda";

export const esteponaScraper: Scraper = {
  id: "estepona",
  name: "Agenda de Estepona",

  async fetch() {
    return fetchHtml(getAgendaUrl(), getFetchTimeoutMs());
  },

  parse(html, options = getParseOptions()) {
    return parseAgendaLines(htmlToLines(html), options);
  },
};
