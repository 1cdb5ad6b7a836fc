import * as cheerio from "cheerio";
import { hasChildren, isText } from "domhandler";
import type { AnyNode } from "domhandler";
import { cleanSpaces, isGarbageLine } from "./text";

function collectText(nodes: readonly AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * Flatten rendered agenda HTML into its visible text lines, in document order.
 * Every tag boundary starts a new line; entities come back decoded.
 */
export function htmlToLines(html: string): string[] {
  const $ = cheerio.load(html);
  $("script, style, noscript, template").remove();

  const chunks: string[] = [];
  collectText($.root().toArray(), chunks);

  const lines: string[] = [];
  for (const chunk of chunks) {
    for (const part of chunk.split(/\r\n|\r|\n/)) {
      const line = cleanSpaces(part);
      if (line && !isGarbageLine(line)) lines.push(line);
    }
  }
  return lines;
}
