const GARBAGE_PREFIXES = ["Copyright ©"];

/** Collapse every whitespace run (NBSP included) to one space and trim. */
export function cleanSpaces(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

export function isGarbageLine(s: string): boolean {
  const line = cleanSpaces(s);
  if (!line) return true;
  return GARBAGE_PREFIXES.some((p) => line.startsWith(p));
}
