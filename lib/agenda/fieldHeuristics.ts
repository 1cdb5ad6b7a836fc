const LOCATION_KEYWORDS = [
  "TEATRO",
  "PLAZA",
  "BIBLIOTECA",
  "CASA",
  "PALACIO",
  "POLIDEPORTIVO",
  "IGLESIA",
  "CALLE",
  "AVDA",
  "AVENIDA",
  "URBANIZACIÓN",
  "PUERTO",
  "CENTRO",
  "AYUNTAMIENTO",
];

/** True if the line names a place ("Plaza de las Flores", "Teatro Felipe VI", "Avda. España"). */
export function looksLikeLocation(line: string): boolean {
  const up = line.toUpperCase();
  return LOCATION_KEYWORDS.some((k) => up.includes(k));
}

export function isExcludedTitle(title: string, keywords: readonly string[]): boolean {
  const up = title.toUpperCase();
  return keywords.some((k) => k.trim() !== "" && up.includes(k.trim().toUpperCase()));
}
