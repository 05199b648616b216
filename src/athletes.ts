import type { CountryResolver } from "./countries";
import { normalize, stripFootnoteMarkers } from "./text";

export interface AthleteCountry {
  /** Empty when the cell credits a team */
  athlete: string;
  countryCode: string;
}

const EMPTY_MARKERS = new Set(["nan", "none", "n/a", "-", "–", "—"]);
const TRAILING_SEPARATORS = /[\s,;:\-–—]+$/;

export function isEmptyCell(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length === 0 || EMPTY_MARKERS.has(trimmed.toLowerCase());
}

/**
 * Split a results cell such as "Franjo von Allmen  Switzerland" into the
 * athlete and the country code. Returns null when no country resolves.
 */
export function splitAthleteCountry(
  cellText: string,
  resolver: CountryResolver,
): AthleteCountry | null {
  const trimmed = cellText.trim();
  if (trimmed.length < 3 || EMPTY_MARKERS.has(trimmed.toLowerCase())) {
    return null;
  }

  const text = normalize(stripFootnoteMarkers(trimmed));
  const match = resolver.match(text);
  if (!match) return null;

  const athlete = text.slice(0, match.start).replace(TRAILING_SEPARATORS, "");
  return { athlete, countryCode: match.code };
}
