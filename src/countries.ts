import {
  canonicalWithOffsets,
  canonicalize,
  escapeRegExp,
  isAlphanumeric,
  normalize,
  stripFootnoteMarkers,
} from "./text";

export interface CountryMatch {
  code: string;
  /** Mapping key that matched, e.g. "south korea" */
  name: string;
  /** Offsets into the footnote-stripped, whitespace-collapsed text */
  start: number;
  end: number;
  mode: "suffix" | "word";
}

export interface CountryResolver {
  match(text: string): CountryMatch | null;
  resolve(text: string): string | null;
}

interface Candidate {
  name: string;
  code: string;
  canonical: string;
  pattern: RegExp;
}

/**
 * Build a resolver over a lowercase country-name -> NOC mapping.
 * Longer names are always tried first so "south korea" wins over "korea".
 */
export function createCountryResolver(
  countries: Readonly<Record<string, string>>,
): CountryResolver {
  const candidates: Candidate[] = Object.entries(countries)
    .map(([name, code]) => ({
      name: normalize(name.toLowerCase()),
      code,
      canonical: canonicalize(name),
      pattern: wordPattern(name),
    }))
    .filter((candidate) => candidate.canonical.length > 0)
    .sort(
      (a, b) =>
        b.canonical.length - a.canonical.length || a.name.localeCompare(b.name),
    );

  function match(text: string): CountryMatch | null {
    const display = normalize(stripFootnoteMarkers(text));
    if (!display) return null;

    return matchSuffix(display) ?? matchLastWord(display);
  }

  function matchSuffix(display: string): CountryMatch | null {
    const { canonical, offsets } = canonicalWithOffsets(display);
    if (!canonical) return null;

    for (const candidate of candidates) {
      if (!canonical.endsWith(candidate.canonical)) continue;
      const start = offsets[canonical.length - candidate.canonical.length];
      if (!startsWord(display, start)) continue;
      return {
        code: candidate.code,
        name: candidate.name,
        start,
        end: offsets[canonical.length - 1] + 1,
        mode: "suffix",
      };
    }
    return null;
  }

  function matchLastWord(display: string): CountryMatch | null {
    let best: CountryMatch | null = null;

    for (const candidate of candidates) {
      const pattern = candidate.pattern;
      pattern.lastIndex = 0;
      let found: RegExpExecArray | null;
      while ((found = pattern.exec(display)) !== null) {
        const start = found.index;
        const end = start + found[0].length;
        const longer = best !== null && end - start > best.end - best.start;
        if (best === null || end > best.end || (end === best.end && longer)) {
          best = {
            code: candidate.code,
            name: candidate.name,
            start,
            end,
            mode: "word",
          };
        }
      }
    }

    return best;
  }

  return {
    match,
    resolve: (text) => match(text)?.code ?? null,
  };
}

function wordPattern(name: string): RegExp {
  const body = normalize(name)
    .split(" ")
    .map((part) => escapeRegExp(part))
    .join("\\s+");
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, "giu");
}

// A suffix match must not begin inside a word ("Petroc" is not "roc"),
// unless the text runs two words together ("AllmenSwitzerland").
function startsWord(display: string, start: number): boolean {
  if (start === 0) return true;
  const previous = display[start - 1];
  if (!isAlphanumeric(previous)) return true;
  const first = display[start];
  return first !== first.toLowerCase();
}
