// Text canonicalization shared by every matcher

const FOOTNOTE_PATTERN = /\[[^\]]*\]/g;
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]/gu;

export function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Remove bracketed annotations such as "[a]" or "[edit]"
 */
export function stripFootnoteMarkers(text: string): string {
  return text.replace(FOOTNOTE_PATTERN, "");
}

/**
 * Matching key: lowercase letters and digits only. Never shown to users.
 */
export function canonicalize(text: string): string {
  return normalize(stripFootnoteMarkers(text.toLowerCase())).replace(
    NON_ALPHANUMERIC,
    "",
  );
}

const GENDER_PREFIX = /^(?:(?:wo)?men[’']?s|ladies[’']?)\s+/i;

/**
 * Event name without a leading gender word: "Women's singles" -> "singles".
 * Aggregate tables repeat the gender in the event, single-event pages do not.
 */
export function stripGenderPrefix(eventName: string): string {
  return eventName.trim().replace(GENDER_PREFIX, "");
}

export function isAlphanumeric(char: string): boolean {
  return /^[\p{L}\p{N}]$/u.test(char);
}

/**
 * Canonical form of `text` together with the offset in `text` of each
 * canonical character, so a match in canonical space maps back to a
 * position in the display string.
 */
export function canonicalWithOffsets(text: string): {
  canonical: string;
  offsets: number[];
} {
  let canonical = "";
  const offsets: number[] = [];

  let index = 0;
  for (const char of text) {
    for (const lowered of char.toLowerCase()) {
      if (isAlphanumeric(lowered)) {
        canonical += lowered;
        offsets.push(index);
      }
    }
    index += char.length;
  }

  return { canonical, offsets };
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
