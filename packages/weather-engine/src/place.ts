const TRAILING_PUNCTUATION = /[，。,.;；：:、！？!?]+$/u;
const TRAILING_FILLER = /的$/u;

/**
 * Canonical form of a place description, used both as the geocoding query and in cache keys.
 * Not idempotent: a second pass strips another trailing filler character.
 */
export function normalizePlace(place: string): string {
  return place.replace(/\s+/gu, "").replace(TRAILING_PUNCTUATION, "").replace(TRAILING_FILLER, "");
}
