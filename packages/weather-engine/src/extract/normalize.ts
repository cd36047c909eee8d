/** Keeps the date part of an ISO-like timestamp. */
export const normalizeDate = (text: string): string => {
  const index = text.indexOf("T");
  return index >= 0 ? text.slice(0, index) : text;
};

/** `2024-05-01T08:00+08:00` becomes `2024-05-01 08:00`; unrecognized text is only de-`T`ed. */
export const normalizeDateTime = (text: string): string => {
  if (!text) return text;
  const spaced = text.replace(/T/g, " ");
  const match = /^(\d{4}-\d{2}-\d{2} \d{2}:\d{2})/.exec(spaced);
  return match ? match[1] : spaced;
};

const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/**
 * The service sends precipitation probability either as a 0-1 fraction or as a percentage.
 * Values up to 1 are taken as fractions, so an input of exactly 1 means 100%.
 */
export function normalizeProbabilityPercent(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return null;
  }
  return value <= 1 ? roundTo(value * 100, 1) : roundTo(value, 1);
}

export { roundTo };
