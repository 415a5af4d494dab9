/**
 * Embedded Date Text
 *
 * Dates written inside event titles ("Chimera Golf Club 4.4.26").
 * The same three shapes serve two purposes:
 * - extractDate(): recover a date when no bracketed or multi-line date applies
 * - stripDateTokens(): remove dates before computing a StableKey
 */

/** Tried in this order; the first shape that matches anywhere wins */
const DATE_SHAPES: RegExp[] = [
  // "4.4.26", "04.04.2026"
  /\d{1,2}\.\d{1,2}\.\d{2,4}/,
  // "Jan 24", "feb 8"
  /(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+\d{1,2}/i,
  // "02/15/26"
  /\d{1,2}\/\d{1,2}\/\d{2,4}/,
];

/**
 * Best-effort date found inside a title.
 * Returns "" when none of the shapes match.
 */
export function extractDate(title: string): string {
  for (const shape of DATE_SHAPES) {
    const match = shape.exec(title);
    if (match) return match[0];
  }
  return "";
}

/** Remove every date-shaped substring, in shape order */
export function stripDateTokens(text: string): string {
  return DATE_SHAPES.reduce(
    (result, shape) => result.replace(new RegExp(shape.source, `${shape.flags}g`), " "),
    text
  );
}
