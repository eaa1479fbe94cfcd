/**
 * Release-year hint taken from raw title text.
 */

/** Four-digit years from 1900 through 2029, matched without word boundaries */
const YEAR_TOKEN = /(19\d{2}|20[0-2]\d)/;

/**
 * Returns the leftmost year-like token in a title, or `undefined`.
 *
 * Unrelated numbers that look like years ("Blade Runner 2049" has none in
 * range, "Apollo 1999 Edition" does) produce a hint all the same.
 *
 * @example
 * ```typescript
 * extractYearHint('The Polar Express2017 IMAX Release'); // 2017
 * extractYearHint('Heat');                               // undefined
 * ```
 */
export function extractYearHint(title: string): number | undefined {
  const match = YEAR_TOKEN.exec(title);
  return match?.[1] === undefined ? undefined : Number.parseInt(match[1], 10);
}
