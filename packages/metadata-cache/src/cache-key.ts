/**
 * Lookup key derivation.
 *
 * A key is the lower-cased, trimmed title, suffixed with `|<year>` when a
 * year hint is present. A year-less and a year-qualified lookup of the same
 * title are cached independently.
 */

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

/**
 * @example
 * ```typescript
 * makeCacheKey('  The Dark Knight ');    // 'the dark knight'
 * makeCacheKey('The Dark Knight', 2008); // 'the dark knight|2008'
 * ```
 */
export function makeCacheKey(title: string, year?: number): string {
  const normalized = normalizeTitle(title);
  return year === undefined ? normalized : `${normalized}|${year}`;
}
