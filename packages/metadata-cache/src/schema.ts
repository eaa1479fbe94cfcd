/**
 * zod schemas for entries read back from the cache file.
 *
 * Entries written by this package always validate; the schemas guard
 * against hand edits and files written by other tools.
 */

import { z } from 'zod';

const nullableText = z.string().nullable();
const nullableNumber = z.number().nullable();

export const EnrichedMetadataSchema = z.object({
  title: z.string().min(1),
  year: nullableText,
  rated: nullableText,
  released: nullableText,
  runtime: nullableText,
  genre: nullableText,
  director: nullableText,
  actors: nullableText,
  plot: nullableText,
  language: nullableText,
  country: nullableText,
  awards: nullableText,
  posterUrl: nullableText,
  metascore: nullableNumber,
  imdbRating: nullableNumber,
  imdbVotes: nullableNumber,
  imdbId: nullableText,
  boxOffice: nullableText,
  enrichedAt: z.string().datetime(),
  resultKind: z.literal('match'),
});

export const CacheEntrySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('matched'),
    storedAt: z.string().datetime(),
    metadata: EnrichedMetadataSchema,
  }),
  z.object({
    kind: z.literal('not_found'),
    storedAt: z.string().datetime(),
    title: z.string(),
  }),
  z.object({
    kind: z.literal('error'),
    storedAt: z.string().datetime(),
    title: z.string(),
    reason: z.string(),
  }),
]);
