import { z } from 'zod';

export const MOVIE_PARTITION_KEY = 'year';
export const MOVIE_SORT_KEY = 'title';

/**
 * Release year. JSON numbers and numeric strings ("1999") are accepted;
 * anything that is not a safe integer is rejected.
 */
export const MovieYearSchema = z.union(
  [
    z.number().int('Year must be an integer').safe('Year must be a safe integer'),
    z
      .string()
      .trim()
      .regex(/^-?\d+$/, 'Year must be a number')
      .transform(Number)
      .refine(Number.isSafeInteger, 'Year must be a safe integer'),
  ],
  { errorMap: () => ({ message: 'Year must be a number' }) },
);

export const MovieTitleSchema = z.string().trim().min(1, 'Title must not be empty');

export const UNSAFE_NUMBER_MESSAGE = 'Number must be within the safe integer range';

// DynamoDB's document marshaller refuses numbers past Number.MAX_SAFE_INTEGER.
const isStorableNumber = (value: number): boolean =>
  Number.isFinite(value) && Math.abs(value) <= Number.MAX_SAFE_INTEGER;

/** Paths of numbers anywhere under `value` that cannot be stored. */
export function unsafeNumberPaths(value: unknown, path: (string | number)[] = []): (string | number)[][] {
  if (typeof value === 'number') {
    return isStorableNumber(value) ? [] : [path];
  }
  if (Array.isArray(value)) {
    return value.flatMap((item, index) => unsafeNumberPaths(item, [...path, index]));
  }
  if (value !== null && typeof value === 'object') {
    return Object.entries(value).flatMap(([key, item]) => unsafeNumberPaths(item, [...path, key]));
  }
  return [];
}

/**
 * Catalog entry keyed by (year, title). Attributes beyond the key are kept
 * as sent and replaced wholesale on the next write for the same key.
 */
export const CatalogEntrySchema = z
  .object({
    [MOVIE_PARTITION_KEY]: MovieYearSchema,
    [MOVIE_SORT_KEY]: MovieTitleSchema,
  })
  .passthrough()
  .superRefine((entry, ctx) => {
    for (const [name, value] of Object.entries(entry)) {
      if (name === MOVIE_PARTITION_KEY || name === MOVIE_SORT_KEY) continue;
      for (const path of unsafeNumberPaths(value, [name])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path, message: UNSAFE_NUMBER_MESSAGE });
      }
    }
  });

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export type CatalogEntryKey = Pick<CatalogEntry, 'year' | 'title'>;

// Single-string form of the composite key, e.g. "1999#The Matrix".
export const formatCatalogEntryKey = (key: CatalogEntryKey): string => `${key.year}#${key.title}`;
