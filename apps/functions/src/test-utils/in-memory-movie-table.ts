import { formatCatalogEntryKey, type CatalogEntry, type CatalogEntryKey } from '@movie-catalog/core';
import type { MovieTable, StoredMovie, UpsertOptions } from '@/helpers/db';

export const FIXED_UPDATED_AT = '2026-10-18T10:00:00.000Z';

/**
 * In-process stand-in for the movies table with the same overwrite-by-key
 * behaviour as PutItem.
 */
export function inMemoryMovieTable(tableName = 'movies-test') {
  const items = new Map<string, StoredMovie>();
  const calls: { entry: CatalogEntry; options?: UpsertOptions }[] = [];

  const table: MovieTable = {
    tableName,
    async upsert(entry, options) {
      calls.push({ entry, options });
      const item: StoredMovie = { ...entry, updatedAt: FIXED_UPDATED_AT };
      items.set(formatCatalogEntryKey(entry), item);
      return item;
    },
  };

  return {
    table,
    items,
    calls,
    lookup: (key: CatalogEntryKey): StoredMovie | undefined => items.get(formatCatalogEntryKey(key)),
  };
}

export function failingMovieTable(error: Error, tableName = 'movies-test'): MovieTable {
  return {
    tableName,
    async upsert() {
      throw error;
    },
  };
}
