/**
 * Engine result and option types
 */

import type { CatalogEntry } from '@ntdocs/catalog';

export interface RankedEntry {
  readonly entry: CatalogEntry;
  /** Fuzzy relevance; higher is better. 0 for the unfiltered listing. */
  readonly score: number;
}

export interface ScoreOptions {
  /** Lowercase the query and candidate texts before matching */
  ignoreCase?: boolean;
}
