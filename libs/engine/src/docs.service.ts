/**
 * DocsService - query and rendering operations over one shared catalog.
 *
 * UI callbacks hold a single service instance instead of passing the catalog
 * around; the catalog is never mutated.
 */

import type { Catalog, CatalogEntry } from '@ntdocs/catalog';
import { prettyDefinition, rawDefinition } from './definition';
import { FuzzyMatcher } from './matcher';
import { rank, resolveBest, scoreEntry } from './ranking';
import type { RankedEntry, ScoreOptions } from './types';

export class DocsService {
  private readonly matcher: FuzzyMatcher;

  constructor(
    readonly catalog: Catalog,
    matcher?: FuzzyMatcher,
  ) {
    this.matcher = matcher ?? new FuzzyMatcher();
  }

  /** Best name match for a one-shot lookup */
  resolve(query: string): CatalogEntry | null {
    return resolveBest(this.catalog, query, this.matcher);
  }

  /** Ranked name matches for live filtering, at most 50 */
  rank(query: string, limit?: number): RankedEntry[] {
    return rank(this.catalog, query, limit, this.matcher);
  }

  /** Relevance of one entry, including body-text fallback */
  score(entry: CatalogEntry, query: string, options?: ScoreOptions): number | null {
    return scoreEntry(entry, query, options, this.matcher);
  }

  raw(entry: CatalogEntry): string {
    return rawDefinition(entry, this.catalog);
  }

  pretty(entry: CatalogEntry): string {
    return prettyDefinition(entry, this.catalog);
  }

  /** Entry names in catalog order */
  list(): string[] {
    return this.catalog.names();
  }
}
