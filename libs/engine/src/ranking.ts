/**
 * Ranking - fuzzy scoring of entries against a query.
 *
 * Catalog-wide search (`resolveBest`, `rank`) scores names only. `scoreEntry`
 * additionally falls back to kind-specific body text and is meant for
 * relevance checks against one known entry.
 */

import { assertNever } from '@ntdocs/catalog';
import type { Catalog, CatalogEntry } from '@ntdocs/catalog';
import { defaultMatcher, type FuzzyMatcher } from './matcher';
import type { RankedEntry, ScoreOptions } from './types';

/** Added to name hits so they always outrank body-text hits */
export const NAME_MATCH_BONUS = 1000;

/** Maximum length of a ranked result list */
export const RANK_LIMIT = 50;

function secondaryTexts(entry: CatalogEntry): readonly string[] {
  switch (entry.kind) {
    case 'define':
      return [entry.value];
    case 'function':
      return [entry.description];
    case 'struct':
    case 'union':
      return entry.fields.map((f) => f.name);
    case 'enum':
      return entry.members.map((m) => m.name);
    case 'typedef':
      return [];
    default:
      return assertNever(entry);
  }
}

/**
 * Relevance of a single entry. Name hits score `NAME_MATCH_BONUS` plus the fuzzy
 * score; otherwise the best score across the entry's body text, or null.
 */
export function scoreEntry(
  entry: CatalogEntry,
  query: string,
  options: ScoreOptions = {},
  matcher: FuzzyMatcher = defaultMatcher,
): number | null {
  const fold = options.ignoreCase ? (s: string) => s.toLowerCase() : (s: string) => s;
  const q = fold(query);

  const nameScore = matcher.score(fold(entry.name), q);
  if (nameScore !== null) return nameScore + NAME_MATCH_BONUS;

  let best: number | null = null;
  for (const hit of matcher.scoreAll(secondaryTexts(entry).map(fold), q)) {
    if (best === null || hit.score > best) best = hit.score;
  }
  return best;
}

function scoreNames(
  catalog: Catalog,
  query: string,
  ignoreCase: boolean,
  matcher: FuzzyMatcher,
): RankedEntry[] {
  const names = ignoreCase ? catalog.names().map((n) => n.toLowerCase()) : catalog.names();
  const q = ignoreCase ? query.toLowerCase() : query;
  return matcher.scoreAll(names, q).map(({ index, score }) => ({ entry: catalog.entries[index], score }));
}

/**
 * Name matches for a query: case-sensitive if anything matches that way,
 * otherwise the lowercased pass. The fallback applies to the whole set.
 */
function matchNames(catalog: Catalog, query: string, matcher: FuzzyMatcher): RankedEntry[] {
  const exact = scoreNames(catalog, query, false, matcher);
  if (exact.length > 0) return exact;
  return scoreNames(catalog, query, true, matcher);
}

/**
 * Single best name match, or null when nothing matches in either pass.
 * Equal top scores resolve to the earliest entry in catalog order.
 */
export function resolveBest(
  catalog: Catalog,
  query: string,
  matcher: FuzzyMatcher = defaultMatcher,
): CatalogEntry | null {
  let best: RankedEntry | null = null;
  for (const hit of matchNames(catalog, query, matcher)) {
    if (best === null || hit.score > best.score) best = hit;
  }
  return best ? best.entry : null;
}

function compareNames(a: RankedEntry, b: RankedEntry): number {
  if (a.entry.name < b.entry.name) return -1;
  if (a.entry.name > b.entry.name) return 1;
  return 0;
}

/**
 * Ranked list for incremental filtering.
 *
 * An empty query lists the catalog by name with a neutral score of 0. Otherwise
 * name matches are sorted by score, ties kept in catalog order.
 */
export function rank(
  catalog: Catalog,
  query: string,
  limit: number = RANK_LIMIT,
  matcher: FuzzyMatcher = defaultMatcher,
): RankedEntry[] {
  const bounded = Math.max(0, Math.min(limit, RANK_LIMIT));

  if (query === '') {
    return catalog.entries
      .map((entry) => ({ entry, score: 0 }))
      .sort(compareNames)
      .slice(0, bounded);
  }

  return matchNames(catalog, query, matcher)
    .sort((a, b) => b.score - a.score)
    .slice(0, bounded);
}
