/**
 * @ntdocs/engine - definition synthesis and fuzzy ranking
 *
 * @packageDocumentation
 */

export { DocsService } from './docs.service';

export { rawDefinition, prettyDefinition, resolveStructAlias } from './definition';

export { scoreEntry, resolveBest, rank, NAME_MATCH_BONUS, RANK_LIMIT } from './ranking';

export { FuzzyMatcher, defaultMatcher } from './matcher';
export type { ScoredIndex } from './matcher';

export type { RankedEntry, ScoreOptions } from './types';
