/**
 * FuzzyMatcher tests
 */

import { FuzzyMatcher } from '../matcher';

describe('FuzzyMatcher', () => {
  const matcher = new FuzzyMatcher();

  it('matches an in-order subsequence', () => {
    expect(matcher.score('MAX_PATH', 'MAXPATH')).not.toBeNull();
  });

  it('rejects characters out of order', () => {
    expect(matcher.score('MAX_PATH', 'HTAP')).toBeNull();
  });

  it('is case-sensitive', () => {
    expect(matcher.score('NtClose', 'ntclose')).toBeNull();
    expect(matcher.score('ntclose', 'ntclose')).not.toBeNull();
  });

  it('does not fold accented characters', () => {
    expect(matcher.score('Cafe', 'Café')).toBeNull();
    expect(matcher.score('Café', 'Cafe')).toBeNull();
    expect(matcher.score('Café', 'Café')).not.toBeNull();
  });

  it('scores contiguous matches above scattered ones', () => {
    const contiguous = matcher.score('NtClose', 'Close');
    const scattered = matcher.score('NtCallosumEdge', 'Close');

    expect(contiguous).not.toBeNull();
    expect(scattered).not.toBeNull();
    expect(contiguous ?? 0).toBeGreaterThan(scattered ?? 0);
  });

  it('reports only matching texts, in input order', () => {
    const hits = matcher.scoreAll(['NtClose', 'ntohs', 'NtOpenFile', 'NtCloseObjectAuditAlarm'], 'NtC');
    expect(hits.map((h) => h.index)).toEqual([0, 3]);
  });

  it('returns nothing for an empty list', () => {
    expect(matcher.scoreAll([], 'x')).toEqual([]);
  });
});
