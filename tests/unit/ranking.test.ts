import { describe, it, expect } from 'vitest';
import { mergeByRank, sortPapers } from '../../apps/api/src/services/paper-search/ranking';
import { makePaper } from '../helpers/papers';

describe('Ranking', () => {
  describe('mergeByRank', () => {
    it('interleaves by rank with source priority breaking ties', () => {
      const merged = mergeByRank({
        crossref: [makePaper({ id: 'c1', source: 'crossref', title: 'c1' })],
        arxiv: [makePaper({ id: 'a1', title: 'a1' }), makePaper({ id: 'a2', title: 'a2' }), makePaper({ id: 'a3', title: 'a3' })],
        openalex: [makePaper({ id: 'o1', source: 'openalex', title: 'o1' }), makePaper({ id: 'o2', source: 'openalex', title: 'o2' })],
      });

      expect(merged.map((p) => p.id)).toEqual(['a1', 'o1', 'c1', 'a2', 'o2', 'a3']);
    });

    it('returns an empty list when nothing succeeded', () => {
      expect(mergeByRank({})).toEqual([]);
    });
  });

  describe('sortPapers', () => {
    const papers = [
      makePaper({ id: 'p1', title: 'p1', published_date: '2019-01-01', citation_count: 5 }),
      makePaper({ id: 'p2', title: 'p2', published_date: null, citation_count: 50 }),
      makePaper({ id: 'p3', title: 'p3', published_date: '2023-06-01' }),
      makePaper({ id: 'p4', title: 'p4', published_date: '2021-03-01', citation_count: 5 }),
    ];

    it('keeps merge order for relevance', () => {
      expect(sortPapers(papers, 'relevance').map((p) => p.id)).toEqual(['p1', 'p2', 'p3', 'p4']);
    });

    it('sorts by date descending with undated papers last', () => {
      expect(sortPapers(papers, 'date').map((p) => p.id)).toEqual(['p3', 'p4', 'p1', 'p2']);
    });

    it('sorts by citations descending, ties newest first, missing counts last', () => {
      expect(sortPapers(papers, 'citations').map((p) => p.id)).toEqual(['p2', 'p4', 'p1', 'p3']);
    });

    it('does not mutate its input', () => {
      sortPapers(papers, 'date');
      expect(papers.map((p) => p.id)).toEqual(['p1', 'p2', 'p3', 'p4']);
    });
  });
});
