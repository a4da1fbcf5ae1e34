import { describe, it, expect, beforeEach } from 'vitest';
import { MAX_RECENT_QUERIES, useSearchStore } from '../searchStore';

describe('searchStore', () => {
  beforeEach(() => {
    useSearchStore.getState().reset();
  });

  it('starts with every source and the default result count', () => {
    const state = useSearchStore.getState();
    expect(state.sources).toEqual(['arxiv', 'openalex', 'crossref']);
    expect(state.maxResults).toBe(5);
    expect(state.sortBy).toBe('relevance');
    expect(state.recentQueries).toEqual([]);
  });

  describe('toggleSource', () => {
    it('removes and re-adds sources in priority order', () => {
      const { toggleSource } = useSearchStore.getState();

      toggleSource('arxiv');
      expect(useSearchStore.getState().sources).toEqual(['openalex', 'crossref']);

      toggleSource('arxiv');
      expect(useSearchStore.getState().sources).toEqual(['arxiv', 'openalex', 'crossref']);
    });

    it('keeps the last selected source', () => {
      const { toggleSource } = useSearchStore.getState();
      toggleSource('arxiv');
      toggleSource('openalex');
      toggleSource('crossref');

      expect(useSearchStore.getState().sources).toEqual(['crossref']);
    });
  });

  it('saves preferences with sources in priority order', () => {
    useSearchStore.getState().savePreferences({ maxResults: 20, sortBy: 'citations', sources: ['crossref', 'arxiv'] });

    const state = useSearchStore.getState();
    expect(state.maxResults).toBe(20);
    expect(state.sortBy).toBe('citations');
    expect(state.sources).toEqual(['arxiv', 'crossref']);
  });

  describe('recent queries', () => {
    it('puts the latest query first and collapses duplicates', () => {
      const { addRecentQuery } = useSearchStore.getState();
      addRecentQuery('transformers');
      addRecentQuery('graph networks');
      addRecentQuery('  Transformers ');

      expect(useSearchStore.getState().recentQueries).toEqual(['Transformers', 'graph networks']);
    });

    it('ignores blank queries', () => {
      useSearchStore.getState().addRecentQuery('   ');
      expect(useSearchStore.getState().recentQueries).toEqual([]);
    });

    it('keeps a bounded history', () => {
      const { addRecentQuery } = useSearchStore.getState();
      for (let i = 0; i < MAX_RECENT_QUERIES + 3; i++) {
        addRecentQuery(`query ${i}`);
      }

      const { recentQueries } = useSearchStore.getState();
      expect(recentQueries).toHaveLength(MAX_RECENT_QUERIES);
      expect(recentQueries[0]).toBe(`query ${MAX_RECENT_QUERIES + 2}`);
    });

    it('can be cleared', () => {
      useSearchStore.getState().addRecentQuery('transformers');
      useSearchStore.getState().clearRecentQueries();
      expect(useSearchStore.getState().recentQueries).toEqual([]);
    });
  });

  it('persists preferences to localStorage', () => {
    useSearchStore.getState().savePreferences({ maxResults: 12, sortBy: 'date', sources: ['openalex'] });

    const stored = localStorage.getItem('paper-search-preferences');
    expect(stored).not.toBeNull();
    expect(JSON.parse(stored ?? '{}').state).toEqual({
      maxResults: 12,
      sortBy: 'date',
      sources: ['openalex'],
      recentQueries: [],
    });
  });
});
