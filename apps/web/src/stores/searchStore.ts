import { create } from 'zustand';
import { persist } from 'zustand/middleware';
import { DEFAULT_MAX_RESULTS, SOURCE_IDS } from '@paperlens/shared';
import type { SortBy, SourceId } from '@paperlens/shared';

export const MAX_RECENT_QUERIES = 8;

interface SearchPreferencesState {
  // State
  maxResults: number;
  sortBy: SortBy;
  sources: SourceId[];
  recentQueries: string[];

  // Actions
  savePreferences: (preferences: { maxResults: number; sortBy: SortBy; sources: SourceId[] }) => void;
  toggleSource: (source: SourceId) => void;
  addRecentQuery: (query: string) => void;
  clearRecentQueries: () => void;
  reset: () => void;
}

type SearchPreferences = Pick<SearchPreferencesState, 'maxResults' | 'sortBy' | 'sources' | 'recentQueries'>;

const initialState: SearchPreferences = {
  maxResults: DEFAULT_MAX_RESULTS,
  sortBy: 'relevance',
  sources: [...SOURCE_IDS],
  recentQueries: [],
};

export const useSearchStore = create<SearchPreferencesState>()(
  persist(
    (set) => ({
      ...initialState,

      savePreferences: ({ maxResults, sortBy, sources }) => {
        set({ maxResults, sortBy, sources: SOURCE_IDS.filter((id) => sources.includes(id)) });
      },

      // Keeps at least one source selected
      toggleSource: (source) => {
        set((state) => {
          if (state.sources.includes(source)) {
            return state.sources.length > 1 ? { sources: state.sources.filter((id) => id !== source) } : {};
          }
          return { sources: SOURCE_IDS.filter((id) => id === source || state.sources.includes(id)) };
        });
      },

      // Most recent first, case-insensitive duplicates collapsed
      addRecentQuery: (query) => {
        const trimmed = query.trim();
        if (!trimmed) return;
        set((state) => ({
          recentQueries: [
            trimmed,
            ...state.recentQueries.filter((q) => q.toLowerCase() !== trimmed.toLowerCase()),
          ].slice(0, MAX_RECENT_QUERIES),
        }));
      },

      clearRecentQueries: () => {
        set({ recentQueries: [] });
      },

      reset: () => {
        set({ ...initialState, sources: [...SOURCE_IDS], recentQueries: [] });
      },
    }),
    {
      name: 'paper-search-preferences',
      partialize: (state): SearchPreferences => ({
        maxResults: state.maxResults,
        sortBy: state.sortBy,
        sources: state.sources,
        recentQueries: state.recentQueries,
      }),
    }
  )
);
