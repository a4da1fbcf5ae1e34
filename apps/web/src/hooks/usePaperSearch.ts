import { useMutation, useQuery } from '@tanstack/react-query';
import type { SearchRequest } from '@paperlens/shared';
import { apiClient } from '../lib/api';
import { useSearchStore } from '../stores/searchStore';

/**
 * Run a paper search; successful queries are remembered as recent searches
 */
export function usePaperSearch() {
  const addRecentQuery = useSearchStore((state) => state.addRecentQuery);

  return useMutation({
    mutationFn: async (request: SearchRequest) => {
      return apiClient.search.papers(request);
    },
    onSuccess: (response) => {
      addRecentQuery(response.query);
    },
  });
}

/**
 * Backend health, shown next to the page title
 */
export function useApiHealth() {
  return useQuery({
    queryKey: ['health'],
    queryFn: () => apiClient.health.check(),
    staleTime: 60000, // 1 minute
    retry: false,
  });
}
