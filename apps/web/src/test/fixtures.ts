import type { Paper, SearchResponse } from '@paperlens/shared';

export function createPaper(overrides: Partial<Paper> = {}): Paper {
  return {
    id: 'arxiv:2401.01234v1',
    title: 'Graph Neural Networks for Traffic Flow',
    authors: [{ name: 'Ada Lovelace' }, { name: 'Alan Turing' }],
    abstract: 'We study graph networks.',
    source: 'arxiv',
    source_name: 'arXiv',
    published_date: '2024-01-15',
    url: 'https://arxiv.org/abs/2401.01234v1',
    primary_author: { name: 'Ada Lovelace' },
    formatted_authors: 'Ada Lovelace, Alan Turing',
    ...overrides,
  };
}

export function createResponse(overrides: Partial<SearchResponse> = {}): SearchResponse {
  const papers = overrides.papers ?? [
    createPaper(),
    createPaper({
      id: 'openalex:W1',
      title: 'Congestion Pricing Experiments',
      source: 'openalex',
      source_name: 'OpenAlex',
      doi: '10.1000/xyz',
      citation_count: 12,
      url: 'https://doi.org/10.1000/xyz',
    }),
  ];
  return {
    query: 'traffic',
    total_results: 6,
    papers,
    sources: {
      arxiv: { papers: [], count: 2 },
      openalex: { papers: [], count: 4 },
      crossref: { papers: [], count: 0, error: 'Crossref responded with HTTP 500' },
    },
    search_params: { max_results: 2, sort_by: 'relevance', sources: ['arxiv', 'openalex', 'crossref'] },
    ...overrides,
  };
}
