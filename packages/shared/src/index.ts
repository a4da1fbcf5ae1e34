// ============ Source Types ============

/** Source ids in priority order: used as dedup and ranking tie-break */
export const SOURCE_IDS = ['arxiv', 'openalex', 'crossref'] as const;

export type SourceId = (typeof SOURCE_IDS)[number];

export const SOURCE_LABELS: Record<SourceId, string> = {
  arxiv: 'arXiv',
  openalex: 'OpenAlex',
  crossref: 'Crossref',
};

// ============ Paper Types ============

export interface Author {
  name: string;
  affiliation?: string;
  /** ORCID or another persistent author identifier */
  orcid?: string;
}

export interface Paper {
  /** Source-qualified id, e.g. `arxiv:2401.01234v1` */
  id: string;
  title: string;
  authors: Author[];
  /** May be empty when the source has no abstract */
  abstract: string;
  source: SourceId;
  source_name: string;
  /** YYYY-MM-DD, null when the source gives no date */
  published_date: string | null;
  url: string;
  /** Bare DOI without resolver prefix */
  doi?: string;
  categories?: string[];
  citation_count?: number;
  /** First listed author, null when the source lists none */
  primary_author: Author | null;
  formatted_authors: string;
}

export interface SourceResult {
  papers: Paper[];
  count: number;
  error?: string;
}

// ============ Search Types ============

export const SORT_OPTIONS = ['relevance', 'date', 'citations'] as const;

export type SortBy = (typeof SORT_OPTIONS)[number];

export const DEFAULT_MAX_RESULTS = 5;
export const MAX_RESULTS_LIMIT = 50;
export const MAX_QUERY_LENGTH = 500;

export interface SearchRequest {
  query: string;
  max_results?: number;
  sort_by?: SortBy;
  sources?: SourceId[];
  /** YYYY-MM-DD */
  date_from?: string;
  /** YYYY-MM-DD */
  date_to?: string;
}

export interface SearchParams {
  max_results: number;
  sort_by: SortBy;
  sources: SourceId[];
  date_from?: string;
  date_to?: string;
}

export interface SearchResponse {
  query: string;
  /** Deduplicated pool size before truncation */
  total_results: number;
  papers: Paper[];
  sources: Partial<Record<SourceId, SourceResult>>;
  search_params: SearchParams;
}

// ============ API Types ============

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export interface HealthResponse {
  status: 'ok';
  message: string;
  timestamp: string;
  version: string;
}
