/**
 * Paper Search - Shared types for source adapters and orchestration
 * Adapters return structured SourceResults only and never reject.
 */

import type { SearchRequest, SearchResponse, SortBy, SourceId, SourceResult } from '@paperlens/shared';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/** Query handed to a single source adapter */
export interface SourceQuery {
  /** Trimmed free-text query */
  query: string;
  limit: number;
  sortBy: SortBy;
  /** Inclusive lower bound (YYYY-MM-DD) */
  dateFrom?: string;
  /** Inclusive upper bound (YYYY-MM-DD) */
  dateTo?: string;
}

/**
 * PaperSource interface.
 * Each adapter encapsulates one external API; failures are reported
 * through SourceResult.error, never thrown.
 */
export interface PaperSource {
  readonly id: SourceId;
  readonly label: string;
  search(query: SourceQuery): Promise<SourceResult>;
}

/** Per-adapter HTTP settings, passed in explicitly */
export interface SourceClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  mailto?: string;
  /** Defaults to global fetch */
  fetch?: FetchLike;
}

export type PaperSourceRegistry = Partial<Record<SourceId, PaperSource>>;

export type PaperSearchFn = (request: SearchRequest) => Promise<SearchResponse>;
