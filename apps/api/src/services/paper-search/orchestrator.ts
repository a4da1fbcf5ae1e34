/**
 * Paper Search Orchestrator
 * Queries every requested source concurrently, waits for all of them to
 * settle, then merges by rank, deduplicates by DOI/title, sorts and truncates.
 * A failing source only contributes its error message.
 */

import {
  DEFAULT_MAX_RESULTS,
  MAX_RESULTS_LIMIT,
  SORT_OPTIONS,
  SOURCE_IDS,
} from '@paperlens/shared';
import type {
  Paper,
  SearchParams,
  SearchRequest,
  SearchResponse,
  SortBy,
  SourceId,
  SourceResult,
} from '@paperlens/shared';
import { dedupePapers } from './dedup';
import { describeDateWindow, isIsoDate } from './date-window';
import { PaperSearchValidationError } from './errors';
import { mergeByRank, sortPapers } from './ranking';
import type { PaperSearchFn, PaperSourceRegistry, SourceQuery } from './types';
import { createLogger } from '../logger';

const log = createLogger('Orchestrator');

export interface OrchestratorDeps {
  sources: PaperSourceRegistry;
  defaultMaxResults?: number;
  /** Upper bound for max_results */
  maxResults?: number;
  titleSimilarityThreshold?: number;
}

interface ResolvedRequest {
  query: string;
  params: SearchParams;
}

function isSortBy(value: string): value is SortBy {
  return (SORT_OPTIONS as readonly string[]).includes(value);
}

function resolveMaxResults(value: number | undefined, fallback: number, limit: number): number {
  if (value === undefined) return Math.min(fallback, limit);
  if (!Number.isFinite(value)) {
    throw new PaperSearchValidationError('INVALID_MAX_RESULTS', 'Max results must be a number');
  }
  return Math.min(Math.max(Math.trunc(value), 1), limit);
}

function resolveSources(requested: readonly string[] | undefined, registry: PaperSourceRegistry): SourceId[] {
  if (requested !== undefined && requested.length === 0) {
    throw new PaperSearchValidationError('EMPTY_SOURCES', 'Sources list cannot be empty if provided');
  }
  const wanted = new Set<string>(requested ?? SOURCE_IDS.filter((id) => registry[id]));
  const unknown = [...wanted].filter((id) => !SOURCE_IDS.some((known) => known === id && registry[known]));
  if (unknown.length > 0) {
    const available = SOURCE_IDS.filter((id) => registry[id]).join(', ');
    throw new PaperSearchValidationError(
      'UNKNOWN_SOURCE',
      `Invalid sources: ${unknown.join(', ')}. Valid sources are: ${available}`
    );
  }
  // Priority order, duplicates dropped
  return SOURCE_IDS.filter((id) => wanted.has(id));
}

function resolveDates(request: SearchRequest): Pick<SearchParams, 'date_from' | 'date_to'> {
  const dates: Pick<SearchParams, 'date_from' | 'date_to'> = {};
  for (const key of ['date_from', 'date_to'] as const) {
    const value = request[key]?.trim();
    if (!value) continue;
    if (!isIsoDate(value)) {
      throw new PaperSearchValidationError('INVALID_DATE', `${key} must be a valid date in YYYY-MM-DD format`);
    }
    dates[key] = value;
  }
  if (dates.date_from && dates.date_to && dates.date_from > dates.date_to) {
    throw new PaperSearchValidationError('INVALID_DATE_RANGE', 'date_from must not be after date_to');
  }
  return dates;
}

function resolveRequest(request: SearchRequest, deps: OrchestratorDeps): ResolvedRequest {
  const query = typeof request.query === 'string' ? request.query.trim() : '';
  if (!query) {
    throw new PaperSearchValidationError('EMPTY_QUERY', 'Search query cannot be empty');
  }

  const sortBy = request.sort_by ?? 'relevance';
  if (!isSortBy(sortBy)) {
    throw new PaperSearchValidationError('INVALID_SORT', `Sort must be one of: ${SORT_OPTIONS.join(', ')}`);
  }

  return {
    query,
    params: {
      max_results: resolveMaxResults(
        request.max_results,
        deps.defaultMaxResults ?? DEFAULT_MAX_RESULTS,
        deps.maxResults ?? MAX_RESULTS_LIMIT
      ),
      sort_by: sortBy,
      sources: resolveSources(request.sources, deps.sources),
      ...resolveDates(request),
    },
  };
}

function describeFailure(reason: unknown): string {
  const message = reason instanceof Error ? reason.message : String(reason);
  return message || 'Unknown error';
}

export function createPaperSearchOrchestrator(deps: OrchestratorDeps): PaperSearchFn {
  const { sources: registry, titleSimilarityThreshold } = deps;

  return async function search(request: SearchRequest): Promise<SearchResponse> {
    const { query, params } = resolveRequest(request, deps);
    const sourceQuery: SourceQuery = {
      query,
      limit: params.max_results,
      sortBy: params.sort_by,
      dateFrom: params.date_from,
      dateTo: params.date_to,
    };

    log.info(
      `Searching "${query}" across ${params.sources.join(', ')} ` +
        `(max=${params.max_results}, sort=${params.sort_by}, dates=${describeDateWindow({ from: params.date_from, to: params.date_to })})`
    );

    const settled = await Promise.allSettled(
      params.sources.map((id) => {
        const source = registry[id];
        if (!source) {
          return Promise.reject(new Error(`Source not registered: ${id}`));
        }
        return source.search(sourceQuery);
      })
    );

    const sourceResults: Partial<Record<SourceId, SourceResult>> = {};
    const successful: Partial<Record<SourceId, Paper[]>> = {};
    params.sources.forEach((id, index) => {
      const outcome = settled[index];
      if (outcome.status === 'rejected') {
        const error = describeFailure(outcome.reason);
        log.error(`${id} rejected instead of reporting an error: ${error}`);
        sourceResults[id] = { papers: [], count: 0, error };
        return;
      }
      const { error } = outcome.value;
      if (error) {
        sourceResults[id] = { papers: [], count: 0, error };
        return;
      }
      sourceResults[id] = outcome.value;
      successful[id] = outcome.value.papers;
    });

    const merged = mergeByRank(successful);
    const unique = dedupePapers(merged, { titleSimilarityThreshold });
    const sorted = sortPapers(unique, params.sort_by);
    const papers = sorted.slice(0, params.max_results);

    const failed = params.sources.filter((id) => sourceResults[id]?.error);
    log.info(
      `Merged ${merged.length} papers into ${unique.length} unique, returning ${papers.length}` +
        (failed.length > 0 ? ` (failed: ${failed.join(', ')})` : '')
    );

    return {
      query,
      total_results: unique.length,
      papers,
      sources: sourceResults,
      search_params: params,
    };
  };
}
