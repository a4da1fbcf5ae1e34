/**
 * Paper Search - arXiv, OpenAlex and Crossref adapters plus orchestration.
 * Adding a source means writing a PaperSource factory and registering it below.
 */

export * from './types';
export { PaperSearchValidationError } from './errors';
export type { PaperSearchErrorCode } from './errors';
export { createArxivSource } from './arxiv-source';
export { createOpenAlexSource } from './openalex-source';
export { createCrossrefSource } from './crossref-source';
export { createPaperSearchOrchestrator } from './orchestrator';
export type { OrchestratorDeps } from './orchestrator';
export { dedupePapers, normalizeTitle, titleSimilarity } from './dedup';
export { mergeByRank, sortPapers } from './ranking';

import type { SourceId } from '@paperlens/shared';
import type { AppConfig, SourcesConfig } from '../config';
import { createArxivSource } from './arxiv-source';
import { createCrossrefSource } from './crossref-source';
import { createOpenAlexSource } from './openalex-source';
import { createPaperSearchOrchestrator } from './orchestrator';
import type { FetchLike, PaperSearchFn, PaperSource, SourceClientOptions } from './types';

export function createPaperSources(config: SourcesConfig, fetchImpl?: FetchLike): Record<SourceId, PaperSource> {
  const options = (baseUrl: string): SourceClientOptions => ({
    baseUrl,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    mailto: config.mailto,
    fetch: fetchImpl,
  });

  return {
    arxiv: createArxivSource(options(config.arxiv.baseUrl)),
    openalex: createOpenAlexSource(options(config.openalex.baseUrl)),
    crossref: createCrossrefSource(options(config.crossref.baseUrl)),
  };
}

/** Orchestrator wired to the real sources from configuration */
export function createPaperSearch(config: AppConfig, fetchImpl?: FetchLike): PaperSearchFn {
  return createPaperSearchOrchestrator({
    sources: createPaperSources(config.sources, fetchImpl),
    defaultMaxResults: config.search.defaultMaxResults,
    maxResults: config.search.maxResults,
    titleSimilarityThreshold: config.search.titleSimilarityThreshold,
  });
}
