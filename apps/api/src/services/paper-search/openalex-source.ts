/**
 * OpenAlex source - works search with citation counts and concepts.
 * Abstracts arrive as an inverted index and are rebuilt word by word.
 */

import { z } from 'zod';
import type { Author, Paper, SortBy } from '@paperlens/shared';
import { isIsoDate } from './date-window';
import { assertOk, buildHeaders, fetchWithTimeout } from './http';
import { buildPaper, normalizeDoi, parseRecords, runSourceSearch } from './paper';
import type { PaperSource, SourceClientOptions, SourceQuery } from './types';
import { createLogger } from '../logger';

const log = createLogger('OpenAlexSource');

const MAX_CATEGORIES = 5;

const SORT_PARAM: Record<SortBy, string> = {
  relevance: 'relevance_score:desc',
  date: 'publication_date:desc',
  citations: 'cited_by_count:desc',
};

const SELECT_FIELDS = [
  'id',
  'doi',
  'title',
  'display_name',
  'publication_date',
  'authorships',
  'abstract_inverted_index',
  'cited_by_count',
  'concepts',
  'topics',
].join(',');

const listResponseSchema = z.object({
  results: z.array(z.unknown()),
});

const namedSchema = z.object({ display_name: z.string().nullish() }).passthrough();

const workSchema = z.object({
  id: z.string(),
  doi: z.string().nullish(),
  title: z.string().nullish(),
  display_name: z.string().nullish(),
  publication_date: z.string().nullish(),
  authorships: z
    .array(
      z.object({
        author: z.object({ display_name: z.string().nullish(), orcid: z.string().nullish() }).nullish(),
        institutions: z.array(namedSchema).nullish(),
      })
    )
    .nullish(),
  abstract_inverted_index: z.record(z.array(z.number().int().nonnegative())).nullish(),
  cited_by_count: z.number().nullish(),
  concepts: z.array(namedSchema).nullish(),
  topics: z.array(namedSchema).nullish(),
});

type OpenAlexWork = z.infer<typeof workSchema>;

export function reconstructAbstract(invertedIndex: Record<string, number[]> | null | undefined): string {
  if (!invertedIndex) return '';
  const words: string[] = [];
  for (const [word, positions] of Object.entries(invertedIndex)) {
    for (const position of positions) {
      words[position] = word;
    }
  }
  return words.filter((word) => word !== undefined).join(' ');
}

export function buildOpenAlexUrl(options: SourceClientOptions, query: SourceQuery): URL {
  const url = new URL(options.baseUrl);
  url.searchParams.set('search', query.query);
  url.searchParams.set('per-page', String(query.limit));
  url.searchParams.set('sort', SORT_PARAM[query.sortBy]);
  url.searchParams.set('select', SELECT_FIELDS);

  const filters = ['has_abstract:true'];
  if (query.dateFrom) filters.push(`from_publication_date:${query.dateFrom}`);
  if (query.dateTo) filters.push(`to_publication_date:${query.dateTo}`);
  url.searchParams.set('filter', filters.join(','));

  if (options.mailto) {
    url.searchParams.set('mailto', options.mailto);
  }
  return url;
}

function parseAuthors(work: OpenAlexWork): Author[] {
  const authors: Author[] = [];
  for (const authorship of work.authorships ?? []) {
    const name = authorship.author?.display_name?.trim();
    if (!name) continue;
    const author: Author = { name };
    const affiliation = authorship.institutions?.[0]?.display_name;
    if (affiliation) author.affiliation = affiliation;
    if (authorship.author?.orcid) author.orcid = authorship.author.orcid;
    authors.push(author);
  }
  return authors;
}

function parseCategories(work: OpenAlexWork): string[] {
  const source = work.concepts && work.concepts.length > 0 ? work.concepts : work.topics ?? [];
  return source
    .map((entry) => entry.display_name)
    .filter((name): name is string => Boolean(name))
    .slice(0, MAX_CATEGORIES);
}

/** Convert one OpenAlex work into a Paper; null when id or title is missing */
export function parseOpenAlexWork(raw: unknown): Paper | null {
  const parsed = workSchema.safeParse(raw);
  if (!parsed.success) return null;
  const work = parsed.data;

  const title = (work.title ?? work.display_name ?? '').trim();
  const shortId = work.id.split('/').pop();
  if (!title || !shortId) return null;

  const doi = normalizeDoi(work.doi);
  const publicationDate = work.publication_date && isIsoDate(work.publication_date) ? work.publication_date : null;

  return buildPaper({
    id: `openalex:${shortId}`,
    title,
    authors: parseAuthors(work),
    abstract: reconstructAbstract(work.abstract_inverted_index),
    source: 'openalex',
    published_date: publicationDate,
    url: doi ? `https://doi.org/${doi}` : work.id,
    doi,
    categories: parseCategories(work),
    citation_count: work.cited_by_count,
  });
}

export function parseOpenAlexResponse(body: unknown): Paper[] {
  const parsed = listResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error('OpenAlex returned an unexpected response (no results array)');
  }
  return parseRecords(parsed.data.results, parseOpenAlexWork, log);
}

export function createOpenAlexSource(options: SourceClientOptions): PaperSource {
  const fetchImpl = options.fetch ?? fetch;

  return {
    id: 'openalex',
    label: 'OpenAlex',

    search(query) {
      return runSourceSearch(query, log, async () => {
        const url = buildOpenAlexUrl(options, query);
        log.debug(`Fetching: ${url.toString()}`);
        const body = await fetchWithTimeout(
          fetchImpl,
          url,
          { headers: buildHeaders(options.userAgent, 'application/json') },
          options.timeoutMs,
          'OpenAlex',
          (res): Promise<unknown> => assertOk(res, 'OpenAlex').json()
        );
        return parseOpenAlexResponse(body);
      });
    },
  };
}
