/**
 * Crossref source - publisher metadata search over registered DOIs.
 * Dates are taken from print, then online, then general publication, then issued.
 */

import { z } from 'zod';
import type { Author, Paper, SortBy } from '@paperlens/shared';
import { toIsoDate } from './date-window';
import { assertOk, buildHeaders, fetchWithTimeout } from './http';
import { buildPaper, normalizeDoi, parseRecords, runSourceSearch } from './paper';
import type { PaperSource, SourceClientOptions, SourceQuery } from './types';
import { createLogger } from '../logger';

const log = createLogger('CrossrefSource');

const MAX_CATEGORIES = 5;
const WORK_TYPES = ['journal-article', 'proceedings-article'];

const SORT_PARAM: Record<SortBy, string> = {
  relevance: 'relevance',
  date: 'published',
  citations: 'is-referenced-by-count',
};

const dateSchema = z
  .object({
    'date-parts': z.array(z.array(z.number().nullable())).optional(),
  })
  .nullish();

const itemSchema = z.object({
  DOI: z.string().nullish(),
  URL: z.string().nullish(),
  title: z.array(z.string()).nullish(),
  abstract: z.string().nullish(),
  author: z
    .array(
      z.object({
        given: z.string().nullish(),
        family: z.string().nullish(),
        name: z.string().nullish(),
        ORCID: z.string().nullish(),
        affiliation: z.array(z.object({ name: z.string().nullish() })).nullish(),
      })
    )
    .nullish(),
  subject: z.array(z.string()).nullish(),
  'is-referenced-by-count': z.number().nullish(),
  'published-print': dateSchema,
  'published-online': dateSchema,
  published: dateSchema,
  issued: dateSchema,
});

type CrossrefItem = z.infer<typeof itemSchema>;

const listResponseSchema = z.object({
  message: z.object({
    items: z.array(z.unknown()),
  }),
});

/** Crossref abstracts are JATS XML fragments, e.g. <jats:p>...</jats:p> */
export function stripJats(text: string): string {
  return text
    .replace(/<jats:title>[\s\S]*?<\/jats:title>/gi, ' ')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

export function buildCrossrefUrl(options: SourceClientOptions, query: SourceQuery): URL {
  const url = new URL(options.baseUrl);
  url.searchParams.set('query', query.query);
  url.searchParams.set('rows', String(query.limit));
  url.searchParams.set('sort', SORT_PARAM[query.sortBy]);
  url.searchParams.set('order', 'desc');

  const filters = ['has-abstract:true', ...WORK_TYPES.map((type) => `type:${type}`)];
  if (query.dateFrom) filters.push(`from-pub-date:${query.dateFrom}`);
  if (query.dateTo) filters.push(`until-pub-date:${query.dateTo}`);
  url.searchParams.set('filter', filters.join(','));

  if (options.mailto) {
    url.searchParams.set('mailto', options.mailto);
  }
  return url;
}

function parseDate(item: CrossrefItem): string | null {
  const candidates = [item['published-print'], item['published-online'], item.published, item.issued];
  for (const candidate of candidates) {
    const parts = candidate?.['date-parts']?.[0];
    if (!parts) continue;
    const [year, month, day] = parts;
    if (typeof year !== 'number') continue;
    const date = toIsoDate(year, month ?? undefined, day ?? undefined);
    if (date) return date;
  }
  return null;
}

function parseAuthors(item: CrossrefItem): Author[] {
  const authors: Author[] = [];
  for (const entry of item.author ?? []) {
    const name = (entry.family ? [entry.given, entry.family].filter(Boolean).join(' ') : entry.name ?? '').trim();
    if (!name) continue;
    const author: Author = { name };
    const affiliation = entry.affiliation?.[0]?.name;
    if (affiliation) author.affiliation = affiliation;
    if (entry.ORCID) author.orcid = entry.ORCID;
    authors.push(author);
  }
  return authors;
}

/** Convert one Crossref work item into a Paper; null when it has no title or identifier */
export function parseCrossrefItem(raw: unknown): Paper | null {
  const parsed = itemSchema.safeParse(raw);
  if (!parsed.success) return null;
  const item = parsed.data;

  const title = item.title?.[0]?.trim();
  const doi = normalizeDoi(item.DOI);
  const identifier = doi ?? item.URL;
  if (!title || !identifier) return null;

  return buildPaper({
    id: `crossref:${identifier}`,
    title,
    authors: parseAuthors(item),
    abstract: item.abstract ? stripJats(item.abstract) : '',
    source: 'crossref',
    published_date: parseDate(item),
    url: doi ? `https://doi.org/${doi}` : identifier,
    doi,
    categories: (item.subject ?? []).slice(0, MAX_CATEGORIES),
    citation_count: item['is-referenced-by-count'],
  });
}

export function parseCrossrefResponse(body: unknown): Paper[] {
  const parsed = listResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error('Crossref returned an unexpected response (no message.items)');
  }
  return parseRecords(parsed.data.message.items, parseCrossrefItem, log);
}

export function createCrossrefSource(options: SourceClientOptions): PaperSource {
  const fetchImpl = options.fetch ?? fetch;
  const userAgent = options.mailto ? `${options.userAgent} (mailto:${options.mailto})` : options.userAgent;

  return {
    id: 'crossref',
    label: 'Crossref',

    search(query) {
      return runSourceSearch(query, log, async () => {
        const url = buildCrossrefUrl(options, query);
        log.debug(`Fetching: ${url.toString()}`);
        const body = await fetchWithTimeout(
          fetchImpl,
          url,
          { headers: buildHeaders(userAgent, 'application/json') },
          options.timeoutMs,
          'Crossref',
          (res): Promise<unknown> => assertOk(res, 'Crossref').json()
        );
        return parseCrossrefResponse(body);
      });
    },
  };
}
