/**
 * arXiv source - Official arXiv Atom API for paper search.
 * Uses the submission (published) date of the listed version.
 *
 * IMPORTANT arXiv API quirks:
 * 1. Multi-word queries need each word prefixed with a field:
 *    - WRONG: all:traffic+networks (parsed as all:traffic OR networks)
 *    - RIGHT: all:traffic+AND+all:networks
 * 2. Square brackets in date ranges MUST be URL-encoded: %5B and %5D
 * 3. Errors come back as HTTP 200 with a single <entry> titled "Error"
 */

import type { Author, Paper, SortBy } from '@paperlens/shared';
import { formatForArxiv, isoDateFromTimestamp } from './date-window';
import { assertOk, buildHeaders, fetchWithTimeout } from './http';
import { buildPaper, collapseWhitespace, parseRecords, runSourceSearch } from './paper';
import type { PaperSource, SourceClientOptions, SourceQuery } from './types';
import { createLogger } from '../logger';

const log = createLogger('ArxivSource');

const SORT_PARAM: Record<SortBy, string> = {
  relevance: 'relevance',
  date: 'submittedDate',
  // arXiv has no citation data; fall back to its relevance ranking
  citations: 'relevance',
};

export function decodeXml(text: string): string {
  return text
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;|&#39;/g, "'")
    .replace(/&#x([0-9a-f]+);/gi, (_, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&amp;/g, '&');
}

/**
 * Build a pre-encoded search_query value; the caller must not encode it again.
 */
export function buildArxivQuery(query: SourceQuery): string {
  const terms = query.query.trim().split(/\s+/).filter((t) => t.length > 0);
  let q = terms.map((term) => `all:${encodeURIComponent(term)}`).join('+AND+');
  if (query.dateFrom || query.dateTo) {
    const range = formatForArxiv({ from: query.dateFrom, to: query.dateTo });
    q += `+AND+submittedDate:${range.replace('[', '%5B').replace(']', '%5D').replace(/ /g, '+')}`;
  }
  return q;
}

export function buildArxivUrl(baseUrl: string, query: SourceQuery): string {
  // Built by hand to avoid double-encoding the %5B/%5D and + separators
  const params = [
    `search_query=${buildArxivQuery(query)}`,
    'start=0',
    `max_results=${query.limit}`,
    `sortBy=${SORT_PARAM[query.sortBy]}`,
    'sortOrder=descending',
  ];
  return `${baseUrl}?${params.join('&')}`;
}

function tagText(entry: string, tag: string): string | null {
  const match = entry.match(new RegExp(`<${tag}(?:\\s[^>]*)?>([\\s\\S]*?)</${tag}>`));
  return match ? collapseWhitespace(decodeXml(match[1])) : null;
}

function attribute(tag: string, name: string): string | null {
  const match = tag.match(new RegExp(`\\s${name}\\s*=\\s*"([^"]*)"`));
  return match ? decodeXml(match[1]) : null;
}

function parseAuthors(entry: string): Author[] {
  const authors: Author[] = [];
  for (const block of entry.matchAll(/<author>([\s\S]*?)<\/author>/g)) {
    const name = tagText(block[1], 'name');
    if (!name) continue;
    const affiliation = tagText(block[1], 'arxiv:affiliation');
    authors.push(affiliation ? { name, affiliation } : { name });
  }
  return authors;
}

function parseAlternateLink(entry: string): string | null {
  for (const match of entry.matchAll(/<link\s[^>]*>/g)) {
    const rel = attribute(match[0], 'rel');
    const type = attribute(match[0], 'type');
    if (rel === 'alternate' || (rel === null && type === 'text/html')) {
      return attribute(match[0], 'href');
    }
  }
  return null;
}

function parseCategories(entry: string): string[] {
  const terms = new Set<string>();
  for (const match of entry.matchAll(/<category\s[^>]*>/g)) {
    const term = attribute(match[0], 'term');
    if (term) terms.add(term);
  }
  return [...terms];
}

/** Convert one Atom <entry> body into a Paper; null when id or title is missing */
export function parseArxivEntry(entry: string): Paper | null {
  const rawId = tagText(entry, 'id');
  const title = tagText(entry, 'title');
  if (!rawId || !title) return null;

  const arxivId = rawId.includes('/abs/') ? rawId.slice(rawId.indexOf('/abs/') + 5) : rawId.split('/').pop();
  if (!arxivId) return null;

  return buildPaper({
    id: `arxiv:${arxivId}`,
    title,
    authors: parseAuthors(entry),
    abstract: tagText(entry, 'summary'),
    source: 'arxiv',
    published_date: isoDateFromTimestamp(tagText(entry, 'published')),
    url: parseAlternateLink(entry) ?? rawId,
    doi: tagText(entry, 'arxiv:doi'),
    categories: parseCategories(entry),
  });
}

/** Split an Atom feed into entries and parse them, failing on arXiv's error feed */
export function parseArxivFeed(feed: string): Paper[] {
  if (!/<feed[\s>]/.test(feed)) {
    throw new Error('arXiv returned an unexpected response (no Atom feed)');
  }
  const entries = [...feed.matchAll(/<entry>([\s\S]*?)<\/entry>/g)].map((m) => m[1]);
  if (entries.length === 1 && tagText(entries[0], 'title') === 'Error') {
    throw new Error(`arXiv query error: ${tagText(entries[0], 'summary') ?? 'unknown'}`);
  }
  return parseRecords(entries, parseArxivEntry, log);
}

export function createArxivSource(options: SourceClientOptions): PaperSource {
  const fetchImpl = options.fetch ?? fetch;

  return {
    id: 'arxiv',
    label: 'arXiv',

    search(query) {
      return runSourceSearch(query, log, async () => {
        const url = buildArxivUrl(options.baseUrl, query);
        log.debug(`Fetching: ${url}`);
        const feed = await fetchWithTimeout(
          fetchImpl,
          url,
          { headers: buildHeaders(options.userAgent, 'application/atom+xml') },
          options.timeoutMs,
          'arXiv',
          (res) => assertOk(res, 'arXiv').text()
        );
        return parseArxivFeed(feed);
      });
    },
  };
}
