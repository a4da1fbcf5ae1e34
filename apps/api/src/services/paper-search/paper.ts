import { SOURCE_LABELS } from '@paperlens/shared';
import type { Author, Paper, SourceId, SourceResult } from '@paperlens/shared';
import { filterByDateWindow } from './date-window';
import type { SourceQuery } from './types';
import type { Logger } from '../logger';

export interface PaperFields {
  id: string;
  title: string;
  authors: Author[];
  abstract?: string | null;
  source: SourceId;
  published_date: string | null;
  url: string;
  doi?: string | null;
  categories?: string[];
  citation_count?: number | null;
}

/** Collapse runs of whitespace (including newlines in Atom titles) */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function normalizeDoi(doi: string | null | undefined): string | null {
  if (!doi) return null;
  const bare = doi
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
    .replace(/^doi:/i, '')
    .trim();
  return bare || null;
}

export function formatAuthors(authors: Author[]): string {
  if (authors.length === 0) return 'Unknown authors';
  if (authors.length <= 3) return authors.map((a) => a.name).join(', ');
  return `${authors[0].name} et al.`;
}

/**
 * Build a frozen Paper. Optional fields are left off entirely when the
 * source has no value for them.
 */
export function buildPaper(fields: PaperFields): Paper {
  const authors = fields.authors.map((author) => Object.freeze({ ...author }));
  const paper: Paper = {
    id: fields.id,
    title: collapseWhitespace(fields.title),
    authors,
    abstract: collapseWhitespace(fields.abstract ?? ''),
    source: fields.source,
    source_name: SOURCE_LABELS[fields.source],
    published_date: fields.published_date,
    url: fields.url,
    primary_author: authors[0] ?? null,
    formatted_authors: formatAuthors(authors),
  };
  const doi = normalizeDoi(fields.doi);
  if (doi) paper.doi = doi;
  if (fields.categories && fields.categories.length > 0) {
    const categories = [...fields.categories];
    Object.freeze(categories);
    paper.categories = categories;
  }
  if (typeof fields.citation_count === 'number' && Number.isFinite(fields.citation_count)) {
    paper.citation_count = fields.citation_count;
  }
  Object.freeze(authors);
  return Object.freeze(paper);
}

/**
 * Run one adapter call and fold every failure into the SourceResult.
 * Results outside the requested date window are dropped here.
 */
export async function runSourceSearch(
  query: SourceQuery,
  log: Logger,
  fetchPapers: () => Promise<Paper[]>
): Promise<SourceResult> {
  const startedAt = Date.now();
  try {
    const papers = await fetchPapers();
    const { kept, excluded } = filterByDateWindow(papers, { from: query.dateFrom, to: query.dateTo });
    if (excluded > 0) {
      log.debug(`Dropped ${excluded} papers outside the requested date window`);
    }
    log.info(`Found ${kept.length} papers for "${query.query}" in ${Date.now() - startedAt}ms`);
    return { papers: kept, count: kept.length };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error(`Search failed for "${query.query}": ${message}`);
    return { papers: [], count: 0, error: message || 'Unknown error' };
  }
}

/**
 * Parse each raw record independently; a record that throws or yields null is skipped.
 */
export function parseRecords<T>(records: T[], parse: (record: T) => Paper | null, log: Logger): Paper[] {
  const papers: Paper[] = [];
  let skipped = 0;
  for (const record of records) {
    try {
      const paper = parse(record);
      if (paper) {
        papers.push(paper);
      } else {
        skipped++;
      }
    } catch (error) {
      skipped++;
      log.debug('Skipping malformed record:', error);
    }
  }
  if (skipped > 0) {
    log.debug(`Skipped ${skipped} incomplete records`);
  }
  return papers;
}
