/**
 * Cross-source deduplication.
 *
 * Two papers are the same work when their DOIs match (case-insensitive) or
 * their normalized titles are equal or near-equal. A paper that matches
 * several existing groups joins them into one, so no two output papers
 * match each other and running the pass again changes nothing.
 */

import { SOURCE_IDS } from '@paperlens/shared';
import type { Paper } from '@paperlens/shared';
import { normalizeDoi } from './paper';

export const DEFAULT_TITLE_SIMILARITY_THRESHOLD = 0.95;

/** Below this many normalized characters only exact title matches count */
const MIN_FUZZY_TITLE_LENGTH = 10;

export interface DedupeOptions {
  /** 0-1; 1 disables fuzzy matching */
  titleSimilarityThreshold?: number;
}

/**
 * Lowercase, strip punctuation, collapse whitespace, trim
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j - 1] + cost, // substitution
        current[j - 1] + 1, // insertion
        previous[j] + 1 // deletion
      );
    }
    previous = current;
  }
  return previous[b.length];
}

/** 0-1 similarity of two already-normalized titles */
export function titleSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) return 1;
  return Math.max(0, 1 - levenshteinDistance(a, b) / maxLength);
}

export function isTitleMatch(a: string, b: string, threshold = DEFAULT_TITLE_SIMILARITY_THRESHOLD): boolean {
  if (!a || !b) return false;
  if (a === b) return true;
  if (threshold >= 1) return false;
  if (a.length < MIN_FUZZY_TITLE_LENGTH || b.length < MIN_FUZZY_TITLE_LENGTH) return false;
  return titleSimilarity(a, b) >= threshold;
}

interface Entry {
  paper: Paper;
  /** Position in the merged pool */
  order: number;
  doiKey: string | null;
  titleKey: string;
}

/** 0-3: non-empty abstract, citation count, DOI */
export function metadataRichness(paper: Paper): number {
  let score = 0;
  if (paper.abstract.trim()) score++;
  if (paper.citation_count !== undefined) score++;
  if (paper.doi) score++;
  return score;
}

function sourcePriority(paper: Paper): number {
  return SOURCE_IDS.indexOf(paper.source);
}

/** Negative when `a` is the better representative */
function compareRepresentatives(a: Entry, b: Entry): number {
  return (
    metadataRichness(b.paper) - metadataRichness(a.paper) ||
    sourcePriority(a.paper) - sourcePriority(b.paper) ||
    a.order - b.order
  );
}

export function dedupePapers(papers: Paper[], options: DedupeOptions = {}): Paper[] {
  const threshold = options.titleSimilarityThreshold ?? DEFAULT_TITLE_SIMILARITY_THRESHOLD;
  const sameWork = (a: Entry, b: Entry): boolean =>
    (a.doiKey !== null && a.doiKey === b.doiKey) || isTitleMatch(a.titleKey, b.titleKey, threshold);

  // Groups stay ordered by their earliest member
  let groups: Entry[][] = [];

  papers.forEach((paper, order) => {
    const entry: Entry = {
      paper,
      order,
      doiKey: normalizeDoi(paper.doi)?.toLowerCase() ?? null,
      titleKey: normalizeTitle(paper.title),
    };

    const matched = groups.filter((group) => group.some((member) => sameWork(member, entry)));
    if (matched.length === 0) {
      groups.push([entry]);
      return;
    }

    const [target, ...absorbed] = matched;
    target.push(entry);
    for (const group of absorbed) {
      target.push(...group);
    }
    if (absorbed.length > 0) {
      groups = groups.filter((group) => !absorbed.includes(group));
    }
  });

  return groups.map((group) => [...group].sort(compareRepresentatives)[0].paper);
}
