import { SOURCE_IDS } from '@paperlens/shared';
import type { Paper, SortBy, SourceId } from '@paperlens/shared';

/**
 * Interleave per-source lists by rank: every source's first paper (in source
 * priority order), then every second paper, and so on. Each API's own
 * relevance order survives and source priority breaks ties between ranks.
 */
export function mergeByRank(lists: Partial<Record<SourceId, Paper[]>>): Paper[] {
  const ordered = SOURCE_IDS.map((id) => lists[id] ?? []);
  const depth = Math.max(0, ...ordered.map((list) => list.length));
  const merged: Paper[] = [];
  for (let rank = 0; rank < depth; rank++) {
    for (const list of ordered) {
      const paper = list[rank];
      if (paper) merged.push(paper);
    }
  }
  return merged;
}

/** Descending ISO date, missing dates last */
function compareDates(a: Paper, b: Paper): number {
  if (a.published_date === b.published_date) return 0;
  if (a.published_date === null) return 1;
  if (b.published_date === null) return -1;
  return a.published_date < b.published_date ? 1 : -1;
}

/** Descending citation count, missing counts last */
function compareCitations(a: Paper, b: Paper): number {
  const ca = a.citation_count;
  const cb = b.citation_count;
  if (ca === cb) return 0;
  if (ca === undefined) return 1;
  if (cb === undefined) return -1;
  return cb - ca;
}

/**
 * Stable sort; `relevance` keeps the merge order untouched.
 */
export function sortPapers(papers: Paper[], sortBy: SortBy): Paper[] {
  const sorted = [...papers];
  if (sortBy === 'date') {
    sorted.sort(compareDates);
  } else if (sortBy === 'citations') {
    sorted.sort((a, b) => compareCitations(a, b) || compareDates(a, b));
  }
  return sorted;
}
