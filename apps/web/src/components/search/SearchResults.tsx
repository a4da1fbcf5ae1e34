import { FileSearch } from 'lucide-react';
import type { SearchResponse, SortBy } from '@paperlens/shared';
import { PaperCard } from './PaperCard';
import { SourceStatusList } from './SourceStatusList';

const SORT_DESCRIPTIONS: Record<SortBy, string> = {
  relevance: 'relevance',
  date: 'publication date',
  citations: 'citation count',
};

interface SearchResultsProps {
  response: SearchResponse;
}

export function SearchResults({ response }: SearchResultsProps) {
  const { papers, total_results: total, query, search_params: params } = response;
  const sourceCount = params.sources.length;

  return (
    <section className="space-y-4" aria-label="Search results">
      <SourceStatusList sources={response.search_params.sources} results={response.sources} />

      {papers.length === 0 ? (
        <div className="flex flex-col items-center gap-2 py-12 text-center text-muted-foreground">
          <FileSearch className="h-10 w-10" />
          <p>No papers found for &ldquo;{query}&rdquo;</p>
          <p className="text-sm">Try different keywords or enable more sources.</p>
        </div>
      ) : (
        <>
          <div className="space-y-1 text-sm text-muted-foreground">
            <p>
              Showing {papers.length} of {total} unique {total === 1 ? 'result' : 'results'} for &ldquo;{query}&rdquo;
            </p>
            <p>
              Sorted by {SORT_DESCRIPTIONS[params.sort_by]} across {sourceCount} {sourceCount === 1 ? 'source' : 'sources'}
            </p>
            {total > papers.length && (
              <p className="text-xs">Showing the top {papers.length}. Raise max results to see more.</p>
            )}
          </div>
          <ol className="space-y-4">
            {papers.map((paper, index) => (
              <li key={paper.id}>
                <PaperCard paper={paper} rank={index + 1} />
              </li>
            ))}
          </ol>
        </>
      )}
    </section>
  );
}
