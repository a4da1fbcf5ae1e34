import { BookOpen } from 'lucide-react';
import { SOURCE_IDS } from '@paperlens/shared';
import { SearchForm } from '../components/search/SearchForm';
import { SearchResults } from '../components/search/SearchResults';
import { SourceStatusList } from '../components/search/SourceStatusList';
import { Card, CardContent } from '../components/ui/card';
import { StatusIcon } from '../components/ui/status-icon';
import { useApiHealth, usePaperSearch } from '../hooks/usePaperSearch';
import { ApiError } from '../lib/api';

function describeError(error: Error): string {
  if (error instanceof ApiError && error.status === 0) {
    return 'The search service is not reachable. Is the API server running?';
  }
  return error.message || 'Search failed';
}

export function SearchPage() {
  const search = usePaperSearch();
  const health = useApiHealth();

  return (
    <div className="mx-auto max-w-4xl space-y-6 px-4 py-8">
      <header className="flex items-center justify-between">
        <div className="flex items-center gap-3">
          <BookOpen className="h-8 w-8" />
          <div>
            <h1 className="text-2xl font-bold">PaperLens</h1>
            <p className="text-sm text-muted-foreground">Search arXiv, OpenAlex and Crossref in one go</p>
          </div>
        </div>
        {health.data && (
          <span className="flex items-center gap-2 text-xs text-muted-foreground">
            <StatusIcon status="completed" size="sm" />
            API v{health.data.version}
          </span>
        )}
        {health.isError && (
          <span className="flex items-center gap-2 text-xs text-muted-foreground">
            <StatusIcon status="failed" size="sm" />
            API offline
          </span>
        )}
      </header>

      <Card>
        <CardContent className="pt-5">
          <SearchForm onSearch={(request) => search.mutate(request)} isSearching={search.isPending} />
        </CardContent>
      </Card>

      {search.isPending && <SourceStatusList sources={search.variables?.sources ?? [...SOURCE_IDS]} />}

      {search.isError && (
        <div role="alert" className="rounded-md border border-red-200 bg-red-50 p-4 text-sm text-red-700">
          {describeError(search.error)}
        </div>
      )}

      {search.isSuccess && <SearchResults response={search.data} />}
    </div>
  );
}
