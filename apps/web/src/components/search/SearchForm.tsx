import { useForm } from 'react-hook-form';
import { zodResolver } from '@hookform/resolvers/zod';
import { z } from 'zod';
import { Search } from 'lucide-react';
import { MAX_QUERY_LENGTH, MAX_RESULTS_LIMIT, SORT_OPTIONS, SOURCE_IDS, SOURCE_LABELS } from '@paperlens/shared';
import type { SearchRequest } from '@paperlens/shared';
import { Button } from '../ui/button';
import { Input } from '../ui/input';
import { Label } from '../ui/label';
import { useSearchStore } from '../../stores/searchStore';

const SORT_LABELS: Record<(typeof SORT_OPTIONS)[number], string> = {
  relevance: 'Relevance',
  date: 'Newest first',
  citations: 'Most cited',
};

export const EXAMPLE_QUERIES = [
  'graph neural networks for traffic forecasting',
  'CRISPR off-target effects',
  'large language model evaluation',
];

const optionalDate = z.string().regex(/^(\d{4}-\d{2}-\d{2})?$/, 'Use YYYY-MM-DD');

// Validation schema
export const searchFormSchema = z
  .object({
    query: z
      .string()
      .trim()
      .min(1, 'Enter a search query')
      .max(MAX_QUERY_LENGTH, `Keep the query under ${MAX_QUERY_LENGTH} characters`),
    maxResults: z
      .number({ invalid_type_error: 'Enter a number' })
      .int('Enter a whole number')
      .min(1, `Choose between 1 and ${MAX_RESULTS_LIMIT}`)
      .max(MAX_RESULTS_LIMIT, `Choose between 1 and ${MAX_RESULTS_LIMIT}`),
    sortBy: z.enum(SORT_OPTIONS),
    sources: z.array(z.enum(SOURCE_IDS)).min(1, 'Select at least one source'),
    dateFrom: optionalDate,
    dateTo: optionalDate,
  })
  .refine((values) => !(values.dateFrom && values.dateTo && values.dateFrom > values.dateTo), {
    message: 'Start date must be before end date',
    path: ['dateTo'],
  });

export type SearchFormValues = z.infer<typeof searchFormSchema>;

export function toSearchRequest(values: SearchFormValues): SearchRequest {
  const request: SearchRequest = {
    query: values.query.trim(),
    max_results: values.maxResults,
    sort_by: values.sortBy,
    sources: values.sources,
  };
  if (values.dateFrom) request.date_from = values.dateFrom;
  if (values.dateTo) request.date_to = values.dateTo;
  return request;
}

interface SearchFormProps {
  onSearch: (request: SearchRequest) => void;
  isSearching?: boolean;
}

export function SearchForm({ onSearch, isSearching = false }: SearchFormProps) {
  const { maxResults, sortBy, sources, recentQueries, savePreferences } = useSearchStore();

  const {
    register,
    handleSubmit,
    setValue,
    formState: { errors },
  } = useForm<SearchFormValues>({
    resolver: zodResolver(searchFormSchema),
    defaultValues: {
      query: '',
      maxResults,
      sortBy,
      sources,
      dateFrom: '',
      dateTo: '',
    },
  });

  const onSubmit = (values: SearchFormValues) => {
    savePreferences({ maxResults: values.maxResults, sortBy: values.sortBy, sources: values.sources });
    onSearch(toSearchRequest(values));
  };

  return (
    <form onSubmit={handleSubmit(onSubmit)} className="space-y-4" noValidate>
      <div className="space-y-2">
        <Label htmlFor="query">Search query</Label>
        <div className="flex gap-2">
          <Input
            id="query"
            placeholder="e.g. graph neural networks for traffic forecasting"
            autoComplete="off"
            {...register('query')}
            disabled={isSearching}
          />
          <Button type="submit" disabled={isSearching}>
            <Search className="h-4 w-4" />
            {isSearching ? 'Searching...' : 'Search'}
          </Button>
        </div>
        {errors.query && <p className="text-sm text-red-500">{errors.query.message}</p>}
        <div className="flex flex-wrap items-center gap-2 text-xs text-muted-foreground">
          <span>{recentQueries.length > 0 ? 'Recent:' : 'Try:'}</span>
          {(recentQueries.length > 0 ? recentQueries : EXAMPLE_QUERIES).map((suggestion) => (
            <button
              key={suggestion}
              type="button"
              className="rounded-full border border-border px-2 py-0.5 hover:bg-muted"
              onClick={() => setValue('query', suggestion, { shouldValidate: true })}
              disabled={isSearching}
            >
              {suggestion}
            </button>
          ))}
        </div>
      </div>

      <div className="grid gap-4 sm:grid-cols-4">
        <div className="space-y-2">
          <Label htmlFor="maxResults">Max results</Label>
          <Input
            id="maxResults"
            type="number"
            min={1}
            max={MAX_RESULTS_LIMIT}
            {...register('maxResults', { valueAsNumber: true })}
            disabled={isSearching}
          />
          {errors.maxResults && <p className="text-sm text-red-500">{errors.maxResults.message}</p>}
        </div>

        <div className="space-y-2">
          <Label htmlFor="sortBy">Sort by</Label>
          <select
            id="sortBy"
            className="flex h-10 w-full rounded-md border border-border bg-background px-3 text-sm"
            {...register('sortBy')}
            disabled={isSearching}
          >
            {SORT_OPTIONS.map((option) => (
              <option key={option} value={option}>
                {SORT_LABELS[option]}
              </option>
            ))}
          </select>
        </div>

        <div className="space-y-2">
          <Label htmlFor="dateFrom">Published from</Label>
          <Input id="dateFrom" type="date" {...register('dateFrom')} disabled={isSearching} />
          {errors.dateFrom && <p className="text-sm text-red-500">{errors.dateFrom.message}</p>}
        </div>

        <div className="space-y-2">
          <Label htmlFor="dateTo">Published to</Label>
          <Input id="dateTo" type="date" {...register('dateTo')} disabled={isSearching} />
          {errors.dateTo && <p className="text-sm text-red-500">{errors.dateTo.message}</p>}
        </div>
      </div>

      <fieldset className="space-y-2">
        <legend className="text-sm font-medium">Sources</legend>
        <div className="flex flex-wrap gap-4">
          {SOURCE_IDS.map((id) => (
            <label key={id} className="flex items-center gap-2 text-sm">
              <input type="checkbox" value={id} {...register('sources')} disabled={isSearching} />
              {SOURCE_LABELS[id]}
            </label>
          ))}
        </div>
        {errors.sources && <p className="text-sm text-red-500">{errors.sources.message}</p>}
      </fieldset>
    </form>
  );
}
