import { describe, it, expect, vi, beforeEach } from 'vitest';
import { render, screen, fireEvent, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { EXAMPLE_QUERIES, SearchForm, toSearchRequest } from '../SearchForm';
import { useSearchStore } from '../../../stores/searchStore';

describe('SearchForm', () => {
  beforeEach(() => {
    useSearchStore.getState().reset();
  });

  it('submits the query with stored preferences', async () => {
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    await user.type(screen.getByLabelText('Search query'), '  graph neural  ');
    await user.click(screen.getByRole('button', { name: 'Search' }));

    await waitFor(() => expect(onSearch).toHaveBeenCalledTimes(1));
    expect(onSearch).toHaveBeenCalledWith({
      query: 'graph neural',
      max_results: 5,
      sort_by: 'relevance',
      sources: ['arxiv', 'openalex', 'crossref'],
    });
  });

  it('sends changed options and remembers them', async () => {
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    await user.type(screen.getByLabelText('Search query'), 'transformers');
    await user.clear(screen.getByLabelText('Max results'));
    await user.type(screen.getByLabelText('Max results'), '10');
    await user.selectOptions(screen.getByLabelText('Sort by'), 'date');
    await user.click(screen.getByLabelText('Crossref'));
    fireEvent.change(screen.getByLabelText('Published from'), { target: { value: '2020-01-01' } });
    await user.click(screen.getByRole('button', { name: 'Search' }));

    await waitFor(() => expect(onSearch).toHaveBeenCalledTimes(1));
    expect(onSearch).toHaveBeenCalledWith({
      query: 'transformers',
      max_results: 10,
      sort_by: 'date',
      sources: ['arxiv', 'openalex'],
      date_from: '2020-01-01',
    });

    const state = useSearchStore.getState();
    expect(state.maxResults).toBe(10);
    expect(state.sortBy).toBe('date');
    expect(state.sources).toEqual(['arxiv', 'openalex']);
  });

  it('requires a non-blank query', async () => {
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    await user.type(screen.getByLabelText('Search query'), '   ');
    await user.click(screen.getByRole('button', { name: 'Search' }));

    expect(await screen.findByText('Enter a search query')).toBeInTheDocument();
    expect(onSearch).not.toHaveBeenCalled();
  });

  it('requires at least one source', async () => {
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    await user.type(screen.getByLabelText('Search query'), 'transformers');
    await user.click(screen.getByLabelText('arXiv'));
    await user.click(screen.getByLabelText('OpenAlex'));
    await user.click(screen.getByLabelText('Crossref'));
    await user.click(screen.getByRole('button', { name: 'Search' }));

    expect(await screen.findByText('Select at least one source')).toBeInTheDocument();
    expect(onSearch).not.toHaveBeenCalled();
  });

  it('rejects an inverted date range', async () => {
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    await user.type(screen.getByLabelText('Search query'), 'transformers');
    fireEvent.change(screen.getByLabelText('Published from'), { target: { value: '2024-01-01' } });
    fireEvent.change(screen.getByLabelText('Published to'), { target: { value: '2023-01-01' } });
    await user.click(screen.getByRole('button', { name: 'Search' }));

    expect(await screen.findByText('Start date must be before end date')).toBeInTheDocument();
    expect(onSearch).not.toHaveBeenCalled();
  });

  it('fills the query from a recent search', async () => {
    useSearchStore.setState({ recentQueries: ['diffusion models'] });
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    await user.click(screen.getByRole('button', { name: 'diffusion models' }));
    await user.click(screen.getByRole('button', { name: 'Search' }));

    await waitFor(() => expect(onSearch).toHaveBeenCalledTimes(1));
    expect(onSearch.mock.calls[0][0]).toMatchObject({ query: 'diffusion models' });
  });

  it('offers example queries before anything was searched', async () => {
    const user = userEvent.setup();
    const onSearch = vi.fn();
    render(<SearchForm onSearch={onSearch} />);

    expect(screen.getByText('Try:')).toBeInTheDocument();
    await user.click(screen.getByRole('button', { name: EXAMPLE_QUERIES[1] }));

    expect(screen.getByLabelText('Search query')).toHaveValue(EXAMPLE_QUERIES[1]);
  });

  it('disables the submit button while searching', () => {
    render(<SearchForm onSearch={vi.fn()} isSearching />);

    expect(screen.getByRole('button', { name: 'Searching...' })).toBeDisabled();
  });

  it('leaves empty dates out of the request', () => {
    expect(
      toSearchRequest({
        query: ' q ',
        maxResults: 3,
        sortBy: 'citations',
        sources: ['openalex'],
        dateFrom: '',
        dateTo: '2022-12-31',
      })
    ).toEqual({ query: 'q', max_results: 3, sort_by: 'citations', sources: ['openalex'], date_to: '2022-12-31' });
  });
});
