import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ApiError, apiClient } from '../api';
import { createResponse } from '../../test/fixtures';

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('apiClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the search request as JSON', async () => {
    const response = createResponse();
    fetchMock.mockResolvedValue(jsonResponse(response));

    const result = await apiClient.search.papers({ query: 'traffic', max_results: 2 });

    expect(result).toEqual(response);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('/api/search/papers');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"query":"traffic","max_results":2}');
    expect(new Headers(init?.headers).get('Content-Type')).toBe('application/json');
  });

  it('turns API error bodies into ApiError', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ error: { code: 'VALIDATION_ERROR', message: 'query: Search query cannot be empty' } }, 400, 'Bad Request')
    );

    const error = await apiClient.search.papers({ query: ' ' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      message: 'query: Search query cannot be empty',
      status: 400,
      code: 'VALIDATION_ERROR',
    });
  });

  it('falls back to the HTTP status for non-JSON errors', async () => {
    fetchMock.mockResolvedValue(new Response('<html>bad gateway</html>', { status: 502, statusText: 'Bad Gateway' }));

    await expect(apiClient.search.papers({ query: 'q' })).rejects.toMatchObject({
      message: 'HTTP 502: Bad Gateway',
      status: 502,
      code: 'UNKNOWN_ERROR',
    });
  });

  it('reports network failures with status 0', async () => {
    fetchMock.mockRejectedValue(new TypeError('Failed to fetch'));

    await expect(apiClient.health.check()).rejects.toMatchObject({ status: 0, code: 'NETWORK_ERROR' });
  });

  it('fetches the health endpoint', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ status: 'ok', message: 'up', timestamp: '2024-01-01T00:00:00.000Z', version: '0.1.0' })
    );

    const health = await apiClient.health.check();

    expect(health.version).toBe('0.1.0');
    expect(fetchMock.mock.calls[0][0]).toBe('/api/health');
  });
});
