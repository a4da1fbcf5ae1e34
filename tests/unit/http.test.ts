import { describe, it, expect } from 'vitest';
import {
  assertOk,
  buildHeaders,
  fetchWithTimeout,
  HttpStatusError,
} from '../../apps/api/src/services/paper-search/http';
import { hangingFetch, jsonResponse, stalledBodyResponse } from '../helpers/fake-fetch';

const readStatus = async (response: Response) => response.status;

describe('HTTP helpers', () => {
  it('passes the request through with an abort signal', async () => {
    let signal: AbortSignal | null | undefined;
    const body = await fetchWithTimeout(
      async (_input, init) => {
        signal = init?.signal;
        return jsonResponse({ ok: true });
      },
      'https://example.org/api',
      { headers: buildHeaders('Agent/1.0', 'application/json') },
      1000,
      'Example',
      (response): Promise<unknown> => response.json()
    );

    expect(body).toEqual({ ok: true });
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(false);
  });

  it('rejects with a labelled timeout message', async () => {
    await expect(fetchWithTimeout(hangingFetch, 'https://example.org/slow', {}, 10, 'Example', readStatus)).rejects.toThrow(
      'Example timed out after 10ms'
    );
  });

  it('times out when the body stalls after the headers arrive', async () => {
    const stalled = async () => stalledBodyResponse('{"results":[');

    await expect(
      fetchWithTimeout(stalled, 'https://example.org/stalled', {}, 20, 'Example', (response): Promise<unknown> =>
        response.json()
      )
    ).rejects.toThrow('Example timed out after 20ms');
  });

  it('surfaces errors thrown while reading the response', async () => {
    await expect(
      fetchWithTimeout(async () => jsonResponse({}, 503), 'https://example.org', {}, 1000, 'Example', async (response) =>
        assertOk(response, 'Example').status
      )
    ).rejects.toThrow('Example responded with HTTP 503');
  });

  it('rethrows network errors untouched', async () => {
    const failing = async (): Promise<Response> => {
      throw new TypeError('fetch failed');
    };

    await expect(fetchWithTimeout(failing, 'https://example.org', {}, 1000, 'Example', readStatus)).rejects.toThrow(
      'fetch failed'
    );
  });

  it('assertOk throws HttpStatusError for non-2xx responses', () => {
    const response = jsonResponse({}, 404);
    expect(() => assertOk(response, 'Example')).toThrow(HttpStatusError);
    expect(() => assertOk(response, 'Example')).toThrow('Example responded with HTTP 404');
    expect(assertOk(jsonResponse({}), 'Example').status).toBe(200);
  });

  it('builds Accept and User-Agent headers', () => {
    expect(buildHeaders('Agent/1.0', 'text/xml')).toEqual({ Accept: 'text/xml', 'User-Agent': 'Agent/1.0' });
  });
});
