import type { FetchLike } from './types';

export class HttpStatusError extends Error {
  status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

/**
 * Single GET/POST bounded by `timeoutMs`, body read included: `read` runs
 * under the same timer, so headers followed by a stalled body still time out.
 * The request is aborted on expiry and the rejection carries
 * "<label> timed out after <n>ms".
 */
export async function fetchWithTimeout<T>(
  fetchImpl: FetchLike,
  input: string | URL,
  init: RequestInit,
  timeoutMs: number,
  label: string,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const message = `${label} timed out after ${timeoutMs}ms`;
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort(new Error(message));
      reject(new Error(message));
    }, timeoutMs);
  });

  try {
    const response = await Promise.race([fetchImpl(input, { ...init, signal: controller.signal }), expired]);
    return await Promise.race([read(response), expired]);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(message);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Throws HttpStatusError for non-2xx responses */
export function assertOk(response: Response, label: string): Response {
  if (!response.ok) {
    throw new HttpStatusError(`${label} responded with HTTP ${response.status}`, response.status);
  }
  return response;
}

export function buildHeaders(userAgent: string, accept: string): Record<string, string> {
  return {
    Accept: accept,
    'User-Agent': userAgent,
  };
}
