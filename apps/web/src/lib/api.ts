import type { ApiErrorBody, HealthResponse, SearchRequest, SearchResponse } from '@paperlens/shared';

// API base URL (proxied through Vite dev server)
const API_BASE_URL = '/api';

// Custom error class for API errors
export class ApiError extends Error {
  constructor(
    message: string,
    public status: number,
    public code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function isApiErrorBody(value: unknown): value is ApiErrorBody {
  if (typeof value !== 'object' || value === null || !('error' in value)) return false;
  const { error } = value;
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

// Core fetch wrapper with error handling
async function apiFetch<T>(endpoint: string, options: RequestInit = {}): Promise<T> {
  const headers = new Headers(options.headers);
  headers.set('Content-Type', 'application/json');

  let response: Response;
  try {
    response = await fetch(`${API_BASE_URL}${endpoint}`, { ...options, headers });
  } catch {
    throw new ApiError('Unable to reach the search service', 0, 'NETWORK_ERROR');
  }

  if (!response.ok) {
    let errorMessage = `HTTP ${response.status}: ${response.statusText}`;
    let errorCode = 'UNKNOWN_ERROR';

    try {
      const errorData: unknown = await response.json();
      if (isApiErrorBody(errorData)) {
        errorMessage = errorData.error.message;
        errorCode = errorData.error.code;
      }
    } catch {
      // Response is not JSON, use default message
    }

    throw new ApiError(errorMessage, response.status, errorCode);
  }

  return response.json();
}

// Search API
export const searchApi = {
  async papers(request: SearchRequest): Promise<SearchResponse> {
    return apiFetch<SearchResponse>('/search/papers', {
      method: 'POST',
      body: JSON.stringify(request),
    });
  },
};

// Health API
export const healthApi = {
  async check(): Promise<HealthResponse> {
    return apiFetch<HealthResponse>('/health');
  },
};

export const apiClient = {
  search: searchApi,
  health: healthApi,
};
