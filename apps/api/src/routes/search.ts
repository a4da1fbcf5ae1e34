/**
 * Search Routes
 * POST/GET /api/search/papers - fan-out search across paper sources
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import {
  MAX_QUERY_LENGTH,
  MAX_RESULTS_LIMIT,
  SORT_OPTIONS,
  SOURCE_IDS,
} from '@paperlens/shared';
import type { ApiErrorBody, SearchRequest } from '@paperlens/shared';
import { PaperSearchValidationError } from '../services/paper-search/errors';
import { isIsoDate } from '../services/paper-search/date-window';
import type { PaperSearchFn } from '../services/paper-search/types';

// Validation schemas
const dateSchema = z.string().refine(isIsoDate, 'Date must be in YYYY-MM-DD format');

const sourcesSchema = z
  .array(z.enum(SOURCE_IDS, { message: `Valid sources are: ${SOURCE_IDS.join(', ')}` }))
  .min(1, 'Sources list cannot be empty if provided');

const searchFields = {
  query: z
    .string({ required_error: 'Query is required' })
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(MAX_QUERY_LENGTH, `Query must be at most ${MAX_QUERY_LENGTH} characters`),
  sort_by: z.enum(SORT_OPTIONS).optional(),
  date_from: dateSchema.optional(),
  date_to: dateSchema.optional(),
};

const maxResultsSchema = z
  .number()
  .int('Max results must be an integer')
  .min(1, 'Max results must be between 1 and 50')
  .max(MAX_RESULTS_LIMIT, `Max results must be between 1 and ${MAX_RESULTS_LIMIT}`);

function dateOrderValid(value: { date_from?: string; date_to?: string }): boolean {
  return !(value.date_from && value.date_to && value.date_from > value.date_to);
}

const dateOrderIssue = { message: 'date_from must not be after date_to', path: ['date_from'] };

export const searchBodySchema = z
  .object({
    ...searchFields,
    max_results: maxResultsSchema.optional(),
    sources: sourcesSchema.optional(),
  })
  .refine(dateOrderValid, dateOrderIssue);

export const searchQuerySchema = z
  .object({
    ...searchFields,
    max_results: z.coerce.number().pipe(maxResultsSchema).optional(),
    // Comma-separated: ?sources=arxiv,crossref
    sources: z
      .string()
      .optional()
      .transform((value) =>
        value
          ? value
              .split(',')
              .map((s) => s.trim())
              .filter(Boolean)
          : undefined
      )
      .pipe(sourcesSchema.optional()),
  })
  .refine(dateOrderValid, dateOrderIssue);

export function errorBody(code: string, message: string, details?: unknown): ApiErrorBody {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

function validationFailed(error: z.ZodError): ApiErrorBody {
  const issue = error.issues[0];
  const field = issue?.path.join('.');
  const message = issue ? (field ? `${field}: ${issue.message}` : issue.message) : 'Invalid request';
  return errorBody('VALIDATION_ERROR', message, error.flatten().fieldErrors);
}

export function createSearchRoutes(search: PaperSearchFn) {
  const routes = new Hono();

  async function respond(c: Context, request: SearchRequest) {
    try {
      const response = await search(request);
      return c.json(response);
    } catch (error) {
      if (error instanceof PaperSearchValidationError) {
        return c.json(errorBody(error.code, error.message), 400);
      }
      throw error;
    }
  }

  /**
   * POST /api/search/papers
   * Search for research papers across the selected sources
   */
  routes.post(
    '/papers',
    zValidator('json', searchBodySchema, (result, c) => {
      if (!result.success) {
        return c.json(validationFailed(result.error), 400);
      }
    }),
    async (c) => respond(c, c.req.valid('json'))
  );

  /**
   * GET /api/search/papers?query=...&max_results=5&sort_by=date&sources=arxiv,openalex
   * Query-string variant for direct browser access
   */
  routes.get(
    '/papers',
    zValidator('query', searchQuerySchema, (result, c) => {
      if (!result.success) {
        return c.json(validationFailed(result.error), 400);
      }
    }),
    async (c) => respond(c, c.req.valid('query'))
  );

  return routes;
}
