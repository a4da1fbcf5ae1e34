export type PaperSearchErrorCode =
  | 'EMPTY_QUERY'
  | 'INVALID_MAX_RESULTS'
  | 'INVALID_SORT'
  | 'EMPTY_SOURCES'
  | 'UNKNOWN_SOURCE'
  | 'INVALID_DATE'
  | 'INVALID_DATE_RANGE';

/**
 * Raised before any source is queried; maps to HTTP 400.
 */
export class PaperSearchValidationError extends Error {
  readonly code: PaperSearchErrorCode;

  constructor(code: PaperSearchErrorCode, message: string) {
    super(message);
    this.name = 'PaperSearchValidationError';
    this.code = code;
  }
}
