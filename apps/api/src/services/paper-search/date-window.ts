/**
 * Date Window Validation
 *
 * Explicit `date_from` / `date_to` bounds are pushed into each source's query
 * and verified again after parsing, since sources filter at different
 * granularities (arXiv by submission time, Crossref by any issued date).
 */

/** Inclusive, either bound optional */
export interface DateWindow {
  /** YYYY-MM-DD */
  from?: string;
  /** YYYY-MM-DD */
  to?: string;
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Strict YYYY-MM-DD check that also rejects impossible dates like 2024-02-30
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/**
 * Build a YYYY-MM-DD string from year/month/day parts; missing parts become 01.
 * Returns null for parts that do not form a real date.
 */
export function toIsoDate(year: number, month = 1, day = 1): string | null {
  const value = `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  return isIsoDate(value) ? value : null;
}

/** Take the date part of an ISO timestamp such as 2024-01-15T18:00:01Z */
export function isoDateFromTimestamp(value: string | undefined | null): string | null {
  if (!value) return null;
  const candidate = value.trim().slice(0, 10);
  return isIsoDate(candidate) ? candidate : null;
}

export function hasDateWindow(window: DateWindow): boolean {
  return Boolean(window.from || window.to);
}

/**
 * Papers without a date are kept: the window only excludes what is known to be outside it.
 * ISO dates compare correctly as strings.
 */
export function isDateWithinWindow(date: string | null | undefined, window: DateWindow): boolean {
  if (!date) return true;
  if (window.from && date < window.from) return false;
  if (window.to && date > window.to) return false;
  return true;
}

export function filterByDateWindow<T extends { published_date: string | null }>(
  items: T[],
  window: DateWindow
): { kept: T[]; excluded: number } {
  if (!hasDateWindow(window)) return { kept: items, excluded: 0 };
  const kept = items.filter((item) => isDateWithinWindow(item.published_date, window));
  return { kept, excluded: items.length - kept.length };
}

/**
 * arXiv submittedDate range: [YYYYMMDDTTTT TO YYYYMMDDTTTT] in GMT.
 * arXiv has no wildcards, so open bounds use the earliest/latest representable values.
 */
export function formatForArxiv(window: DateWindow): string {
  const start = window.from ? `${window.from.replace(/-/g, '')}0000` : '000001010000';
  const end = window.to ? `${window.to.replace(/-/g, '')}2359` : '999912312359';
  return `[${start} TO ${end}]`;
}

export function describeDateWindow(window: DateWindow): string {
  return `${window.from ?? 'any'} to ${window.to ?? 'any'}`;
}
