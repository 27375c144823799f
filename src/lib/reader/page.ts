import { MAX_PAGE, MIN_PAGE } from './config';

/**
 * Raw page input as it arrives from a query string, a form field or a
 * client event payload.
 */
export type RawPageInput = string | string[] | number | null | undefined;

/**
 * Parse the leading integer of a page value.
 * "12", "12abc" and " 12" all give 12; "abc", "" and missing values give null.
 */
export function parsePage(raw: RawPageInput): number | null {
  if (raw === null || raw === undefined) return null;

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? Math.trunc(raw) : null;
  }

  const value = Array.isArray(raw) ? raw[0] : raw;
  if (value === undefined) return null;

  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Clamp a page number into [MIN_PAGE, MAX_PAGE]
 */
export function clampPage(page: number, maxPage: number = MAX_PAGE): number {
  return Math.min(maxPage, Math.max(MIN_PAGE, page));
}

/**
 * Resolve untrusted input to an authoritative page number.
 * Unparsable input falls back to the first page, numeric input is clamped.
 */
export function resolvePage(raw: RawPageInput, maxPage: number = MAX_PAGE): number {
  const parsed = parsePage(raw);
  return parsed === null ? MIN_PAGE : clampPage(parsed, maxPage);
}

/**
 * Size of the gap between two page numbers
 */
export function pageDistance(a: number, b: number): number {
  return Math.abs(a - b);
}
