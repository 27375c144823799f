import { readerConfig } from './config';
import { parsePage } from './page';

/** Query marker for navigations that follow a physical scroll */
export const SCROLL_ACT = 'scroll';

export interface ReaderQuery {
  page: number | null;
  fromScroll: boolean;
}

export interface ReaderHrefOptions {
  fromScroll?: boolean;
  basePath?: string;
}

/**
 * Query values as URLSearchParams (Next's ReadonlyURLSearchParams extends it)
 * or as the plain record a server component receives
 */
export type QuerySource = URLSearchParams | Record<string, string | string[] | undefined>;

function readParam(source: QuerySource, key: string): string | string[] | undefined {
  if (source instanceof URLSearchParams) {
    return source.get(key) ?? undefined;
  }
  return source[key];
}

/**
 * Read `page` and `act` from the reader's query string.
 * The page is parsed but not clamped; clamping is the controller's job.
 */
export function parseReaderQuery(source: QuerySource): ReaderQuery {
  const act = readParam(source, 'act');
  const actValue = Array.isArray(act) ? act[0] : act;

  return {
    page: parsePage(readParam(source, 'page')),
    fromScroll: actValue === SCROLL_ACT
  };
}

/**
 * Build the shareable reader URL for a page
 */
export function buildReaderHref(page: number, options: ReaderHrefOptions = {}): string {
  const { fromScroll = false, basePath = readerConfig.basePath } = options;
  const params = new URLSearchParams({ page: String(page) });
  if (fromScroll) {
    params.set('act', SCROLL_ACT);
  }
  return `${basePath}?${params.toString()}`;
}
