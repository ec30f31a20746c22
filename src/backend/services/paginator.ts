import { DiscogsPagination } from '../../shared/types';
import { createLogger } from '../utils/logger';

import { CatalogClient, CatalogResponse, QueryParams } from './discogsClient';

const logger = createLogger('Paginator');

// Largest page sizes the Discogs API accepts for each collection
export const INVENTORY_PAGE_SIZE = 100;
export const VERSIONS_PAGE_SIZE = 500;

export interface WalkOptions {
  perPage: number;
  /** Extra query parameters sent with every page request */
  params?: QueryParams;
  /** Label used in progress logging, e.g. "inventory for shop" */
  label?: string;
  /** Log page progress at info level instead of debug */
  reportProgress?: boolean;
}

type PagedBody<K extends string, T> = Partial<Record<K, T[]>> & {
  pagination?: DiscogsPagination;
};

/**
 * Walk a paginated Discogs collection, yielding its items in order as one
 * flat sequence.
 *
 * The walk ends on an empty page, when the reported page reaches the
 * reported page count, on the first failed request, or on a page whose
 * items field is not a list. Failures are logged and end the sequence
 * early; they are never thrown to the consumer.
 * Missing pagination metadata counts as zero pages, which ends the walk
 * after the first page.
 */
export async function* walkPages<T, K extends string = string>(
  client: CatalogClient,
  path: string,
  itemsKey: K,
  options: WalkOptions
): AsyncGenerator<T, void, undefined> {
  const label = options.label ?? path;
  const progress = (message: string) =>
    options.reportProgress ? logger.info(message) : logger.debug(message);
  let page = 1;

  while (true) {
    progress(`Fetching page ${page} of ${label}...`);

    let response: CatalogResponse<PagedBody<K, T>>;
    try {
      response = await client.get<PagedBody<K, T>>(path, {
        ...options.params,
        per_page: options.perPage,
        page,
      });
    } catch (error) {
      logger.error(`Request for page ${page} of ${label} failed`, error);
      return;
    }

    if (!response.ok) {
      logger.error(
        `Error fetching page ${page} of ${label}: HTTP ${response.status}`,
        response.body
      );
      return;
    }

    const collection: Partial<Record<K, T[]>> = response.data;
    const raw = collection[itemsKey];
    if (raw !== undefined && raw !== null && !Array.isArray(raw)) {
      logger.error(
        `Unexpected "${itemsKey}" in page ${page} of ${label}: not a list`,
        raw
      );
      return;
    }

    const items = raw ?? [];
    if (items.length === 0) {
      return;
    }

    yield* items;

    const currentPage = response.data.pagination?.page ?? page;
    const totalPages = response.data.pagination?.pages ?? 0;
    progress(
      `Page ${currentPage}/${totalPages} of ${label}: ${items.length} items fetched`
    );

    if (currentPage >= totalPages) {
      return;
    }
    page++;
  }
}

/**
 * Drain a walk into an array.
 */
export async function collectPages<T>(
  walk: AsyncIterable<T>
): Promise<T[]> {
  const items: T[] = [];
  for await (const item of walk) {
    items.push(item);
  }
  return items;
}
