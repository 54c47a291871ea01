import { createLogger } from '../logger';
import type { DealsApiClient } from '../api/client';
import type { Deal } from '../api/types';

const logger = createLogger('paginator');

export interface PaginatorOptions {
  client: DealsApiClient;
  accessToken: string;
  startCursor?: string | null;
  pageSize?: number;
  properties?: readonly string[];
  associations?: readonly string[];
  /** Stop after this many fetched pages even if the remote reports more. */
  maxPages?: number;
}

export interface DealPage {
  deals: Deal[];
  cursor: string | null;
}

export async function* paginateDeals(options: PaginatorOptions): AsyncGenerator<DealPage> {
  let cursor: string | null | undefined = options.startCursor;
  let pageCount = 0;

  while (true) {
    const page = await options.client.getDeals(options.accessToken, {
      limit: options.pageSize ?? 100,
      after: cursor ?? undefined,
      properties: options.properties,
      associations: options.associations,
    });

    pageCount++;
    logger.debug({ pageCount, count: page.deals.length, nextCursor: page.nextCursor }, 'Page fetched');

    if (page.deals.length > 0) {
      yield { deals: page.deals, cursor: page.nextCursor };
    }

    if (!page.nextCursor) {
      logger.info({ totalPages: pageCount }, 'Pagination complete');
      break;
    }

    if (options.maxPages !== undefined && pageCount >= options.maxPages) {
      logger.warn({ totalPages: pageCount, nextCursor: page.nextCursor }, 'Page limit reached, stopping early');
      break;
    }

    cursor = page.nextCursor;
  }
}

export async function collectDeals(options: PaginatorOptions): Promise<Deal[]> {
  const deals: Deal[] = [];
  for await (const page of paginateDeals(options)) {
    deals.push(...page.deals);
  }
  return deals;
}
