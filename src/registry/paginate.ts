/**
 * Offset pagination for registry search results
 */

import { logger } from '../util/logger.js';
import type { PageWindow } from './query.js';

export interface PaginationOptions {
  pageSize: number;
  maxResults: number;
}

/**
 * Page through results, advancing the offset by the size of each returned
 * batch. Stops on a short page or once `maxResults` items have been yielded;
 * items past the cap are dropped.
 */
export async function* paginateOffsets<T>(
  fetchPage: (page: PageWindow) => Promise<T[]>,
  options: PaginationOptions
): AsyncGenerator<T[], void, unknown> {
  const { pageSize, maxResults } = options;
  let offset = 0;
  let total = 0;
  let pagesProcessed = 0;

  while (total < maxResults) {
    const records = await fetchPage({ offset, limit: pageSize });
    pagesProcessed++;

    if (records.length === 0) {
      break;
    }

    const remaining = maxResults - total;
    const batch = records.length > remaining ? records.slice(0, remaining) : records;
    total += batch.length;
    offset += records.length;

    yield batch;

    if (records.length < pageSize) {
      logger.debug('Received partial page, pagination complete', {
        recordCount: records.length,
        pageSize,
        total,
      });
      break;
    }
  }

  logger.debug('Pagination completed', { total, pagesProcessed, finalOffset: offset });
}
