/**
 * @fileoverview Page-number pagination over catalog endpoints.
 * @module @tasklink/clickup/paginator
 */

import { ConfigurationError, ValidationError } from '@tasklink/errors';
import type { Payload, RequestExecutor } from './executor.js';
import type { CallOptions, EndpointDescriptor, Params, PathValues } from './types.js';

/**
 * One fetched page.
 */
export interface Page {
  /** Zero-based page number */
  page: number;
  items: unknown[];
  payload: Payload;
}

export interface PaginateOptions extends CallOptions {
  /** Fail with `ValidationError` instead of fetching more than this many pages */
  maxPages?: number;
}

/**
 * Iterate the pages of a paginated endpoint, one request at a time.
 *
 * Starts at page 0 and stops after a short page, an empty page, a page whose
 * `lastPageKey` is `true`, or the single page of an endpoint without a
 * `pageParam`. The first failed request ends iteration by throwing; nothing
 * from that page is yielded.
 *
 * @example
 * ```typescript
 * for await (const { items } of paginate(executor, lookupEndpoint('tasks'), { list_id: '9' })) {
 *   console.log(items.length);
 * }
 * ```
 */
export async function* paginate(
  executor: RequestExecutor,
  descriptor: EndpointDescriptor,
  pathValues: PathValues = {},
  params: Params = {},
  options: PaginateOptions = {}
): AsyncGenerator<Page, void, undefined> {
  const spec = descriptor.pagination;
  if (!spec) {
    throw new ConfigurationError(`Operation ${descriptor.name} is not paginated`);
  }
  const { maxPages, ...callOptions } = options;

  for (let page = 0; ; page++) {
    if (maxPages !== undefined && page >= maxPages) {
      throw new ValidationError(`Pagination exceeded ${maxPages} pages`, {
        maxPages: [`more than ${maxPages} pages for ${descriptor.name}`],
      });
    }

    const pageParams: Params = spec.pageParam ? { ...params, [spec.pageParam]: page } : params;
    const payload = await executor.execute(descriptor, pathValues, pageParams, callOptions);
    const raw = payload[spec.itemsKey];
    const items: unknown[] = Array.isArray(raw) ? raw : [];

    yield { page, items, payload };

    const lastPage =
      !spec.pageParam ||
      items.length === 0 ||
      (spec.pageSize !== undefined && items.length < spec.pageSize) ||
      (spec.lastPageKey !== undefined && payload[spec.lastPageKey] === true);
    if (lastPage) {
      return;
    }
  }
}

/**
 * Drain {@link paginate} into one flat array of items.
 */
export async function collectPages(
  executor: RequestExecutor,
  descriptor: EndpointDescriptor,
  pathValues: PathValues = {},
  params: Params = {},
  options: PaginateOptions = {}
): Promise<unknown[]> {
  const all: unknown[] = [];
  for await (const { items } of paginate(executor, descriptor, pathValues, params, options)) {
    all.push(...items);
  }
  return all;
}
