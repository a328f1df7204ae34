import type { AppConfig, ArchiveSearch, DayRange, ItemSummary, NormalizedPage, ScopeKey } from '../types.js';
import { HttpError, RemoteQueryError } from '../types.js';
import type { HttpClient } from './http-client.js';
import { withRetry } from './middleware/retry.js';
import { normalizeSearchPage, queryableEnum } from '../mappers.js';
import { formatDay, inRange } from '../core/day.js';
import type { Logger } from '../logger.js';

const PAGE_SIZE = 100;
const EXISTS_MAX_ITEMS = 150;

export type SearchClientConfig = Pick<AppConfig, 'catalogUrl' | 'maxRetries' | 'retryBaseMs' | 'retryMaxMs'>;

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildFilter(scope: ScopeKey): string {
  return `productType = ${quote(scope.productType)} AND productVersion = ${quote(scope.version)}`;
}

/** STAC `datetime` interval covering the whole UTC days of the range. */
export function datetimeInterval(range: DayRange): string {
  return `${range.start}T00:00:00Z/${range.end}T23:59:59Z`;
}

function byReferenceTime(a: ItemSummary, b: ItemSummary): number {
  return a.referenceTime - b.referenceTime || (a.locator < b.locator ? -1 : a.locator > b.locator ? 1 : 0);
}

/**
 * `ArchiveSearch` over a STAC API. The remote side filters by item metadata
 * time; results are re-filtered here by the identifier's reference day.
 */
export function createSearchClient(
  httpClient: HttpClient,
  config: SearchClientConfig,
  logger: Logger,
): ArchiveSearch {
  const queryablesCache = new Map<string, Promise<unknown>>();

  function searchUrl(scope: ScopeKey, range: DayRange, limit: number): string {
    const url = new URL(`${config.catalogUrl}/search`);
    url.searchParams.set('collections', scope.collection);
    url.searchParams.set('filter', buildFilter(scope));
    url.searchParams.set('filter-lang', 'cql2-text');
    url.searchParams.set('datetime', datetimeInterval(range));
    url.searchParams.set('limit', String(limit));
    return url.toString();
  }

  async function fetchJson(url: string, operation: string): Promise<unknown> {
    try {
      const response = await withRetry(() => httpClient.get(url), config, logger, operation)();
      return response.body;
    } catch (err) {
      if (err instanceof HttpError) {
        throw new RemoteQueryError(`${operation} failed: ${err.message}`, operation, err);
      }
      throw err;
    }
  }

  async function fetchPage(url: string, operation: string): Promise<NormalizedPage> {
    return normalizeSearchPage(await fetchJson(url, operation));
  }

  /**
   * Walks `rel=next` links until `maxItems` raw items were seen or `stop`
   * returns true for a page.
   */
  async function collect(
    scope: ScopeKey,
    range: DayRange,
    maxItems: number,
    operation: string,
    stop: (page: NormalizedPage) => boolean = () => false,
  ): Promise<ItemSummary[]> {
    const items: ItemSummary[] = [];
    let seen = 0;
    let url: string | null = searchUrl(scope, range, Math.min(PAGE_SIZE, maxItems));

    while (url !== null && seen < maxItems) {
      const page = await fetchPage(url, operation);
      seen += page.items.length;
      for (const item of page.items) {
        if (inRange(formatDay(item.referenceTime), range)) items.push(item);
      }
      if (page.items.length === 0 || stop(page)) break;
      url = page.nextUrl;
    }

    return items;
  }

  async function countMatches(scope: ScopeKey, range: DayRange): Promise<number> {
    const page = await fetchPage(searchUrl(scope, range, 1), 'countMatches');
    return page.matched ?? 0;
  }

  async function existsAny(scope: ScopeKey, range: DayRange): Promise<boolean> {
    const found = await collect(scope, range, EXISTS_MAX_ITEMS, 'existsAny', (page) => {
      if (page.matched === 0) return true;
      return page.items.some((item) => inRange(formatDay(item.referenceTime), range));
    });
    return found.length > 0;
  }

  async function queryItems(scope: ScopeKey, range: DayRange, maxItems: number): Promise<ItemSummary[]> {
    const items = await collect(scope, range, maxItems, 'queryItems');

    const unique = new Map<string, ItemSummary>();
    for (const item of items) {
      if (!unique.has(item.locator)) unique.set(item.locator, item);
    }

    const sorted = [...unique.values()].sort(byReferenceTime);
    logger.debug(
      { productType: scope.productType, version: scope.version, start: range.start, end: range.end, items: sorted.length },
      'Items queried',
    );
    return sorted;
  }

  function loadQueryables(collection: string): Promise<unknown> {
    let pending = queryablesCache.get(collection);
    if (pending === undefined) {
      const url = `${config.catalogUrl}/collections/${encodeURIComponent(collection)}/queryables`;
      pending = fetchJson(url, 'queryables');
      // Failed lookups are not cached
      void pending.catch(() => queryablesCache.delete(collection));
      queryablesCache.set(collection, pending);
    }
    return pending;
  }

  async function listProductTypes(collection: string): Promise<string[]> {
    return queryableEnum(await loadQueryables(collection), 'productType');
  }

  // Queryables list versions per collection, not per product type.
  async function listVersions(collection: string, _productType: string): Promise<string[]> {
    return queryableEnum(await loadQueryables(collection), 'productVersion');
  }

  return { countMatches, existsAny, queryItems, listProductTypes, listVersions };
}
