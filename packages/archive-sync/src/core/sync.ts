import pLimit from 'p-limit';
import type { ArchiveSearch, CatalogSnapshot, Day, DayRange, PairRecord, ScopeKey } from '../types.js';
import { FetchError } from '../types.js';
import type { LifecycleTracker } from './lifecycle-tracker.js';
import type { Fetcher } from './fetcher.js';
import { addDays, formatDay, iterateDays, singleDay } from './day.js';
import type { Logger } from '../logger.js';

const DEFAULT_WINDOW_DAYS = 3;

export interface DiscoveryDeps {
  readonly search: ArchiveSearch;
  readonly tracker: LifecycleTracker;
  readonly logger: Logger;
  /** Cap on items queried per day, and on transfers per run when fetching. */
  readonly maxItems: number;
}

export interface SyncDeps extends DiscoveryDeps {
  readonly fetcher: Fetcher;
  readonly concurrency: number;
}

export type FetchSummary = Omit<SyncSummary, 'window' | 'discovered'>;

export interface SyncSummary {
  readonly window: DayRange;
  readonly discovered: number;
  readonly fetched: number;
  readonly skipped: number;
  readonly failed: number;
}

export interface WindowOptions {
  readonly startDate: Day | null;
  readonly endDate: Day | null;
  readonly today: Day;
}

/**
 * Sync window: explicit dates, otherwise the last three days through today.
 * With a catalog entry for the scope, the start never precedes its first item.
 */
export function resolveSyncWindow(
  options: WindowOptions,
  scope: ScopeKey,
  catalog: CatalogSnapshot | null,
): DayRange | null {
  const end = options.endDate ?? options.today;
  let start = options.startDate ?? addDays(end, -DEFAULT_WINDOW_DAYS);

  const entry = catalog?.products[scope.productType]?.baselines[scope.version];
  if (entry !== undefined) {
    const firstDay = formatDay(Date.parse(entry.timeStart));
    if (firstDay > start) start = firstDay;
  }

  return start <= end ? { start, end } : null;
}

/** Day-by-day remote search into the Discovered phase, without fetching. */
export function createDiscovery(deps: DiscoveryDeps) {
  const { search, tracker, logger } = deps;
  const scope = tracker.scope;

  async function discover(window: DayRange): Promise<number> {
    let added = 0;
    for (const day of iterateDays(window)) {
      const items = await search.queryItems(scope, singleDay(day), deps.maxItems);
      if (items.length >= deps.maxItems) {
        logger.warn({ day, maxItems: deps.maxItems }, 'Day hit the item cap, results may be truncated');
      }
      const fresh = await tracker.recordDiscovered(items.map((item) => item.locator));
      added += fresh;
      logger.info({ day, found: items.length, new: fresh }, 'Day discovered');
    }
    return added;
  }

  return { discover };
}

export type Discovery = ReturnType<typeof createDiscovery>;

/** Pending records with a local target, oldest day first, at most `limit` of them. */
export async function collectPending(
  tracker: LifecycleTracker,
  limit: number,
  window?: DayRange,
): Promise<PairRecord[]> {
  const queue: PairRecord[] = [];
  if (limit <= 0) return queue;

  for await (const { records } of tracker.pendingFetch(window)) {
    for (const record of records) {
      if (record.localPath === '') continue;
      queue.push(record);
      if (queue.length >= limit) return queue;
    }
  }
  return queue;
}

export function createSync(deps: SyncDeps) {
  const { tracker, fetcher, logger } = deps;
  const scope = tracker.scope;
  const { discover } = createDiscovery(deps);

  /** Fetches what the ledger holds as pending; the whole ledger without a window. */
  async function fetchPending(window?: DayRange): Promise<FetchSummary> {
    const limit = pLimit(deps.concurrency);

    // Ledger updates for one scope run one at a time
    let ledgerChain: Promise<unknown> = Promise.resolve();
    function serialize<T>(task: () => Promise<T>): Promise<T> {
      const next = ledgerChain.then(task);
      ledgerChain = next.catch(() => undefined);
      return next;
    }

    let fetched = 0;
    let skipped = 0;
    let failed = 0;

    async function fetchOne(record: PairRecord): Promise<void> {
      try {
        const result = await fetcher.fetchItem(record.locator, record.localPath);
        await serialize(() => tracker.recordFetched(record.locator, record.localPath));
        if (result.skipped) skipped++;
        else fetched++;
      } catch (err) {
        if (!(err instanceof FetchError)) throw err;
        failed++;
        const message = err.message;
        logger.error({ locator: record.locator, status: err.status, err }, 'Fetch failed');
        await serialize(() => tracker.recordError(record.locator, message));
      }
    }

    const queue = await collectPending(tracker, deps.maxItems, window);
    logger.info({ pending: queue.length, concurrency: deps.concurrency }, 'Fetching pending items');
    const results = await Promise.allSettled(queue.map((record) => limit(() => fetchOne(record))));
    const crashed = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected',
    );
    for (const c of crashed) {
      logger.error({ reason: c.reason }, 'Fetch task crashed');
    }
    if (crashed.length > 0) {
      throw crashed[0]?.reason;
    }

    return { fetched, skipped, failed };
  }

  async function run(window: DayRange): Promise<SyncSummary> {
    logger.info(
      { productType: scope.productType, version: scope.version, start: window.start, end: window.end },
      'Sync starting',
    );

    const discovered = await discover(window);
    const { fetched, skipped, failed } = await fetchPending(window);

    const summary = { window, discovered, fetched, skipped, failed };
    logger.info(summary, 'Sync complete');
    return summary;
  }

  return { discover, fetchPending, run };
}

export type Sync = ReturnType<typeof createSync>;
