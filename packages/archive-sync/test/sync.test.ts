import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import { collectPending, createDiscovery, createSync, resolveSyncWindow } from '../src/core/sync.js';
import { createLifecycleTracker } from '../src/core/lifecycle-tracker.js';
import type { LifecycleTracker } from '../src/core/lifecycle-tracker.js';
import type { FetchResult } from '../src/core/fetcher.js';
import { createLedgerStore } from '../src/storage/ledger-store.js';
import type { LedgerStore } from '../src/storage/ledger-store.js';
import { createLocalPathFn } from '../src/paths.js';
import type { CatalogSnapshot } from '../src/types.js';
import { FetchError, LedgerPhase } from '../src/types.js';
import { SCOPE, createFakeArchive, itemLocator } from './fake-archive.js';

const logger = pino({ level: 'silent' });
const WINDOW = { start: '2024-01-05', end: '2024-01-06' };

function createMockFetcher(failures: Record<string, Error> = {}, skipped: readonly string[] = []) {
  return {
    fetchItem: vi.fn().mockImplementation(async (locator: string, localPath: string): Promise<FetchResult> => {
      const failure = failures[locator];
      if (failure !== undefined) throw failure;
      return { locator, localPath, bytes: skipped.includes(locator) ? 0 : 1, skipped: skipped.includes(locator) };
    }),
  };
}

describe('sync', () => {
  const u1 = itemLocator('2024-01-05', '010000', '01000A');
  const u2 = itemLocator('2024-01-05', '020000', '01001A');
  const u3 = itemLocator('2024-01-06', '010000', '01010A');

  let root: string;
  let store: LedgerStore;
  let tracker: LifecycleTracker;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'archive-sync-sync-'));
    store = createLedgerStore(join(root, 'registry'));
    tracker = createLifecycleTracker(SCOPE, {
      store,
      localPathFor: createLocalPathFn(join(root, 'data'), SCOPE),
      logger,
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function setup(fetcher: ReturnType<typeof createMockFetcher>, maxItems = 100) {
    const archive = createFakeArchive({ 'PRD_1B/AB': [u1, u2, u3] });
    const sync = createSync({ search: archive, tracker, fetcher, logger, concurrency: 2, maxItems });
    return { archive, sync };
  }

  it('discovers each day and fetches what is pending', async () => {
    const fetcher = createMockFetcher({ [u2]: new FetchError(u2, 'HTTP 404', 404) });
    const { archive, sync } = setup(fetcher);

    const summary = await sync.run(WINDOW);

    expect(summary).toEqual({ window: WINDOW, discovered: 3, fetched: 2, skipped: 0, failed: 1 });
    expect(archive.queryItems).toHaveBeenCalledTimes(2);
    expect(archive.queryItems.mock.calls[0]?.[1]).toEqual({ start: '2024-01-05', end: '2024-01-05' });
    expect(fetcher.fetchItem).toHaveBeenCalledTimes(3);

    expect((await tracker.pendingFetchOn('2024-01-05')).map((r) => r.locator)).toEqual([u2]);
    expect(await store.readErrors(SCOPE)).toEqual([{ locator: u2, message: `Fetch failed for ${u2}: HTTP 404` }]);
  });

  it('only retries what is still pending on the next run', async () => {
    const first = createMockFetcher({ [u2]: new FetchError(u2, 'HTTP 503', 503) });
    await setup(first).sync.run(WINDOW);

    const second = createMockFetcher();
    const summary = await setup(second).sync.run(WINDOW);

    expect(summary).toEqual({ window: WINDOW, discovered: 0, fetched: 1, skipped: 0, failed: 0 });
    expect(second.fetchItem).toHaveBeenCalledTimes(1);
    expect(second.fetchItem.mock.calls[0]?.[0]).toBe(u2);
  });

  it('counts files already on disk as skipped', async () => {
    const fetcher = createMockFetcher({}, [u3]);
    const summary = await setup(fetcher).sync.run(WINDOW);

    expect(summary).toEqual({ window: WINDOW, discovered: 3, fetched: 2, skipped: 1, failed: 0 });
    expect(await tracker.pendingFetchOn('2024-01-06')).toEqual([]);
  });

  it('caps transfers per run', async () => {
    const fetcher = createMockFetcher();
    const { sync } = setup(fetcher);

    await sync.discover(WINDOW);
    const result = await createSync({
      search: createFakeArchive({}),
      tracker,
      fetcher,
      logger,
      concurrency: 2,
      maxItems: 1,
    }).fetchPending(WINDOW);

    expect(result).toEqual({ fetched: 1, skipped: 0, failed: 0 });
    expect(fetcher.fetchItem.mock.calls[0]?.[0]).toBe(u1);
  });

  it('stops reading the ledger once the cap is reached', async () => {
    await setup(createMockFetcher()).sync.discover(WINDOW);
    const readSet = vi.spyOn(store, 'readSet');

    const queue = await collectPending(tracker, 1);

    expect(queue.map((record) => record.locator)).toEqual([u1]);
    expect(readSet.mock.calls.map(([, phase, day]) => `${phase}:${day}`)).toEqual([
      `${LedgerPhase.DISCOVERED}:2024-01-05`,
      `${LedgerPhase.FETCHED}:2024-01-05`,
    ]);
  });

  it('discovers without fetching', async () => {
    const archive = createFakeArchive({ 'PRD_1B/AB': [u1, u2, u3] });
    const discovery = createDiscovery({ search: archive, tracker, logger, maxItems: 100 });

    expect(await discovery.discover(WINDOW)).toBe(3);
    expect((await tracker.stats()).pendingFetch).toBe(3);
  });

  it('fetches the whole ledger when no window is given', async () => {
    const fetcher = createMockFetcher();
    const { sync } = setup(fetcher);
    await sync.discover(WINDOW);

    expect(await sync.fetchPending()).toEqual({ fetched: 3, skipped: 0, failed: 0 });
    expect((await tracker.stats()).pendingFetch).toBe(0);
  });

  it('propagates unexpected errors', async () => {
    const fetcher = createMockFetcher({ [u1]: new Error('disk full') });
    await expect(setup(fetcher).sync.run(WINDOW)).rejects.toThrow('disk full');
  });
});

describe('resolveSyncWindow', () => {
  const catalog = (timeStart: string): CatalogSnapshot => ({
    schema: '1.0',
    generatedAt: '2024-06-01T00:00:00Z',
    collection: 'COLL',
    client: { name: 'archive-sync', version: 'test' },
    products: {
      PRD_1B: {
        baselines: {
          AB: {
            timeStart,
            timeEnd: '2024-06-01T00:00:00Z',
            frameStart: null,
            frameEnd: null,
            count: 1,
            updatedAt: '2024-06-01T00:00:00Z',
          },
        },
      },
    },
  });

  it('defaults to the three days before today', () => {
    expect(resolveSyncWindow({ startDate: null, endDate: null, today: '2024-01-10' }, SCOPE, null)).toEqual({
      start: '2024-01-07',
      end: '2024-01-10',
    });
  });

  it('uses explicit dates', () => {
    expect(
      resolveSyncWindow({ startDate: '2023-12-01', endDate: '2023-12-31', today: '2024-01-10' }, SCOPE, null),
    ).toEqual({ start: '2023-12-01', end: '2023-12-31' });
  });

  it('never starts before the first catalogued item', () => {
    expect(
      resolveSyncWindow({ startDate: null, endDate: null, today: '2024-01-10' }, SCOPE, catalog('2024-01-09T05:00:00Z')),
    ).toEqual({ start: '2024-01-09', end: '2024-01-10' });
    expect(
      resolveSyncWindow({ startDate: null, endDate: null, today: '2024-01-10' }, SCOPE, catalog('2023-01-01T00:00:00Z')),
    ).toEqual({ start: '2024-01-07', end: '2024-01-10' });
  });

  it('is empty when the catalogue starts after the window', () => {
    expect(
      resolveSyncWindow({ startDate: null, endDate: '2024-01-10', today: '2024-02-01' }, SCOPE, catalog('2024-01-20T00:00:00Z')),
    ).toBeNull();
  });

  it('ignores catalog entries of other scopes', () => {
    expect(
      resolveSyncWindow(
        { startDate: null, endDate: null, today: '2024-01-10' },
        { ...SCOPE, version: 'AC' },
        catalog('2024-01-09T05:00:00Z'),
      ),
    ).toEqual({ start: '2024-01-07', end: '2024-01-10' });
  });
});
