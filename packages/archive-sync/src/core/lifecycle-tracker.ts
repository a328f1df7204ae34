import { access } from 'node:fs/promises';
import type { Day, DayRange, LedgerStats, PairRecord, ScopeKey } from '../types.js';
import { LedgerPhase, StorageError } from '../types.js';
import type { LedgerStore } from '../storage/ledger-store.js';
import { isNotFound } from '../storage/atomic-write.js';
import { parseIdentifier } from '../identifiers.js';
import { referenceDayOf } from '../paths.js';
import type { LocalPathFn } from '../paths.js';
import type { Logger } from '../logger.js';

export interface LifecycleTrackerDeps {
  readonly store: LedgerStore;
  readonly localPathFor: LocalPathFn;
  readonly logger: Logger;
}

export interface PendingFetchDay {
  readonly day: Day;
  readonly records: readonly PairRecord[];
}

export interface PathsDay {
  readonly day: Day;
  readonly paths: readonly string[];
}

/** A partition holding more lines than distinct records. */
export interface RepeatedLines {
  readonly phase: LedgerPhase;
  readonly day: Day;
  readonly lines: number;
  readonly records: number;
}

function restartable<T>(generate: () => AsyncGenerator<T>): AsyncIterable<T> {
  return { [Symbol.asyncIterator]: generate };
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw new StorageError(`Failed to stat ${path}`, 'deletable', path, err);
  }
}

/** False when the name states a product type or version other than the scope's. */
function belongsTo(scope: ScopeKey, locator: string): boolean {
  const { productType, version } = parseIdentifier(locator);
  if (productType !== null && productType.toUpperCase() !== scope.productType.toUpperCase()) return false;
  return version === null || version.toUpperCase() === scope.version.toUpperCase();
}

/**
 * Found → fetched → consumed bookkeeping for one scope. Every record lands in
 * the partition of its reference day, re-derived from the identifier, so a
 * remote query window that overlaps neighbouring days never misfiles items.
 */
export function createLifecycleTracker(scope: ScopeKey, deps: LifecycleTrackerDeps) {
  const { store, localPathFor, logger } = deps;

  async function recordDiscovered(locators: readonly string[]): Promise<number> {
    const byDay = new Map<Day, PairRecord[]>();
    for (const locator of locators) {
      const day = referenceDayOf(locator);
      const localPath = localPathFor(locator);
      if (day === null || localPath === null) {
        logger.warn({ locator }, 'No reference timestamp in identifier, skipping');
        continue;
      }
      if (!belongsTo(scope, locator)) {
        logger.warn({ locator, productType: scope.productType, version: scope.version }, 'Item belongs to another scope, skipping');
        continue;
      }
      const records = byDay.get(day) ?? [];
      records.push({ locator, localPath });
      byDay.set(day, records);
    }

    let added = 0;
    for (const day of [...byDay.keys()].sort()) {
      const existing = await store.readSet(scope, LedgerPhase.DISCOVERED, day);
      const known = new Set(existing.map((r) => r.locator));

      const fresh: PairRecord[] = [];
      for (const record of byDay.get(day) ?? []) {
        if (known.has(record.locator)) continue;
        known.add(record.locator);
        fresh.push(record);
      }

      if (fresh.length === 0) {
        await store.touch(scope, LedgerPhase.DISCOVERED, day);
        continue;
      }

      await store.writeSet(scope, LedgerPhase.DISCOVERED, day, [...existing, ...fresh]);
      added += fresh.length;
      logger.debug({ day, added: fresh.length, total: known.size }, 'Discovered partition updated');
    }

    return added;
  }

  async function recordFetched(locator: string, localPath: string): Promise<boolean> {
    const day = referenceDayOf(locator);
    if (day === null) {
      logger.warn({ locator }, 'Cannot derive day for fetched item');
      return false;
    }

    const existing = await store.readSet(scope, LedgerPhase.FETCHED, day);
    if (existing.some((r) => r.locator === locator)) return false;

    await store.writeSet(scope, LedgerPhase.FETCHED, day, [...existing, { locator, localPath }]);
    return true;
  }

  async function recordConsumed(localPath: string): Promise<boolean> {
    const day = referenceDayOf(localPath);
    if (day === null) {
      logger.warn({ localPath }, 'Cannot derive day for consumed file');
      return false;
    }

    const existing = await store.readSet(scope, LedgerPhase.CONSUMED, day);
    if (existing.includes(localPath)) return false;

    await store.writeSet(scope, LedgerPhase.CONSUMED, day, [...existing, localPath]);
    return true;
  }

  async function recordError(locator: string, message: string): Promise<void> {
    await store.appendError(scope, locator, message);
  }

  async function pendingFetchOn(day: Day): Promise<PairRecord[]> {
    const [discovered, fetched] = await Promise.all([
      store.readSet(scope, LedgerPhase.DISCOVERED, day),
      store.readSet(scope, LedgerPhase.FETCHED, day),
    ]);
    const done = new Set(fetched.map((r) => r.locator));
    return discovered.filter((r) => !done.has(r.locator));
  }

  async function pendingConsumeOn(day: Day): Promise<string[]> {
    const [fetched, consumed] = await Promise.all([
      store.readSet(scope, LedgerPhase.FETCHED, day),
      store.readSet(scope, LedgerPhase.CONSUMED, day),
    ]);
    const done = new Set(consumed);
    const paths = new Set<string>();
    for (const record of fetched) {
      if (record.localPath !== '' && !done.has(record.localPath)) paths.add(record.localPath);
    }
    return [...paths];
  }

  async function deletableOn(day: Day): Promise<string[]> {
    const consumed = await store.readSet(scope, LedgerPhase.CONSUMED, day);
    const present: string[] = [];
    for (const path of consumed) {
      if (await fileExists(path)) present.push(path);
    }
    return present;
  }

  function pendingFetch(range?: DayRange): AsyncIterable<PendingFetchDay> {
    return restartable(async function* () {
      for await (const day of store.listDays(scope, LedgerPhase.DISCOVERED, range)) {
        const records = await pendingFetchOn(day);
        if (records.length > 0) yield { day, records };
      }
    });
  }

  function pendingConsume(range?: DayRange): AsyncIterable<PathsDay> {
    return restartable(async function* () {
      for await (const day of store.listDays(scope, LedgerPhase.FETCHED, range)) {
        const paths = await pendingConsumeOn(day);
        if (paths.length > 0) yield { day, paths };
      }
    });
  }

  function deletable(range?: DayRange): AsyncIterable<PathsDay> {
    return restartable(async function* () {
      for await (const day of store.listDays(scope, LedgerPhase.CONSUMED, range)) {
        const paths = await deletableOn(day);
        if (paths.length > 0) yield { day, paths };
      }
    });
  }

  /** Partitions edited by hand or merged from elsewhere still read as sets; this lists them. */
  async function repeatedLines(range?: DayRange): Promise<RepeatedLines[]> {
    const found: RepeatedLines[] = [];
    for (const phase of Object.values(LedgerPhase)) {
      for await (const day of store.listDays(scope, phase, range)) {
        const [lines, records] = await Promise.all([
          store.countLines(scope, phase, day),
          store.readSet(scope, phase, day),
        ]);
        if (lines > records.length) found.push({ phase, day, lines, records: records.length });
      }
    }
    return found;
  }

  async function stats(range?: DayRange): Promise<LedgerStats> {
    const days = new Set<Day>();
    for (const phase of Object.values(LedgerPhase)) {
      for await (const day of store.listDays(scope, phase, range)) days.add(day);
    }

    let discovered = 0;
    let fetched = 0;
    let consumed = 0;
    let pendingFetchCount = 0;
    let pendingConsumeCount = 0;

    for (const day of days) {
      const [d, f, c] = await Promise.all([
        store.readSet(scope, LedgerPhase.DISCOVERED, day),
        store.readSet(scope, LedgerPhase.FETCHED, day),
        store.readSet(scope, LedgerPhase.CONSUMED, day),
      ]);
      const fetchedLocators = new Set(f.map((r) => r.locator));
      const fetchedPaths = new Set(f.map((r) => r.localPath).filter((p) => p !== ''));
      const consumedPaths = new Set(c);

      discovered += new Set(d.map((r) => r.locator)).size;
      fetched += fetchedLocators.size;
      consumed += consumedPaths.size;
      pendingFetchCount += d.filter((r) => !fetchedLocators.has(r.locator)).length;
      pendingConsumeCount += [...fetchedPaths].filter((p) => !consumedPaths.has(p)).length;
    }

    const errors = new Set((await store.readErrors(scope)).map((e) => e.locator)).size;

    return {
      discovered,
      fetched,
      consumed,
      pendingFetch: pendingFetchCount,
      pendingConsume: pendingConsumeCount,
      errors,
    };
  }

  return {
    scope,
    recordDiscovered,
    recordFetched,
    recordConsumed,
    recordError,
    pendingFetch,
    pendingConsume,
    deletable,
    pendingFetchOn,
    pendingConsumeOn,
    repeatedLines,
    stats,
  };
}

export type LifecycleTracker = ReturnType<typeof createLifecycleTracker>;
