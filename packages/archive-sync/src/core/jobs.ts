import { rm } from 'node:fs/promises';
import type { AppConfig, BaselineEntry, Day, DayRange, LedgerStats, ScopeKey } from '../types.js';
import { ConfigError, PendingKind } from '../types.js';
import type { CatalogBuilder, BuildReport } from './catalog-builder.js';
import type { CatalogStore } from '../storage/catalog-store.js';
import type { LedgerStore } from '../storage/ledger-store.js';
import type { LifecycleTracker } from './lifecycle-tracker.js';
import type { Logger } from '../logger.js';

export function scopeFromConfig(config: AppConfig): ScopeKey {
  if (config.productType === null || config.version === null) {
    throw new ConfigError('PRODUCT_TYPE and VERSION are required for this mode');
  }
  return {
    mission: config.mission,
    collection: config.collection,
    productType: config.productType,
    version: config.version,
  };
}

/** Mission start through mission end, or through today while the mission runs. */
export function missionBounds(config: AppConfig, today: Day): DayRange {
  const end = config.missionEnd !== null && config.missionEnd < today ? config.missionEnd : today;
  return { start: config.missionStart, end: end < config.missionStart ? config.missionStart : end };
}

/** Explicit START_DATE/END_DATE window, or undefined for the whole ledger. */
export function ledgerWindow(config: AppConfig, today: Day): DayRange | undefined {
  if (config.startDate === null && config.endDate === null) return undefined;
  return {
    start: config.startDate ?? config.missionStart,
    end: config.endDate ?? today,
  };
}

// ── Catalog jobs ──

export interface CatalogJobDeps {
  readonly config: AppConfig;
  readonly builder: CatalogBuilder;
  readonly store: CatalogStore;
  readonly logger: Logger;
}

async function saveReport(deps: CatalogJobDeps, report: BuildReport): Promise<string> {
  const path = await deps.store.save(report.snapshot);
  for (const failure of report.failures) {
    deps.logger.error(failure, 'Baseline not refreshed');
  }
  deps.logger.info(
    {
      path,
      refreshed: report.refreshed.length,
      empty: report.empty.length,
      failures: report.failures.length,
    },
    'Catalog saved',
  );
  return path;
}

export async function runCatalogJob(deps: CatalogJobDeps): Promise<BuildReport> {
  const { config, builder, store, logger } = deps;
  const filters = { productType: config.productType, version: config.version };

  const base = config.forceRebuild ? null : await store.load(config.collection);
  logger.info(
    { collection: config.collection, merge: base !== null, ...filters },
    'Building catalog',
  );

  const report = await builder.buildFull(config.collection, filters, base);
  await saveReport(deps, report);
  return report;
}

export async function runRefreshJob(deps: CatalogJobDeps): Promise<BuildReport> {
  const { config, builder, store, logger } = deps;
  const filters = { productType: config.productType, version: config.version };

  const existing = await store.load(config.collection);
  if (existing === null) {
    logger.info({ collection: config.collection }, 'No catalog yet, running a full build');
  }

  const report = existing === null
    ? await builder.buildFull(config.collection, filters)
    : await builder.buildIncremental(existing, config.collection, filters);
  await saveReport(deps, report);
  return report;
}

export interface ListJobDeps {
  readonly config: AppConfig;
  readonly store: CatalogStore;
  readonly logger: Logger;
}

export interface ListedBaseline extends BaselineEntry {
  readonly productType: string;
  readonly version: string;
}

/** Baselines of the stored catalog, narrowed by PRODUCT_TYPE and VERSION when set. */
export async function runListJob(deps: ListJobDeps): Promise<ListedBaseline[]> {
  const { config, store, logger } = deps;

  const catalog = await store.load(config.collection);
  if (catalog === null) {
    throw new ConfigError(
      `No catalog for ${config.collection} at ${store.path(config.collection)}, run MODE=catalog first`,
    );
  }

  const rows: ListedBaseline[] = [];
  for (const productType of Object.keys(catalog.products).sort()) {
    if (config.productType !== null && productType !== config.productType) continue;
    const baselines = catalog.products[productType]?.baselines ?? {};
    for (const version of Object.keys(baselines).sort()) {
      const entry = baselines[version];
      if (entry === undefined || (config.version !== null && version !== config.version)) continue;
      rows.push({ productType, version, ...entry });
    }
  }

  logger.info(
    { collection: catalog.collection, generatedAt: catalog.generatedAt, baselines: rows.length },
    'Catalog listed',
  );
  return rows;
}

/** One tab-separated line per baseline; absent frames print as `-`. */
export function formatListing(rows: readonly ListedBaseline[]): string[] {
  return rows.map((row) =>
    [
      row.productType,
      row.version,
      row.timeStart,
      row.timeEnd,
      row.frameStart ?? '-',
      row.frameEnd ?? '-',
      String(row.count),
      row.updatedAt,
    ].join('\t'),
  );
}

// ── Ledger jobs ──

export interface LedgerJobDeps {
  readonly tracker: LifecycleTracker;
  readonly logger: Logger;
}

export async function runStatusJob(deps: LedgerJobDeps, range?: DayRange): Promise<LedgerStats> {
  const { tracker, logger } = deps;
  const stats = await tracker.stats(range);
  logger.info(
    { ...tracker.scope, start: range?.start ?? null, end: range?.end ?? null, ...stats },
    'Ledger status',
  );
  for (const repeated of await tracker.repeatedLines(range)) {
    logger.warn({ ...tracker.scope, ...repeated }, 'Partition holds repeated lines, each record counts once');
  }
  return stats;
}

export interface StatusAllJobDeps {
  readonly store: LedgerStore;
  readonly trackerFor: (scope: ScopeKey) => LifecycleTracker;
  readonly logger: Logger;
}

export interface ScopeStatus {
  readonly scope: ScopeKey;
  readonly stats: LedgerStats;
}

/** Status of every tracked scope of the collection, narrowed by PRODUCT_TYPE and VERSION when set. */
export async function runStatusAllJob(
  deps: StatusAllJobDeps,
  config: AppConfig,
  range?: DayRange,
): Promise<ScopeStatus[]> {
  const { store, trackerFor, logger } = deps;
  const scopes = (await store.listScopes(config.mission, config.collection)).filter(
    (scope) =>
      (config.productType === null || scope.productType === config.productType) &&
      (config.version === null || scope.version === config.version),
  );
  if (scopes.length === 0) {
    logger.info({ mission: config.mission, collection: config.collection }, 'No tracked scopes');
  }

  const statuses: ScopeStatus[] = [];
  for (const scope of scopes) {
    statuses.push({ scope, stats: await runStatusJob({ tracker: trackerFor(scope), logger }, range) });
  }
  return statuses;
}

/** Locators still to fetch, or local paths still to consume, oldest day first. */
export async function runPendingJob(
  deps: LedgerJobDeps,
  kind: PendingKind,
  range?: DayRange,
): Promise<string[]> {
  const { tracker, logger } = deps;
  const lines: string[] = [];

  if (kind === PendingKind.FETCH) {
    for await (const { records } of tracker.pendingFetch(range)) {
      lines.push(...records.map((record) => record.locator));
    }
  } else {
    for await (const { paths } of tracker.pendingConsume(range)) {
      lines.push(...paths);
    }
  }

  logger.info({ ...tracker.scope, kind, pending: lines.length }, 'Pending items listed');
  return lines;
}

export async function runMarkJob(deps: LedgerJobDeps, paths: readonly string[]): Promise<number> {
  if (paths.length === 0) {
    throw new ConfigError('MODE=mark needs at least one file path argument');
  }

  let marked = 0;
  for (const path of paths) {
    if (await deps.tracker.recordConsumed(path)) marked++;
  }
  deps.logger.info({ given: paths.length, marked }, 'Files marked as consumed');
  return marked;
}

export async function runCleanupJob(
  deps: LedgerJobDeps,
  dryRun: boolean,
  range?: DayRange,
): Promise<string[]> {
  const { tracker, logger } = deps;
  const removed: string[] = [];
  let failed = 0;

  for await (const { day, paths } of tracker.deletable(range)) {
    for (const path of paths) {
      if (dryRun) {
        logger.info({ day, path }, 'Would delete');
        removed.push(path);
        continue;
      }
      try {
        await rm(path);
        removed.push(path);
        logger.debug({ day, path }, 'Deleted');
      } catch (err) {
        failed++;
        logger.error({ path, err }, 'Failed to delete');
      }
    }
  }

  logger.info({ dryRun, removed: removed.length, failed }, 'Cleanup complete');
  return removed;
}
