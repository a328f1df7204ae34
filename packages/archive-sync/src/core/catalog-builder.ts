import type {
  ArchiveSearch,
  BaselineEntry,
  CatalogSnapshot,
  DayRange,
  ProductEntry,
  ScopeKey,
} from '../types.js';
import { CATALOG_SCHEMA_VERSION, RemoteQueryError } from '../types.js';
import type { RangeResolver } from './range-resolver.js';
import { clampRange, formatDay, toZulu } from './day.js';
import type { Logger } from '../logger.js';

export interface CatalogBuilderDeps {
  readonly search: ArchiveSearch;
  readonly resolver: RangeResolver;
  readonly logger: Logger;
  readonly mission: string;
  /** Outer search bound, normally mission start through mission end (or today). */
  readonly bounds: DayRange;
  readonly client: { readonly name: string; readonly version: string };
  readonly now?: () => number;
}

export interface BuildFilters {
  readonly productType?: string | null;
  readonly version?: string | null;
}

export interface BaselineRef {
  readonly productType: string;
  readonly version: string;
}

export interface BuildFailure {
  readonly productType: string | null;
  readonly version: string | null;
  readonly error: string;
}

export interface BuildReport {
  readonly snapshot: CatalogSnapshot;
  readonly refreshed: readonly BaselineRef[];
  readonly empty: readonly BaselineRef[];
  readonly failures: readonly BuildFailure[];
}

type WorkingProducts = Map<string, Map<string, BaselineEntry>>;

interface Run {
  readonly collection: string;
  readonly products: WorkingProducts;
  readonly refreshed: BaselineRef[];
  readonly empty: BaselineRef[];
  readonly failures: BuildFailure[];
}

/** Case-insensitive lookup of `wanted` in `names`; all of `names` when no filter. */
function selectNames(names: readonly string[], wanted: string | null | undefined): string[] {
  if (wanted === null || wanted === undefined || wanted === '') return [...names];
  const target = wanted.toUpperCase();
  return names.filter((name) => name.toUpperCase() === target);
}

/**
 * Latest version of a product: greatest `timeEnd`, ties broken by the
 * greatest version name.
 */
export function latestVersion(product: ProductEntry): string | null {
  let best: string | null = null;
  let bestEnd = '';
  for (const [version, entry] of Object.entries(product.baselines)) {
    if (best === null || entry.timeEnd > bestEnd || (entry.timeEnd === bestEnd && version > best)) {
      best = version;
      bestEnd = entry.timeEnd;
    }
  }
  return best;
}

export function createCatalogBuilder(deps: CatalogBuilderDeps) {
  const { search, resolver, logger } = deps;
  const now = deps.now ?? Date.now;

  function scopeOf(collection: string, productType: string, version: string): ScopeKey {
    return { mission: deps.mission, collection, productType, version };
  }

  async function buildBaseline(scope: ScopeKey, outer: DayRange): Promise<BaselineEntry | null> {
    const days = await resolver.resolveDayRange(scope, outer.start, outer.end);
    if (days === null) return null;

    const count = await search.countMatches(scope, days);
    const first = await resolver.refineBoundaryItem(scope, days.start, 'first');
    const last = await resolver.refineBoundaryItem(scope, days.end, 'last');
    if (first === null || last === null) {
      logger.warn(
        { productType: scope.productType, version: scope.version, start: days.start, end: days.end },
        'Boundary day returned no items, baseline left unresolved',
      );
      return null;
    }

    return {
      timeStart: toZulu(first.referenceTime),
      timeEnd: toZulu(last.referenceTime),
      frameStart: first.ordinal,
      frameEnd: last.ordinal,
      count,
      updatedAt: toZulu(now()),
    };
  }

  function startRun(collection: string, base: CatalogSnapshot | null): Run {
    const products: WorkingProducts = new Map();
    if (base !== null) {
      for (const [productType, product] of Object.entries(base.products)) {
        products.set(productType, new Map(Object.entries(product.baselines)));
      }
    }
    return { collection, products, refreshed: [], empty: [], failures: [] };
  }

  function finishRun(run: Run, base: CatalogSnapshot | null): BuildReport {
    const products: Record<string, ProductEntry> = {};
    for (const [productType, baselines] of run.products) {
      products[productType] = { baselines: Object.fromEntries(baselines) };
    }

    return {
      snapshot: {
        schema: base?.schema ?? CATALOG_SCHEMA_VERSION,
        generatedAt: toZulu(now()),
        collection: run.collection,
        client: base?.client ?? deps.client,
        products,
      },
      refreshed: run.refreshed,
      empty: run.empty,
      failures: run.failures,
    };
  }

  function recordFailure(run: Run, productType: string | null, version: string | null, err: unknown): void {
    if (!(err instanceof RemoteQueryError)) throw err;
    logger.error({ productType, version, operation: err.operation, err }, 'Remote query failed');
    run.failures.push({ productType, version, error: err.message });
  }

  async function refreshBaseline(run: Run, productType: string, version: string, outer: DayRange): Promise<void> {
    const scope = scopeOf(run.collection, productType, version);
    try {
      const entry = await buildBaseline(scope, outer);
      if (entry === null) {
        run.empty.push({ productType, version });
        return;
      }
      const baselines = run.products.get(productType) ?? new Map<string, BaselineEntry>();
      baselines.set(version, entry);
      run.products.set(productType, baselines);
      run.refreshed.push({ productType, version });
      logger.info({ productType, version, count: entry.count, timeStart: entry.timeStart, timeEnd: entry.timeEnd }, 'Baseline resolved');
    } catch (err) {
      recordFailure(run, productType, version, err);
    }
  }

  async function listProductTypes(run: Run, filters: BuildFilters): Promise<string[]> {
    try {
      return selectNames(await search.listProductTypes(run.collection), filters.productType);
    } catch (err) {
      recordFailure(run, null, null, err);
      return [];
    }
  }

  async function buildProduct(run: Run, productType: string, filters: BuildFilters): Promise<void> {
    let versions: string[];
    try {
      versions = selectNames(await search.listVersions(run.collection, productType), filters.version);
    } catch (err) {
      recordFailure(run, productType, null, err);
      return;
    }

    for (const version of versions) {
      await refreshBaseline(run, productType, version, deps.bounds);
    }
  }

  async function buildFull(
    collection: string,
    filters: BuildFilters = {},
    base: CatalogSnapshot | null = null,
  ): Promise<BuildReport> {
    const run = startRun(collection, base);
    for (const productType of await listProductTypes(run, filters)) {
      await buildProduct(run, productType, filters);
    }
    return finishRun(run, base);
  }

  /**
   * Re-resolves only the newest version of each known product type,
   * searching from its recorded start day. Product types the snapshot does
   * not know yet get a full build.
   */
  async function buildIncremental(
    existing: CatalogSnapshot,
    collection: string,
    filters: BuildFilters = {},
  ): Promise<BuildReport> {
    const run = startRun(collection, existing);

    for (const productType of await listProductTypes(run, filters)) {
      const product = existing.products[productType];
      const known = product === undefined ? [] : Object.keys(product.baselines);
      const targets = filters.version ? selectNames(known, filters.version) : known;

      if (product === undefined || targets.length === 0) {
        await buildProduct(run, productType, filters);
        continue;
      }

      const version = filters.version ? (targets[targets.length - 1] ?? null) : latestVersion(product);
      if (version === null) continue;
      const entry = product.baselines[version];
      if (entry === undefined) continue;

      const outer = clampRange({ start: formatDay(Date.parse(entry.timeStart)), end: deps.bounds.end }, deps.bounds);
      if (outer === null) {
        run.empty.push({ productType, version });
        continue;
      }
      await refreshBaseline(run, productType, version, outer);
    }

    return finishRun(run, existing);
  }

  return { buildBaseline, buildFull, buildIncremental };
}

export type CatalogBuilder = ReturnType<typeof createCatalogBuilder>;
