import type { ArchiveSearch, Day, DayRange, ItemSummary, ScopeKey } from '../types.js';
import { fromDayIndex, singleDay, spanDays, toDayIndex } from './day.js';
import type { Logger } from '../logger.js';

export type Edge = 'first' | 'last';

/** Upper bound on items fetched when refining a boundary day. */
const REFINE_MAX_ITEMS = 5000;

/**
 * Finds the first/last day holding data without enumerating the archive.
 *
 * `first` is the least d with existsAny([start, d]); `last` the greatest d with
 * existsAny([d, end]). Both predicates are monotone in d however sparse the
 * data is, so the binary search lands exactly on the edge.
 */
export function createRangeResolver(search: ArchiveSearch, logger: Logger, refineMaxItems = REFINE_MAX_ITEMS) {
  async function holdsAny(scope: ScopeKey, start: Day, end: Day): Promise<boolean> {
    const found = await search.existsAny(scope, { start, end });
    logger.trace({ productType: scope.productType, version: scope.version, start, end, found }, 'Existence check');
    return found;
  }

  // Assumes existsAny([outerStart, outerEnd]) already holds.
  async function searchEdge(scope: ScopeKey, edge: Edge, outerStart: Day, outerEnd: Day): Promise<Day> {
    let lo = toDayIndex(outerStart);
    let hi = toDayIndex(outerEnd);

    if (edge === 'first') {
      while (lo < hi) {
        const mid = Math.floor((lo + hi) / 2);
        if (await holdsAny(scope, outerStart, fromDayIndex(mid))) {
          hi = mid;
        } else {
          lo = mid + 1;
        }
      }
    } else {
      while (lo < hi) {
        const mid = Math.ceil((lo + hi) / 2);
        if (await holdsAny(scope, fromDayIndex(mid), outerEnd)) {
          lo = mid;
        } else {
          hi = mid - 1;
        }
      }
    }

    return fromDayIndex(lo);
  }

  async function findBoundaryDay(
    scope: ScopeKey,
    edge: Edge,
    outerStart: Day,
    outerEnd: Day,
  ): Promise<Day | null> {
    if (outerStart > outerEnd) return null;
    if (!(await holdsAny(scope, outerStart, outerEnd))) return null;
    return searchEdge(scope, edge, outerStart, outerEnd);
  }

  async function resolveDayRange(scope: ScopeKey, outerStart: Day, outerEnd: Day): Promise<DayRange | null> {
    if (outerStart > outerEnd) return null;
    if (!(await holdsAny(scope, outerStart, outerEnd))) {
      logger.debug({ productType: scope.productType, version: scope.version, outerStart, outerEnd }, 'No data in bound');
      return null;
    }

    const start = await searchEdge(scope, 'first', outerStart, outerEnd);
    // The last edge cannot precede the first one.
    const end = await searchEdge(scope, 'last', start, outerEnd);

    logger.debug(
      { productType: scope.productType, version: scope.version, start, end, span: spanDays({ start: outerStart, end: outerEnd }) },
      'Resolved day range',
    );
    return { start, end };
  }

  async function refineBoundaryItem(scope: ScopeKey, day: Day, edge: Edge): Promise<ItemSummary | null> {
    const items = await search.queryItems(scope, singleDay(day), refineMaxItems);
    if (items.length === 0) return null;
    if (items.length >= refineMaxItems) {
      logger.warn(
        { productType: scope.productType, version: scope.version, day, edge, maxItems: refineMaxItems },
        'Boundary day hit the item cap, the boundary item may be missing',
      );
    }

    let best: ItemSummary | undefined;
    for (const item of items) {
      if (
        best === undefined ||
        (edge === 'first' ? item.referenceTime < best.referenceTime : item.referenceTime > best.referenceTime)
      ) {
        best = item;
      }
    }
    return best ?? null;
  }

  return { findBoundaryDay, resolveDayRange, refineBoundaryItem };
}

export type RangeResolver = ReturnType<typeof createRangeResolver>;
