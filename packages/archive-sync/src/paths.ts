import { join } from 'node:path';
import type { Day, ScopeKey } from './types.js';
import { formatDay } from './core/day.js';
import { extractReferenceTime, fileNameOf } from './identifiers.js';

/** UTC day of the identifier's reference timestamp. */
export function referenceDayOf(locatorOrPath: string): Day | null {
  const referenceTime = extractReferenceTime(locatorOrPath);
  return referenceTime === null ? null : formatDay(referenceTime);
}

/**
 * `<dataDir>/<mission>/<collection>/<productType>/<version>/YYYY/MM/DD/<file>`,
 * or null when the locator carries no reference timestamp.
 */
export function localPathFor(dataDir: string, scope: ScopeKey, locator: string): string | null {
  const day = referenceDayOf(locator);
  if (day === null) return null;

  const [year = '', month = '', dayOfMonth = ''] = day.split('-');
  return join(
    dataDir,
    scope.mission,
    scope.collection,
    scope.productType,
    scope.version,
    year,
    month,
    dayOfMonth,
    fileNameOf(locator),
  );
}

export type LocalPathFn = (locator: string) => string | null;

export function createLocalPathFn(dataDir: string, scope: ScopeKey): LocalPathFn {
  return (locator) => localPathFor(dataDir, scope, locator);
}
