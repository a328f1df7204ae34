import type { ItemSummary, NormalizedPage } from './types.js';
import { extractOrdinal, extractReferenceTime } from './identifiers.js';

// ── Timestamp normalization ──

export function normalizeTimestampMs(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const n = Math.floor(value);
    return n < 1_000_000_000_000 ? n * 1000 : n;
  }

  if (typeof value === 'string' && value.length > 0) {
    if (/^\d+$/.test(value)) {
      const n = Number(value);
      if (Number.isFinite(n)) {
        return n < 1_000_000_000_000 ? Math.floor(n * 1000) : Math.floor(n);
      }
    }
    const parsed = Date.parse(value);
    if (Number.isFinite(parsed)) return parsed;
  }

  throw new Error(`Invalid timestamp: ${String(value)}`);
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

// ── Item mapping ──

const PREFERRED_ASSET = 'enclosure_h5';

/** Href of the preferred enclosure asset: `enclosure_h5`, else the first `enclosure*`. */
export function selectEnclosure(assets: unknown): string | null {
  if (!isRecord(assets)) return null;

  const preferred = assets[PREFERRED_ASSET];
  if (isRecord(preferred) && typeof preferred['href'] === 'string') {
    return preferred['href'];
  }

  for (const key of Object.keys(assets).sort()) {
    const asset = assets[key];
    if (key.startsWith('enclosure') && isRecord(asset) && typeof asset['href'] === 'string') {
      return asset['href'];
    }
  }
  return null;
}

function fallbackReferenceTime(properties: unknown): number | null {
  if (!isRecord(properties)) return null;
  const raw = properties['start_datetime'] ?? properties['datetime'];
  try {
    return normalizeTimestampMs(raw);
  } catch {
    return null;
  }
}

/**
 * Reference time comes from the identifier; the item's own datetime is only
 * used when the file name carries none.
 */
export function toItemSummary(feature: unknown): ItemSummary | null {
  if (!isRecord(feature)) return null;

  const locator = selectEnclosure(feature['assets']);
  if (locator === null) return null;

  const referenceTime = extractReferenceTime(locator) ?? fallbackReferenceTime(feature['properties']);
  if (referenceTime === null) return null;

  return { locator, referenceTime, ordinal: extractOrdinal(locator) };
}

// ── Page normalization ──

function nextLink(links: unknown): string | null {
  if (!Array.isArray(links)) return null;
  for (const link of links) {
    if (isRecord(link) && link['rel'] === 'next' && typeof link['href'] === 'string') {
      return link['href'];
    }
  }
  return null;
}

function matchedCount(raw: Record<string, unknown>): number | null {
  const direct = raw['numberMatched'];
  if (typeof direct === 'number' && Number.isFinite(direct)) return direct;

  const context = raw['context'];
  if (isRecord(context) && typeof context['matched'] === 'number' && Number.isFinite(context['matched'])) {
    return context['matched'];
  }
  return null;
}

export function normalizeSearchPage(raw: unknown): NormalizedPage {
  if (!isRecord(raw)) {
    return { items: [], nextUrl: null, matched: null };
  }

  const features = Array.isArray(raw['features']) ? raw['features'] : [];
  const items: ItemSummary[] = [];
  for (const feature of features) {
    const item = toItemSummary(feature);
    if (item !== null) items.push(item);
  }

  return {
    items,
    nextUrl: nextLink(raw['links']),
    matched: matchedCount(raw),
  };
}

// ── Queryables ──

/** Upper-cased, sorted, distinct `enum` values of one queryable property. */
export function queryableEnum(raw: unknown, property: string): string[] {
  if (!isRecord(raw) || !isRecord(raw['properties'])) return [];
  const definition = raw['properties'][property];
  if (!isRecord(definition) || !Array.isArray(definition['enum'])) return [];

  const values = new Set<string>();
  for (const value of definition['enum']) {
    if (typeof value === 'string' && value !== '') values.add(value.toUpperCase());
  }
  return [...values].sort();
}
