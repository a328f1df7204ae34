import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { BaselineEntry, CatalogSnapshot, ProductEntry } from '../types.js';
import { CATALOG_SCHEMA_VERSION, CatalogSchemaError, StorageError } from '../types.js';
import { isNotFound, writeFileAtomic } from './atomic-write.js';

// ── On-disk shape ──

interface BaselineDocument {
  time_start: string;
  time_end: string;
  frame_start?: string;
  frame_end?: string;
  count: number;
  updated_at: string;
}

interface SnapshotDocument {
  schema: string;
  generated_at: string;
  collection: string;
  client: { name: string; version: string };
  products: Record<string, { baselines: Record<string, BaselineDocument> }>;
}

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

function sortedKeys(record: Readonly<Record<string, unknown>>): string[] {
  return Object.keys(record).sort();
}

function toDocument(snapshot: CatalogSnapshot): SnapshotDocument {
  const products: SnapshotDocument['products'] = {};
  for (const productType of sortedKeys(snapshot.products)) {
    const product = snapshot.products[productType];
    if (product === undefined) continue;

    const baselines: Record<string, BaselineDocument> = {};
    for (const version of sortedKeys(product.baselines)) {
      const entry = product.baselines[version];
      if (entry === undefined) continue;
      baselines[version] = {
        time_start: entry.timeStart,
        time_end: entry.timeEnd,
        ...(entry.frameStart !== null ? { frame_start: entry.frameStart } : {}),
        ...(entry.frameEnd !== null ? { frame_end: entry.frameEnd } : {}),
        count: entry.count,
        updated_at: entry.updatedAt,
      };
    }
    products[productType] = { baselines };
  }

  return {
    schema: snapshot.schema,
    generated_at: snapshot.generatedAt,
    collection: snapshot.collection,
    client: { name: snapshot.client.name, version: snapshot.client.version },
    products,
  };
}

// ── Parsing ──

class ShapeError extends Error {}

function requireString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') throw new ShapeError(`${where}.${key} must be a string`);
  return value;
}

function optionalString(record: Record<string, unknown>, key: string, where: string): string | null {
  const value = record[key];
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') throw new ShapeError(`${where}.${key} must be a string`);
  return value;
}

function requireTimestamp(record: Record<string, unknown>, key: string, where: string): string {
  const value = requireString(record, key, where);
  if (!Number.isFinite(Date.parse(value))) {
    throw new ShapeError(`${where}.${key} must be an ISO-8601 timestamp, got: ${value}`);
  }
  return value;
}

function parseBaseline(raw: unknown, where: string): BaselineEntry {
  if (!isRecord(raw)) throw new ShapeError(`${where} must be an object`);

  const count = raw['count'];
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
    throw new ShapeError(`${where}.count must be a non-negative integer`);
  }

  const timeStart = requireTimestamp(raw, 'time_start', where);
  const timeEnd = requireTimestamp(raw, 'time_end', where);
  if (Date.parse(timeStart) > Date.parse(timeEnd)) {
    throw new ShapeError(`${where}.time_start ${timeStart} is after time_end ${timeEnd}`);
  }

  return {
    timeStart,
    timeEnd,
    frameStart: optionalString(raw, 'frame_start', where),
    frameEnd: optionalString(raw, 'frame_end', where),
    count,
    updatedAt: requireString(raw, 'updated_at', where),
  };
}

function parseProducts(raw: unknown): Record<string, ProductEntry> {
  if (!isRecord(raw)) throw new ShapeError('products must be an object');

  const products: Record<string, ProductEntry> = {};
  for (const [productType, product] of Object.entries(raw)) {
    if (!isRecord(product) || !isRecord(product['baselines'])) {
      throw new ShapeError(`products.${productType}.baselines must be an object`);
    }
    const baselines: Record<string, BaselineEntry> = {};
    for (const [version, entry] of Object.entries(product['baselines'])) {
      baselines[version] = parseBaseline(entry, `products.${productType}.baselines.${version}`);
    }
    products[productType] = { baselines };
  }
  return products;
}

export function parseSnapshot(raw: unknown, path: string): CatalogSnapshot {
  if (!isRecord(raw)) {
    throw new StorageError(`Catalog ${path} is not a JSON object`, 'loadCatalog', path);
  }
  if (raw['schema'] !== CATALOG_SCHEMA_VERSION) {
    throw new CatalogSchemaError(path, raw['schema']);
  }

  try {
    const client = raw['client'];
    if (!isRecord(client)) throw new ShapeError('client must be an object');

    return {
      schema: CATALOG_SCHEMA_VERSION,
      generatedAt: requireString(raw, 'generated_at', 'snapshot'),
      collection: requireString(raw, 'collection', 'snapshot'),
      client: {
        name: requireString(client, 'name', 'client'),
        version: requireString(client, 'version', 'client'),
      },
      products: parseProducts(raw['products']),
    };
  } catch (err) {
    if (err instanceof ShapeError) {
      throw new StorageError(`Invalid catalog ${path}: ${err.message}`, 'loadCatalog', path, err);
    }
    throw err;
  }
}

// ── Store ──

export function createCatalogStore(catalogDir: string) {
  function path(collection: string): string {
    return join(catalogDir, `${collection}_collection.json`);
  }

  async function load(collection: string): Promise<CatalogSnapshot | null> {
    const filePath = path(collection);

    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new StorageError(`Failed to read ${filePath}`, 'loadCatalog', filePath, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new StorageError(`Catalog ${filePath} is not valid JSON`, 'loadCatalog', filePath, err);
    }

    return parseSnapshot(raw, filePath);
  }

  async function save(snapshot: CatalogSnapshot): Promise<string> {
    const filePath = path(snapshot.collection);
    try {
      await writeFileAtomic(filePath, `${JSON.stringify(toDocument(snapshot), null, 2)}\n`);
    } catch (err) {
      throw new StorageError(`Failed to write ${filePath}`, 'saveCatalog', filePath, err);
    }
    return filePath;
  }

  return { path, load, save };
}

export type CatalogStore = ReturnType<typeof createCatalogStore>;
