// ── Scope and time types ──

/** One partition of the archive. */
export interface ScopeKey {
  readonly mission: string;
  readonly collection: string;
  readonly productType: string;
  readonly version: string;
}

/** UTC calendar day, formatted `YYYY-MM-DD`. */
export type Day = string;

/** Inclusive range of UTC days. */
export interface DayRange {
  readonly start: Day;
  readonly end: Day;
}

// ── Search types ──

export interface ItemSummary {
  readonly locator: string;
  /** Reference (sensing start) time, epoch milliseconds. */
  readonly referenceTime: number;
  readonly ordinal: string | null;
}

export interface NormalizedPage {
  readonly items: readonly ItemSummary[];
  readonly nextUrl: string | null;
  readonly matched: number | null;
}

export interface ArchiveSearch {
  readonly countMatches: (scope: ScopeKey, range: DayRange) => Promise<number>;
  readonly existsAny: (scope: ScopeKey, range: DayRange) => Promise<boolean>;
  readonly queryItems: (scope: ScopeKey, range: DayRange, maxItems: number) => Promise<ItemSummary[]>;
  readonly listProductTypes: (collection: string) => Promise<string[]>;
  readonly listVersions: (collection: string, productType: string) => Promise<string[]>;
}

// ── Ledger types ──

export const LedgerPhase = {
  DISCOVERED: 'discovered',
  FETCHED: 'fetched',
  CONSUMED: 'consumed',
} as const;

export type LedgerPhase = (typeof LedgerPhase)[keyof typeof LedgerPhase];

export interface PairRecord {
  readonly locator: string;
  readonly localPath: string;
}

export interface PhaseRecordMap {
  readonly discovered: PairRecord;
  readonly fetched: PairRecord;
  readonly consumed: string;
}

export type LedgerRecord<P extends LedgerPhase> = PhaseRecordMap[P];

export interface LedgerStats {
  readonly discovered: number;
  readonly fetched: number;
  readonly consumed: number;
  readonly pendingFetch: number;
  readonly pendingConsume: number;
  readonly errors: number;
}

// ── Catalog types ──

export const CATALOG_SCHEMA_VERSION = '1.0';

/** Producing-client identity written into snapshots and the User-Agent. */
export const CLIENT_IDENTITY = { name: 'archive-sync', version: '0.1.0' } as const;

export interface BaselineEntry {
  readonly timeStart: string;
  readonly timeEnd: string;
  readonly frameStart: string | null;
  readonly frameEnd: string | null;
  readonly count: number;
  readonly updatedAt: string;
}

export interface ProductEntry {
  readonly baselines: Readonly<Record<string, BaselineEntry>>;
}

export interface CatalogSnapshot {
  readonly schema: string;
  readonly generatedAt: string;
  readonly collection: string;
  readonly client: { readonly name: string; readonly version: string };
  readonly products: Readonly<Record<string, ProductEntry>>;
}

// ── Error types ──

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly method: string,
    readonly url: string,
    /** Server-requested delay from a `Retry-After` header. */
    readonly retryAfterMs: number | null = null,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class RemoteQueryError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RemoteQueryError';
  }
}

export class StorageError extends Error {
  constructor(
    message: string,
    readonly operation: string,
    readonly path: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StorageError';
  }
}

export class CatalogSchemaError extends StorageError {
  constructor(path: string, readonly schema: unknown) {
    super(`Unsupported catalog schema ${JSON.stringify(schema)} in ${path}`, 'loadCatalog', path);
    this.name = 'CatalogSchemaError';
  }
}

export class AuthError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = 'AuthError';
  }
}

export class FetchError extends Error {
  constructor(
    readonly locator: string,
    message: string,
    readonly status: number | null = null,
  ) {
    super(`Fetch failed for ${locator}: ${message}`);
    this.name = 'FetchError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ── Config type ──

export const Mode = {
  CATALOG: 'catalog',
  REFRESH: 'refresh',
  LIST: 'list',
  SYNC: 'sync',
  DISCOVER: 'discover',
  FETCH: 'fetch',
  STATUS: 'status',
  PENDING: 'pending',
  MARK: 'mark',
  CLEANUP: 'cleanup',
} as const;

export type Mode = (typeof Mode)[keyof typeof Mode];

/** Which pending set `MODE=pending` prints. */
export const PendingKind = {
  FETCH: 'fetch',
  CONSUME: 'consume',
} as const;

export type PendingKind = (typeof PendingKind)[keyof typeof PendingKind];

export interface Credentials {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly offlineToken: string;
}

export interface AppConfig {
  readonly mode: Mode;
  readonly catalogUrl: string;
  readonly tokenUrl: string;
  readonly credentials: Credentials | null;
  readonly mission: string;
  readonly missionStart: Day;
  readonly missionEnd: Day | null;
  readonly collection: string;
  readonly productType: string | null;
  readonly version: string | null;
  readonly startDate: Day | null;
  readonly endDate: Day | null;
  readonly dataDir: string;
  readonly registryDir: string;
  readonly catalogDir: string;
  readonly maxItems: number;
  readonly fetchConcurrency: number;
  readonly requestTimeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  readonly retryMaxMs: number;
  readonly forceRebuild: boolean;
  readonly dryRun: boolean;
  readonly pendingKind: PendingKind;
}
