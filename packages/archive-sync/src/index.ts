export * from './types.js';
export { loadConfig } from './config.js';
export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export { parseIdentifier, extractReferenceTime, extractOrdinal } from './identifiers.js';
export type { ParsedIdentifier } from './identifiers.js';
export { localPathFor, referenceDayOf } from './paths.js';
export { createHttpClient } from './api/http-client.js';
export type { HttpClient } from './api/http-client.js';
export { createSearchClient } from './api/search-client.js';
export { createTokenManager } from './api/token-manager.js';
export type { TokenManager } from './api/token-manager.js';
export { createLedgerStore } from './storage/ledger-store.js';
export type { LedgerStore } from './storage/ledger-store.js';
export { createCatalogStore } from './storage/catalog-store.js';
export type { CatalogStore } from './storage/catalog-store.js';
export { createLifecycleTracker } from './core/lifecycle-tracker.js';
export type { LifecycleTracker } from './core/lifecycle-tracker.js';
export { createRangeResolver } from './core/range-resolver.js';
export type { RangeResolver, Edge } from './core/range-resolver.js';
export { createCatalogBuilder } from './core/catalog-builder.js';
export type { CatalogBuilder, BuildReport, BuildFilters } from './core/catalog-builder.js';
export { createFetcher } from './core/fetcher.js';
export { createDiscovery, createSync, resolveSyncWindow } from './core/sync.js';
export type { Discovery, Sync, SyncSummary } from './core/sync.js';
