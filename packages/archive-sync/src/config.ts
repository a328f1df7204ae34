import type { AppConfig, Credentials, Day } from './types.js';
import { ConfigError, Mode, PendingKind } from './types.js';
import { isDay } from './core/day.js';

function mustGetEnv(key: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    throw new ConfigError(`Required environment variable ${key} is not set`);
  }
  return value;
}

function getEnv(key: string, fallback: string): string {
  const value = process.env[key];
  return value !== undefined && value !== '' ? value : fallback;
}

function getOptionalEnv(key: string): string | null {
  const value = process.env[key];
  return value !== undefined && value !== '' ? value : null;
}

function getIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${raw}`);
  }
  return parsed;
}

function getBoolEnv(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1';
}

function getDayEnv(key: string): Day | null {
  const raw = getOptionalEnv(key);
  if (raw === null) return null;
  if (!isDay(raw)) {
    throw new ConfigError(`Environment variable ${key} must be a YYYY-MM-DD date, got: ${raw}`);
  }
  return raw;
}

function isMode(value: string): value is Mode {
  return Object.values(Mode).some((mode) => mode === value);
}

function isPendingKind(value: string): value is PendingKind {
  return Object.values(PendingKind).some((kind) => kind === value);
}

/** Modes that operate on one product/version ledger. */
const SCOPED_MODES: readonly Mode[] = [
  Mode.SYNC,
  Mode.DISCOVER,
  Mode.FETCH,
  Mode.PENDING,
  Mode.MARK,
  Mode.CLEANUP,
];

/** Modes that download and so need credentials. */
const FETCHING_MODES: readonly Mode[] = [Mode.SYNC, Mode.FETCH];

function loadCredentials(): Credentials | null {
  const clientId = getOptionalEnv('CLIENT_ID');
  const clientSecret = getOptionalEnv('CLIENT_SECRET');
  const offlineToken = getOptionalEnv('OFFLINE_TOKEN');

  if (clientId === null && clientSecret === null && offlineToken === null) return null;
  if (clientId === null || clientSecret === null || offlineToken === null) {
    throw new ConfigError('CLIENT_ID, CLIENT_SECRET and OFFLINE_TOKEN must be set together');
  }
  return { clientId, clientSecret, offlineToken };
}

export function loadConfig(): AppConfig {
  const mode = getEnv('MODE', Mode.STATUS);
  if (!isMode(mode)) {
    throw new ConfigError(`MODE must be one of ${Object.values(Mode).join(', ')}, got: ${mode}`);
  }

  const missionStart = getDayEnv('MISSION_START');
  if (missionStart === null) {
    throw new ConfigError('Required environment variable MISSION_START is not set');
  }
  const missionEnd = getDayEnv('MISSION_END');
  if (missionEnd !== null && missionEnd < missionStart) {
    throw new ConfigError(`MISSION_END (${missionEnd}) must not precede MISSION_START (${missionStart})`);
  }

  const startDate = getDayEnv('START_DATE');
  const endDate = getDayEnv('END_DATE');
  if (startDate !== null && endDate !== null && startDate > endDate) {
    throw new ConfigError(`START_DATE (${startDate}) must not be after END_DATE (${endDate})`);
  }

  const productType = getOptionalEnv('PRODUCT_TYPE');
  const version = getOptionalEnv('VERSION');
  if (SCOPED_MODES.includes(mode) && (productType === null || version === null)) {
    throw new ConfigError(`MODE=${mode} requires PRODUCT_TYPE and VERSION`);
  }

  const tokenUrl = getEnv('TOKEN_URL', '');
  const credentials = loadCredentials();
  if (FETCHING_MODES.includes(mode) && (credentials === null || tokenUrl === '')) {
    throw new ConfigError(`MODE=${mode} requires TOKEN_URL, CLIENT_ID, CLIENT_SECRET and OFFLINE_TOKEN`);
  }

  const pendingKind = getEnv('PENDING_KIND', PendingKind.FETCH);
  if (!isPendingKind(pendingKind)) {
    throw new ConfigError(`PENDING_KIND must be one of ${Object.values(PendingKind).join(', ')}, got: ${pendingKind}`);
  }

  const retryBaseMs = Math.max(1, getIntEnv('RETRY_BASE_MS', 250));

  return {
    mode,
    catalogUrl: normalizeCatalogUrl(mustGetEnv('CATALOG_URL')),
    tokenUrl,
    credentials,
    mission: mustGetEnv('MISSION'),
    missionStart,
    missionEnd,
    collection: mustGetEnv('COLLECTION'),
    productType: productType?.toUpperCase() ?? null,
    version: version?.toUpperCase() ?? null,
    startDate,
    endDate,
    dataDir: getEnv('DATA_DIR', './data'),
    registryDir: getEnv('REGISTRY_DIR', './registry'),
    catalogDir: getEnv('CATALOG_DIR', './catalogs'),
    maxItems: Math.max(1, getIntEnv('MAX_ITEMS', 50_000)),
    fetchConcurrency: Math.min(16, Math.max(1, getIntEnv('FETCH_CONCURRENCY', 2))),
    requestTimeoutMs: Math.max(1000, getIntEnv('REQUEST_TIMEOUT_MS', 60_000)),
    maxRetries: Math.max(0, getIntEnv('MAX_RETRIES', 5)),
    retryBaseMs,
    retryMaxMs: Math.max(retryBaseMs, getIntEnv('RETRY_MAX_MS', 15_000)),
    forceRebuild: getBoolEnv('FORCE_REBUILD', false),
    dryRun: getBoolEnv('DRY_RUN', false),
    pendingKind,
  };
}

function normalizeCatalogUrl(url: string): string {
  // Strip trailing slash
  return url.replace(/\/+$/, '');
}
