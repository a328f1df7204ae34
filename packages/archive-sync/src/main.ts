import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { AppConfig, Day, DayRange, ScopeKey } from './types.js';
import { CLIENT_IDENTITY, ConfigError, Mode } from './types.js';
import { createHttpClient } from './api/http-client.js';
import { createSearchClient } from './api/search-client.js';
import { createTokenManager } from './api/token-manager.js';
import { createLedgerStore } from './storage/ledger-store.js';
import { createCatalogStore } from './storage/catalog-store.js';
import { createLifecycleTracker } from './core/lifecycle-tracker.js';
import { createRangeResolver } from './core/range-resolver.js';
import { createCatalogBuilder } from './core/catalog-builder.js';
import { createFetcher } from './core/fetcher.js';
import { createDiscovery, createSync, resolveSyncWindow } from './core/sync.js';
import { formatDay } from './core/day.js';
import { createLocalPathFn } from './paths.js';
import {
  formatListing,
  ledgerWindow,
  missionBounds,
  runCatalogJob,
  runCleanupJob,
  runListJob,
  runMarkJob,
  runPendingJob,
  runRefreshJob,
  runStatusAllJob,
  runStatusJob,
  scopeFromConfig,
} from './core/jobs.js';

const logger = createLogger();

let shutdownInProgress = false;

function shutdown(signal: string): void {
  if (shutdownInProgress) return;
  shutdownInProgress = true;
  logger.warn({ signal }, 'Shutdown signal received, completed partitions are kept');
  process.exit(1);
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

function createTracker(config: AppConfig, log: Logger, scope: ScopeKey = scopeFromConfig(config)) {
  return createLifecycleTracker(scope, {
    store: createLedgerStore(config.registryDir),
    localPathFor: createLocalPathFn(config.dataDir, scope),
    logger: log,
  });
}

function printLines(lines: readonly string[]): void {
  if (lines.length > 0) process.stdout.write(`${lines.join('\n')}\n`);
}

async function loadWindow(config: AppConfig, scope: ScopeKey, today: Day): Promise<DayRange | null> {
  const catalog = await createCatalogStore(config.catalogDir).load(config.collection);
  return resolveSyncWindow({ startDate: config.startDate, endDate: config.endDate, today }, scope, catalog);
}

async function main(): Promise<void> {
  const config = loadConfig();
  const today = formatDay(Date.now());
  logger.info(
    { mode: config.mode, collection: config.collection, productType: config.productType, version: config.version },
    `Starting ${CLIENT_IDENTITY.name} ${CLIENT_IDENTITY.version}`,
  );

  switch (config.mode) {
    case Mode.CATALOG:
    case Mode.REFRESH: {
      const httpClient = createHttpClient(config);
      const search = createSearchClient(httpClient, config, logger);
      const deps = {
        config,
        builder: createCatalogBuilder({
          search,
          resolver: createRangeResolver(search, logger),
          logger,
          mission: config.mission,
          bounds: missionBounds(config, today),
          client: CLIENT_IDENTITY,
        }),
        store: createCatalogStore(config.catalogDir),
        logger,
      };
      const report = config.mode === Mode.CATALOG ? await runCatalogJob(deps) : await runRefreshJob(deps);
      if (report.failures.length > 0) process.exitCode = 1;
      return;
    }

    case Mode.LIST:
      printLines(formatListing(await runListJob({ config, store: createCatalogStore(config.catalogDir), logger })));
      return;

    case Mode.SYNC:
    case Mode.FETCH: {
      if (config.credentials === null) {
        throw new ConfigError(`MODE=${config.mode} requires CLIENT_ID, CLIENT_SECRET and OFFLINE_TOKEN`);
      }
      const tracker = createTracker(config, logger);
      const httpClient = createHttpClient(config);
      const tokens = createTokenManager(httpClient, config.tokenUrl, config.credentials, logger);
      const sync = createSync({
        search: createSearchClient(httpClient, config, logger),
        tracker,
        fetcher: createFetcher(httpClient, tokens, config, logger),
        logger,
        concurrency: config.fetchConcurrency,
        maxItems: config.maxItems,
      });

      if (config.mode === Mode.FETCH) {
        const result = await sync.fetchPending(ledgerWindow(config, today));
        logger.info(result, 'Fetch complete');
        if (result.failed > 0) process.exitCode = 1;
        return;
      }

      const window = await loadWindow(config, tracker.scope, today);
      if (window === null) {
        logger.info('Sync window is empty, nothing to do');
        return;
      }
      const summary = await sync.run(window);
      if (summary.failed > 0) process.exitCode = 1;
      return;
    }

    case Mode.DISCOVER: {
      const tracker = createTracker(config, logger);
      const window = await loadWindow(config, tracker.scope, today);
      if (window === null) {
        logger.info('Discovery window is empty, nothing to do');
        return;
      }
      const discovery = createDiscovery({
        search: createSearchClient(createHttpClient(config), config, logger),
        tracker,
        logger,
        maxItems: config.maxItems,
      });
      const added = await discovery.discover(window);
      logger.info({ start: window.start, end: window.end, added }, 'Discovery complete');
      return;
    }

    case Mode.STATUS: {
      const range = ledgerWindow(config, today);
      if (config.productType !== null && config.version !== null) {
        await runStatusJob({ tracker: createTracker(config, logger), logger }, range);
        return;
      }
      const store = createLedgerStore(config.registryDir);
      await runStatusAllJob(
        { store, trackerFor: (scope) => createTracker(config, logger, scope), logger },
        config,
        range,
      );
      return;
    }

    case Mode.PENDING:
      printLines(
        await runPendingJob(
          { tracker: createTracker(config, logger), logger },
          config.pendingKind,
          ledgerWindow(config, today),
        ),
      );
      return;

    case Mode.MARK:
      await runMarkJob({ tracker: createTracker(config, logger), logger }, process.argv.slice(2));
      return;

    case Mode.CLEANUP:
      await runCleanupJob(
        { tracker: createTracker(config, logger), logger },
        config.dryRun,
        ledgerWindow(config, today),
      );
      return;
  }
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error');
  process.exit(1);
});
