import { createWriteStream } from 'node:fs';
import { access, mkdir, rename, rm, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import { FetchError, HttpError } from '../types.js';
import type { HttpClient } from '../api/http-client.js';
import type { TokenManager } from '../api/token-manager.js';
import { getAuthHeaders } from '../api/middleware/auth.js';
import { withRetry } from '../api/middleware/retry.js';
import type { RetryConfig } from '../api/middleware/retry.js';
import { isNotFound } from '../storage/atomic-write.js';
import type { Logger } from '../logger.js';

export interface FetchResult {
  readonly locator: string;
  readonly localPath: string;
  readonly bytes: number;
  /** The file was already on disk; nothing was transferred. */
  readonly skipped: boolean;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export function createFetcher(
  httpClient: HttpClient,
  tokens: TokenManager,
  config: RetryConfig,
  logger: Logger,
) {
  async function transfer(locator: string, target: string): Promise<number> {
    const response = await httpClient.download(locator, await getAuthHeaders(tokens));
    const partPath = `${target}.part`;
    await mkdir(dirname(target), { recursive: true });

    try {
      await pipeline(response.body, createWriteStream(partPath));
      await rename(partPath, target);
    } catch (err) {
      await rm(partPath, { force: true });
      // A broken transfer is as transient as a failed request
      throw new HttpError(
        `Transfer interrupted: ${err instanceof Error ? err.message : String(err)}`,
        0,
        'GET',
        locator,
      );
    }

    return (await stat(target)).size;
  }

  function transferWithRetry(locator: string, target: string): Promise<number> {
    return withRetry(() => transfer(locator, target), config, logger, 'fetch')();
  }

  async function fetchItem(locator: string, localPath: string): Promise<FetchResult> {
    if (await fileExists(localPath)) {
      return { locator, localPath, bytes: 0, skipped: true };
    }

    try {
      let bytes: number;
      try {
        bytes = await transferWithRetry(locator, localPath);
      } catch (err) {
        if (!(err instanceof HttpError) || (err.status !== 401 && err.status !== 403)) throw err;
        logger.warn({ locator, status: err.status }, 'Fetch rejected, refreshing access token');
        tokens.invalidate();
        bytes = await transferWithRetry(locator, localPath);
      }

      logger.debug({ locator, localPath, bytes }, 'Fetched');
      return { locator, localPath, bytes, skipped: false };
    } catch (err) {
      if (err instanceof HttpError) {
        throw new FetchError(locator, err.message, err.status);
      }
      throw new FetchError(locator, err instanceof Error ? err.message : String(err));
    }
  }

  return { fetchItem };
}

export type Fetcher = ReturnType<typeof createFetcher>;
