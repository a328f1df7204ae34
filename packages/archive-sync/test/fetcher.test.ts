import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { Readable } from 'node:stream';
import pino from 'pino';
import { createFetcher } from '../src/core/fetcher.js';
import { FetchError, HttpError } from '../src/types.js';
import { createFakeHttp, createFakeTokens, streamResponse } from './fake-http.js';

const logger = pino({ level: 'silent' });
const FAST = { maxRetries: 1, retryBaseMs: 1, retryMaxMs: 1 };
const LOCATOR = 'https://archive.test/COLL/PRD_1B/AB/item.h5';

async function* brokenBody(): AsyncGenerator<string> {
  yield 'partial';
  throw new Error('connection reset');
}

describe('fetcher', () => {
  let root: string;
  let target: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'archive-sync-fetch-'));
    target = join(root, 'data', '2024', '01', '05', 'item.h5');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('streams the body into place with a bearer token', async () => {
    const http = createFakeHttp();
    http.download.mockResolvedValue(streamResponse(['hello ', 'world']));
    const fetcher = createFetcher(http, createFakeTokens(), FAST, logger);

    const result = await fetcher.fetchItem(LOCATOR, target);

    expect(result).toEqual({ locator: LOCATOR, localPath: target, bytes: 11, skipped: false });
    expect(await readFile(target, 'utf8')).toBe('hello world');
    expect(await readdir(dirname(target))).toEqual(['item.h5']);
    expect(http.download).toHaveBeenCalledWith(LOCATOR, { Authorization: 'Bearer test-token' });
  });

  it('skips files already on disk', async () => {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, 'existing');
    const http = createFakeHttp();
    const fetcher = createFetcher(http, createFakeTokens(), FAST, logger);

    expect(await fetcher.fetchItem(LOCATOR, target)).toEqual({
      locator: LOCATOR,
      localPath: target,
      bytes: 0,
      skipped: true,
    });
    expect(http.download).not.toHaveBeenCalled();
  });

  it('retries transient failures', async () => {
    const http = createFakeHttp();
    http.download
      .mockRejectedValueOnce(new HttpError('HTTP 503 GET', 503, 'GET', LOCATOR))
      .mockResolvedValueOnce(streamResponse(['ok']));
    const fetcher = createFetcher(http, createFakeTokens(), FAST, logger);

    expect((await fetcher.fetchItem(LOCATOR, target)).bytes).toBe(2);
    expect(http.download).toHaveBeenCalledTimes(2);
  });

  it('refreshes the token once when the archive rejects it', async () => {
    const http = createFakeHttp();
    http.download
      .mockRejectedValueOnce(new HttpError('HTTP 401 GET', 401, 'GET', LOCATOR))
      .mockResolvedValueOnce(streamResponse(['ok']));
    const tokens = createFakeTokens();
    const fetcher = createFetcher(http, tokens, FAST, logger);

    expect((await fetcher.fetchItem(LOCATOR, target)).skipped).toBe(false);
    expect(tokens.invalidate).toHaveBeenCalledTimes(1);
    expect(tokens.get).toHaveBeenCalledTimes(2);
  });

  it('reports permanent failures as FetchError', async () => {
    const http = createFakeHttp();
    http.download.mockRejectedValue(new HttpError(`HTTP 404 GET ${LOCATOR}`, 404, 'GET', LOCATOR));
    const fetcher = createFetcher(http, createFakeTokens(), FAST, logger);

    const result = fetcher.fetchItem(LOCATOR, target);
    await expect(result).rejects.toBeInstanceOf(FetchError);
    await expect(result).rejects.toMatchObject({
      locator: LOCATOR,
      status: 404,
      message: `Fetch failed for ${LOCATOR}: HTTP 404 GET ${LOCATOR}`,
    });
    expect(http.download).toHaveBeenCalledTimes(1);
  });

  it('discards interrupted transfers and retries them', async () => {
    const http = createFakeHttp();
    http.download.mockImplementation(async () => ({
      status: 200,
      headers: new Headers(),
      body: Readable.from(brokenBody()),
    }));
    const fetcher = createFetcher(http, createFakeTokens(), FAST, logger);

    await expect(fetcher.fetchItem(LOCATOR, target)).rejects.toMatchObject({ status: 0 });
    expect(http.download).toHaveBeenCalledTimes(2);
    expect(await readdir(dirname(target))).not.toContain('item.h5');
  });
});
