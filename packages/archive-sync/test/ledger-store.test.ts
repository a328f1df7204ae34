import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { createLedgerStore, sanitizeErrorMessage } from '../src/storage/ledger-store.js';
import type { LedgerStore } from '../src/storage/ledger-store.js';
import { LedgerPhase, StorageError } from '../src/types.js';
import type { Day } from '../src/types.js';
import { SCOPE } from './fake-archive.js';

async function collect(days: AsyncIterable<Day>): Promise<Day[]> {
  const out: Day[] = [];
  for await (const day of days) out.push(day);
  return out;
}

describe('ledger store', () => {
  let root: string;
  let store: LedgerStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'archive-sync-ledger-'));
    store = createLedgerStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('lays out partitions per phase, scope and year', () => {
    expect(store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toBe(
      join(root, 'urls', 'MIS', 'COLL', 'PRD_1B', 'AB', '2024', 'url_20240105.txt'),
    );
    expect(store.path(SCOPE, LedgerPhase.FETCHED, '2024-01-05')).toBe(
      join(root, 'downloads', 'MIS', 'COLL', 'PRD_1B', 'AB', '2024', 'dwl_20240105.txt'),
    );
    expect(store.path(SCOPE, LedgerPhase.CONSUMED, '2024-01-05')).toBe(
      join(root, 'marked', 'MIS', 'COLL', 'PRD_1B', 'AB', '2024', 'mrk_20240105.txt'),
    );
    expect(store.errorsPath(SCOPE)).toBe(join(root, 'downloads', 'MIS', 'COLL', 'PRD_1B', 'AB', 'errors.txt'));
  });

  it('reads a missing partition as empty', async () => {
    expect(await store.readSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toEqual([]);
    expect(await store.countLines(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toBe(0);
  });

  it('writes de-duplicated records sorted by key', async () => {
    await store.writeSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05', [
      { locator: 'u2', localPath: 'p2' },
      { locator: 'u1', localPath: 'p1' },
      { locator: 'u2', localPath: 'other' },
    ]);

    const file = store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05');
    expect(await readFile(file, 'utf8')).toBe('u1|p1\nu2|p2\n');
    expect(await store.readSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toEqual([
      { locator: 'u1', localPath: 'p1' },
      { locator: 'u2', localPath: 'p2' },
    ]);
  });

  it('stores consumed paths one per line', async () => {
    await store.writeSet(SCOPE, LedgerPhase.CONSUMED, '2024-01-05', ['/b', '/a', '/b']);
    const file = store.path(SCOPE, LedgerPhase.CONSUMED, '2024-01-05');
    expect(await readFile(file, 'utf8')).toBe('/a\n/b\n');
  });

  it('writes an empty file for an empty set', async () => {
    await store.writeSet(SCOPE, LedgerPhase.FETCHED, '2024-01-05', []);
    const file = store.path(SCOPE, LedgerPhase.FETCHED, '2024-01-05');
    expect(await readFile(file, 'utf8')).toBe('');
    expect(await collect(store.listDays(SCOPE, LedgerPhase.FETCHED))).toEqual(['2024-01-05']);
  });

  it('ignores blank and comment lines and tolerates lines without a path', async () => {
    const file = store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05');
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, '# written by hand\n\n  u1|p1  \nu3\n');

    expect(await store.readSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toEqual([
      { locator: 'u1', localPath: 'p1' },
      { locator: 'u3', localPath: '' },
    ]);
    expect(await store.countLines(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toBe(2);
  });

  it('reads a hand-edited partition with repeated keys as a set', async () => {
    const file = store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05');
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, 'u1|/x\nu1|/x\nu2|/y\nu1|/other\n');

    expect(await store.readSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toEqual([
      { locator: 'u1', localPath: '/x' },
      { locator: 'u2', localPath: '/y' },
    ]);
    expect(await store.countLines(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toBe(4);

    const marked = store.path(SCOPE, LedgerPhase.CONSUMED, '2024-01-05');
    await mkdir(dirname(marked), { recursive: true });
    await writeFile(marked, '/a\n/a\n');
    expect(await store.readSet(SCOPE, LedgerPhase.CONSUMED, '2024-01-05')).toEqual(['/a']);
  });

  it('raises StorageError for unreadable partitions', async () => {
    await mkdir(store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05'), { recursive: true });
    await expect(store.readSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).rejects.toBeInstanceOf(StorageError);
  });

  it('touches existing partitions only', async () => {
    expect(await store.touch(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toBe(false);

    await store.writeSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05', [{ locator: 'u1', localPath: 'p1' }]);
    const file = store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05');
    const old = new Date('2000-01-01T00:00:00Z');
    await utimes(file, old, old);

    expect(await store.touch(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05')).toBe(true);
    expect((await stat(file)).mtimeMs).toBeGreaterThan(old.getTime());
    expect(await readFile(file, 'utf8')).toBe('u1|p1\n');
  });

  it('lists partition days ascending across years', async () => {
    for (const day of ['2024-01-02', '2023-12-31', '2024-01-01']) {
      await store.writeSet(SCOPE, LedgerPhase.DISCOVERED, day, [{ locator: day, localPath: '' }]);
    }
    const yearDir = dirname(store.path(SCOPE, LedgerPhase.DISCOVERED, '2024-01-01'));
    await writeFile(join(yearDir, 'notes.txt'), 'not a partition\n');

    const days = store.listDays(SCOPE, LedgerPhase.DISCOVERED);
    expect(await collect(days)).toEqual(['2023-12-31', '2024-01-01', '2024-01-02']);
    expect(await collect(days)).toEqual(['2023-12-31', '2024-01-01', '2024-01-02']);

    const bounded = store.listDays(SCOPE, LedgerPhase.DISCOVERED, { start: '2024-01-01', end: '2024-01-01' });
    expect(await collect(bounded)).toEqual(['2024-01-01']);
    expect(await collect(store.listDays(SCOPE, LedgerPhase.FETCHED))).toEqual([]);
  });

  it('lists the scopes holding a ledger in any phase', async () => {
    const other = { ...SCOPE, productType: 'PRD_2A', version: 'BA' };
    await store.writeSet(other, LedgerPhase.CONSUMED, '2024-01-05', ['/a']);
    await store.writeSet(SCOPE, LedgerPhase.DISCOVERED, '2024-01-05', [{ locator: 'u1', localPath: '' }]);
    await store.writeSet(SCOPE, LedgerPhase.FETCHED, '2024-01-05', [{ locator: 'u1', localPath: '' }]);
    await store.writeSet({ ...SCOPE, collection: 'OTHER' }, LedgerPhase.DISCOVERED, '2024-01-05', []);

    expect(await store.listScopes('MIS', 'COLL')).toEqual([SCOPE, other]);
    expect(await store.listScopes('MIS', 'NONE')).toEqual([]);
  });

  it('appends sanitized error lines', async () => {
    await store.appendError(SCOPE, 'u1', 'line one\r\nline|two');
    await store.appendError(SCOPE, 'u2', 'gone');

    expect(await readFile(store.errorsPath(SCOPE), 'utf8')).toBe('u1|line one line;two\nu2|gone\n');
    expect(await store.readErrors(SCOPE)).toEqual([
      { locator: 'u1', message: 'line one line;two' },
      { locator: 'u2', message: 'gone' },
    ]);
  });
});

describe('sanitizeErrorMessage', () => {
  it('truncates long messages', () => {
    expect(sanitizeErrorMessage('x'.repeat(250))).toBe('x'.repeat(200));
  });
});
