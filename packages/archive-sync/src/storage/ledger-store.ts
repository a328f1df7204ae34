import { appendFile, mkdir, readFile, readdir, utimes } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { Day, DayRange, PairRecord, PhaseRecordMap, ScopeKey } from '../types.js';
import { LedgerPhase, StorageError } from '../types.js';
import { compactDay, expandCompactDay, inRange } from '../core/day.js';
import { isNotFound, writeFileAtomic } from './atomic-write.js';

// ── Record codecs ──

interface RecordCodec<R> {
  readonly dir: string;
  readonly prefix: string;
  readonly key: (record: R) => string;
  readonly encode: (record: R) => string;
  readonly decode: (line: string) => R;
}

function pairCodec(dir: string, prefix: string): RecordCodec<PairRecord> {
  return {
    dir,
    prefix,
    key: (record) => record.locator,
    encode: (record) => `${record.locator}|${record.localPath}`,
    decode: (line) => {
      const sep = line.indexOf('|');
      return sep === -1
        ? { locator: line, localPath: '' }
        : { locator: line.slice(0, sep), localPath: line.slice(sep + 1) };
    },
  };
}

const CODECS: { readonly [P in LedgerPhase]: RecordCodec<PhaseRecordMap[P]> } = {
  discovered: pairCodec('urls', 'url_'),
  fetched: pairCodec('downloads', 'dwl_'),
  consumed: {
    dir: 'marked',
    prefix: 'mrk_',
    key: (path) => path,
    encode: (path) => path,
    decode: (line) => line,
  },
};

function codecFor<P extends LedgerPhase>(phase: P): RecordCodec<PhaseRecordMap[P]> {
  return CODECS[phase];
}

/** Record key within a partition: locator for pairs, the path itself for consumed. */
export function recordKey<P extends LedgerPhase>(phase: P, record: PhaseRecordMap[P]): string {
  return codecFor(phase).key(record);
}

// ── Error log ──

export interface ErrorEntry {
  readonly locator: string;
  readonly message: string;
}

const MAX_ERROR_LENGTH = 200;

export function sanitizeErrorMessage(message: string): string {
  return message.replace(/\r?\n/g, ' ').replace(/\|/g, ';').slice(0, MAX_ERROR_LENGTH);
}

function contentLines(text: string): string[] {
  const lines: string[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line !== '' && !line.startsWith('#')) lines.push(line);
  }
  return lines;
}

// ── Store ──

export function createLedgerStore(registryDir: string) {
  function scopeDir(scope: ScopeKey, dir: string): string {
    return join(registryDir, dir, scope.mission, scope.collection, scope.productType, scope.version);
  }

  function path(scope: ScopeKey, phase: LedgerPhase, day: Day): string {
    const codec = codecFor(phase);
    return join(scopeDir(scope, codec.dir), day.slice(0, 4), `${codec.prefix}${compactDay(day)}.txt`);
  }

  function errorsPath(scope: ScopeKey): string {
    return join(scopeDir(scope, codecFor('fetched').dir), 'errors.txt');
  }

  async function readLines(filePath: string, operation: string): Promise<string[]> {
    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError(`Failed to read ${filePath}`, operation, filePath, err);
    }
    return contentLines(text);
  }

  /** Records of the partition in file order, one per key (first occurrence wins). */
  async function readSet<P extends LedgerPhase>(
    scope: ScopeKey,
    phase: P,
    day: Day,
  ): Promise<PhaseRecordMap[P][]> {
    const codec = codecFor(phase);
    const lines = await readLines(path(scope, phase, day), 'readSet');

    const seen = new Set<string>();
    const records: PhaseRecordMap[P][] = [];
    for (const line of lines) {
      const record = codec.decode(line);
      const key = codec.key(record);
      if (seen.has(key)) continue;
      seen.add(key);
      records.push(record);
    }
    return records;
  }

  /**
   * Replace the partition with `records`, de-duplicated by key (first
   * occurrence wins) and sorted by key.
   */
  async function writeSet<P extends LedgerPhase>(
    scope: ScopeKey,
    phase: P,
    day: Day,
    records: readonly PhaseRecordMap[P][],
  ): Promise<void> {
    const codec = codecFor(phase);
    const byKey = new Map<string, PhaseRecordMap[P]>();
    for (const record of records) {
      const key = codec.key(record);
      if (!byKey.has(key)) byKey.set(key, record);
    }

    const keys = [...byKey.keys()].sort();
    const lines: string[] = [];
    for (const key of keys) {
      const record = byKey.get(key);
      if (record !== undefined) lines.push(codec.encode(record));
    }

    const filePath = path(scope, phase, day);
    try {
      await writeFileAtomic(filePath, lines.length > 0 ? `${lines.join('\n')}\n` : '');
    } catch (err) {
      throw new StorageError(`Failed to write ${filePath}`, 'writeSet', filePath, err);
    }
  }

  async function touch(scope: ScopeKey, phase: LedgerPhase, day: Day): Promise<boolean> {
    const filePath = path(scope, phase, day);
    const now = new Date();
    try {
      await utimes(filePath, now, now);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new StorageError(`Failed to touch ${filePath}`, 'touch', filePath, err);
    }
  }

  async function countLines(scope: ScopeKey, phase: LedgerPhase, day: Day): Promise<number> {
    const lines = await readLines(path(scope, phase, day), 'countLines');
    return lines.length;
  }

  async function listEntries(dirPath: string): Promise<string[]> {
    try {
      return await readdir(dirPath);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError(`Failed to list ${dirPath}`, 'listDays', dirPath, err);
    }
  }

  async function listDirs(dirPath: string): Promise<string[]> {
    try {
      const entries = await readdir(dirPath, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw new StorageError(`Failed to list ${dirPath}`, 'listScopes', dirPath, err);
    }
  }

  async function collectDays(scope: ScopeKey, phase: LedgerPhase, range?: DayRange): Promise<Day[]> {
    const codec = codecFor(phase);
    const root = scopeDir(scope, codec.dir);
    const filePattern = new RegExp(`^${codec.prefix}(\\d{8})\\.txt$`);

    const years = (await listEntries(root))
      .filter((name) => /^\d{4}$/.test(name))
      .filter((year) => range === undefined || (year >= range.start.slice(0, 4) && year <= range.end.slice(0, 4)))
      .sort();

    const days: Day[] = [];
    for (const year of years) {
      const yearDays: Day[] = [];
      for (const name of await listEntries(join(root, year))) {
        const match = filePattern.exec(name);
        const day = match?.[1] ? expandCompactDay(match[1]) : null;
        if (day !== null && day.startsWith(year) && inRange(day, range)) {
          yearDays.push(day);
        }
      }
      days.push(...yearDays.sort());
    }
    return days;
  }

  /**
   * Days with a partition file for the phase, ascending. Each iteration
   * re-reads the directory listing.
   */
  function listDays(scope: ScopeKey, phase: LedgerPhase, range?: DayRange): AsyncIterable<Day> {
    return {
      [Symbol.asyncIterator]: async function* () {
        yield* await collectDays(scope, phase, range);
      },
    };
  }

  /**
   * Product/version scopes with a ledger directory in any phase, sorted by
   * product type then version.
   */
  async function listScopes(mission: string, collection: string): Promise<ScopeKey[]> {
    const found = new Map<string, ScopeKey>();
    for (const phase of Object.values(LedgerPhase)) {
      const root = join(registryDir, codecFor(phase).dir, mission, collection);
      for (const productType of await listDirs(root)) {
        for (const version of await listDirs(join(root, productType))) {
          found.set(`${productType}/${version}`, { mission, collection, productType, version });
        }
      }
    }
    return [...found.keys()].sort().flatMap((key) => {
      const scope = found.get(key);
      return scope === undefined ? [] : [scope];
    });
  }

  async function appendError(scope: ScopeKey, locator: string, message: string): Promise<void> {
    const filePath = errorsPath(scope);
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await appendFile(filePath, `${locator}|${sanitizeErrorMessage(message)}\n`, 'utf8');
    } catch (err) {
      throw new StorageError(`Failed to append to ${filePath}`, 'appendError', filePath, err);
    }
  }

  async function readErrors(scope: ScopeKey): Promise<ErrorEntry[]> {
    const lines = await readLines(errorsPath(scope), 'readErrors');
    return lines.map((line) => {
      const sep = line.indexOf('|');
      return sep === -1
        ? { locator: line, message: '' }
        : { locator: line.slice(0, sep), message: line.slice(sep + 1) };
    });
  }

  return {
    path,
    errorsPath,
    readSet,
    writeSet,
    touch,
    countLines,
    listDays,
    listScopes,
    appendError,
    readErrors,
  };
}

export type LedgerStore = ReturnType<typeof createLedgerStore>;
