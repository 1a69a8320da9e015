// ═══════════════════════════════════════════════════════════
// TERMSAGE — History Store
// Bounded, append-only log of query → command pairs
// ═══════════════════════════════════════════════════════════

import { appendFile, link, mkdir, open, readFile, rename, stat, truncate, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { HistoryError } from '../core/errors.js';
import type { HistoryEntry } from '../core/types.js';

const LOCK_STALE_MS = 10_000;
const LOCK_RETRY_MS = 25;
const LOCK_MAX_WAIT_MS = 5_000;

/** Serialize one entry as `<unix-seconds>|<query>|<command>` */
export function formatEntry(entry: HistoryEntry): string {
  const seconds = Math.floor(entry.timestamp.getTime() / 1000);
  // The command is the tail of the line and may keep its pipes; the query may not.
  const query = entry.query.replace(/\r?\n/g, ' ').replace(/\|/g, '¦');
  const command = entry.command.replace(/\r?\n/g, ' ');
  return `${seconds}|${query}|${command}`;
}

/** Parse one line; null for anything malformed */
export function parseEntry(line: string): HistoryEntry | null {
  const first = line.indexOf('|');
  if (first <= 0) return null;
  const second = line.indexOf('|', first + 1);
  if (second < 0) return null;

  const stamp = line.slice(0, first);
  if (!/^\d+$/.test(stamp)) return null;

  return {
    timestamp: new Date(Number(stamp) * 1000),
    query: line.slice(first + 1, second),
    command: line.slice(second + 1),
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return;
    throw error;
  }
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export interface HistoryStoreOptions {
  filePath: string;
  /** Oldest entries are dropped beyond this count */
  maxEntries: number;
}

/**
 * File-backed history.
 *
 * Calls on one instance run strictly one after another; separate processes
 * coordinate through an exclusive `<file>.lock` that is considered stale after
 * ten seconds.
 */
export class HistoryStore {
  readonly filePath: string;
  readonly maxEntries: number;
  private readonly lockPath: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: HistoryStoreOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new HistoryError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }
    this.filePath = options.filePath;
    this.maxEntries = options.maxEntries;
    this.lockPath = `${options.filePath}.lock`;
  }

  /** Add an entry, then trim to `maxEntries` oldest-first */
  async append(entry: HistoryEntry): Promise<void> {
    try {
      await this.serialize(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await appendFile(this.filePath, formatEntry(entry) + '\n', 'utf-8');

        const lines = await this.readLines();
        if (lines.length > this.maxEntries) {
          await this.rewrite(lines.slice(-this.maxEntries));
        }
      });
    } catch (error) {
      if (error instanceof HistoryError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new HistoryError(`Cannot write ${this.filePath}: ${reason}`, { cause: error });
    }
  }

  /** The `n` most recent entries, oldest first */
  async recent(n: number): Promise<HistoryEntry[]> {
    if (n <= 0) return [];
    return this.serialize(async () => {
      const entries = (await this.boundedLines())
        .map(parseEntry)
        .filter((entry): entry is HistoryEntry => entry !== null);
      return entries.slice(-n);
    });
  }

  /** Number of readable entries, at most `maxEntries` */
  async size(): Promise<number> {
    return this.serialize(async () => {
      const lines = await this.boundedLines();
      return lines.filter(line => parseEntry(line) !== null).length;
    });
  }

  async clear(): Promise<void> {
    await this.serialize(async () => {
      try {
        await truncate(this.filePath);
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return;
        throw error;
      }
    });
  }

  // ─── Internals ─────────────────────────────────────────

  private async readLines(): Promise<string[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }
    return content.split('\n').filter(line => line.length > 0);
  }

  /** Newest `maxEntries` lines; a file written under a larger maximum reads as trimmed */
  private async boundedLines(): Promise<string[]> {
    return (await this.readLines()).slice(-this.maxEntries);
  }

  private async rewrite(lines: string[]): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, lines.map(line => line + '\n').join(''), 'utf-8');
    await rename(tmpPath, this.filePath);
  }

  /** Queue `task` behind earlier calls and run it under the file lock */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.withFileLock(task));
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private async withFileLock<T>(task: () => Promise<T>): Promise<T> {
    await mkdir(dirname(this.lockPath), { recursive: true });
    await this.acquireLock();
    try {
      return await task();
    } finally {
      await removeIfPresent(this.lockPath);
    }
  }

  private async acquireLock(): Promise<void> {
    const deadline = Date.now() + LOCK_MAX_WAIT_MS;

    for (;;) {
      try {
        const handle = await open(this.lockPath, 'wx');
        await handle.writeFile(String(process.pid));
        await handle.close();
        return;
      } catch (error) {
        if (!(isErrnoException(error) && error.code === 'EEXIST')) throw error;
      }

      if (await this.lockIsStale(this.lockPath)) {
        await this.breakStaleLock();
        continue;
      }
      if (Date.now() > deadline) {
        throw new HistoryError(`Timed out waiting for history lock ${this.lockPath}`);
      }
      await sleep(LOCK_RETRY_MS);
    }
  }

  /**
   * Move the lock aside under a name only this attempt uses, then look again.
   * Another process may have broken the stale lock and taken a fresh one in
   * between; that lock is put back.
   */
  private async breakStaleLock(): Promise<void> {
    const asidePath = `${this.lockPath}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2)}`;
    try {
      await rename(this.lockPath, asidePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return;
      throw error;
    }

    if (!await this.lockIsStale(asidePath)) {
      try {
        await link(asidePath, this.lockPath);
      } catch (error) {
        if (!(isErrnoException(error) && error.code === 'EEXIST')) throw error;
      }
    }
    await removeIfPresent(asidePath);
  }

  private async lockIsStale(path: string): Promise<boolean> {
    try {
      const info = await stat(path);
      return Date.now() - info.mtimeMs > LOCK_STALE_MS;
    } catch (error) {
      // Released between our attempt and the stat
      if (isErrnoException(error) && error.code === 'ENOENT') return false;
      throw error;
    }
  }
}
