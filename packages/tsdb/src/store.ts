/**
 * Store - owns the shards under one data directory.
 *
 * Shards live at `<path>/<database>/<retentionPolicy>/<shardId>/`. A Store is
 * constructed without touching the filesystem; `open()` rehydrates every
 * shard found under the path and `close()` snapshots and releases them.
 * Only one open Store may own a path at a time.
 *
 * @example
 * ```typescript
 * const store = new Store('/var/lib/strata/data');
 * await store.open();
 * await store.createShard('telemetry', 'default', 1n);
 * await store.writeToShard(1n, [new Point('cpu', { host: 'a' }, { value: 0.5 }, new Date())]);
 * await store.close();
 * ```
 */

import { mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ShardExistsError,
  ShardNotFoundError,
  StorageError,
  StoreClosedError,
  ValidationError,
  type ValidationIssue,
  createLogger,
  resolveStoreConfig,
  type StoreConfig,
  type StoreOptions,
  type StrataLogger,
} from '@strata/core';
import type { Point } from './point.js';
import { Shard } from './shard.js';

type StoreState = 'new' | 'open' | 'closed';

export class Store {
  readonly path: string;
  private readonly config: StoreConfig;
  private readonly logger: StrataLogger;
  private readonly shards = new Map<bigint, Shard>();
  private readonly pendingShards = new Set<bigint>();
  private state: StoreState = 'new';
  private opening: Promise<void> | null = null;

  constructor(path: string, options: StoreOptions = {}) {
    this.path = path;
    this.config = resolveStoreConfig(options);
    this.logger = (this.config.logger ?? createLogger({ module: 'tsdb' })).child('store');
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Create the data directory if needed and load every persisted shard.
   * Calling open() again after it succeeded does nothing.
   */
  open(): Promise<void> {
    if (this.state === 'closed') return Promise.reject(new StoreClosedError(this.path));
    if (this.state === 'open') return Promise.resolve();

    this.opening ??= this.load().then(
      () => {
        this.state = 'open';
        this.opening = null;
      },
      (err: unknown) => {
        this.opening = null;
        throw err;
      }
    );
    return this.opening;
  }

  /**
   * Allocate an empty shard. Fails when the ID is already in use.
   */
  async createShard(database: string, retentionPolicy: string, shardId: bigint): Promise<void> {
    this.assertOpen();
    const issues = [...nameIssues('database', database), ...nameIssues('retentionPolicy', retentionPolicy)];
    if (issues.length > 0) throw new ValidationError(issues, 'STRATA_V600', { shardId: shardId.toString() });
    if (this.shards.has(shardId) || this.pendingShards.has(shardId)) {
      throw new ShardExistsError(shardId);
    }

    this.pendingShards.add(shardId);
    try {
      const shard = this.newShard(database, retentionPolicy, shardId);
      await shard.open();
      if (this.state !== 'open') {
        await shard.close();
        throw new StoreClosedError(this.path);
      }
      this.shards.set(shardId, shard);
      this.logger.info('shard created', { database, retentionPolicy, shardId });
    } finally {
      this.pendingShards.delete(shardId);
    }
  }

  /**
   * Write a batch of points to a shard. The batch becomes visible to readers
   * all at once, after it is durably logged.
   */
  async writeToShard(shardId: bigint, points: readonly Point[]): Promise<void> {
    this.assertOpen();
    const shard = this.shards.get(shardId);
    if (!shard) throw new ShardNotFoundError(shardId);
    await shard.write(points);
  }

  /** Look up an open shard */
  shard(shardId: bigint): Shard | undefined {
    this.assertOpen();
    return this.shards.get(shardId);
  }

  shardIds(): bigint[] {
    this.assertOpen();
    return [...this.shards.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /** The shards of `shardIds` held by this store, skipping unknown IDs */
  shardsFor(shardIds: Iterable<bigint>): Shard[] {
    this.assertOpen();
    const result: Shard[] = [];
    for (const id of new Set(shardIds)) {
      const shard = this.shards.get(id);
      if (shard) result.push(shard);
    }
    return result;
  }

  /**
   * Close a shard and remove its files
   */
  async deleteShard(shardId: bigint): Promise<void> {
    this.assertOpen();
    const shard = this.shards.get(shardId);
    if (!shard) throw new ShardNotFoundError(shardId);
    this.shards.delete(shardId);
    await shard.destroy();
    this.logger.info('shard deleted', { shardId });
  }

  /**
   * Flush and release every shard. Every later call fails with StoreClosedError.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') return;
    if (this.opening) await Promise.allSettled([this.opening]);
    this.state = 'closed';

    const shards = [...this.shards.values()];
    this.shards.clear();
    const results = await Promise.allSettled(shards.map((shard) => shard.close()));
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');

    this.logger.info('store closed', { path: this.path, shards: shards.length });
    if (failure) {
      throw new StorageError(
        'STRATA_S300',
        `failed to close store: ${this.path}`,
        { path: this.path },
        failure.reason instanceof Error ? failure.reason : undefined
      );
    }
  }

  // ── Private ──────────────────────────────────────────────────────────

  private assertOpen(): void {
    if (this.state !== 'open') throw new StoreClosedError(this.path);
  }

  private newShard(database: string, retentionPolicy: string, shardId: bigint): Shard {
    const dir = join(this.path, encodePathSegment(database), encodePathSegment(retentionPolicy), shardId.toString());
    return new Shard(shardId, database, retentionPolicy, dir, {
      syncWrites: this.config.syncWrites,
      snapshotOnClose: this.config.snapshotOnClose,
      maxWalBytes: this.config.maxWalBytes,
      logger: this.logger.child('shard', { shardId, database, retentionPolicy }),
    });
  }

  private async load(): Promise<void> {
    const done = this.logger.time('store open');
    await this.ensureDirectory(this.path);

    const loaded: Shard[] = [];
    try {
      for (const dbDir of await this.listDirectories(this.path)) {
        for (const rpDir of await this.listDirectories(join(this.path, dbDir))) {
          const database = decodePathSegment(dbDir);
          const rp = decodePathSegment(rpDir);
          for (const name of await this.listDirectories(join(this.path, dbDir, rpDir))) {
            if (database === null || rp === null || !/^\d+$/.test(name)) {
              this.logger.warn('skipping unrecognised shard directory', {
                path: join(this.path, dbDir, rpDir, name),
              });
              continue;
            }
            const id = BigInt(name);
            if (this.shards.has(id)) {
              throw new StorageError('STRATA_S302', `duplicate shard id on disk: ${id}`, {
                path: join(this.path, dbDir, rpDir, name),
              });
            }
            const shard = this.newShard(database, rp, id);
            await shard.open();
            loaded.push(shard);
            this.shards.set(id, shard);
          }
        }
      }
    } catch (err) {
      this.shards.clear();
      await Promise.allSettled(loaded.map((shard) => shard.close()));
      throw err;
    }

    done({ path: this.path, shards: this.shards.size });
    this.logger.info('store opened', { path: this.path, shards: this.shards.size });
  }

  private async ensureDirectory(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (err) {
      throw new StorageError(
        'STRATA_S300',
        `cannot create data directory: ${dir}`,
        { path: dir },
        err instanceof Error ? err : undefined
      );
    }
  }

  private async listDirectories(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
    } catch (err) {
      throw new StorageError(
        'STRATA_S300',
        `cannot read directory: ${dir}`,
        { path: dir },
        err instanceof Error ? err : undefined
      );
    }
  }
}

/**
 * Directory name for a database or retention policy. Separators, `%` and
 * dots are percent-encoded so every name maps to one directory below the
 * store path.
 */
export function encodePathSegment(name: string): string {
  return encodeURIComponent(name).replace(/\./g, '%2E');
}

/** Inverse of encodePathSegment; null for names it cannot have produced */
export function decodePathSegment(segment: string): string | null {
  if (!segment || /\./.test(segment)) return null;
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

function nameIssues(path: string, name: string): ValidationIssue[] {
  if (!name) return [{ path, message: 'name is required' }];
  try {
    encodePathSegment(name);
    return [];
  } catch {
    return [{ path, message: 'name is not valid unicode' }];
  }
}

export function createStore(path: string, options?: StoreOptions): Store {
  return new Store(path, options);
}
