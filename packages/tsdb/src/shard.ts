/**
 * Shard - durable storage for the series routed to one shard ID.
 *
 * On disk a shard is a directory holding `wal.log` and, after a clean close,
 * `snapshot.json`. Opening loads the snapshot and replays log entries newer
 * than it. Writes go through a per-shard queue: validate, append to the log,
 * then apply to memory.
 */

import { mkdir, open as openFile, readFile, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { StorageError, ValidationError, type StrataLogger } from '@strata/core';
import { z } from 'zod';
import { fieldValueSchema, validatePoints, type Point, type Tags } from './point.js';
import { ShardIndex, type PointData, type ScanOptions, type ScanSeries, type Series } from './series-index.js';
import { WriteAheadLog, isMissingFile, type StoredPoint, type WALRecord } from './wal.js';

export const WAL_FILE = 'wal.log';
export const SNAPSHOT_FILE = 'snapshot.json';

const snapshotSchema = z.object({
  version: z.literal(1),
  /** Last log sequence folded into the snapshot */
  sequence: z.number().int().nonnegative(),
  measurements: z.array(
    z.object({
      name: z.string().min(1),
      tagKeys: z.array(z.string()),
      fieldKeys: z.array(z.string()),
    })
  ),
  series: z.array(
    z.object({
      measurement: z.string().min(1),
      tags: z.record(z.string()),
      records: z.array(z.tuple([z.string().regex(/^-?\d+$/), z.record(fieldValueSchema)])),
    })
  ),
});

type ShardSnapshot = z.infer<typeof snapshotSchema>;

export interface ShardOptions {
  syncWrites: boolean;
  snapshotOnClose: boolean;
  /** Snapshot once the log reaches this many bytes; 0 never does */
  maxWalBytes: number;
  logger: StrataLogger;
}

export class Shard {
  private readonly index = new ShardIndex();
  private readonly wal: WriteAheadLog;
  private readonly logger: StrataLogger;
  private writeQueue: Promise<void> = Promise.resolve();
  private opened = false;

  constructor(
    readonly id: bigint,
    readonly database: string,
    readonly retentionPolicy: string,
    readonly path: string,
    private readonly options: ShardOptions
  ) {
    this.logger = options.logger;
    this.wal = new WriteAheadLog(join(path, WAL_FILE), {
      syncWrites: options.syncWrites,
      logger: options.logger,
    });
  }

  get isOpen(): boolean {
    return this.opened;
  }

  /**
   * Create the shard directory if needed and rebuild memory from the
   * snapshot and the write-ahead log
   */
  async open(): Promise<void> {
    if (this.opened) return;
    const done = this.logger.time('shard open');

    await mkdir(this.path, { recursive: true });
    const snapshot = await this.readSnapshot();
    if (snapshot) this.restore(snapshot);

    const entries = await this.wal.open(snapshot?.sequence ?? 0);
    for (const entry of entries) this.replay(entry.record);

    this.opened = true;
    done({
      replayed: entries.length,
      series: this.index.seriesCount,
      points: this.index.pointCount,
    });
  }

  /**
   * Durably write a batch. Invalid points reject the whole batch before
   * anything is logged.
   */
  write(points: readonly Point[]): Promise<void> {
    const issues = validatePoints(points);
    if (issues.length > 0) {
      return Promise.reject(new ValidationError(issues, 'STRATA_V601', { shardId: this.id.toString() }));
    }
    const data: PointData[] = points.map((p) => ({
      measurement: p.measurement,
      tags: { ...p.tags },
      fields: { ...p.fields },
      time: p.time,
    }));

    return this.withWriteLock(async () => {
      await this.wal.append({ type: 'write', points: data.map(toStoredPoint) });
      this.index.apply(data);
      await this.compactIfNeeded();
    });
  }

  /** Remove series data, keeping the measurement's catalogue; resolves the count removed */
  dropSeries(measurement: string, tags?: Readonly<Tags>): Promise<number> {
    return this.withWriteLock(async () => {
      if (!this.index.hasMeasurement(measurement)) return 0;
      await this.wal.append({ type: 'drop_series', measurement, ...(tags ? { tags: { ...tags } } : {}) });
      const dropped = this.index.dropSeries(measurement, tags);
      await this.compactIfNeeded();
      return dropped;
    });
  }

  dropMeasurement(measurement: string): Promise<boolean> {
    return this.withWriteLock(async () => {
      if (!this.index.hasMeasurement(measurement)) return false;
      await this.wal.append({ type: 'drop_measurement', measurement });
      const dropped = this.index.dropMeasurement(measurement);
      await this.compactIfNeeded();
      return dropped;
    });
  }

  scan(measurement: string, options?: ScanOptions): ScanSeries[] {
    return this.index.scan(measurement, options);
  }

  hasMeasurement(measurement: string): boolean {
    return this.index.hasMeasurement(measurement);
  }

  measurements(): string[] {
    return this.index.measurements();
  }

  series(measurement: string): Series[] {
    return this.index.seriesOf(measurement);
  }

  tagKeys(measurement: string): string[] {
    return this.index.tagKeys(measurement);
  }

  tagValues(measurement: string, tagKey: string): string[] {
    return this.index.tagValues(measurement, tagKey);
  }

  fieldKeys(measurement: string): string[] {
    return this.index.fieldKeys(measurement);
  }

  get seriesCount(): number {
    return this.index.seriesCount;
  }

  get pointCount(): number {
    return this.index.pointCount;
  }

  /**
   * Write the full shard state to `snapshot.json` and truncate the log.
   * The snapshot is written to a temporary file and renamed into place.
   */
  snapshot(): Promise<void> {
    return this.withWriteLock(() => this.writeSnapshot());
  }

  /**
   * Wait for queued writes, snapshot when configured, and release the log
   */
  async close(): Promise<void> {
    if (!this.opened) return;
    if (this.options.snapshotOnClose) {
      await this.snapshot();
    } else {
      await this.withWriteLock(async () => undefined);
    }
    await this.wal.close();
    this.opened = false;
    this.logger.debug('shard closed');
  }

  /** Close the shard and remove its directory */
  async destroy(): Promise<void> {
    await this.withWriteLock(async () => undefined);
    await this.wal.close();
    this.opened = false;
    await rm(this.path, { recursive: true, force: true });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(() => {
      if (!this.opened) {
        throw new StorageError('STRATA_S300', `shard ${this.id} is not open`, {
          shardId: this.id.toString(),
        });
      }
      return fn();
    });
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async writeSnapshot(): Promise<void> {
    const target = join(this.path, SNAPSHOT_FILE);
    const temp = `${target}.tmp`;
    const content = JSON.stringify(this.toSnapshot());

    try {
      const handle = await openFile(temp, 'w');
      try {
        await handle.writeFile(content, 'utf8');
        if (this.options.syncWrites) await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, target);
    } catch (err) {
      throw new StorageError(
        'STRATA_S300',
        `failed to write snapshot for shard ${this.id}`,
        { shardId: this.id.toString(), path: target },
        err instanceof Error ? err : undefined
      );
    }

    await this.wal.truncate();
    this.logger.debug('shard snapshot written', {
      sequence: this.wal.getSequence(),
      bytes: content.length,
    });
  }

  /**
   * Fold the log into a snapshot once it reaches `maxWalBytes`. The change
   * that triggered it is already durable, so a failed snapshot is logged and
   * retried on the next change.
   */
  private async compactIfNeeded(): Promise<void> {
    const limit = this.options.maxWalBytes;
    const size = this.wal.getSize();
    if (limit <= 0 || size < limit) return;

    try {
      await this.writeSnapshot();
      this.logger.info('write-ahead log compacted', { bytes: size });
    } catch (err) {
      this.logger.error('write-ahead log compaction failed', err, { bytes: size });
    }
  }

  private replay(record: WALRecord): void {
    switch (record.type) {
      case 'write':
        this.index.apply(record.points.map(fromStoredPoint));
        break;
      case 'drop_series':
        this.index.dropSeries(record.measurement, record.tags);
        break;
      case 'drop_measurement':
        this.index.dropMeasurement(record.measurement);
        break;
    }
  }

  private async readSnapshot(): Promise<ShardSnapshot | null> {
    const file = join(this.path, SNAPSHOT_FILE);
    let text: string;
    try {
      text = await readFile(file, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new StorageError(
        'STRATA_S300',
        `failed to read snapshot: ${file}`,
        { path: file },
        err instanceof Error ? err : undefined
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new StorageError(
        'STRATA_S302',
        `corrupt snapshot: ${file}`,
        { path: file },
        err instanceof Error ? err : undefined
      );
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StorageError('STRATA_S302', `corrupt snapshot: ${file}`, {
        path: file,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  private restore(snapshot: ShardSnapshot): void {
    for (const m of snapshot.measurements) {
      this.index.restoreCatalogue(m.name, m.tagKeys, m.fieldKeys);
    }
    for (const series of snapshot.series) {
      this.index.apply(
        series.records.map(([time, fields]) => ({
          measurement: series.measurement,
          tags: series.tags,
          fields,
          time: BigInt(time),
        }))
      );
    }
  }

  private toSnapshot(): ShardSnapshot {
    return {
      version: 1,
      sequence: this.wal.getSequence(),
      measurements: this.index.measurements().map((name) => ({
        name,
        tagKeys: this.index.tagKeys(name),
        fieldKeys: this.index.fieldKeys(name),
      })),
      series: this.index.allSeries().map((s) => ({
        measurement: s.measurement,
        tags: { ...s.tags },
        records: s.records.map((r): [string, Record<string, string | number | boolean>] => [
          r.time.toString(),
          { ...r.fields },
        ]),
      })),
    };
  }
}

function toStoredPoint(point: PointData): StoredPoint {
  return {
    measurement: point.measurement,
    tags: { ...point.tags },
    fields: { ...point.fields },
    time: point.time.toString(),
  };
}

function fromStoredPoint(point: StoredPoint): PointData {
  return { ...point, time: BigInt(point.time) };
}
