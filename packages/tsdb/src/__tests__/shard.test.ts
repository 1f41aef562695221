import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import { open, type FileHandle } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { StorageError, ValidationError, createLogger, type LogEntry } from '@strata/core';
import { Point } from '../point.js';
import { ShardIndex } from '../series-index.js';
import { SNAPSHOT_FILE, Shard, WAL_FILE, type ShardOptions } from '../shard.js';

function cpu(host: string, time: bigint, fields: Record<string, number> = { value: 1 }): Point {
  return new Point('cpu', { host }, fields, time);
}

describe('ShardIndex', () => {
  let index: ShardIndex;

  beforeEach(() => {
    index = new ShardIndex();
  });

  it('should keep only the last field set written at a timestamp', () => {
    index.apply([cpu('a', 10n, { value: 1 }), cpu('a', 10n, { value: 2, idle: 5 })]);
    index.apply([cpu('a', 10n, { value: 3 })]);

    const [series] = index.scan('cpu');
    expect(series?.rows).toEqual([{ time: 10n, fields: { value: 3 } }]);
  });

  it('should order rows by time and series by first write', () => {
    index.apply([cpu('b', 30n), cpu('a', 20n), cpu('b', 10n), cpu('a', 5n)]);

    const scanned = index.scan('cpu');
    expect(scanned.map((s) => s.key)).toEqual(['cpu,host=b', 'cpu,host=a']);
    expect(scanned[0]?.rows.map((r) => r.time)).toEqual([10n, 30n]);
    expect(scanned[1]?.rows.map((r) => r.time)).toEqual([5n, 20n]);
  });

  it('should filter scans by inclusive time bounds and tags', () => {
    index.apply([cpu('a', 1n), cpu('a', 2n), cpu('a', 3n), cpu('b', 2n)]);

    const scanned = index.scan('cpu', { start: 2n, end: 3n, tags: { host: 'a' } });
    expect(scanned).toHaveLength(1);
    expect(scanned[0]?.rows.map((r) => r.time)).toEqual([2n, 3n]);
    expect(index.scan('mem')).toEqual([]);
  });

  it('should keep the catalogue when series are dropped', () => {
    index.apply([cpu('a', 1n), cpu('b', 1n)]);

    expect(index.dropSeries('cpu', { host: 'a' })).toBe(1);
    expect(index.tagValues('cpu', 'host')).toEqual(['b']);

    expect(index.dropSeries('cpu')).toBe(1);
    expect(index.scan('cpu')).toEqual([]);
    expect(index.tagKeys('cpu')).toEqual(['host']);
    expect(index.fieldKeys('cpu')).toEqual(['value']);
    expect(index.measurements()).toEqual(['cpu']);
  });

  it('should remove the catalogue with the measurement', () => {
    index.apply([cpu('a', 1n)]);
    expect(index.dropMeasurement('cpu')).toBe(true);
    expect(index.measurements()).toEqual([]);
    expect(index.tagKeys('cpu')).toEqual([]);
    expect(index.dropMeasurement('cpu')).toBe(false);
  });

  it('should list field keys in discovery order', () => {
    index.apply([cpu('a', 2n, { user: 1 }), cpu('a', 1n, { system: 1, user: 2 })]);
    expect(index.fieldKeys('cpu')).toEqual(['user', 'system']);
  });
});

describe('Shard', () => {
  let tmpDir: string;
  let options: ShardOptions;
  let logs: LogEntry[];

  const openShard = async (): Promise<Shard> => {
    const shard = new Shard(1n, 'foo', 'bar', tmpDir, options);
    await shard.open();
    return shard;
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-shard-'));
    logs = [];
    options = {
      syncWrites: false,
      snapshotOnClose: true,
      maxWalBytes: 0,
      logger: createLogger({ level: 'debug', handler: (entry) => logs.push(entry) }),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /** Methods of the prototype are shared by every open file handle */
  const fileHandlePrototype = async (): Promise<FileHandle> => {
    const handle = await open(path.join(tmpDir, 'scratch'), 'w');
    const prototype: FileHandle = Object.getPrototypeOf(handle);
    await handle.close();
    return prototype;
  };

  it('should copy points so later mutation does not change stored data', async () => {
    const shard = await openShard();
    const pt = cpu('a', 1n);
    await shard.write([pt]);
    pt.setTime(2n);
    pt.fields.value = 99;

    expect(shard.scan('cpu')[0]?.rows).toEqual([{ time: 1n, fields: { value: 1 } }]);
    await shard.close();
  });

  it('should reject an invalid batch without applying any of it', async () => {
    const shard = await openShard();
    const bad = cpu('b', 2n);
    delete bad.fields.value;

    await expect(shard.write([cpu('a', 1n), bad])).rejects.toBeInstanceOf(ValidationError);
    expect(shard.pointCount).toBe(0);
    await shard.close();
  });

  it('should snapshot on close and truncate the log', async () => {
    const shard = await openShard();
    await shard.write([cpu('a', 1n), cpu('a', 2n)]);
    await shard.close();

    expect(fs.readFileSync(path.join(tmpDir, WAL_FILE), 'utf8')).toBe('');
    expect(fs.existsSync(path.join(tmpDir, SNAPSHOT_FILE))).toBe(true);

    const reopened = await openShard();
    expect(reopened.scan('cpu')[0]?.rows.map((r) => r.time)).toEqual([1n, 2n]);
    await reopened.close();
  });

  it('should replay the log when no snapshot was written', async () => {
    options.snapshotOnClose = false;
    const shard = await openShard();
    await shard.write([cpu('a', 1n)]);
    await shard.dropSeries('cpu');
    await shard.write([cpu('b', 3n, { value: 7 })]);
    await shard.close();

    expect(fs.existsSync(path.join(tmpDir, SNAPSHOT_FILE))).toBe(false);

    const reopened = await openShard();
    const scanned = reopened.scan('cpu');
    expect(scanned.map((s) => s.key)).toEqual(['cpu,host=b']);
    expect(scanned[0]?.rows).toEqual([{ time: 3n, fields: { value: 7 } }]);
    expect(reopened.tagKeys('cpu')).toEqual(['host']);
    await reopened.close();
  });

  it('should apply log entries written after the snapshot', async () => {
    const shard = await openShard();
    await shard.write([cpu('a', 1n)]);
    await shard.snapshot();
    await shard.write([cpu('a', 2n)]);
    options.snapshotOnClose = false;
    await shard.close();

    const reopened = await openShard();
    expect(reopened.scan('cpu')[0]?.rows.map((r) => r.time)).toEqual([1n, 2n]);
    await reopened.close();
  });

  it('should cut off a torn final log entry', async () => {
    options.snapshotOnClose = false;
    const shard = await openShard();
    await shard.write([cpu('a', 1n)]);
    await shard.close();
    fs.appendFileSync(path.join(tmpDir, WAL_FILE), '{"sequence":2,"timesta');

    const reopened = await openShard();
    expect(reopened.pointCount).toBe(1);
    expect(logs.some((e) => e.message === 'discarding torn write-ahead log entry')).toBe(true);

    await reopened.write([cpu('a', 2n)]);
    await reopened.close();
    const again = await openShard();
    expect(again.pointCount).toBe(2);
    await again.close();
  });

  it('should fail to open when a log entry is corrupt', async () => {
    options.snapshotOnClose = false;
    const shard = await openShard();
    await shard.write([cpu('a', 1n)]);
    await shard.close();

    const walPath = path.join(tmpDir, WAL_FILE);
    fs.writeFileSync(walPath, fs.readFileSync(walPath, 'utf8').replace('"value":1', '"value":2'));

    const reopened = new Shard(1n, 'foo', 'bar', tmpDir, options);
    await expect(reopened.open()).rejects.toMatchObject({
      code: 'STRATA_S302',
      message: expect.stringContaining('checksum mismatch'),
    });
  });

  it('should fail to open a corrupt snapshot', async () => {
    fs.writeFileSync(path.join(tmpDir, SNAPSHOT_FILE), '{"version":1}');
    const shard = new Shard(1n, 'foo', 'bar', tmpDir, options);
    await expect(shard.open()).rejects.toBeInstanceOf(StorageError);
  });

  it('should serialize concurrent writes in call order', async () => {
    const shard = await openShard();
    await Promise.all([
      shard.write([cpu('a', 1n, { value: 1 })]),
      shard.write([cpu('a', 1n, { value: 2 })]),
      shard.write([cpu('a', 1n, { value: 3 })]),
    ]);
    expect(shard.scan('cpu')[0]?.rows).toEqual([{ time: 1n, fields: { value: 3 } }]);
    await shard.close();
  });

  it('should remove a partially written entry when an append fails', async () => {
    options.snapshotOnClose = false;
    const shard = await openShard();
    await shard.write([cpu('a', 1n)]);

    const prototype = await fileHandlePrototype();
    vi.spyOn(prototype, 'appendFile').mockImplementationOnce(async function (
      this: FileHandle,
      data: string | Uint8Array
    ) {
      if (typeof data === 'string') await this.write(data.slice(0, 20));
      else await this.write(data.subarray(0, 20));
      throw new Error('disk full');
    });

    await expect(shard.write([cpu('a', 2n)])).rejects.toMatchObject({ code: 'STRATA_S300' });
    expect(shard.pointCount).toBe(1);

    await shard.write([cpu('a', 3n)]);
    await shard.close();

    const reopened = await openShard();
    expect(reopened.scan('cpu')[0]?.rows.map((r) => r.time)).toEqual([1n, 3n]);
    await reopened.close();
  });

  it('should not replay a batch whose sync failed', async () => {
    options.snapshotOnClose = false;
    options.syncWrites = true;
    const shard = await openShard();

    const prototype = await fileHandlePrototype();
    vi.spyOn(prototype, 'sync').mockRejectedValueOnce(new Error('io error'));

    await expect(shard.write([cpu('a', 1n)])).rejects.toMatchObject({ code: 'STRATA_S300' });
    await shard.write([cpu('a', 2n)]);
    await shard.close();

    const reopened = await openShard();
    expect(reopened.scan('cpu')[0]?.rows.map((r) => r.time)).toEqual([2n]);
    await reopened.close();
  });

  it('should compact the log once it reaches maxWalBytes', async () => {
    options.snapshotOnClose = false;
    options.maxWalBytes = 1;
    const walPath = path.join(tmpDir, WAL_FILE);
    const shard = await openShard();

    await shard.write([cpu('a', 1n)]);
    expect(fs.statSync(walPath).size).toBe(0);
    await shard.write([cpu('a', 2n)]);
    expect(fs.statSync(walPath).size).toBe(0);
    expect(logs.filter((e) => e.message === 'write-ahead log compacted')).toHaveLength(2);
    await shard.close();

    const reopened = await openShard();
    expect(reopened.scan('cpu')[0]?.rows.map((r) => r.time)).toEqual([1n, 2n]);
    await reopened.close();
  });

  it('should leave the log alone below maxWalBytes', async () => {
    options.snapshotOnClose = false;
    options.maxWalBytes = 1024 * 1024;
    const shard = await openShard();
    await shard.write([cpu('a', 1n)]);
    await shard.close();

    expect(fs.statSync(path.join(tmpDir, WAL_FILE)).size).toBeGreaterThan(0);
    expect(fs.existsSync(path.join(tmpDir, SNAPSHOT_FILE))).toBe(false);
  });
});
