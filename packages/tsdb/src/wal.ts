import { createHash } from 'node:crypto';
import { open, readFile, truncate, type FileHandle } from 'node:fs/promises';
import { StorageError, type StrataLogger } from '@strata/core';
import { z } from 'zod';
import { fieldValueSchema } from './point.js';

/** A point as it is written to disk; the timestamp is a decimal string */
export const storedPointSchema = z.object({
  measurement: z.string().min(1),
  tags: z.record(z.string()),
  fields: z.record(fieldValueSchema),
  time: z.string().regex(/^-?\d+$/),
});

export type StoredPoint = z.infer<typeof storedPointSchema>;

export const walRecordSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('write'), points: z.array(storedPointSchema) }),
  z.object({
    type: z.literal('drop_series'),
    measurement: z.string(),
    tags: z.record(z.string()).optional(),
  }),
  z.object({ type: z.literal('drop_measurement'), measurement: z.string() }),
]);

/** A change to a shard: a point batch or a drop */
export type WALRecord = z.infer<typeof walRecordSchema>;

const walEntrySchema = z.object({
  sequence: z.number().int().positive(),
  timestamp: z.number(),
  checksum: z.string(),
  record: z.unknown(),
});

/**
 * Write-ahead log entry
 */
export interface WALEntry {
  /** Entry sequence number */
  sequence: number;
  /** Wall-clock time the entry was appended, in milliseconds */
  timestamp: number;
  /** Checksum of the serialized record */
  checksum: string;
  record: WALRecord;
}

export interface WriteAheadLogOptions {
  /** fsync after every append */
  syncWrites: boolean;
  logger: StrataLogger;
}

/**
 * Append-only, newline-delimited JSON log of shard changes.
 *
 * A torn final line (a crash in the middle of an append) is cut off when the
 * log is opened; any other unreadable entry fails the open.
 */
export class WriteAheadLog {
  private handle: FileHandle | null = null;
  private sequence = 0;
  private currentSize = 0;

  constructor(
    readonly filePath: string,
    private readonly options: WriteAheadLogOptions
  ) {}

  /**
   * Open the log for appending and return the entries with a sequence
   * greater than `afterSequence`, in order.
   */
  async open(afterSequence = 0): Promise<WALEntry[]> {
    const { entries, size } = await this.readAll();
    this.currentSize = size;
    this.sequence = Math.max(afterSequence, entries[entries.length - 1]?.sequence ?? 0);
    this.handle = await open(this.filePath, 'a');
    return entries.filter((e) => e.sequence > afterSequence);
  }

  /**
   * Append a record; resolves once it is written (and synced, when enabled).
   * A failed append is cut back off the log before the error is raised, so
   * the log never keeps a record its caller was told had failed.
   */
  async append(record: WALRecord): Promise<WALEntry> {
    const handle = this.handle;
    if (!handle) {
      throw new StorageError('STRATA_S300', 'write-ahead log is not open', { path: this.filePath });
    }

    const entry: WALEntry = {
      sequence: this.sequence + 1,
      timestamp: Date.now(),
      checksum: this.calculateChecksum(record),
      record,
    };
    const data = Buffer.from(JSON.stringify(entry) + '\n', 'utf8');

    try {
      await handle.appendFile(data);
      if (this.options.syncWrites) {
        await handle.sync();
      }
    } catch (err) {
      const cause = err instanceof Error ? err : undefined;
      await this.rollback(handle, cause);
      throw new StorageError(
        'STRATA_S300',
        `failed to append to write-ahead log: ${this.filePath}`,
        { path: this.filePath, sequence: entry.sequence },
        cause
      );
    }

    this.sequence = entry.sequence;
    this.currentSize += data.length;
    return entry;
  }

  /**
   * Discard every entry; the sequence keeps counting from where it was
   */
  async truncate(): Promise<void> {
    if (this.handle) {
      await this.handle.truncate(0);
      if (this.options.syncWrites) await this.handle.sync();
      this.currentSize = 0;
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }

  getSequence(): number {
    return this.sequence;
  }

  /** Bytes of complete entries in the log */
  getSize(): number {
    return this.currentSize;
  }

  /**
   * Cut the log back to its last complete entry. When that fails too the
   * log is closed, so later appends fail instead of writing after the
   * partial line.
   */
  private async rollback(handle: FileHandle, cause: Error | undefined): Promise<void> {
    try {
      await handle.truncate(this.currentSize);
      if (this.options.syncWrites) await handle.sync();
    } catch (err) {
      this.options.logger.error('cannot roll back failed write-ahead log append', cause, {
        path: this.filePath,
        size: this.currentSize,
        rollbackError: err,
      });
      this.handle = null;
      await handle.close().catch((closeErr: unknown) => {
        this.options.logger.warn('cannot close write-ahead log', {
          path: this.filePath,
          error: closeErr,
        });
      });
    }
  }

  private async readAll(): Promise<{ entries: WALEntry[]; size: number }> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return { entries: [], size: 0 };
      throw new StorageError(
        'STRATA_S300',
        `failed to read write-ahead log: ${this.filePath}`,
        { path: this.filePath },
        err instanceof Error ? err : undefined
      );
    }

    const complete = text.slice(0, text.lastIndexOf('\n') + 1);
    if (complete.length < text.length) {
      this.options.logger.warn('discarding torn write-ahead log entry', {
        path: this.filePath,
        bytes: Buffer.byteLength(text) - Buffer.byteLength(complete),
      });
      await truncate(this.filePath, Buffer.byteLength(complete));
    }

    const entries: WALEntry[] = [];
    complete.split('\n').forEach((line, i) => {
      if (!line) return;
      entries.push(this.parseEntry(line, i + 1));
    });
    return { entries, size: Buffer.byteLength(complete) };
  }

  private parseEntry(line: string, lineNumber: number): WALEntry {
    const corrupt = (reason: string): StorageError =>
      new StorageError('STRATA_S302', `corrupt write-ahead log entry at line ${lineNumber}: ${reason}`, {
        path: this.filePath,
        line: lineNumber,
      });

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw corrupt('invalid JSON');
    }

    const envelope = walEntrySchema.safeParse(raw);
    if (!envelope.success) throw corrupt(envelope.error.issues[0]?.message ?? 'invalid entry');
    if (this.calculateChecksum(envelope.data.record) !== envelope.data.checksum) {
      throw corrupt('checksum mismatch');
    }

    const record = walRecordSchema.safeParse(envelope.data.record);
    if (!record.success) throw corrupt(record.error.issues[0]?.message ?? 'invalid record');

    return { ...envelope.data, record: record.data };
  }

  private calculateChecksum(record: unknown): string {
    return createHash('sha256').update(JSON.stringify(record)).digest('hex').slice(0, 16);
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
