/**
 * Option schemas for the store and the query executor.
 *
 * @module config
 */

import { z } from 'zod';
import { ValidationError } from '../errors/strata-error.js';
import { StrataLogger } from '../observability/logger.js';

export const storeOptionsSchema = z
  .object({
    /** fsync the write-ahead log after every acknowledged batch */
    syncWrites: z.boolean().default(true),
    /** Write a snapshot of every shard and truncate its log on close */
    snapshotOnClose: z.boolean().default(true),
    /** Snapshot a shard once its log reaches this many bytes; 0 disables it */
    maxWalBytes: z
      .number()
      .int()
      .nonnegative()
      .default(10 * 1024 * 1024),
    logger: z.instanceof(StrataLogger).optional(),
  })
  .strict();

export const queryExecutorOptionsSchema = z
  .object({
    /** Authorize every statement in executeQuery against the supplied user */
    requireAuthentication: z.boolean().default(false),
    /** Upper bound on rows a single SELECT may produce; 0 disables the check */
    maxSelectPoints: z.number().int().nonnegative().default(0),
    logger: z.instanceof(StrataLogger).optional(),
  })
  .strict();

export type StoreOptions = z.input<typeof storeOptionsSchema>;
export type StoreConfig = z.output<typeof storeOptionsSchema>;

export type QueryExecutorOptions = z.input<typeof queryExecutorOptionsSchema>;
export type QueryExecutorConfig = z.output<typeof queryExecutorOptionsSchema>;

function resolve<S extends z.ZodTypeAny>(schema: S, input: unknown, target: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
      'STRATA_V602',
      { target }
    );
  }
  return parsed.data;
}

export function resolveStoreConfig(options: StoreOptions = {}): StoreConfig {
  return resolve(storeOptionsSchema, options, 'store');
}

export function resolveExecutorConfig(options: QueryExecutorOptions = {}): QueryExecutorConfig {
  return resolve(queryExecutorOptionsSchema, options, 'query-executor');
}
