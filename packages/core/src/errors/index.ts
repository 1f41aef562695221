/**
 * Strata Error System
 *
 * Structured errors with stable codes, categories, suggestions and context.
 *
 * @example
 * ```typescript
 * import { StrataError, ShardNotFoundError } from '@strata/core';
 *
 * try {
 *   await store.writeToShard(7n, points);
 * } catch (error) {
 *   if (error instanceof ShardNotFoundError) {
 *     console.log('missing shard', error.shardId);
 *   } else if (StrataError.isCategory(error, 'storage')) {
 *     console.log(StrataError.isStrataError(error) ? error.format() : error);
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  AlreadyExistsError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  QueryError,
  ShardExistsError,
  ShardNotFoundError,
  StorageError,
  StoreClosedError,
  StrataError,
  ValidationError,
  ensureStrataError,
  type SerializedStrataError,
  type StrataErrorOptions,
  type ValidationIssue,
} from './strata-error.js';
