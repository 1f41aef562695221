/**
 * StrataError - Structured error class shared by every Strata package
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating a StrataError
 */
export interface StrataErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
  /** The original error that caused this error */
  cause?: Error;
}

/**
 * Serialized format of a StrataError
 */
export interface SerializedStrataError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  cause?: SerializedStrataError | { name: string; message: string };
}

/**
 * Base error for the storage engine, query executor and metadata layer.
 *
 * Every error carries a stable code, a category derived from the code, a
 * suggestion and free-form context for debugging.
 *
 * @example
 * ```typescript
 * try {
 *   await store.writeToShard(42n, points);
 * } catch (error) {
 *   if (StrataError.isCategory(error, 'not_found')) {
 *     await store.createShard('db', 'rp', 42n);
 *   }
 * }
 * ```
 */
export class StrataError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  /** Original error that caused this error */
  override readonly cause?: Error;

  constructor(options: StrataErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message, { cause: options.cause });

    this.name = 'StrataError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};
    this.cause = options.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StrataError);
    }
  }

  /**
   * Create a StrataError from an error code with minimal options
   */
  static fromCode(code: ErrorCode, context?: Record<string, unknown>): StrataError {
    return new StrataError({ code, context });
  }

  /**
   * Wrap an existing error with a StrataError
   */
  static wrap(error: Error, code: ErrorCode, context?: Record<string, unknown>): StrataError {
    return new StrataError({
      code,
      message: error.message,
      context,
      cause: error,
    });
  }

  static isStrataError(error: unknown): error is StrataError {
    return error instanceof StrataError;
  }

  static isCode(error: unknown, code: ErrorCode): boolean {
    return StrataError.isStrataError(error) && error.code === code;
  }

  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return StrataError.isStrataError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context, bigintReplacer)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  toJSON(): SerializedStrataError {
    const result: SerializedStrataError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.cause) {
      result.cause = StrataError.isStrataError(this.cause)
        ? this.cause.toJSON()
        : { name: this.cause.name, message: this.cause.message };
    }

    return result;
  }

  override toString(): string {
    return this.format();
  }
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Validation error with issue-level details
 */
export class ValidationError extends StrataError {
  /** Individual validation issues */
  readonly issues: ValidationIssue[];

  constructor(
    issues: ValidationIssue[],
    code: ErrorCode = 'STRATA_V600',
    context?: Record<string, unknown>
  ) {
    const message = issues.map((e) => (e.path ? `${e.path}: ${e.message}` : e.message)).join('; ');

    super({
      code,
      message: `${getErrorInfo(code).message}: ${message}`,
      context: { ...context, issues },
    });

    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Path of the offending value, e.g. 'fields.value' */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * A referenced resource does not exist
 */
export class NotFoundError extends StrataError {
  constructor(
    code: ErrorCode = 'STRATA_N100',
    message?: string,
    context?: Record<string, unknown>
  ) {
    super({ code, message, context });
    this.name = 'NotFoundError';
  }
}

/**
 * No shard is registered under the given ID
 */
export class ShardNotFoundError extends NotFoundError {
  readonly shardId: bigint;

  constructor(shardId: bigint) {
    super('STRATA_N101', `shard not found: ${shardId}`, { shardId: shardId.toString() });
    this.name = 'ShardNotFoundError';
    this.shardId = shardId;
  }
}

/**
 * A resource with the same identity already exists
 */
export class AlreadyExistsError extends StrataError {
  constructor(
    code: ErrorCode = 'STRATA_A200',
    message?: string,
    context?: Record<string, unknown>
  ) {
    super({ code, message, context });
    this.name = 'AlreadyExistsError';
  }
}

export class ShardExistsError extends AlreadyExistsError {
  readonly shardId: bigint;

  constructor(shardId: bigint) {
    super('STRATA_A201', `shard already exists: ${shardId}`, { shardId: shardId.toString() });
    this.name = 'ShardExistsError';
    this.shardId = shardId;
  }
}

/**
 * Persistence read/write failure
 */
export class StorageError extends StrataError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'StorageError';
  }
}

/**
 * The store was used before open() or after close()
 */
export class StoreClosedError extends StorageError {
  constructor(path: string) {
    super('STRATA_S301', `store is closed: ${path}`, { path });
    this.name = 'StoreClosedError';
  }
}

/**
 * An authorization rule rejected a statement
 */
export class AuthorizationError extends StrataError {
  readonly user: string | null;
  readonly database: string;

  constructor(message: string, user: string | null, database: string, statement?: string) {
    super({
      code: 'STRATA_U400',
      message,
      context: { user, database, ...(statement ? { statement } : {}) },
    });
    this.name = 'AuthorizationError';
    this.user = user;
    this.database = database;
  }
}

export class AuthenticationError extends StrataError {
  constructor(username: string) {
    super({ code: 'STRATA_U401', message: 'authentication failed', context: { username } });
    this.name = 'AuthenticationError';
  }
}

/**
 * Statement parse or execution error
 */
export class QueryError extends StrataError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super({ code, message, context, cause });
    this.name = 'QueryError';
  }
}

/**
 * Helper function to ensure errors are StrataErrors
 */
export function ensureStrataError(
  error: unknown,
  defaultCode: ErrorCode = 'STRATA_X900'
): StrataError {
  if (StrataError.isStrataError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return StrataError.wrap(error, defaultCode);
  }

  return new StrataError({
    code: defaultCode,
    message: String(error),
  });
}
