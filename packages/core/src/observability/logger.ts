/**
 * Structured logging for Strata packages.
 *
 * Every entry carries a module path such as `tsdb:store:shard`, the fields
 * bound to the logger (a shard's id, database and retention policy) and the
 * call's own context. Context reaches handlers JSON-safe: bigint ids become
 * decimal strings and errors become their name, code and message.
 *
 * @module observability/logger
 */

import { StrataError } from '../errors/strata-error.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: LogContext;
}

export type LogHandler = (entry: LogEntry) => void;

export interface StrataLoggerConfig {
  /** Minimum level written (default: 'info') */
  readonly level?: LogLevel;
  readonly module?: string;
  /** Fields added to every entry of this logger and its children */
  readonly bindings?: LogContext;
  /** Receives every entry at or above `level` */
  readonly handler?: LogHandler;
  /** Without a handler, write entries as JSON lines to the console */
  readonly json?: boolean;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_DEPTH = 6;

/**
 * Turn a context value into plain JSON data
 */
export function serializeLogValue(value: unknown, depth = 0, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'function' || typeof value === 'symbol') return String(value);
  if (value === null || typeof value !== 'object') return value;
  if (value instanceof Date) return value.toISOString();

  if (seen.has(value)) return '[Circular]';
  if (depth >= MAX_DEPTH) return '[Truncated]';
  seen.add(value);
  try {
    return serializeObject(value, depth, seen);
  } finally {
    seen.delete(value);
  }
}

function serializeObject(value: object, depth: number, seen: WeakSet<object>): unknown {
  const nested = (item: unknown): unknown => serializeLogValue(item, depth + 1, seen);

  if (value instanceof StrataError) {
    return {
      name: value.name,
      code: value.code,
      message: value.message,
      ...(Object.keys(value.context).length > 0 ? { context: nested(value.context) } : {}),
    };
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      ...(value.cause !== undefined ? { cause: nested(value.cause) } : {}),
    };
  }
  if (Array.isArray(value)) return value.map(nested);
  if (value instanceof Map) return nested(Object.fromEntries(value));

  const result: LogContext = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = nested(item);
  }
  return result;
}

/**
 * @example
 * ```typescript
 * const log = createLogger({ module: 'tsdb', level: 'debug', json: true });
 * const shardLog = log.child('shard', { shardId: 7n, database: 'telemetry' });
 *
 * shardLog.info('shard opened', { series: 12 });
 * // {"level":"info","module":"tsdb:shard","context":{"shardId":"7","database":"telemetry","series":12},...}
 *
 * const end = shardLog.time('snapshot');
 * await shard.snapshot();
 * end({ bytes: 4096 }); // debug "snapshot completed" with durationMs
 * ```
 */
export class StrataLogger {
  readonly module: string;
  private readonly level: LogLevel;
  private readonly bindings: LogContext;
  private readonly handler: LogHandler | undefined;
  private readonly json: boolean;

  constructor(config: StrataLoggerConfig = {}) {
    this.module = config.module ?? 'strata';
    this.level = config.level ?? 'info';
    this.bindings = config.bindings ?? {};
    this.handler = config.handler;
    this.json = config.json ?? false;
  }

  /**
   * Logger for a sub-module, e.g. `tsdb` → `tsdb:store`. `bindings` are
   * added to the parent's.
   */
  child(subModule: string, bindings: LogContext = {}): StrataLogger {
    return new StrataLogger({
      level: this.level,
      module: `${this.module}:${subModule}`,
      bindings: { ...this.bindings, ...bindings },
      handler: this.handler,
      json: this.json,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /** Log a failure; `error` is recorded under the `error` key */
  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, error === undefined ? context : { ...context, error });
  }

  /**
   * Start a timer. The returned function logs `<operation> completed` at
   * debug level with `durationMs`.
   */
  time(operation: string): (context?: LogContext) => void {
    const start = performance.now();
    return (context?: LogContext) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.log('debug', `${operation} completed`, { ...context, durationMs });
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;
    if (!this.handler && !this.json) return;

    const merged = { ...this.bindings, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(Object.keys(merged).length > 0 ? { context: toContext(serializeLogValue(merged)) } : {}),
    };

    if (this.handler) {
      this.handler(entry);
      return;
    }

    const write = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    write(JSON.stringify(entry));
  }
}

function toContext(value: unknown): LogContext {
  const context: LogContext = {};
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    Object.assign(context, value);
  }
  return context;
}

export function createLogger(config?: StrataLoggerConfig): StrataLogger {
  return new StrataLogger(config);
}
