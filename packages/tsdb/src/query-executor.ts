/**
 * QueryExecutor - authorizes parsed statements and runs them against the
 * store and the MetaStore, streaming the results.
 *
 * @example
 * ```typescript
 * const executor = new QueryExecutor(store);
 * executor.metaStore = meta;
 *
 * executor
 *   .executeQuery(mustParseQuery('SELECT * FROM cpu'), 'telemetry', 1000)
 *   .subscribe({
 *     next: (result) => console.log(result.statementId, result.series),
 *     complete: () => console.log('done'),
 *   });
 * ```
 */

import {
  AuthorizationError,
  NotFoundError,
  QueryError,
  createLogger,
  ensureStrataError,
  resolveExecutorConfig,
  type QueryExecutorConfig,
  type QueryExecutorOptions,
  type StrataLogger,
} from '@strata/core';
import {
  formatStatement,
  requiredPrivileges,
  type DropMeasurementStatement,
  type DropSeriesStatement,
  type Measurement,
  type Query,
  type Result,
  type Row,
  type RowValue,
  type SelectStatement,
  type ShowFieldKeysStatement,
  type ShowMeasurementsStatement,
  type ShowSeriesStatement,
  type ShowTagKeysStatement,
  type ShowTagValuesStatement,
  type Statement,
} from '@strata/influxql';
import {
  shardGroupsByTimeRange,
  userAuthorizes,
  type MetaStatementExecutor,
  type MetaStore,
  type UserInfo,
} from '@strata/meta';
import { Observable, type Subscriber } from 'rxjs';
import { matchesCondition, tagFilter, timeRange } from './condition.js';
import { ownValue, type Fields, type Tags } from './point.js';
import type { Shard } from './shard.js';
import type { Store } from './store.js';
import { formatRFC3339Nano, nowNanos } from './time.js';

export interface ExecuteQueryOptions {
  /** Caller identity; checked when `requireAuthentication` is enabled */
  user?: UserInfo | null;
  /** Aborting stops execution and errors the stream */
  signal?: AbortSignal;
}

interface SelectedSeries {
  name: string;
  tags: Tags;
  rows: { time: bigint; fields: Readonly<Fields> }[];
}

export class QueryExecutor {
  /** Store the statements run against; may be replaced, e.g. after reopening */
  store: Store;
  /** Metadata source for topology and users */
  metaStore: MetaStore | undefined;
  /** Handles database and user management statements */
  metaStatementExecutor: MetaStatementExecutor | undefined;

  private readonly config: QueryExecutorConfig;
  private readonly logger: StrataLogger;

  constructor(store: Store, options: QueryExecutorOptions = {}) {
    this.store = store;
    this.config = resolveExecutorConfig(options);
    this.logger = (this.config.logger ?? createLogger({ module: 'tsdb' })).child('executor');
  }

  /**
   * Check that `user` may run every statement of `query`.
   *
   * While no users exist, a query consisting of a single
   * `CREATE USER ... WITH ALL PRIVILEGES` is allowed without a user. Otherwise
   * a user is required; admins may run anything and other users need the
   * privileges each statement requires on its database (or `database`).
   */
  async authorize(user: UserInfo | null, query: Query, database: string): Promise<void> {
    const meta = this.requireMetaStore();
    const [first] = query.statements;

    if (
      query.statements.length === 1 &&
      first?.kind === 'create_user' &&
      first.admin &&
      (await meta.userCount()) === 0
    ) {
      return;
    }

    if (!user) {
      throw this.denied('no user provided', null, database, first);
    }
    if (user.admin) return;

    for (const stmt of query.statements) {
      for (const required of requiredPrivileges(stmt)) {
        if (required.admin) {
          throw this.denied(
            `${user.name} not authorized to execute '${formatStatement(stmt)}': requires admin privilege`,
            user.name,
            database,
            stmt
          );
        }
        const db = required.database || database;
        if (!userAuthorizes(user, required.privilege, db)) {
          throw this.denied(
            `${user.name} not authorized to execute '${formatStatement(stmt)}': requires ${required.privilege} on ${db}`,
            user.name,
            db,
            stmt
          );
        }
      }
    }
  }

  /**
   * Run every statement of `query` in order.
   *
   * Each statement produces one or more Results carrying its index as
   * `statementId`; with `chunkSize > 0` no Result holds more than `chunkSize`
   * rows. A failing statement produces a Result with `error` and the next
   * statement still runs. The Observable completes after the last statement;
   * unsubscribing stops execution.
   */
  executeQuery(
    query: Query,
    database: string,
    chunkSize: number,
    options: ExecuteQueryOptions = {}
  ): Observable<Result> {
    return new Observable<Result>((subscriber) => {
      const controller = new AbortController();
      const onAbort = (): void => controller.abort();
      if (options.signal?.aborted) controller.abort();
      options.signal?.addEventListener('abort', onAbort, { once: true });

      this.run(query, database, chunkSize, options, controller.signal, subscriber)
        .then(() => subscriber.complete())
        .catch((err: unknown) => subscriber.error(err));

      return () => {
        options.signal?.removeEventListener('abort', onAbort);
        controller.abort();
      };
    });
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async run(
    query: Query,
    database: string,
    chunkSize: number,
    options: ExecuteQueryOptions,
    signal: AbortSignal,
    subscriber: Subscriber<Result>
  ): Promise<void> {
    const done = this.logger.time('query');

    for (const [statementId, stmt] of query.statements.entries()) {
      if (subscriber.closed) return;
      if (signal.aborted) {
        throw new QueryError('STRATA_Q500', 'query aborted', { statementId });
      }

      let series: Row[];
      try {
        if (this.config.requireAuthentication) {
          await this.authorize(options.user ?? null, { statements: [stmt] }, database);
        }
        series = await this.executeStatement(stmt, database, signal);
      } catch (err) {
        const error = ensureStrataError(err);
        this.logger.warn('statement failed', {
          statementId,
          statement: formatStatement(stmt),
          error,
        });
        subscriber.next({ statementId, series: [], error });
        continue;
      }

      for (const chunk of chunkRows(series, chunkSize)) {
        if (subscriber.closed) return;
        subscriber.next({ statementId, series: chunk });
      }
    }

    done({ database, statements: query.statements.length });
  }

  private executeStatement(stmt: Statement, database: string, signal: AbortSignal): Promise<Row[]> {
    switch (stmt.kind) {
      case 'select':
        return this.executeSelect(stmt, database, signal);
      case 'drop_series':
        return this.executeDropSeries(stmt, database);
      case 'drop_measurement':
        return this.executeDropMeasurement(stmt, database);
      case 'show_measurements':
        return this.executeShowMeasurements(stmt, database);
      case 'show_series':
        return this.executeShowSeries(stmt, database);
      case 'show_tag_keys':
        return this.executeShowTagKeys(stmt, database);
      case 'show_tag_values':
        return this.executeShowTagValues(stmt, database);
      case 'show_field_keys':
        return this.executeShowFieldKeys(stmt, database);
      default:
        return this.executeMetaStatement(stmt);
    }
  }

  private async executeSelect(stmt: SelectStatement, database: string, signal: AbortSignal): Promise<Row[]> {
    const now = nowNanos();
    const range = timeRange(stmt.condition, now);
    const rows: Row[] = [];
    let total = 0;

    for (const source of stmt.sources) {
      const shards = await this.shardsForRange(source, database, range.min, range.max);
      if (signal.aborted) throw new QueryError('STRATA_Q500', 'query aborted');

      const fieldKeys = unionInOrder(shards.map((s) => s.fieldKeys(source.name)));
      const columns = selectColumns(stmt, fieldKeys);

      for (const series of this.collectSeries(shards, source.name, range.min, range.max)) {
        const values: RowValue[][] = [];
        for (const record of series.rows) {
          if (!matchesCondition(stmt.condition, { time: record.time, tags: series.tags, fields: record.fields }, now)) {
            continue;
          }
          const cells = columns.map(
            ({ source: name }) => ownValue(record.fields, name) ?? ownValue(series.tags, name) ?? null
          );
          if (cells.every((cell) => cell === null)) continue;
          values.push([formatRFC3339Nano(record.time), ...cells]);
        }

        const limited = values.slice(stmt.offset, stmt.limit > 0 ? stmt.offset + stmt.limit : undefined);
        if (limited.length === 0) continue;

        total += limited.length;
        if (this.config.maxSelectPoints > 0 && total > this.config.maxSelectPoints) {
          throw new QueryError(
            'STRATA_Q503',
            `select produced more than ${this.config.maxSelectPoints} rows`,
            { maxSelectPoints: this.config.maxSelectPoints }
          );
        }

        rows.push({
          name: series.name,
          ...(Object.keys(series.tags).length > 0 ? { tags: { ...series.tags } } : {}),
          columns: ['time', ...columns.map((c) => c.name)],
          values: limited,
        });
      }
    }

    return rows;
  }

  /** Merge each series' rows across shards, ordered by time */
  private collectSeries(shards: readonly Shard[], measurement: string, min: bigint, max: bigint): SelectedSeries[] {
    const byKey = new Map<string, SelectedSeries>();
    for (const shard of shards) {
      for (const scanned of shard.scan(measurement, { start: min, end: max })) {
        let series = byKey.get(scanned.key);
        if (!series) {
          series = { name: measurement, tags: { ...scanned.tags }, rows: [] };
          byKey.set(scanned.key, series);
        }
        series.rows.push(...scanned.rows);
      }
    }

    const result = [...byKey.values()];
    if (shards.length > 1) {
      for (const series of result) {
        series.rows.sort((a, b) => (a.time < b.time ? -1 : a.time > b.time ? 1 : 0));
      }
    }
    return result;
  }

  private async executeDropSeries(stmt: DropSeriesStatement, database: string): Promise<Row[]> {
    const tags = tagFilter(stmt.condition);
    const filter = Object.keys(tags).length > 0 ? tags : undefined;

    if (stmt.sources.length === 0) {
      for (const shard of await this.shardsForDatabase(database)) {
        for (const measurement of shard.measurements()) {
          await shard.dropSeries(measurement, filter);
        }
      }
      return [];
    }

    for (const source of stmt.sources) {
      const shards = await this.shardsForDatabase(source.database ?? database, source.retentionPolicy);
      let dropped = 0;
      for (const shard of shards) {
        dropped += await shard.dropSeries(source.name, filter);
      }
      this.logger.debug('series dropped', { measurement: source.name, dropped });
    }
    return [];
  }

  private async executeDropMeasurement(stmt: DropMeasurementStatement, database: string): Promise<Row[]> {
    let found = false;
    for (const shard of await this.shardsForDatabase(database)) {
      if (await shard.dropMeasurement(stmt.name)) found = true;
    }
    if (!found) {
      throw new NotFoundError('STRATA_N100', `measurement not found: ${stmt.name}`, {
        measurement: stmt.name,
      });
    }
    return [];
  }

  private async executeShowMeasurements(stmt: ShowMeasurementsStatement, database: string): Promise<Row[]> {
    const shards = await this.shardsForDatabase(stmt.database ?? database);
    const names = unionSorted(shards.map((s) => s.measurements()));
    if (names.length === 0) return [];
    return [{ name: 'measurements', columns: ['name'], values: names.map((n) => [n]) }];
  }

  private async executeShowSeries(stmt: ShowSeriesStatement, database: string): Promise<Row[]> {
    const shards = await this.shardsForDatabase(stmt.database ?? database);
    const rows: Row[] = [];

    for (const measurement of this.measurementsOf(shards, stmt.sources)) {
      const tagKeys = unionSorted(shards.map((s) => s.tagKeys(measurement)));
      const seen = new Set<string>();
      const values: RowValue[][] = [];
      for (const shard of shards) {
        for (const series of shard.series(measurement)) {
          if (seen.has(series.key)) continue;
          seen.add(series.key);
          values.push([series.key, ...tagKeys.map((k) => ownValue(series.tags, k) ?? '')]);
        }
      }
      if (values.length > 0) {
        rows.push({ name: measurement, columns: ['_key', ...tagKeys], values });
      }
    }
    return rows;
  }

  /** Tag keys come from the catalogue, so they outlive dropped series */
  private async executeShowTagKeys(stmt: ShowTagKeysStatement, database: string): Promise<Row[]> {
    const shards = await this.shardsForDatabase(stmt.database ?? database);
    return this.measurementsOf(shards, stmt.sources).map((measurement) => ({
      name: measurement,
      columns: ['tagKey'],
      values: unionSorted(shards.map((s) => s.tagKeys(measurement))).map((k) => [k]),
    }));
  }

  private async executeShowTagValues(stmt: ShowTagValuesStatement, database: string): Promise<Row[]> {
    const shards = await this.shardsForDatabase(stmt.database ?? database);
    const rows: Row[] = [];

    for (const measurement of this.measurementsOf(shards, stmt.sources)) {
      const values: RowValue[][] = [];
      for (const key of stmt.tagKeys) {
        for (const value of unionSorted(shards.map((s) => s.tagValues(measurement, key)))) {
          values.push([key, value]);
        }
      }
      if (values.length > 0) {
        rows.push({ name: measurement, columns: ['key', 'value'], values });
      }
    }
    return rows;
  }

  private async executeShowFieldKeys(stmt: ShowFieldKeysStatement, database: string): Promise<Row[]> {
    const shards = await this.shardsForDatabase(stmt.database ?? database);
    return this.measurementsOf(shards, stmt.sources).map((measurement) => ({
      name: measurement,
      columns: ['fieldKey'],
      values: unionInOrder(shards.map((s) => s.fieldKeys(measurement))).map((k) => [k]),
    }));
  }

  private executeMetaStatement(stmt: Statement): Promise<Row[]> {
    if (!this.metaStatementExecutor) {
      return Promise.reject(
        new QueryError('STRATA_Q502', `no executor configured for '${formatStatement(stmt)}'`, {
          kind: stmt.kind,
        })
      );
    }
    return this.metaStatementExecutor.executeStatement(stmt);
  }

  /** Measurements named by `sources`, or every measurement, that exist in the shards */
  private measurementsOf(shards: readonly Shard[], sources: readonly Measurement[]): string[] {
    if (sources.length === 0) {
      return unionSorted(shards.map((s) => s.measurements()));
    }
    const names = [...new Set(sources.map((m) => m.name))];
    return names.filter((name) => shards.some((s) => s.hasMeasurement(name)));
  }

  /** Shards of the shard groups overlapping `[min, max]` */
  private async shardsForRange(source: Measurement, database: string, min: bigint, max: bigint): Promise<Shard[]> {
    const db = this.requireDatabaseName(source.database ?? database);
    const meta = this.requireMetaStore();
    const rp = await meta.retentionPolicy(db, source.retentionPolicy ?? '');
    if (!rp) {
      throw new NotFoundError('STRATA_N103', `retention policy not found: ${source.retentionPolicy ?? ''}`, {
        database: db,
      });
    }

    const groups = shardGroupsByTimeRange(rp, min, max);
    return this.store.shardsFor(groups.flatMap((g) => g.shards.map((s) => s.id)));
  }

  /** Every shard of a database, optionally limited to one retention policy */
  private async shardsForDatabase(database: string, retentionPolicy?: string): Promise<Shard[]> {
    const name = this.requireDatabaseName(database);
    const info = await this.requireMetaStore().database(name);
    if (!info) {
      throw new NotFoundError('STRATA_N102', `database not found: ${name}`, { database: name });
    }

    const ids = info.retentionPolicies
      .filter((rp) => !retentionPolicy || rp.name === retentionPolicy)
      .flatMap((rp) => rp.shardGroups.flatMap((g) => g.shards.map((s) => s.id)));
    return this.store.shardsFor(ids);
  }

  private requireDatabaseName(database: string): string {
    if (!database) {
      throw new QueryError('STRATA_Q500', 'database name required');
    }
    return database;
  }

  private requireMetaStore(): MetaStore {
    if (!this.metaStore) {
      throw new QueryError('STRATA_Q500', 'no meta store configured');
    }
    return this.metaStore;
  }

  private denied(
    message: string,
    user: string | null,
    database: string,
    stmt: Statement | undefined
  ): AuthorizationError {
    this.logger.warn('authorization denied', { user, database, reason: message });
    return new AuthorizationError(message, user, database, stmt ? formatStatement(stmt) : undefined);
  }
}

export function createQueryExecutor(store: Store, options?: QueryExecutorOptions): QueryExecutor {
  return new QueryExecutor(store, options);
}

interface Column {
  /** Output column name */
  name: string;
  /** Field or tag the value is read from */
  source: string;
}

function selectColumns(stmt: SelectStatement, fieldKeys: readonly string[]): Column[] {
  const columns: Column[] = [];
  for (const field of stmt.fields) {
    if (field.type === 'wildcard') {
      columns.push(...fieldKeys.map((name) => ({ name, source: name })));
    } else if (field.name.toLowerCase() !== 'time') {
      columns.push({ name: field.alias ?? field.name, source: field.name });
    }
  }
  return columns;
}

/**
 * Split rows into Results of at most `chunkSize` values. A row is split
 * across chunks when needed; `chunkSize <= 0` disables chunking.
 */
export function chunkRows(rows: readonly Row[], chunkSize: number): Row[][] {
  if (chunkSize <= 0 || rows.length === 0) return [[...rows]];

  const chunks: Row[][] = [];
  let current: Row[] = [];
  let count = 0;

  for (const row of rows) {
    if (row.values.length === 0) {
      current.push(row);
      continue;
    }
    let offset = 0;
    while (offset < row.values.length) {
      const take = Math.min(chunkSize - count, row.values.length - offset);
      current.push({ ...row, values: row.values.slice(offset, offset + take) });
      offset += take;
      count += take;
      if (count === chunkSize) {
        chunks.push(current);
        current = [];
        count = 0;
      }
    }
  }

  if (current.length > 0 || chunks.length === 0) chunks.push(current);
  return chunks;
}

function unionSorted(lists: readonly string[][]): string[] {
  return [...new Set(lists.flat())].sort();
}

function unionInOrder(lists: readonly string[][]): string[] {
  return [...new Set(lists.flat())];
}
