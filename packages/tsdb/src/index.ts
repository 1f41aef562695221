/**
 * @strata/tsdb - Time-series storage engine and query executor
 *
 * @example
 * ```typescript
 * import { Point, QueryExecutor, Store } from '@strata/tsdb';
 * import { mustParseQuery } from '@strata/influxql';
 *
 * const store = new Store('./data');
 * await store.open();
 * await store.createShard('telemetry', 'default', 1n);
 * await store.writeToShard(1n, [new Point('cpu', { host: 'a' }, { value: 1 }, new Date())]);
 *
 * const executor = new QueryExecutor(store);
 * executor.metaStore = meta;
 * executor.executeQuery(mustParseQuery('SELECT * FROM cpu'), 'telemetry', 0).subscribe(console.log);
 * ```
 */

export {
  Point,
  fieldValueSchema,
  ownValue,
  pointSchema,
  seriesKey,
  validatePoints,
  type FieldValue,
  type Fields,
  type Tags,
} from './point.js';

export { parsePoints } from './line-protocol.js';

export {
  MAX_TIME,
  MIN_TIME,
  dateToNanos,
  formatRFC3339Nano,
  nowNanos,
  parseRFC3339Nano,
  precisionMultiplier,
  type Precision,
} from './time.js';

export {
  ShardIndex,
  matchesTags,
  type ScanOptions,
  type ScanSeries,
  type Series,
  type SeriesRecord,
} from './series-index.js';

export { WriteAheadLog, type WALEntry, type WALRecord } from './wal.js';

export { SNAPSHOT_FILE, Shard, WAL_FILE, type ShardOptions } from './shard.js';

export { Store, createStore } from './store.js';

export { matchesCondition, tagFilter, timeRange, timeValue, type TimeRange } from './condition.js';

export {
  QueryExecutor,
  chunkRows,
  createQueryExecutor,
  type ExecuteQueryOptions,
} from './query-executor.js';
