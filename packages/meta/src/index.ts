/**
 * @strata/meta - Cluster metadata contract and in-memory implementation
 *
 * @example
 * ```typescript
 * import { createMemoryMetaStore } from '@strata/meta';
 *
 * const meta = createMemoryMetaStore();
 * await meta.createDatabase('telemetry');
 * const group = await meta.createShardGroup('telemetry', '', new Date());
 * await store.createShard('telemetry', 'default', group.shards[0].id);
 * ```
 */

export type {
  DatabaseInfo,
  MetaStore,
  MetaStoreAdmin,
  RetentionPolicyInfo,
  RetentionPolicySpec,
  ShardGroupInfo,
  ShardInfo,
  UserInfo,
} from './types.js';

export {
  DEFAULT_RETENTION_POLICY,
  MemoryMetaStore,
  createMemoryMetaStore,
  defaultShardGroupDuration,
  type MemoryMetaStoreConfig,
} from './memory-meta-store.js';

export {
  StatementExecutor,
  createStatementExecutor,
  formatDuration,
  shardGroupsByTimeRange,
  type MetaStatementExecutor,
} from './statement-executor.js';

export { hashPassword, userAuthorizes, verifyPassword } from './users.js';
