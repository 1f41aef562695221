/**
 * Executes statements that only read or change metadata: databases,
 * retention policies, users and privileges.
 */

import { QueryError } from '@strata/core';
import { formatStatement, type Row, type Statement } from '@strata/influxql';
import type { MetaStoreAdmin, RetentionPolicyInfo, ShardGroupInfo } from './types.js';

/**
 * Executor the query engine delegates metadata statements to
 */
export interface MetaStatementExecutor {
  executeStatement(stmt: Statement): Promise<Row[]>;
}

/**
 * Render a nanosecond duration the way retention policies are displayed,
 * e.g. `168h0m0s`; `0` means infinite.
 */
export function formatDuration(ns: bigint): string {
  if (ns === 0n) return '0';
  const totalSeconds = ns / 1_000_000_000n;
  const hours = totalSeconds / 3600n;
  const minutes = (totalSeconds % 3600n) / 60n;
  const seconds = totalSeconds % 60n;
  return `${hours}h${minutes}m${seconds}s`;
}

/**
 * Shard groups of a policy overlapping the inclusive nanosecond range `[min, max]`
 */
export function shardGroupsByTimeRange(
  rp: RetentionPolicyInfo,
  min: bigint,
  max: bigint
): ShardGroupInfo[] {
  return rp.shardGroups.filter((g) => {
    const start = BigInt(g.startTime.getTime()) * 1_000_000n;
    const end = BigInt(g.endTime.getTime()) * 1_000_000n;
    return start <= max && end > min;
  });
}

export class StatementExecutor implements MetaStatementExecutor {
  constructor(private readonly store: MetaStoreAdmin) {}

  async executeStatement(stmt: Statement): Promise<Row[]> {
    switch (stmt.kind) {
      case 'show_databases': {
        const dbs = await this.store.databases();
        return [{ name: 'databases', columns: ['name'], values: dbs.map((db) => [db.name]) }];
      }
      case 'create_database':
        await this.store.createDatabase(stmt.name, { ifNotExists: stmt.ifNotExists });
        return [];
      case 'drop_database':
        await this.store.dropDatabase(stmt.name);
        return [];
      case 'show_retention_policies': {
        const db = await this.store.database(stmt.database);
        if (!db) {
          throw new QueryError('STRATA_Q500', `database not found: ${stmt.database}`, {
            database: stmt.database,
          });
        }
        return [
          {
            name: '',
            columns: ['name', 'duration', 'replicaN', 'default'],
            values: db.retentionPolicies.map((rp) => [
              rp.name,
              formatDuration(rp.duration),
              rp.replicaN,
              rp.name === db.defaultRetentionPolicy,
            ]),
          },
        ];
      }
      case 'create_user':
        await this.store.createUser(stmt.name, stmt.password, stmt.admin);
        return [];
      case 'drop_user':
        await this.store.dropUser(stmt.name);
        return [];
      case 'show_users': {
        const users = await this.store.users();
        return [{ name: '', columns: ['user', 'admin'], values: users.map((u) => [u.name, u.admin]) }];
      }
      case 'grant':
        if (stmt.database) {
          await this.store.setPrivilege(stmt.user, stmt.database, stmt.privilege);
        } else {
          await this.store.setAdmin(stmt.user, true);
        }
        return [];
      case 'revoke':
        if (stmt.database) {
          await this.store.setPrivilege(stmt.user, stmt.database, 'NO_PRIVILEGES');
        } else {
          await this.store.setAdmin(stmt.user, false);
        }
        return [];
      default:
        throw new QueryError('STRATA_Q502', `not a metadata statement: ${formatStatement(stmt)}`, {
          kind: stmt.kind,
        });
    }
  }
}

export function createStatementExecutor(store: MetaStoreAdmin): StatementExecutor {
  return new StatementExecutor(store);
}
