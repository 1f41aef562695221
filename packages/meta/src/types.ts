/**
 * Cluster metadata records and the MetaStore contract consumed by the
 * storage engine and query executor.
 */

import type { Privilege } from '@strata/influxql';

/**
 * A shard and the nodes that own it
 */
export interface ShardInfo {
  id: bigint;
  ownerIds: bigint[];
}

/**
 * A time range `[startTime, endTime)` mapped to one or more shards
 */
export interface ShardGroupInfo {
  id: bigint;
  startTime: Date;
  endTime: Date;
  shards: ShardInfo[];
}

export interface RetentionPolicyInfo {
  name: string;
  /** How long data is kept, in nanoseconds; 0 keeps data forever */
  duration: bigint;
  replicaN: number;
  /** Width of each shard group, in nanoseconds */
  shardGroupDuration: bigint;
  shardGroups: ShardGroupInfo[];
}

export interface DatabaseInfo {
  name: string;
  defaultRetentionPolicy: string;
  retentionPolicies: RetentionPolicyInfo[];
}

export interface UserInfo {
  name: string;
  /** Encoded password hash */
  hash: string;
  admin: boolean;
  /** Privilege per database name */
  privileges: Map<string, Privilege>;
}

/**
 * Read-only metadata surface used by the store and the query executor
 */
export interface MetaStore {
  /** Look up a database; resolves null when it does not exist */
  database(name: string): Promise<DatabaseInfo | null>;
  databases(): Promise<DatabaseInfo[]>;
  /**
   * Look up a retention policy. An empty name selects the database default.
   * Rejects with NotFoundError when the database does not exist.
   */
  retentionPolicy(database: string, name: string): Promise<RetentionPolicyInfo | null>;
  user(name: string): Promise<UserInfo | null>;
  /** Rejects with AuthenticationError on unknown users or wrong passwords */
  authenticate(username: string, password: string): Promise<UserInfo>;
  adminUserExists(): Promise<boolean>;
  userCount(): Promise<number>;
}

/**
 * Options for creating a retention policy
 */
export interface RetentionPolicySpec {
  name: string;
  duration?: bigint;
  replicaN?: number;
  shardGroupDuration?: bigint;
}

/**
 * Management surface behind user and database statements
 */
export interface MetaStoreAdmin extends MetaStore {
  createDatabase(name: string, options?: { ifNotExists?: boolean }): Promise<DatabaseInfo>;
  dropDatabase(name: string): Promise<void>;
  createRetentionPolicy(
    database: string,
    spec: RetentionPolicySpec,
    makeDefault?: boolean
  ): Promise<RetentionPolicyInfo>;
  createShardGroup(database: string, policy: string, timestamp: Date): Promise<ShardGroupInfo>;
  createUser(name: string, password: string, admin: boolean): Promise<UserInfo>;
  dropUser(name: string): Promise<void>;
  setPrivilege(username: string, database: string, privilege: Privilege): Promise<void>;
  setAdmin(username: string, admin: boolean): Promise<void>;
  users(): Promise<UserInfo[]>;
}
