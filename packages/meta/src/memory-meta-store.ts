import {
  AlreadyExistsError,
  AuthenticationError,
  NotFoundError,
  createLogger,
  type StrataLogger,
} from '@strata/core';
import type { Privilege } from '@strata/influxql';
import type {
  DatabaseInfo,
  MetaStoreAdmin,
  RetentionPolicyInfo,
  RetentionPolicySpec,
  ShardGroupInfo,
  UserInfo,
} from './types.js';
import { hashPassword, verifyPassword } from './users.js';

/** Name of the retention policy created with every database */
export const DEFAULT_RETENTION_POLICY = 'default';

const DAY_NS = 86_400_000_000_000n;
const WEEK_NS = 7n * DAY_NS;

/**
 * Shard group width derived from the retention duration, mirroring the
 * usual time-series defaults: short policies get hourly groups, long or
 * infinite ones weekly groups.
 */
export function defaultShardGroupDuration(duration: bigint): bigint {
  if (duration === 0n || duration >= 180n * DAY_NS) return WEEK_NS;
  if (duration >= 2n * DAY_NS) return DAY_NS;
  return DAY_NS / 24n;
}

export interface MemoryMetaStoreConfig {
  logger?: StrataLogger;
  /** Iterations for password hashing; lower values speed up tests */
  hashIterations?: number;
}

/**
 * In-process MetaStore holding databases, retention policies, shard groups
 * and users. Lookups return copies so callers cannot mutate stored state.
 */
export class MemoryMetaStore implements MetaStoreAdmin {
  private readonly dbs = new Map<string, DatabaseInfo>();
  private readonly userRecords = new Map<string, UserInfo>();
  private readonly logger: StrataLogger;
  private readonly hashIterations: number | undefined;
  private nextShardGroupId = 1n;
  private nextShardId = 1n;

  constructor(config: MemoryMetaStoreConfig = {}) {
    this.logger = config.logger ?? createLogger({ module: 'meta' });
    this.hashIterations = config.hashIterations;
  }

  async database(name: string): Promise<DatabaseInfo | null> {
    const db = this.dbs.get(name);
    return db ? structuredClone(db) : null;
  }

  async databases(): Promise<DatabaseInfo[]> {
    return [...this.dbs.values()].map((db) => structuredClone(db));
  }

  async retentionPolicy(database: string, name: string): Promise<RetentionPolicyInfo | null> {
    const db = this.requireDatabase(database);
    const policyName = name || db.defaultRetentionPolicy;
    const rp = db.retentionPolicies.find((p) => p.name === policyName);
    return rp ? structuredClone(rp) : null;
  }

  async user(name: string): Promise<UserInfo | null> {
    const user = this.userRecords.get(name);
    return user ? structuredClone(user) : null;
  }

  async authenticate(username: string, password: string): Promise<UserInfo> {
    const user = this.userRecords.get(username);
    if (!user || !verifyPassword(password, user.hash)) {
      this.logger.warn('authentication failed', { username });
      throw new AuthenticationError(username);
    }
    return structuredClone(user);
  }

  async adminUserExists(): Promise<boolean> {
    return [...this.userRecords.values()].some((u) => u.admin);
  }

  async userCount(): Promise<number> {
    return this.userRecords.size;
  }

  async createDatabase(name: string, options: { ifNotExists?: boolean } = {}): Promise<DatabaseInfo> {
    const existing = this.dbs.get(name);
    if (existing) {
      if (options.ifNotExists) return structuredClone(existing);
      throw new AlreadyExistsError('STRATA_A202', `database already exists: ${name}`, { database: name });
    }

    const db: DatabaseInfo = {
      name,
      defaultRetentionPolicy: DEFAULT_RETENTION_POLICY,
      retentionPolicies: [
        {
          name: DEFAULT_RETENTION_POLICY,
          duration: 0n,
          replicaN: 1,
          shardGroupDuration: defaultShardGroupDuration(0n),
          shardGroups: [],
        },
      ],
    };
    this.dbs.set(name, db);
    this.logger.info('database created', { database: name });
    return structuredClone(db);
  }

  async dropDatabase(name: string): Promise<void> {
    this.requireDatabase(name);
    this.dbs.delete(name);
    this.logger.info('database dropped', { database: name });
  }

  async createRetentionPolicy(
    database: string,
    spec: RetentionPolicySpec,
    makeDefault = false
  ): Promise<RetentionPolicyInfo> {
    const db = this.requireDatabase(database);
    if (db.retentionPolicies.some((p) => p.name === spec.name)) {
      throw new AlreadyExistsError('STRATA_A200', `retention policy already exists: ${spec.name}`, {
        database,
        retentionPolicy: spec.name,
      });
    }

    const duration = spec.duration ?? 0n;
    const rp: RetentionPolicyInfo = {
      name: spec.name,
      duration,
      replicaN: spec.replicaN ?? 1,
      shardGroupDuration: spec.shardGroupDuration ?? defaultShardGroupDuration(duration),
      shardGroups: [],
    };
    db.retentionPolicies.push(rp);
    if (makeDefault) db.defaultRetentionPolicy = rp.name;
    return structuredClone(rp);
  }

  /**
   * Return the shard group covering `timestamp`, creating it (with one
   * shard) when none exists. Group boundaries align to the policy's shard
   * group duration.
   */
  async createShardGroup(database: string, policy: string, timestamp: Date): Promise<ShardGroupInfo> {
    const rp = this.requirePolicy(database, policy);
    const ns = BigInt(timestamp.getTime()) * 1_000_000n;
    const existing = rp.shardGroups.find(
      (g) => toNanos(g.startTime) <= ns && ns < toNanos(g.endTime)
    );
    if (existing) return structuredClone(existing);

    const width = rp.shardGroupDuration;
    const start = ns - (((ns % width) + width) % width);
    const group: ShardGroupInfo = {
      id: this.nextShardGroupId++,
      startTime: fromNanos(start),
      endTime: fromNanos(start + width),
      shards: [{ id: this.nextShardId++, ownerIds: [1n] }],
    };
    rp.shardGroups.push(group);
    rp.shardGroups.sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
    this.logger.debug('shard group created', {
      database,
      retentionPolicy: rp.name,
      shardGroupId: group.id,
    });
    return structuredClone(group);
  }

  async createUser(name: string, password: string, admin: boolean): Promise<UserInfo> {
    if (this.userRecords.has(name)) {
      throw new AlreadyExistsError('STRATA_A203', `user already exists: ${name}`, { user: name });
    }
    const user: UserInfo = {
      name,
      hash: hashPassword(password, this.hashIterations),
      admin,
      privileges: new Map(),
    };
    this.userRecords.set(name, user);
    this.logger.info('user created', { user: name, admin });
    return structuredClone(user);
  }

  async dropUser(name: string): Promise<void> {
    this.requireUser(name);
    this.userRecords.delete(name);
    this.logger.info('user dropped', { user: name });
  }

  async setPrivilege(username: string, database: string, privilege: Privilege): Promise<void> {
    const user = this.requireUser(username);
    this.requireDatabase(database);
    user.privileges.set(database, privilege);
  }

  async setAdmin(username: string, admin: boolean): Promise<void> {
    this.requireUser(username).admin = admin;
  }

  async users(): Promise<UserInfo[]> {
    return [...this.userRecords.values()]
      .map((u) => structuredClone(u))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  // ── Private ──────────────────────────────────────────────────────────

  private requireDatabase(name: string): DatabaseInfo {
    const db = this.dbs.get(name);
    if (!db) {
      throw new NotFoundError('STRATA_N102', `database not found: ${name}`, { database: name });
    }
    return db;
  }

  private requirePolicy(database: string, name: string): RetentionPolicyInfo {
    const db = this.requireDatabase(database);
    const policyName = name || db.defaultRetentionPolicy;
    const rp = db.retentionPolicies.find((p) => p.name === policyName);
    if (!rp) {
      throw new NotFoundError('STRATA_N103', `retention policy not found: ${policyName}`, {
        database,
        retentionPolicy: policyName,
      });
    }
    return rp;
  }

  private requireUser(name: string): UserInfo {
    const user = this.userRecords.get(name);
    if (!user) {
      throw new NotFoundError('STRATA_N104', `user not found: ${name}`, { user: name });
    }
    return user;
  }
}

function toNanos(date: Date): bigint {
  return BigInt(date.getTime()) * 1_000_000n;
}

function fromNanos(ns: bigint): Date {
  return new Date(Number(ns / 1_000_000n));
}

export function createMemoryMetaStore(config?: MemoryMetaStoreConfig): MemoryMetaStore {
  return new MemoryMetaStore(config);
}
