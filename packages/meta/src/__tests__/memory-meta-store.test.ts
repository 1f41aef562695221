import { beforeEach, describe, expect, it } from 'vitest';
import { AlreadyExistsError, AuthenticationError, NotFoundError } from '@strata/core';

import { MemoryMetaStore, defaultShardGroupDuration } from '../memory-meta-store.js';
import { shardGroupsByTimeRange } from '../statement-executor.js';
import { hashPassword, userAuthorizes, verifyPassword } from '../users.js';

const HOUR_NS = 3_600_000_000_000n;

describe('MemoryMetaStore', () => {
  let meta: MemoryMetaStore;

  beforeEach(() => {
    meta = new MemoryMetaStore({ hashIterations: 1 });
  });

  describe('databases', () => {
    it('should create a database with a default retention policy', async () => {
      await meta.createDatabase('foo');
      const db = await meta.database('foo');
      expect(db?.defaultRetentionPolicy).toBe('default');
      expect(db?.retentionPolicies.map((rp) => rp.name)).toEqual(['default']);
      expect(await meta.database('missing')).toBeNull();
    });

    it('should reject duplicates unless ifNotExists is set', async () => {
      await meta.createDatabase('foo');
      await expect(meta.createDatabase('foo')).rejects.toBeInstanceOf(AlreadyExistsError);
      await expect(meta.createDatabase('foo', { ifNotExists: true })).resolves.toMatchObject({
        name: 'foo',
      });
    });

    it('should resolve the default policy for an empty name', async () => {
      await meta.createDatabase('foo');
      await meta.createRetentionPolicy('foo', { name: 'bar', duration: 48n * HOUR_NS }, true);
      const rp = await meta.retentionPolicy('foo', '');
      expect(rp?.name).toBe('bar');
      expect(rp?.shardGroupDuration).toBe(24n * HOUR_NS);
      expect(await meta.retentionPolicy('foo', 'nope')).toBeNull();
      await expect(meta.retentionPolicy('missing', '')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return copies of stored records', async () => {
      await meta.createDatabase('foo');
      const db = await meta.database('foo');
      db?.retentionPolicies.splice(0);
      expect((await meta.database('foo'))?.retentionPolicies).toHaveLength(1);
    });
  });

  describe('shard groups', () => {
    it('should align groups to the shard group duration and reuse them', async () => {
      await meta.createDatabase('foo');
      await meta.createRetentionPolicy('foo', { name: 'hourly', shardGroupDuration: HOUR_NS });

      const first = await meta.createShardGroup('foo', 'hourly', new Date('2024-01-01T10:15:00Z'));
      const again = await meta.createShardGroup('foo', 'hourly', new Date('2024-01-01T10:59:59Z'));
      const next = await meta.createShardGroup('foo', 'hourly', new Date('2024-01-01T11:00:00Z'));

      expect(first.startTime.toISOString()).toBe('2024-01-01T10:00:00.000Z');
      expect(first.endTime.toISOString()).toBe('2024-01-01T11:00:00.000Z');
      expect(again.id).toBe(first.id);
      expect(next.id).not.toBe(first.id);
      expect(next.shards[0]?.id).toBe(2n);

      const rp = await meta.retentionPolicy('foo', 'hourly');
      if (!rp) throw new Error('missing policy');
      const start = BigInt(Date.parse('2024-01-01T10:30:00Z')) * 1_000_000n;
      expect(shardGroupsByTimeRange(rp, start, start + HOUR_NS).map((g) => g.id)).toEqual([
        first.id,
        next.id,
      ]);
      expect(shardGroupsByTimeRange(rp, 0n, start - HOUR_NS)).toEqual([]);
    });

    it('should pick weekly groups for infinite retention', () => {
      expect(defaultShardGroupDuration(0n)).toBe(168n * HOUR_NS);
      expect(defaultShardGroupDuration(HOUR_NS)).toBe(HOUR_NS);
    });
  });

  describe('users', () => {
    it('should count users and detect admins', async () => {
      expect(await meta.userCount()).toBe(0);
      await meta.createUser('bob', 'test-password', false);
      expect(await meta.userCount()).toBe(1);
      expect(await meta.adminUserExists()).toBe(false);
      await meta.setAdmin('bob', true);
      expect(await meta.adminUserExists()).toBe(true);
    });

    it('should authenticate with the right password only', async () => {
      await meta.createUser('bob', 'test-password', false);
      await expect(meta.authenticate('bob', 'test-password')).resolves.toMatchObject({ name: 'bob' });
      await expect(meta.authenticate('bob', 'wrong')).rejects.toBeInstanceOf(AuthenticationError);
      await expect(meta.authenticate('nobody', 'x')).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('should grant privileges per database', async () => {
      await meta.createDatabase('foo');
      await meta.createUser('bob', 'test-password', false);
      await meta.setPrivilege('bob', 'foo', 'READ');
      const bob = await meta.user('bob');
      if (!bob) throw new Error('missing user');
      expect(userAuthorizes(bob, 'READ', 'foo')).toBe(true);
      expect(userAuthorizes(bob, 'WRITE', 'foo')).toBe(false);
      expect(userAuthorizes(bob, 'READ', 'other')).toBe(false);
      await expect(meta.setPrivilege('bob', 'missing', 'READ')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should drop users', async () => {
      await meta.createUser('bob', 'test-password', false);
      await meta.dropUser('bob');
      expect(await meta.user('bob')).toBeNull();
      await expect(meta.dropUser('bob')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('password hashing', () => {
    it('should verify hashes and reject malformed ones', () => {
      const hash = hashPassword('test-secret', 2);
      expect(hash.startsWith('pbkdf2-sha256$2$')).toBe(true);
      expect(verifyPassword('test-secret', hash)).toBe(true);
      expect(verifyPassword('other', hash)).toBe(false);
      expect(verifyPassword('test-secret', 'plain')).toBe(false);
    });

    it('should treat ALL as covering READ and WRITE', () => {
      const user = { name: 'a', hash: '', admin: false, privileges: new Map([['db', 'ALL' as const]]) };
      expect(userAuthorizes(user, 'READ', 'db')).toBe(true);
      expect(userAuthorizes(user, 'WRITE', 'db')).toBe(true);
    });
  });
});
