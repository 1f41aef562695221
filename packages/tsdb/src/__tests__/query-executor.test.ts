import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { lastValueFrom, take, toArray } from 'rxjs';
import { AuthenticationError, AuthorizationError, createLogger, type LogEntry } from '@strata/core';
import {
  combineResults,
  marshalResults,
  mustParseQuery,
  type Privilege,
  type Result,
} from '@strata/influxql';
import {
  MemoryMetaStore,
  StatementExecutor,
  type DatabaseInfo,
  type MetaStore,
  type RetentionPolicyInfo,
  type UserInfo,
} from '@strata/meta';
import { Point } from '../point.js';
import { QueryExecutor, chunkRows } from '../query-executor.js';
import { Store } from '../store.js';

const HOUR_MS = 3_600_000;

/**
 * Database "foo" whose policy "bar" has a single shard group around the
 * current time holding shard 1
 */
class TestMetaStore implements MetaStore {
  constructor(public userCountValue = 0) {}

  async database(name: string): Promise<DatabaseInfo> {
    return { name, defaultRetentionPolicy: 'foo', retentionPolicies: [this.policy()] };
  }

  async databases(): Promise<DatabaseInfo[]> {
    return [await this.database('foo')];
  }

  async retentionPolicy(): Promise<RetentionPolicyInfo> {
    return this.policy();
  }

  async user(): Promise<UserInfo | null> {
    return null;
  }

  async authenticate(username: string): Promise<UserInfo> {
    throw new AuthenticationError(username);
  }

  async adminUserExists(): Promise<boolean> {
    return false;
  }

  async userCount(): Promise<number> {
    return this.userCountValue;
  }

  private policy(): RetentionPolicyInfo {
    const now = Date.now();
    return {
      name: 'bar',
      duration: 0n,
      replicaN: 1,
      shardGroupDuration: 7_200_000_000_000n,
      shardGroups: [
        {
          id: 1n,
          startTime: new Date(now - HOUR_MS),
          endTime: new Date(now + HOUR_MS),
          shards: [{ id: 1n, ownerIds: [1n] }],
        },
      ],
    };
  }
}

async function collect(executor: QueryExecutor, query: string, chunkSize = 20): Promise<Result[]> {
  return lastValueFrom(executor.executeQuery(mustParseQuery(query), 'foo', chunkSize).pipe(toArray()));
}

async function executeAndGetJSON(query: string, executor: QueryExecutor): Promise<string> {
  return marshalResults(await collect(executor, query));
}

function user(name: string, privileges: [string, Privilege][], admin = false): UserInfo {
  return { name, hash: '', admin, privileges: new Map(privileges) };
}

describe('QueryExecutor', () => {
  let tmpDir: string;
  let store: Store;
  let executor: QueryExecutor;

  const reopen = async (): Promise<void> => {
    await store.close();
    store = new Store(tmpDir);
    await store.open();
    executor.store = store;
  };

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'strata-executor-'));
    store = new Store(tmpDir, { syncWrites: false });
    await store.open();
    await store.createShard('foo', 'bar', 1n);

    executor = new QueryExecutor(store);
    executor.metaStore = new TestMetaStore();
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('select', () => {
    it('should return written points in time order and after reopening', async () => {
      const pt = new Point('cpu', { host: 'server' }, { value: 1.0 }, 1_000_000_002n);
      await store.writeToShard(1n, [pt]);
      pt.setTime(2_000_000_003n);
      await store.writeToShard(1n, [pt]);

      const expected =
        '[{"series":[{"name":"cpu","tags":{"host":"server"},"columns":["time","value"],"values":[["1970-01-01T00:00:01.000000002Z",1],["1970-01-01T00:00:02.000000003Z",1]]}]}]';
      expect(await executeAndGetJSON('select * from cpu', executor)).toBe(expected);

      await reopen();
      expect(await executeAndGetJSON('select * from cpu', executor)).toBe(expected);
    });

    it('should return an empty result for unknown measurements', async () => {
      expect(await executeAndGetJSON('select * from mem', executor)).toBe('[{}]');
    });

    it('should keep the last value written at a timestamp', async () => {
      await store.writeToShard(1n, [new Point('cpu', {}, { value: 1 }, 5n)]);
      await store.writeToShard(1n, [new Point('cpu', {}, { value: 2 }, 5n)]);

      expect(await executeAndGetJSON('select value from cpu', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["time","value"],"values":[["1970-01-01T00:00:00.000000005Z",2]]}]}]'
      );
    });

    it('should filter by tags and time', async () => {
      await store.writeToShard(1n, [
        new Point('cpu', { host: 'a' }, { value: 1 }, 1_000_000_000n),
        new Point('cpu', { host: 'a' }, { value: 2 }, 2_000_000_000n),
        new Point('cpu', { host: 'a' }, { value: 3 }, 3_000_000_000n),
        new Point('cpu', { host: 'b' }, { value: 4 }, 2_000_000_000n),
      ]);

      expect(
        await executeAndGetJSON(
          "select value from cpu where host = 'a' and time >= '1970-01-01T00:00:02Z'",
          executor
        )
      ).toBe(
        '[{"series":[{"name":"cpu","tags":{"host":"a"},"columns":["time","value"],"values":[["1970-01-01T00:00:02Z",2],["1970-01-01T00:00:03Z",3]]}]}]'
      );

      expect(await executeAndGetJSON('select value from cpu where value > 2 and time < 3s', executor)).toBe(
        '[{"series":[{"name":"cpu","tags":{"host":"b"},"columns":["time","value"],"values":[["1970-01-01T00:00:02Z",4]]}]}]'
      );
    });

    it('should apply aliases, limit and offset per series', async () => {
      await store.writeToShard(1n, [
        new Point('cpu', { host: 'a' }, { value: 1 }, 1n),
        new Point('cpu', { host: 'a' }, { value: 2 }, 2n),
        new Point('cpu', { host: 'a' }, { value: 3 }, 3n),
      ]);

      expect(await executeAndGetJSON('select value as v from cpu limit 1 offset 1', executor)).toBe(
        '[{"series":[{"name":"cpu","tags":{"host":"a"},"columns":["time","v"],"values":[["1970-01-01T00:00:00.000000002Z",2]]}]}]'
      );
    });

    it('should list wildcard fields in discovery order with nulls for missing values', async () => {
      await store.writeToShard(1n, [
        new Point('cpu', {}, { user: 1 }, 1n),
        new Point('cpu', {}, { system: 2 }, 2n),
      ]);

      expect(await executeAndGetJSON('select * from cpu', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["time","user","system"],"values":[["1970-01-01T00:00:00.000000001Z",1,null],["1970-01-01T00:00:00.000000002Z",null,2]]}]}]'
      );
    });

    it('should not resolve names through the object prototype', async () => {
      await store.writeToShard(1n, [new Point('cpu', { host: 'a' }, { value: 1 }, 1n)]);

      expect(await executeAndGetJSON('select "constructor" from cpu', executor)).toBe('[{}]');
      expect(await executeAndGetJSON("select value from cpu where \"toString\" = 'x'", executor)).toBe('[{}]');
      expect(await executeAndGetJSON('show tag values from cpu with key = "constructor"', executor)).toBe('[{}]');
    });

    it('should fail selects that exceed maxSelectPoints', async () => {
      const limited = new QueryExecutor(store, { maxSelectPoints: 1 });
      limited.metaStore = new TestMetaStore();
      await store.writeToShard(1n, [new Point('cpu', {}, { value: 1 }, 1n), new Point('cpu', {}, { value: 2 }, 2n)]);

      const [result] = await collect(limited, 'select * from cpu');
      expect(result?.error?.message).toBe('select produced more than 1 rows');
    });
  });

  describe('drop series', () => {
    it('should clear data but keep tag keys, also after reopening', async () => {
      const pt = new Point('cpu', { host: 'server' }, { value: 1.0 }, 1_000_000_002n);
      await store.writeToShard(1n, [pt]);

      expect(await executeAndGetJSON('select * from cpu', executor)).toBe(
        '[{"series":[{"name":"cpu","tags":{"host":"server"},"columns":["time","value"],"values":[["1970-01-01T00:00:01.000000002Z",1]]}]}]'
      );
      expect(await executeAndGetJSON('drop series from cpu', executor)).toBe('[{}]');

      const tagKeys = '[{"series":[{"name":"cpu","columns":["tagKey"],"values":[["host"]]}]}]';
      expect(await executeAndGetJSON('select * from cpu', executor)).toBe('[{}]');
      expect(await executeAndGetJSON('show tag keys from cpu', executor)).toBe(tagKeys);

      await reopen();
      expect(await executeAndGetJSON('select * from cpu', executor)).toBe('[{}]');
      expect(await executeAndGetJSON('show tag keys from cpu', executor)).toBe(tagKeys);
    });

    it('should drop only the series matching the condition', async () => {
      await store.writeToShard(1n, [
        new Point('cpu', { host: 'a' }, { value: 1 }, 1n),
        new Point('cpu', { host: 'b' }, { value: 2 }, 1n),
      ]);
      await collect(executor, "drop series from cpu where host = 'a'");

      expect(await executeAndGetJSON('show series from cpu', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["_key","host"],"values":[["cpu,host=b","b"]]}]}]'
      );
    });

    it('should reject conditions other than tag equality', async () => {
      const [result] = await collect(executor, 'drop series from cpu where value > 1');
      expect(result?.error?.message).toBe('only tag equality conditions joined by AND are supported here');
    });
  });

  describe('schema statements', () => {
    beforeEach(async () => {
      await store.writeToShard(1n, [
        new Point('cpu', { host: 'a', region: 'east' }, { value: 1, idle: 2 }, 1n),
        new Point('cpu', { host: 'b', region: 'east' }, { value: 3 }, 1n),
        new Point('mem', {}, { free: 10 }, 1n),
      ]);
    });

    it('should show measurements', async () => {
      expect(await executeAndGetJSON('show measurements', executor)).toBe(
        '[{"series":[{"name":"measurements","columns":["name"],"values":[["cpu"],["mem"]]}]}]'
      );
    });

    it('should show tag keys per measurement', async () => {
      expect(await executeAndGetJSON('show tag keys', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["tagKey"],"values":[["host"],["region"]]},{"name":"mem","columns":["tagKey"]}]}]'
      );
    });

    it('should show tag values for the requested keys', async () => {
      expect(await executeAndGetJSON('show tag values from cpu with key in (host, region)', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["key","value"],"values":[["host","a"],["host","b"],["region","east"]]}]}]'
      );
    });

    it('should show field keys in discovery order', async () => {
      expect(await executeAndGetJSON('show field keys from cpu', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["fieldKey"],"values":[["value"],["idle"]]}]}]'
      );
    });

    it('should drop a measurement with its catalogue', async () => {
      expect(await executeAndGetJSON('drop measurement mem', executor)).toBe('[{}]');
      expect(await executeAndGetJSON('show tag keys from mem', executor)).toBe('[{}]');
      expect(await executeAndGetJSON('drop measurement mem', executor)).toBe(
        '[{"error":"measurement not found: mem"}]'
      );
    });
  });

  describe('result streaming', () => {
    beforeEach(async () => {
      const points: Point[] = [];
      for (let i = 1n; i <= 5n; i++) points.push(new Point('cpu', { host: 'a' }, { value: Number(i) }, i));
      points.push(new Point('cpu', { host: 'b' }, { value: 6 }, 1n));
      points.push(new Point('cpu', { host: 'b' }, { value: 7 }, 2n));
      await store.writeToShard(1n, points);
    });

    it('should split rows into chunks that concatenate to the full result', async () => {
      const chunked = await collect(executor, 'select * from cpu', 3);
      expect(chunked.map((r) => r.statementId)).toEqual([0, 0, 0]);
      expect(chunked.map((r) => r.series.map((s) => s.values.length))).toEqual([[3], [2, 1], [1]]);

      const whole = await collect(executor, 'select * from cpu', 0);
      expect(whole).toHaveLength(1);
      expect(marshalResults(combineResults(chunked))).toBe(marshalResults(whole));
    });

    it('should keep running statements after one fails', async () => {
      const results = await collect(executor, 'select value from cpu limit 1; show users; show measurements');
      expect(results.map((r) => r.statementId)).toEqual([0, 1, 2]);
      expect(results[1]?.error?.message).toBe("no executor configured for 'SHOW USERS'");
      expect(results[2]?.series[0]?.values).toEqual([['cpu']]);
    });

    it('should log failed statements with their text and error', async () => {
      const logs: LogEntry[] = [];
      const logged = new QueryExecutor(store, {
        logger: createLogger({ module: 'tsdb', handler: (entry) => logs.push(entry) }),
      });
      await collect(logged, 'show users');

      const failed = logs.find((e) => e.message === 'statement failed');
      expect(failed?.level).toBe('warn');
      expect(failed?.module).toBe('tsdb:executor');
      expect(failed?.context).toEqual({
        statementId: 0,
        statement: 'SHOW USERS',
        error: {
          name: 'QueryError',
          code: 'STRATA_Q502',
          message: "no executor configured for 'SHOW USERS'",
          context: { kind: 'show_users' },
        },
      });
    });

    it('should stop producing when the subscriber unsubscribes', async () => {
      const results = await lastValueFrom(
        executor
          .executeQuery(mustParseQuery('show measurements; show measurements; show measurements'), 'foo', 0)
          .pipe(take(1), toArray())
      );
      expect(results).toHaveLength(1);
    });

    it('should error the stream when the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const results$ = executor.executeQuery(mustParseQuery('show measurements'), 'foo', 0, {
        signal: controller.signal,
      });
      await expect(lastValueFrom(results$)).rejects.toMatchObject({ code: 'STRATA_Q500', message: 'query aborted' });
    });

    it('should be cold and re-run on every subscription', async () => {
      const results$ = executor.executeQuery(mustParseQuery('show measurements'), 'foo', 0);
      const first = await lastValueFrom(results$.pipe(toArray()));
      await store.writeToShard(1n, [new Point('disk', {}, { used: 1 }, 1n)]);
      const second = await lastValueFrom(results$.pipe(toArray()));
      expect(first[0]?.series[0]?.values).toEqual([['cpu']]);
      expect(second[0]?.series[0]?.values).toEqual([['cpu'], ['disk']]);
    });
  });

  describe('chunkRows', () => {
    it('should return a single empty chunk for no rows', () => {
      expect(chunkRows([], 10)).toEqual([[]]);
    });

    it('should keep rows without values in the current chunk', () => {
      const rows = [
        { name: 'cpu', columns: ['tagKey'], values: [['host']] },
        { name: 'mem', columns: ['tagKey'], values: [] },
      ];
      expect(chunkRows(rows, 1)).toEqual([[rows[0]], [rows[1]]]);
    });
  });

  describe('authorize', () => {
    it('should allow only an admin-creating query while no users exist', async () => {
      const meta = new TestMetaStore(0);
      executor.metaStore = meta;

      await expect(
        executor.authorize(null, mustParseQuery("create user foo with password 'test-password' with all privileges"), '')
      ).resolves.toBeUndefined();
      await expect(
        executor.authorize(null, mustParseQuery("create user foo with password 'test-password'"), '')
      ).rejects.toBeInstanceOf(AuthorizationError);
      await expect(executor.authorize(null, mustParseQuery('select * from foo'), '')).rejects.toBeInstanceOf(
        AuthorizationError
      );

      meta.userCountValue = 1;

      await expect(
        executor.authorize(null, mustParseQuery("create user foo with password 'test-password'"), '')
      ).rejects.toBeInstanceOf(AuthorizationError);
      await expect(executor.authorize(null, mustParseQuery('select * from foo'), '')).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(
        executor.authorize(
          null,
          mustParseQuery("create user foo with password 'test-password' with all privileges"),
          ''
        )
      ).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('should not extend the bootstrap exception to multi-statement queries', async () => {
      await expect(
        executor.authorize(
          null,
          mustParseQuery("create user a with password 'test-password' with all privileges; show users"),
          ''
        )
      ).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('should check database privileges of non-admin users', async () => {
      executor.metaStore = new TestMetaStore(1);
      const reader = user('reader', [['foo', 'READ']]);

      await expect(executor.authorize(reader, mustParseQuery('select * from cpu'), 'foo')).resolves.toBeUndefined();
      await expect(executor.authorize(reader, mustParseQuery('select * from cpu'), 'other')).rejects.toThrow(
        "reader not authorized to execute 'SELECT * FROM cpu': requires READ on other"
      );
      await expect(executor.authorize(reader, mustParseQuery('drop series from cpu'), 'foo')).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(executor.authorize(reader, mustParseQuery('show users'), 'foo')).rejects.toThrow(
        'requires admin privilege'
      );
    });

    it('should allow admins everything', async () => {
      executor.metaStore = new TestMetaStore(1);
      await expect(
        executor.authorize(user('root', [], true), mustParseQuery('show users; drop series from cpu'), 'foo')
      ).resolves.toBeUndefined();
    });
  });

  describe('with a memory meta store', () => {
    it('should bootstrap an admin and then require authentication', async () => {
      const meta = new MemoryMetaStore({ hashIterations: 1 });
      const secured = new QueryExecutor(store, { requireAuthentication: true });
      secured.metaStore = meta;
      secured.metaStatementExecutor = new StatementExecutor(meta);

      const run = async (query: string, caller: UserInfo | null): Promise<string> =>
        marshalResults(
          await lastValueFrom(
            secured.executeQuery(mustParseQuery(query), 'foo', 0, { user: caller }).pipe(toArray())
          )
        );

      expect(await run("create user root with password 'test-password' with all privileges", null)).toBe('[{}]');
      expect(await run('show users', null)).toBe('[{"error":"no user provided"}]');

      const root = await meta.authenticate('root', 'test-password');
      expect(await run('show users', root)).toBe(
        '[{"series":[{"columns":["user","admin"],"values":[["root",true]]}]}]'
      );
    });

    it('should resolve shards from shard groups', async () => {
      const meta = new MemoryMetaStore({ hashIterations: 1 });
      await meta.createDatabase('foo');
      const group = await meta.createShardGroup('foo', '', new Date());
      const [shardInfo] = group.shards;
      if (!shardInfo) throw new Error('shard group has no shards');
      if (!store.shard(shardInfo.id)) await store.createShard('foo', 'default', shardInfo.id);
      const orphan = shardInfo.id + 100n;
      await store.createShard('foo', 'default', orphan);

      executor.metaStore = meta;
      await store.writeToShard(shardInfo.id, [new Point('cpu', {}, { value: 1 }, 1n)]);
      // not part of any shard group
      await store.writeToShard(orphan, [new Point('cpu', {}, { value: 2 }, 2n)]);

      expect(await executeAndGetJSON('select value from cpu', executor)).toBe(
        '[{"series":[{"name":"cpu","columns":["time","value"],"values":[["1970-01-01T00:00:00.000000001Z",1]]}]}]'
      );
    });
  });
});
