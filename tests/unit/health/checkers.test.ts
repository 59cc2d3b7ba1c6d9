import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from 'kysely';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { makeDbHealthChecker, makeRedisHealthChecker } from '@/modules/health/index.js';
import { makeTimedCheck } from '@/modules/health/shell/checkers/timed-check.js';

const makeDummyDb = () =>
  new Kysely<Record<string, never>>({
    dialect: {
      createAdapter: () => new PostgresAdapter(),
      createDriver: () => new DummyDriver(),
      createIntrospector: (db) => new PostgresIntrospector(db),
      createQueryCompiler: () => new PostgresQueryCompiler(),
    },
  });

describe('makeTimedCheck', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports a resolved check as healthy', async () => {
    const check = makeTimedCheck({
      name: 'sample',
      timeoutMs: 1000,
      critical: true,
      ping: async () => 'PONG',
    });

    const result = await check();

    expect(result).toMatchObject({ name: 'sample', status: 'healthy', critical: true });
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(result.message).toBeUndefined();
  });

  it('reports a rejected check with its message', async () => {
    const check = makeTimedCheck({
      name: 'sample',
      timeoutMs: 1000,
      critical: false,
      ping: async () => {
        throw new Error('connection refused');
      },
    });

    await expect(check()).resolves.toMatchObject({
      status: 'unhealthy',
      message: 'connection refused',
      critical: false,
    });
  });

  it('fails a check that outlives the deadline', async () => {
    vi.useFakeTimers();
    const check = makeTimedCheck({
      name: 'sample',
      timeoutMs: 50,
      critical: true,
      ping: () => new Promise(() => undefined),
    });

    const pending = check();
    await vi.advanceTimersByTimeAsync(50);

    await expect(pending).resolves.toMatchObject({
      status: 'unhealthy',
      message: 'sample health check timed out after 50ms',
    });
  });
});

describe('makeDbHealthChecker', () => {
  it('runs a query against the database as a critical check', async () => {
    const db = makeDummyDb();

    const result = await makeDbHealthChecker(db)();

    expect(result).toMatchObject({ name: 'database', status: 'healthy', critical: true });
    await db.destroy();
  });
});

describe('makeRedisHealthChecker', () => {
  it('pings redis as a non-critical check', async () => {
    const redis = { ping: vi.fn(async () => 'PONG') };

    const result = await makeRedisHealthChecker(redis, { name: 'queue' })();

    expect(result).toMatchObject({ name: 'queue', status: 'healthy', critical: false });
    expect(redis.ping).toHaveBeenCalledOnce();
  });

  it('is unhealthy when the ping fails', async () => {
    const redis = {
      ping: async (): Promise<string> => {
        throw new Error('ECONNREFUSED');
      },
    };

    const result = await makeRedisHealthChecker(redis)();

    expect(result).toMatchObject({ name: 'redis', status: 'unhealthy', message: 'ECONNREFUSED' });
  });
});
