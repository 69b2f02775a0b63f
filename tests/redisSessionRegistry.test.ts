import { beforeEach, describe, expect, it, vi } from 'vitest';

const { FakeRedis } = vi.hoisted(() => {
  type RetryStrategy = (times: number) => number | null;

  class FakeRedis {
    static instances: FakeRedis[] = [];

    readonly url: string;
    readonly options: { retryStrategy?: RetryStrategy };
    readonly sets = new Map<string, Map<string, number>>();
    quitError?: Error;
    quitCalls = 0;

    constructor(url: string, options: { retryStrategy?: RetryStrategy } = {}) {
      this.url = url;
      this.options = options;
      FakeRedis.instances.push(this);
    }

    on(_event: string, _listener: (error: Error) => void): this {
      return this;
    }

    private set(key: string): Map<string, number> {
      let members = this.sets.get(key);
      if (!members) {
        members = new Map();
        this.sets.set(key, members);
      }
      return members;
    }

    async zadd(key: string, mode: string, score: number, member: string): Promise<number> {
      const members = this.set(key);
      if (mode === 'NX' && members.has(member)) return 0;
      members.set(member, score);
      return 1;
    }

    async zscore(key: string, member: string): Promise<string | null> {
      const score = this.set(key).get(member);
      return score === undefined ? null : String(score);
    }

    async zrem(key: string, member: string): Promise<number> {
      return this.set(key).delete(member) ? 1 : 0;
    }

    async zrange(key: string, _start: number, _stop: number, _withScores: string): Promise<string[]> {
      return Array.from(this.set(key).entries())
        .sort((a, b) => a[1] - b[1])
        .flatMap(([member, score]) => [member, String(score)]);
    }

    async quit(): Promise<'OK'> {
      this.quitCalls++;
      if (this.quitError) throw this.quitError;
      return 'OK';
    }
  }

  return { FakeRedis };
});

vi.mock('ioredis', () => ({ default: FakeRedis }));

import { RedisSessionRegistry } from '../src/server/sessions/redisSessionRegistry';

function lastClient(): InstanceType<typeof FakeRedis> {
  const client = FakeRedis.instances[FakeRedis.instances.length - 1];
  if (!client) throw new Error('no redis client created');
  return client;
}

describe('RedisSessionRegistry', () => {
  let registry: RedisSessionRegistry;

  beforeEach(() => {
    registry = new RedisSessionRegistry('redis://localhost:6379');
  });

  it('stores sessions in a sorted set scored by creation time', async () => {
    await registry.register({ sessionId: 's1', createdAt: 1_000 });

    expect(lastClient().sets.get('chartsessions:index')?.get('s1')).toBe(1_000);
    await expect(registry.has('s1')).resolves.toBe(true);
  });

  it('never overwrites the first creation time', async () => {
    await registry.register({ sessionId: 's1', createdAt: 1_000 });
    await registry.register({ sessionId: 's1', createdAt: 9_000 });

    await expect(registry.list()).resolves.toEqual([{ sessionId: 's1', createdAt: 1_000 }]);
  });

  it('lists entries oldest first', async () => {
    await registry.register({ sessionId: 'newer', createdAt: 2_000 });
    await registry.register({ sessionId: 'older', createdAt: 1_000 });

    await expect(registry.list()).resolves.toEqual([
      { sessionId: 'older', createdAt: 1_000 },
      { sessionId: 'newer', createdAt: 2_000 }
    ]);
  });

  it('reports whether a removal found the session', async () => {
    await registry.register({ sessionId: 's1', createdAt: 1_000 });

    await expect(registry.remove('s1')).resolves.toBe(true);
    await expect(registry.remove('s1')).resolves.toBe(false);
    await expect(registry.has('s1')).resolves.toBe(false);
    await expect(registry.list()).resolves.toEqual([]);
  });

  it('gives up reconnecting after three retries', () => {
    const retryStrategy = lastClient().options.retryStrategy;

    expect(retryStrategy?.(1)).toBe(100);
    expect(retryStrategy?.(3)).toBe(300);
    expect(retryStrategy?.(4)).toBeNull();
  });

  it('closes without throwing when quit fails', async () => {
    const client = lastClient();
    client.quitError = new Error('connection already closed');

    await expect(registry.close()).resolves.toBeUndefined();
    expect(client.quitCalls).toBe(1);
  });
});
