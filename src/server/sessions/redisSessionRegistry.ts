// ============================================
// RedisSessionRegistry
// Durable session index: a sorted set scored by created_at
// ============================================

import Redis from 'ioredis';
import type { SessionEntry } from '../../shared/types';
import type { SessionRegistry } from './sessionRegistry';
import { logger, errorMessage } from '../../shared/utils/logger';

const INDEX_KEY = 'chartsessions:index';

export class RedisSessionRegistry implements SessionRegistry {
  private redis: Redis;

  constructor(redisUrl: string) {
    this.redis = new Redis(redisUrl, {
      retryStrategy: (times) => {
        if (times > 3) {
          logger.error('❌ Redis connection failed after 3 retries');
          return null;
        }
        return Math.min(times * 100, 3000);
      }
    });

    this.redis.on('error', (error: Error) => {
      logger.error('❌ Redis error', { error: error.message });
    });

    logger.info('📦 RedisSessionRegistry initialized', { redisUrl: redactUrl(redisUrl) });
  }

  async register(entry: SessionEntry): Promise<void> {
    // NX: the first created_at wins
    await this.redis.zadd(INDEX_KEY, 'NX', entry.createdAt, entry.sessionId);
    logger.debug('✅ Session registered in Redis', { sessionId: entry.sessionId });
  }

  async has(sessionId: string): Promise<boolean> {
    const score = await this.redis.zscore(INDEX_KEY, sessionId);
    return score !== null;
  }

  async remove(sessionId: string): Promise<boolean> {
    const removed = await this.redis.zrem(INDEX_KEY, sessionId);
    return removed > 0;
  }

  async list(): Promise<SessionEntry[]> {
    const flat = await this.redis.zrange(INDEX_KEY, 0, -1, 'WITHSCORES');
    const entries: SessionEntry[] = [];
    for (let i = 0; i + 1 < flat.length; i += 2) {
      entries.push({ sessionId: flat[i], createdAt: Number(flat[i + 1]) });
    }
    return entries;
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      logger.warn('⚠️ Redis quit failed', { error: errorMessage(error) });
    }
  }
}

function redactUrl(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, '//***@');
}
