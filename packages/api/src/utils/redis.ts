import Redis from 'ioredis';
import type { AppConfig } from '../config';
import type { DedupIndex } from '../services/dataset';
import { logger } from './logger';

/**
 * Redis client for the cross-run dedup index.
 *
 * Each accepted record's dedup key is claimed with SET NX; a key that
 * already exists means an earlier run produced the same content.
 */

const retryStrategy = (times: number) => Math.min(times * 50, 2000);

export function createRedis(redisConfig: AppConfig['redis']): Redis {
  const options = {
    retryStrategy,
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    lazyConnect: true,
  };

  logger.info({ redisUrl: !!redisConfig.url, host: redisConfig.host }, 'Initializing Redis connection');

  // Use REDIS_URL if available, otherwise individual settings
  const redis = redisConfig.url
    ? new Redis(redisConfig.url, options)
    : new Redis({ ...options, host: redisConfig.host, port: redisConfig.port, password: redisConfig.password });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<boolean> {
  try {
    await redis.ping();
    return true;
  } catch (error) {
    logger.warn({ error }, 'Redis health check failed');
    return false;
  }
}

/**
 * The one Redis command the index needs; an ioredis client satisfies it.
 */
export interface ClaimStore {
  set(key: string, value: string, expiryMode: 'EX', seconds: number, mode: 'NX'): Promise<'OK' | null>;
}

export class RedisDedupIndex implements DedupIndex {
  constructor(
    private readonly redis: ClaimStore,
    private readonly prefix: string,
    private readonly ttlSeconds: number
  ) {}

  async claim(key: string): Promise<boolean> {
    const result = await this.redis.set(`${this.prefix}${key}`, '1', 'EX', this.ttlSeconds, 'NX');
    return result === 'OK';
  }
}
