import Redis from 'ioredis';
import { logger } from '../logging/logger';

export interface HealthStatus {
  healthy: boolean;
  latencyMs: number;
}

/**
 * Redis connection with production settings. Commands issued while the
 * connection is down fail after a bounded number of retries instead of
 * queueing forever.
 */
export function createRedisClient(url: string): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    retryStrategy: (times: number) => {
      if (times > 20) {
        logger.error('Redis connection failed after 20 retries');
        return null; // Stop retrying
      }
      return Math.min(times * 100, 3000); // Backoff, max 3s
    },
    reconnectOnError: (err) => {
      const targetErrors = ['READONLY', 'ECONNRESET', 'ETIMEDOUT'];
      return targetErrors.some((e) => err.message.includes(e));
    },
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  redis.on('error', (err) => {
    logger.error({ error: err.message }, 'Redis error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  return redis;
}

// ============================================================================
// Health Check
// ============================================================================

export async function checkRedisHealth(redis: { ping(): Promise<unknown> }): Promise<HealthStatus> {
  const start = Date.now();

  try {
    await redis.ping();
    return {
      healthy: true,
      latencyMs: Date.now() - start,
    };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Redis ping failed');
    return {
      healthy: false,
      latencyMs: Date.now() - start,
    };
  }
}
