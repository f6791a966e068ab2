import type { AssessmentSession } from '../../shared/types';
import { AppError } from '../../shared/errors';
import { logger } from '../logging/logger';
import { checkRedisHealth } from '../redis/client';
import type { HealthStatus } from '../redis/client';
import type { SessionStore } from './session-store';

/** The slice of ioredis this store uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

const KEY_PREFIX = 'intake:session:';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStoredSession(value: unknown): value is AssessmentSession {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'string' &&
    'status' in value && (value.status === 'in_progress' || value.status === 'completed') &&
    'baseSequence' in value && isStringArray(value.baseSequence) &&
    'insertionQueue' in value && isStringArray(value.insertionQueue) &&
    'answers' in value && Array.isArray(value.answers) &&
    'cursor' in value && typeof value.cursor === 'number' &&
    'matchedSymptoms' in value && isStringArray(value.matchedSymptoms)
  );
}

/**
 * Sessions as JSON documents under one key each. No expiry is set.
 */
export class RedisSessionStore implements SessionStore {
  readonly kind = 'redis';

  constructor(private readonly redis: RedisLike) {}

  private key(sessionId: string): string {
    return `${KEY_PREFIX}${sessionId}`;
  }

  async get(sessionId: string): Promise<AssessmentSession | null> {
    const raw = await this.redis.get(this.key(sessionId));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ sessionId, error: err.message }, 'Stored session is not valid JSON');
      throw new AppError(`Stored session ${sessionId} is corrupted`, 500, 'CORRUPTED_SESSION', false);
    }

    if (!isStoredSession(parsed)) {
      logger.error({ sessionId }, 'Stored session has an unexpected shape');
      throw new AppError(`Stored session ${sessionId} is corrupted`, 500, 'CORRUPTED_SESSION', false);
    }
    return parsed;
  }

  async put(session: AssessmentSession): Promise<void> {
    await this.redis.set(this.key(session.id), JSON.stringify(session));
  }

  async delete(sessionId: string): Promise<boolean> {
    const removed = await this.redis.del(this.key(sessionId));
    return removed > 0;
  }

  async checkHealth(): Promise<HealthStatus> {
    return checkRedisHealth(this.redis);
  }

  async close(): Promise<void> {
    await this.redis.quit();
    logger.info('Redis session store closed');
  }
}
