import { describe, expect, it } from 'vitest';
import { AppError } from '../../shared/errors';
import { fixtureCatalog } from '../../test/fixtures';
import { createSession, recordAnswer } from '../../domain/assessment/engine';
import { RedisSessionStore } from './redis-session-store';
import type { RedisLike } from './redis-session-store';

class FakeRedis implements RedisLike {
  readonly data = new Map<string, string>();
  healthy = true;

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.data.set(key, value);
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.data.delete(key) ? 1 : 0;
  }

  async ping(): Promise<string> {
    if (!this.healthy) throw new Error('Connection is closed.');
    return 'PONG';
  }

  async quit(): Promise<'OK'> {
    return 'OK';
  }
}

describe('RedisSessionStore', () => {
  it('round-trips a session under a prefixed key', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis);
    const catalog = fixtureCatalog();
    const session = recordAnswer(catalog, createSession(catalog), 'q_name', 'Ana');

    await store.put(session);

    expect([...redis.data.keys()]).toEqual([`intake:session:${session.id}`]);
    expect(await store.get(session.id)).toEqual(session);
  });

  it('returns null for unknown sessions', async () => {
    const store = new RedisSessionStore(new FakeRedis());

    expect(await store.get('missing')).toBeNull();
  });

  it('reports whether delete removed anything', async () => {
    const store = new RedisSessionStore(new FakeRedis());
    const session = createSession(fixtureCatalog());
    await store.put(session);

    expect(await store.delete(session.id)).toBe(true);
    expect(await store.delete(session.id)).toBe(false);
  });

  it('refuses corrupted documents', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis);
    redis.data.set('intake:session:bad-json', '{');
    redis.data.set('intake:session:bad-shape', JSON.stringify({ id: 'bad-shape', status: 'paused' }));

    await expect(store.get('bad-json')).rejects.toMatchObject({ code: 'CORRUPTED_SESSION' });
    await expect(store.get('bad-shape')).rejects.toBeInstanceOf(AppError);
  });

  it('checks health with a ping', async () => {
    const redis = new FakeRedis();
    const store = new RedisSessionStore(redis);

    expect((await store.checkHealth()).healthy).toBe(true);
    redis.healthy = false;
    expect((await store.checkHealth()).healthy).toBe(false);
  });
});
