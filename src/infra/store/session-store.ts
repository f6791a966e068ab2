import type { AssessmentSession } from '../../shared/types';
import type { HealthStatus } from '../redis/client';

/**
 * Persistence seam for assessment sessions. Implementations hand out copies:
 * mutating a returned session never changes what is stored.
 */
export interface SessionStore {
  readonly kind: string;
  get(sessionId: string): Promise<AssessmentSession | null>;
  put(session: AssessmentSession): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  checkHealth(): Promise<HealthStatus>;
  close(): Promise<void>;
}

export class InMemorySessionStore implements SessionStore {
  readonly kind = 'memory';
  private sessions = new Map<string, AssessmentSession>();

  async get(sessionId: string): Promise<AssessmentSession | null> {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : null;
  }

  async put(session: AssessmentSession): Promise<void> {
    this.sessions.set(session.id, structuredClone(session));
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async checkHealth(): Promise<HealthStatus> {
    return { healthy: true, latencyMs: 0 };
  }

  async close(): Promise<void> {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }
}
