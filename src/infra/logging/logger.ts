import pino from 'pino';
import type { BaseLogger } from 'pino';
import { config } from '../../config';
import { isAppError, isOperationalError } from '../../shared/errors';

export const logger = pino({
  level: config.logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'symptom-intake-core',
    env: config.nodeEnv,
  },
  // Pretty print in development
  ...(config.nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

/** Any pino-compatible logger, including Fastify's request logger. */
export type ContextLogger = Pick<BaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

// ============================================================================
// Execution Logging
// ============================================================================

export async function logExecution<T>(
  action: string,
  fn: () => Promise<T>,
  parentLogger?: ContextLogger,
  bindings: Record<string, unknown> = {}
): Promise<T> {
  const log = parentLogger || logger;
  const startTime = Date.now();

  log.debug({ ...bindings, action }, `Starting ${action}`);

  try {
    const result = await fn();
    const durationMs = Date.now() - startTime;

    log.info({ ...bindings, action, durationMs }, `Completed ${action}`);

    return result;
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const err = error instanceof Error ? error : new Error(String(error));

    // Operational errors are expected traffic (caller mistakes, collaborator hiccups)
    const code = isAppError(error) ? error.code : undefined;
    const level = isOperationalError(error) ? 'warn' : 'error';

    log[level]({
      ...bindings,
      action,
      durationMs,
      code,
      error: err.message,
      stack: level === 'error' ? err.stack : undefined,
    }, `Failed ${action}`);

    throw error;
  }
}

// ============================================================================
// AI Usage Logging
// ============================================================================

interface AIUsageLog {
  sessionId: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

export function logAIUsage(usage: AIUsageLog): void {
  logger.info({ ...usage, kind: 'ai_usage' }, 'Report generation usage');
}
