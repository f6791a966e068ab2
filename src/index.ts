import { config } from './config';
import { buildServer } from './api/app';
import { logger } from './infra/logging/logger';
import { createRedisClient } from './infra/redis/client';
import { InMemorySessionStore } from './infra/store/session-store';
import type { SessionStore } from './infra/store/session-store';
import { RedisSessionStore } from './infra/store/redis-session-store';
import { loadCatalogFromFiles } from './domain/catalog/loader';
import { AIService } from './domain/ai/service';
import { AssessmentService } from './domain/assessment/service';
import type { CatalogHandle } from './domain/catalog/catalog';
import { SchemaError } from './shared/errors';

function createStore(): SessionStore {
  if (config.redisUrl) {
    logger.info('Using Redis session store');
    return new RedisSessionStore(createRedisClient(config.redisUrl));
  }
  logger.warn('REDIS_URL not set, sessions are kept in memory and lost on restart');
  return new InMemorySessionStore();
}

async function bootstrap() {
  logger.info('Starting symptom intake API bootstrap...');

  let catalog: CatalogHandle;
  try {
    catalog = loadCatalogFromFiles({
      catalogPath: config.catalogPath,
      decisionTreePath: config.decisionTreePath,
    });
  } catch (err) {
    const problems = err instanceof SchemaError ? err.problems : undefined;
    logger.fatal({ err, problems }, 'Question catalog failed to load');
    process.exit(1);
  }

  const store = createStore();

  const assistant = new AIService({
    apiKey: config.anthropicApiKey,
    model: config.reportModel,
    maxTokens: config.reportMaxTokens,
    timeoutMs: config.reportTimeoutMs,
  });
  if (!assistant.isConfigured) {
    logger.warn('ANTHROPIC_API_KEY not set, reports and follow-up chat will fail');
  }

  const service = new AssessmentService(catalog, store, assistant, logger);

  const app = await buildServer({
    catalog,
    store,
    service,
    reportGeneratorConfigured: assistant.isConfigured,
  });

  // Graceful shutdown handler
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ signal }, 'Received shutdown signal, closing server...');

    try {
      await app.close();
      await store.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Start server
  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info({ port: config.port, env: config.nodeEnv, store: store.kind }, 'Server started');
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap().catch((err) => {
  logger.fatal({ err }, 'Bootstrap failed');
  process.exit(1);
});
