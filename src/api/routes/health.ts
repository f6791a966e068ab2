import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { CatalogHandle } from '../../domain/catalog/catalog';
import type { SessionStore } from '../../infra/store/session-store';

const VERSION = process.env.npm_package_version || '0.1.0';

export interface HealthRouteOptions {
  catalog: CatalogHandle;
  store: SessionStore;
  reportGeneratorConfigured: boolean;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (
  app: FastifyInstance,
  { catalog, store, reportGeneratorConfigured }
) => {
  // Basic liveness check - always returns 200 if server is running
  app.get('/live', async () => {
    return { status: 'ok' };
  });

  // Readiness check - returns 200 only if the session store answers
  app.get('/ready', async (request, reply) => {
    const storeHealth = await store.checkHealth();

    if (!storeHealth.healthy) {
      reply.status(503);
    }

    return {
      status: storeHealth.healthy ? 'ready' : 'not_ready',
      checks: {
        sessionStore: storeHealth.healthy ? 'ok' : 'fail',
      },
    };
  });

  // Full health check with detailed metrics
  app.get('/health', async (request, reply) => {
    const storeHealth = await store.checkHealth();

    if (!storeHealth.healthy) {
      reply.status(503);
    }

    return {
      status: storeHealth.healthy ? 'healthy' : 'degraded',
      version: VERSION,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      checks: {
        sessionStore: {
          kind: store.kind,
          status: storeHealth.healthy ? 'ok' : 'fail',
          latencyMs: storeHealth.latencyMs,
        },
        catalog: {
          status: 'ok',
          ...catalog.stats(),
        },
        reportGenerator: {
          status: reportGeneratorConfigured ? 'ok' : 'not_configured',
        },
      },
      memory: {
        heapUsed: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
        heapTotal: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
        rss: Math.round(process.memoryUsage().rss / 1024 / 1024),
      },
    };
  });
};
