import { randomUUID } from 'crypto';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { Logger } from 'pino';
import { config } from '../config';
import { isAppError } from '../shared/errors';
import type { ApiResponse } from '../shared/types';
import { logger as rootLogger } from '../infra/logging/logger';
import type { SessionStore } from '../infra/store/session-store';
import type { CatalogHandle } from '../domain/catalog/catalog';
import type { AssessmentService } from '../domain/assessment/service';
import { correlationMiddleware } from './middleware/correlation';
import { healthRoutes } from './routes/health';
import { assessmentRoutes } from './routes/assessments';

export interface ServerDeps {
  catalog: CatalogHandle;
  store: SessionStore;
  service: AssessmentService;
  reportGeneratorConfigured: boolean;
  logger?: Logger;
  corsOrigins?: string[];
}

export async function buildServer(deps: ServerDeps) {
  const app = Fastify({
    logger: deps.logger ?? rootLogger,
    requestIdHeader: 'x-correlation-id',
    genReqId: () => randomUUID(),
  });

  const origins = deps.corsOrigins ?? config.corsOrigins;
  await app.register(cors, {
    origin: origins.includes('*') ? true : origins,
    credentials: true,
  });

  // Correlation ID middleware
  await app.register(correlationMiddleware);

  // Routes
  await app.register(healthRoutes, {
    catalog: deps.catalog,
    store: deps.store,
    reportGeneratorConfigured: deps.reportGeneratorConfigured,
  });
  await app.register(assessmentRoutes, { prefix: '/assessments', service: deps.service });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const correlationId = request.correlationId || request.id;
    const appError = isAppError(error) ? error : null;

    const statusCode = appError?.statusCode ?? error.statusCode ?? 500;
    const code = appError?.code ?? (statusCode < 500 && error.code ? error.code : 'INTERNAL_ERROR');
    const exposed = appError ? appError.isOperational : statusCode < 500;

    const details = {
      correlationId,
      code,
      error: error.message,
      statusCode,
    };
    if (exposed) {
      request.log.warn(details, 'Request rejected');
    } else {
      request.log.error({ ...details, stack: error.stack }, 'Request error');
    }

    // Don't expose internal errors
    const body: ApiResponse = {
      success: false,
      error: exposed ? error.message : 'Internal server error',
      code,
      correlationId,
    };
    reply.status(statusCode).send(body);
  });

  return app;
}
