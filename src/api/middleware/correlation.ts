import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

const CORRELATION_HEADERS = ['x-correlation-id', 'x-request-id'] as const;

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() ? first.trim() : undefined;
}

/**
 * Tags every request with a correlation id taken from the caller's headers or,
 * failing that, the generated request id. The id is echoed back and bound to
 * the request logger so session logs from one call can be grouped.
 */
const correlationPlugin: FastifyPluginAsync = async (app: FastifyInstance) => {
  app.decorateRequest('correlationId', '');

  app.addHook('onRequest', async (request, reply) => {
    const fromHeaders = CORRELATION_HEADERS.map((name) => headerValue(request.headers[name])).find(Boolean);
    const correlationId = fromHeaders ?? request.id;

    request.correlationId = correlationId;
    reply.header('x-correlation-id', correlationId);
    request.log = request.log.child({ correlationId });
  });
};

export const correlationMiddleware = fp(correlationPlugin, {
  name: 'correlation',
});
