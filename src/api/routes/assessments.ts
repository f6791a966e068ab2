import { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { CHAT_ROLES } from '../../shared/types';
import type { ApiResponse } from '../../shared/types';
import { BadRequestError, SessionNotFoundError } from '../../shared/errors';
import { MAX_FREE_TEXT_LENGTH, isValidUUID } from '../../shared/validation';
import type { AssessmentService } from '../../domain/assessment/service';

export interface AssessmentRouteOptions {
  service: AssessmentService;
}

const answerValueSchema = z.union([z.string(), z.number(), z.array(z.string())]);

const startBodySchema = z
  .object({
    profile: z.record(answerValueSchema).optional(),
  })
  .nullish();

const answerBodySchema = z.object({
  questionId: z.string().min(1),
  value: answerValueSchema,
});

const MAX_CHAT_MESSAGES = 50;

const chatBodySchema = z.object({
  history: z
    .array(
      z.object({
        role: z.enum(CHAT_ROLES),
        content: z.string().trim().min(1).max(MAX_FREE_TEXT_LENGTH),
      })
    )
    .max(MAX_CHAT_MESSAGES),
});

const sessionParamsSchema = z.object({
  sessionId: z.string(),
});

function parseSessionId(params: unknown): string {
  const result = sessionParamsSchema.safeParse(params);
  if (!result.success) {
    throw new BadRequestError('Missing session ID');
  }
  // Anything that is not a UUID cannot name a session
  if (!isValidUUID(result.data.sessionId)) {
    throw new SessionNotFoundError(result.data.sessionId);
  }
  return result.data.sessionId;
}

export const assessmentRoutes: FastifyPluginAsync<AssessmentRouteOptions> = async (
  app: FastifyInstance,
  { service }
) => {
  /**
   * POST /assessments
   * Start a session, optionally with profile answers for non-compulsory questions
   */
  app.post('/', async (request, reply) => {
    const parseResult = startBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new BadRequestError(`Invalid request body: ${parseResult.error.message}`);
    }

    const started = await service.start(parseResult.data?.profile ?? {}, request.log);
    request.log.info({ sessionId: started.sessionId }, 'Assessment session created');

    const body: ApiResponse<typeof started> = {
      success: true,
      data: started,
      correlationId: request.correlationId,
    };
    return reply.status(201).send(body);
  });

  app.get('/:sessionId', async (request) => {
    const sessionId = parseSessionId(request.params);
    const snapshot = await service.get(sessionId);

    const body: ApiResponse<typeof snapshot> = {
      success: true,
      data: snapshot,
      correlationId: request.correlationId,
    };
    return body;
  });

  /**
   * POST /assessments/:sessionId/answers
   * Answer the pending question; returns the next one or completion
   */
  app.post('/:sessionId/answers', async (request) => {
    const sessionId = parseSessionId(request.params);

    const parseResult = answerBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new BadRequestError(`Invalid answer payload: ${parseResult.error.message}`);
    }

    const { questionId, value } = parseResult.data;
    const result = await service.answer(sessionId, questionId, value, request.log);

    const body: ApiResponse<typeof result> = {
      success: true,
      data: result,
      correlationId: request.correlationId,
    };
    return body;
  });

  /**
   * POST /assessments/:sessionId/report
   * Generate (once) and return the report for a completed session
   */
  app.post('/:sessionId/report', async (request) => {
    const sessionId = parseSessionId(request.params);
    const report = await service.report(sessionId, request.log);

    const body: ApiResponse<typeof report> = {
      success: true,
      data: report,
      correlationId: request.correlationId,
    };
    return body;
  });

  /**
   * POST /assessments/:sessionId/chat/start
   * Welcome message for the follow-up chat on a reported session
   */
  app.post('/:sessionId/chat/start', async (request) => {
    const sessionId = parseSessionId(request.params);
    const reply = await service.startChat(sessionId, request.log);

    const body: ApiResponse<typeof reply> = {
      success: true,
      data: reply,
      correlationId: request.correlationId,
    };
    return body;
  });

  /**
   * POST /assessments/:sessionId/chat
   * Reply to the last user message; the client sends the whole history
   */
  app.post('/:sessionId/chat', async (request) => {
    const sessionId = parseSessionId(request.params);

    const parseResult = chatBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      throw new BadRequestError(`Invalid chat payload: ${parseResult.error.message}`);
    }

    const reply = await service.chat(sessionId, parseResult.data.history, request.log);

    const body: ApiResponse<typeof reply> = {
      success: true,
      data: reply,
      correlationId: request.correlationId,
    };
    return body;
  });

  app.delete('/:sessionId', async (request) => {
    const sessionId = parseSessionId(request.params);
    await service.end(sessionId, request.log);

    const body: ApiResponse<{ sessionId: string; ended: true }> = {
      success: true,
      data: { sessionId, ended: true },
      correlationId: request.correlationId,
    };
    return body;
  });
};
