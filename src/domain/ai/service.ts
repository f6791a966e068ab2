import Anthropic from '@anthropic-ai/sdk';
import type {
  AIResponse,
  ChatMessage,
  ChatRequest,
  ChatResponder,
  ReportGenerator,
  ReportRequest,
  TokenUsage,
} from '../../shared/types';
import { AIServiceError, MalformedReportResponseError } from '../../shared/errors';
import { logAIUsage } from '../../infra/logging/logger';
import { buildReportPrompt } from '../report/prompt';

export interface AIServiceOptions {
  apiKey?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

/**
 * Pull the JSON object out of a model reply. Tolerates markdown fences and
 * stray prose around the object.
 */
export function parseReportJson(content: string): unknown {
  const unfenced = content.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');

  if (start === -1 || end <= start) {
    throw new MalformedReportResponseError(['response does not contain a JSON object']);
  }

  try {
    return JSON.parse(unfenced.slice(start, end + 1));
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new MalformedReportResponseError([`response is not valid JSON: ${err.message}`]);
  }
}

/**
 * Report generator and follow-up chat backed by the Anthropic Messages API.
 * One call per request, no retries: the caller decides whether to try again.
 */
export class AIService implements ReportGenerator, ChatResponder {
  private client: Anthropic | null;

  constructor(private readonly options: AIServiceOptions) {
    this.client = options.apiKey
      ? new Anthropic({
          apiKey: options.apiKey,
          timeout: options.timeoutMs,
          maxRetries: 0,
        })
      : null;
  }

  get isConfigured(): boolean {
    return this.client !== null;
  }

  async generate(request: ReportRequest): Promise<unknown> {
    const { system, prompt } = buildReportPrompt(request);
    const response = await this.complete(request.sessionId, system, [{ role: 'user', content: prompt }]);
    return parseReportJson(response.content);
  }

  async respond(request: ChatRequest): Promise<string> {
    const response = await this.complete(request.sessionId, request.system, request.messages);
    const reply = response.content.trim();
    if (!reply) {
      throw new AIServiceError('Empty chat response');
    }
    return reply;
  }

  private async complete(sessionId: string, system: string, messages: ChatMessage[]): Promise<AIResponse> {
    if (!this.client) {
      throw new AIServiceError('AI service is not configured');
    }

    const startTime = Date.now();

    try {
      const response = await this.client.messages.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        system,
        messages,
      });

      const latencyMs = Date.now() - startTime;

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('\n');

      const usage: TokenUsage = {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      };

      logAIUsage({
        sessionId,
        model: response.model,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        latencyMs,
      });

      return {
        content,
        usage,
        model: response.model,
        latencyMs,
      };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));

      if (err.message.includes('429') || err.message.includes('rate_limit')) {
        throw new AIServiceError('Rate limit exceeded, please try again later', err);
      }

      throw new AIServiceError(err.message, err);
    }
  }
}
