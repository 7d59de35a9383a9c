import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Completion, CompletionRequest, LLMProvider } from './types.js';

const DEFAULT_MODEL = 'llama-3.3-70b-versatile';
const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.1;

const log = logger.child({ module: 'llm-groq' });

/** The part of the groq-sdk client this provider calls. */
export interface GroqClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          messages: Array<{ role: 'system' | 'user'; content: string }>;
          temperature?: number;
          max_tokens?: number;
          response_format?: { type: 'json_object' | 'text' };
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{ finish_reason?: string | null; message?: { content?: string | null } }>;
        model: string;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
      }>;
    };
  };
}

function statusOf(cause: unknown): number | undefined {
  if (cause !== null && typeof cause === 'object' && 'status' in cause && typeof cause.status === 'number') {
    return cause.status;
  }
  return undefined;
}

export class GroqProvider implements LLMProvider {
  readonly model: string;

  constructor(
    private readonly client: GroqClient,
    model?: string,
  ) {
    this.model = model ?? DEFAULT_MODEL;
  }

  async complete(request: CompletionRequest): Promise<Result<Completion, AppError>> {
    const startTime = Date.now();
    const ctx = { ...request.context, model: this.model };

    let response: Awaited<ReturnType<GroqClient['chat']['completions']['create']>>;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          ...(request.json && { response_format: { type: 'json_object' } }),
        },
        request.signal ? { signal: request.signal } : undefined,
      );
    } catch (cause) {
      return this.mapError(cause, request, Date.now() - startTime);
    }

    const latencyMs = Date.now() - startTime;
    const choice = response.choices[0];
    const content = choice?.message?.content;
    const finishReason = choice?.finish_reason ?? null;

    if (!content) {
      log.warn({ ...ctx, latencyMs, errorCode: ErrorCode.EXTRACTION_MALFORMED_RESPONSE }, 'Groq returned no content');
      return err(createAppError(ErrorCode.EXTRACTION_MALFORMED_RESPONSE, 'Groq returned empty response content', true));
    }
    if (finishReason === 'length') {
      log.warn({ ...ctx, latencyMs, errorCode: ErrorCode.EXTRACTION_MALFORMED_RESPONSE }, 'Groq output hit the token limit');
      return err(
        createAppError(ErrorCode.EXTRACTION_MALFORMED_RESPONSE, 'Groq output was cut at the token limit', true, content.slice(-200)),
      );
    }

    const usage = {
      input: response.usage?.prompt_tokens ?? 0,
      output: response.usage?.completion_tokens ?? 0,
      total: response.usage?.total_tokens ?? 0,
    };
    log.info({ ...ctx, latencyMs, inputTokens: usage.input, outputTokens: usage.output }, 'Groq completion succeeded');
    return ok({ content, model: response.model, finishReason, usage, latencyMs });
  }

  private mapError(cause: unknown, request: CompletionRequest, latencyMs: number): Result<never, AppError> {
    const details = describeCause(cause);
    const status = statusOf(cause);
    const ctx = { ...request.context, model: this.model, latencyMs, status, details };

    if (request.signal?.aborted) {
      log.info(ctx, 'Groq call aborted');
      return err(createAppError(ErrorCode.CANCELLED, 'Extraction call cancelled', false, details));
    }

    switch (true) {
      case status === 401 || status === 403:
        log.error({ ...ctx, errorCode: ErrorCode.EXTRACTION_AUTH_ERROR }, 'Groq authentication failed');
        return err(createAppError(ErrorCode.EXTRACTION_AUTH_ERROR, 'Groq API authentication failed', false, details));

      case status === 429:
        log.warn({ ...ctx, errorCode: ErrorCode.EXTRACTION_RATE_LIMITED }, 'Groq rate limited');
        return err(createAppError(ErrorCode.EXTRACTION_RATE_LIMITED, 'Groq API rate limited', true, details));

      case status === 413:
        log.error({ ...ctx, errorCode: ErrorCode.EXTRACTION_UNAVAILABLE }, 'Document too large for the model');
        return err(createAppError(ErrorCode.EXTRACTION_UNAVAILABLE, 'Document is too large for the extraction model', false, details));

      case status !== undefined && status >= 500:
        log.error({ ...ctx, errorCode: ErrorCode.EXTRACTION_UNAVAILABLE }, 'Groq server error');
        return err(createAppError(ErrorCode.EXTRACTION_UNAVAILABLE, `Groq API returned ${status}`, false, details));

      default:
        log.error({ ...ctx, errorCode: ErrorCode.EXTRACTION_UNAVAILABLE }, 'Groq API call failed');
        return err(createAppError(ErrorCode.EXTRACTION_UNAVAILABLE, 'Groq API call failed', false, details));
    }
  }
}
