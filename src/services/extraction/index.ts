import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import {
  publicationExtractionSchema,
  publicationFieldsSchema,
  type ContractRecord,
  type PublicationExtraction,
} from '../../domain/schemas.js';
import type { CompiledPrompt } from '../../infrastructure/langfuse.js';
import { logger } from '../../infrastructure/logger.js';
import { FALLBACK_PROMPTS, STRICT_OUTPUT_HINT, fillTemplate } from './prompts.js';
import { withRetry, type RetryHooks, type RetryPolicy } from './retry.js';
import type {
  ExtractionAdapter,
  ExtractionDeps,
  ExtractionOptions,
  ExtractionPromptName,
  ExtractionTarget,
} from './types.js';

export type { ExtractionAdapter, ExtractionDeps, ExtractionOptions, ExtractionTarget } from './types.js';
export { createExtractionRetryPolicy, withRetry, retryDelay } from './retry.js';
export type { RetryPolicy, RetryHooks } from './retry.js';

const log = logger.child({ module: 'extraction' });

const USER_MESSAGE = 'Return the JSON object now.';
const DEFAULT_TEMPERATURE = 0.1;

type ContractFields = Omit<ContractRecord, 'processo'>;

export const CONTRACT_TARGET: ExtractionTarget<ContractFields> = {
  promptName: 'contract-extraction',
  schema: publicationFieldsSchema,
  maxChars: 12_000,
};

export const PUBLICATION_TARGET: ExtractionTarget<PublicationExtraction> = {
  promptName: 'publication-extraction',
  schema: publicationExtractionSchema,
  maxChars: 8_000,
};

export const EXTRACTION_PROMPTS: readonly ExtractionPromptName[] = [
  CONTRACT_TARGET.promptName,
  PUBLICATION_TARGET.promptName,
];

interface ResolvedPrompt extends CompiledPrompt {
  source: 'langfuse' | 'bundled';
}

/** Extraction through an LLM: prompt from Langfuse (or the bundled copy), JSON out, zod-validated. */
export class LlmExtractionAdapter implements ExtractionAdapter {
  constructor(private readonly deps: ExtractionDeps) {}

  async extract<T>(
    text: string,
    target: ExtractionTarget<T>,
    options: ExtractionOptions,
  ): Promise<Result<T, AppError>> {
    const ctx = { processo: options.processo, promptName: target.promptName, strict: options.strict };
    const prompt = await this.resolvePrompt(target.promptName, options.processo);

    const documentText = text.length > target.maxChars ? text.slice(0, target.maxChars) : text;
    const systemPrompt =
      fillTemplate(prompt.prompt, {
        processo: options.processo ?? '',
        ...target.variables,
        document_text: documentText,
      }) + (options.strict ? STRICT_OUTPUT_HINT : '');

    const startTime = new Date();
    const completion = await this.deps.llm.complete({
      system: systemPrompt,
      user: USER_MESSAGE,
      json: true,
      temperature: options.strict ? 0 : temperatureOf(prompt.config),
      ...(options.signal !== undefined && { signal: options.signal }),
      context: { processo: options.processo, promptName: target.promptName },
    });
    if (!completion.ok) return completion;

    const response = completion.value;
    this.deps.langfuse?.traceGeneration({
      ...(options.processo !== undefined && { processo: options.processo }),
      name: target.promptName,
      model: response.model,
      input: systemPrompt,
      output: response.content,
      usage: response.usage,
      prompt: { name: prompt.name, version: prompt.version },
      startTime,
      endTime: new Date(),
      metadata: { strict: options.strict, promptSource: prompt.source, finishReason: response.finishReason },
    });

    const parsed = tryParseJson(response.content);
    if (parsed === null) {
      log.warn({ ...ctx, errorCode: ErrorCode.EXTRACTION_MALFORMED_RESPONSE }, 'Response is not a JSON object');
      return err(
        createAppError(
          ErrorCode.EXTRACTION_MALFORMED_RESPONSE,
          'Extraction response is not a JSON object',
          true,
          response.content.slice(0, 500),
        ),
      );
    }

    const validated = target.schema.safeParse(parsed);
    if (!validated.success) {
      const details = validated.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      log.warn({ ...ctx, errorCode: ErrorCode.EXTRACTION_MALFORMED_RESPONSE, details }, 'Response does not match schema');
      return err(
        createAppError(ErrorCode.EXTRACTION_MALFORMED_RESPONSE, 'Extraction response does not match schema', true, details),
      );
    }

    log.info({ ...ctx, model: response.model, latencyMs: response.latencyMs }, 'Extraction completed');
    return ok(validated.data);
  }

  private async resolvePrompt(name: ExtractionPromptName, processo?: string): Promise<ResolvedPrompt> {
    if (this.deps.langfuse) {
      const fetched = await this.deps.langfuse.getPrompt(name, this.deps.promptLabel, processo);
      if (fetched.ok) return { ...fetched.value, source: 'langfuse' };
      log.warn({ promptName: name, errorCode: fetched.error.code }, 'Using bundled prompt');
    }
    return { name, prompt: FALLBACK_PROMPTS[name], version: null, config: {}, source: 'bundled' };
  }
}

function temperatureOf(config: Record<string, unknown>): number {
  return typeof config.temperature === 'number' ? config.temperature : DEFAULT_TEMPERATURE;
}

function tryParseJson(content: string): object | null {
  const trimmed = content.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return parsed;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Runs one extraction under the retry policy. Rate limits are retried by the policy; a
 * malformed response gets exactly one more attempt with the strict output hint.
 */
export async function extractWithPolicy<T>(
  adapter: ExtractionAdapter,
  text: string,
  target: ExtractionTarget<T>,
  policy: RetryPolicy,
  processo: string,
  hooks: RetryHooks = {},
): Promise<Result<T, AppError>> {
  const retryHooks: RetryHooks = { ...hooks, context: { ...hooks.context, processo, promptName: target.promptName } };

  let calls = 0;
  const attempt = (strict: boolean) => () => {
    calls++;
    return adapter.extract(text, target, { strict, processo, signal: hooks.signal });
  };

  const first = await withRetry(policy, attempt(false), retryHooks);
  if (first.ok || first.error.code !== ErrorCode.EXTRACTION_MALFORMED_RESPONSE) return first;

  // The strict retry shares the policy's attempt budget with the first pass.
  const remaining = { ...policy, maxAttempts: Math.max(1, policy.maxAttempts - calls) };
  log.warn(
    { processo, promptName: target.promptName, remainingAttempts: remaining.maxAttempts },
    'Malformed extraction response, retrying with strict hint',
  );
  const second = await withRetry(remaining, attempt(true), retryHooks);
  if (second.ok) return second;

  return err({ ...second.error, retryable: false });
}

export async function extractContractRecord(
  adapter: ExtractionAdapter,
  text: string,
  processo: string,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<Result<ContractRecord, AppError>> {
  const result = await extractWithPolicy(adapter, text, CONTRACT_TARGET, policy, processo, hooks);
  if (!result.ok) return result;
  return ok({ processo, ...result.value });
}

export async function extractPublicationFields(
  adapter: ExtractionAdapter,
  text: string,
  processo: string,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<Result<PublicationExtraction, AppError>> {
  return extractWithPolicy(adapter, text, PUBLICATION_TARGET, policy, processo, hooks);
}
