import Groq from 'groq-sdk';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { AppConfig } from '../config.js';
import { GroqProvider } from './groq.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export type { Completion, CompletionRequest, LLMProvider, LLMProviderConfig, TokenUsage } from './types.js';
export { GroqProvider } from './groq.js';
export type { GroqClient } from './groq.js';

/** Extraction calls are slower than page loads; they get a few portal timeouts each. */
const TIMEOUT_FACTOR = 3;

// Retries are owned by the extraction retry policy, not the SDK.
export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  return new GroqProvider(new Groq({ apiKey: config.apiKey, maxRetries: 0, timeout: config.timeoutMs }), config.model);
}

export function createLLMProviderFromConfig(config: Readonly<AppConfig>): Result<LLMProvider, AppError> {
  const { apiKey, model } = config.extraction;
  if (!apiKey) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, 'GROQ_API_KEY must be set to extract documents', false));
  }
  return ok(
    createLLMProvider({
      apiKey,
      timeoutMs: config.timeoutMs * TIMEOUT_FACTOR,
      ...(model !== null && { model }),
    }),
  );
}
