import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

/** One answer from the extraction model. */
export interface Completion {
  content: string;
  model: string;
  /** `length` means the model hit its token limit and the output is cut short. */
  finishReason: string | null;
  usage: TokenUsage;
  latencyMs: number;
}

export interface CompletionRequest {
  system: string;
  user: string;
  temperature?: number;
  maxTokens?: number;
  /** Ask for a single JSON object. */
  json?: boolean;
  /** Aborts the call in flight when the run is cancelled. */
  signal?: AbortSignal;
  /** Bound into the provider's log lines (processo, prompt). */
  context?: Record<string, unknown>;
}

export interface LLMProvider {
  readonly model: string;
  complete(request: CompletionRequest): Promise<Result<Completion, AppError>>;
}

export interface LLMProviderConfig {
  apiKey: string;
  model?: string;
  /** Per-request timeout. */
  timeoutMs: number;
}
