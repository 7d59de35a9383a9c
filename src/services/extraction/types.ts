import type { z } from 'zod';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LangfuseService } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';

/** What to pull out of a document and how to validate it. */
export interface ExtractionTarget<T> {
  /** Prompt name in Langfuse and key of the bundled fallback template. */
  promptName: ExtractionPromptName;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Documents are truncated to this many characters before they are sent. */
  maxChars: number;
  variables?: Record<string, string>;
}

export type ExtractionPromptName = 'contract-extraction' | 'publication-extraction';

export interface ExtractionOptions {
  /** Adds a stricter output instruction; used for the single retry after a malformed response. */
  strict: boolean;
  processo?: string;
  signal?: AbortSignal;
}

/** Boundary to the structured-extraction service: one call, no retries. */
export interface ExtractionAdapter {
  extract<T>(text: string, target: ExtractionTarget<T>, options: ExtractionOptions): Promise<Result<T, AppError>>;
}

export interface ExtractionDeps {
  llm: LLMProvider;
  langfuse: LangfuseService | null;
  promptLabel: string;
}
