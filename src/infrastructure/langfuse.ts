import { randomUUID } from 'node:crypto';
import { Langfuse } from 'langfuse';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import type { AppConfig } from './config.js';
import { logger } from './logger.js';

export interface CompiledPrompt {
  name: string;
  prompt: string;
  /** Langfuse version; null for the bundled copy. */
  version: number | null;
  config: Record<string, unknown>;
}

export interface GenerationRecord {
  /** Generations for the same processo land on one trace. */
  processo?: string;
  name: string;
  model: string;
  input: string;
  output: string;
  usage?: { input: number; output: number; total: number };
  prompt?: { name: string; version: number | null };
  startTime: Date;
  endTime: Date;
  metadata?: Record<string, unknown>;
}

interface TraceHandle {
  generation(params: {
    name: string;
    model: string;
    input: string;
    output: string;
    usage?: { input: number; output: number; total: number };
    startTime: Date;
    endTime: Date;
    metadata?: Record<string, unknown>;
  }): unknown;
}

/** The part of the langfuse client this service uses. */
export interface LangfuseClient {
  getPrompt(
    name: string,
    version?: number,
    options?: { label?: string; type?: 'text' },
  ): Promise<{ name: string; prompt: string; version?: number; config?: unknown }>;
  trace(params: { id: string; name: string; sessionId?: string; metadata?: Record<string, unknown> }): TraceHandle;
  shutdownAsync(): Promise<void>;
}

export interface LangfuseServiceOptions {
  /** Groups every trace of a run; usually the run id. */
  sessionId?: string;
}

interface CacheEntry {
  prompt: CompiledPrompt;
  fetchedAt: number;
}

const CACHE_TTL_MS = 5 * 60 * 1000;
const log = logger.child({ module: 'langfuse' });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Prompt source and tracing for extraction calls. Prompts are cached for a few minutes and a
 * stale copy is served while Langfuse is unreachable.
 */
export class LangfuseService {
  private readonly cache = new Map<string, CacheEntry>();

  constructor(
    private readonly client: LangfuseClient,
    private readonly options: LangfuseServiceOptions = {},
  ) {}

  async getPrompt(name: string, label?: string, processo?: string): Promise<Result<CompiledPrompt, AppError>> {
    const ctx = { promptName: name, label, processo };
    const key = label ? `${name}:${label}` : name;
    const cached = this.cache.get(key);

    if (cached && Date.now() - cached.fetchedAt < CACHE_TTL_MS) {
      return ok(cached.prompt);
    }

    let fetched: Awaited<ReturnType<LangfuseClient['getPrompt']>>;
    try {
      fetched = await this.client.getPrompt(name, undefined, { label, type: 'text' });
    } catch (cause) {
      const details = describeCause(cause);
      if (cached) {
        log.warn({ ...ctx, staleForMs: Date.now() - cached.fetchedAt, details }, 'Langfuse unavailable, using stale prompt');
        return ok(cached.prompt);
      }
      log.error({ ...ctx, errorCode: ErrorCode.LANGFUSE_UNAVAILABLE, details }, 'Langfuse unavailable and no cached prompt');
      return err(
        createAppError(ErrorCode.LANGFUSE_UNAVAILABLE, 'Cannot fetch prompt from Langfuse and no cached version available', true, details),
      );
    }

    const compiled: CompiledPrompt = {
      name: fetched.name,
      prompt: fetched.prompt,
      version: fetched.version ?? null,
      config: isRecord(fetched.config) ? fetched.config : {},
    };
    this.cache.set(key, { prompt: compiled, fetchedAt: Date.now() });
    log.info({ ...ctx, version: compiled.version }, 'Fetched prompt from Langfuse');
    return ok(compiled);
  }

  /** Loads the prompts a run needs before the first unit; failures only leave the cache cold. */
  async warmCache(promptNames: readonly string[], label?: string): Promise<number> {
    const results = await Promise.all(promptNames.map((name) => this.getPrompt(name, label)));
    const loaded = results.filter((r) => r.ok).length;
    log.info({ prompts: promptNames, loaded }, 'Prompt cache warmed');
    return loaded;
  }

  traceIdFor(processo?: string): string {
    const { sessionId } = this.options;
    return sessionId !== undefined && processo !== undefined ? `${sessionId}:${processo}` : randomUUID();
  }

  /** Fire-and-forget; a tracing failure is logged and never fails the unit. */
  traceGeneration(record: GenerationRecord): void {
    const traceId = this.traceIdFor(record.processo);
    try {
      const trace = this.client.trace({
        id: traceId,
        name: record.processo ?? record.name,
        ...(this.options.sessionId !== undefined && { sessionId: this.options.sessionId }),
        ...(record.processo !== undefined && { metadata: { processo: record.processo } }),
      });

      trace.generation({
        name: record.name,
        model: record.model,
        input: record.input,
        output: record.output,
        ...(record.usage !== undefined && { usage: record.usage }),
        startTime: record.startTime,
        endTime: record.endTime,
        metadata: {
          promptName: record.prompt?.name,
          promptVersion: record.prompt?.version,
          ...record.metadata,
        },
      });
    } catch (cause) {
      log.warn({ traceId, details: describeCause(cause) }, 'Failed to trace generation');
    }
  }

  async shutdown(): Promise<void> {
    try {
      await this.client.shutdownAsync();
    } catch (cause) {
      log.warn({ details: describeCause(cause) }, 'Failed to flush Langfuse events on shutdown');
    }
  }
}

/** Returns null when Langfuse is not configured; prompts then come from the bundled templates. */
export function createLangfuseClient(config: Readonly<AppConfig>): LangfuseClient | null {
  if (!config.langfuse) return null;
  return new Langfuse({
    publicKey: config.langfuse.publicKey,
    secretKey: config.langfuse.secretKey,
    baseUrl: config.langfuse.baseUrl,
  });
}
