import { describe, it, expect, vi, afterEach } from 'vitest';
import { LangfuseService, type LangfuseClient } from '../../src/infrastructure/langfuse.js';

function createMockClient(overrides?: Partial<LangfuseClient>): LangfuseClient {
  return {
    getPrompt: vi.fn(),
    trace: vi.fn().mockReturnValue({ generation: vi.fn() }),
    shutdownAsync: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

afterEach(() => {
  vi.useRealTimers();
});

const fakePromptResponse = {
  name: 'publication-extraction',
  prompt: 'Find {{processo}} in {{document_text}}',
  version: 4,
  config: { temperature: 0 },
};

describe('LangfuseService.getPrompt', () => {
  it('fetches the prompt from Langfuse and caches it', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue(fakePromptResponse);
    const service = new LangfuseService(client);

    const result = await service.getPrompt('publication-extraction', 'production');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe('publication-extraction');
    expect(result.value.prompt).toContain('{{processo}}');
    expect(result.value.config).toEqual({ temperature: 0 });
    expect(result.value.version).toBe(4);

    const second = await service.getPrompt('publication-extraction', 'production');
    expect(second.ok).toBe(true);
    expect(client.getPrompt).toHaveBeenCalledTimes(1);
  });

  it('treats a non-object prompt config as empty', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValue({ ...fakePromptResponse, config: 'oops' });
    const service = new LangfuseService(client);

    const result = await service.getPrompt('publication-extraction');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.config).toEqual({});
  });

  it('returns the stale cached prompt when Langfuse is unavailable', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockResolvedValueOnce(fakePromptResponse);
    const service = new LangfuseService(client);

    await service.getPrompt('publication-extraction');

    vi.useFakeTimers();
    vi.advanceTimersByTime(6 * 60 * 1000);

    vi.mocked(client.getPrompt).mockRejectedValueOnce(new Error('Langfuse 503'));

    const result = await service.getPrompt('publication-extraction');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe('publication-extraction');
  });

  it('returns LANGFUSE_UNAVAILABLE when nothing is cached and Langfuse is down', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt).mockRejectedValueOnce(new Error('Connection refused'));
    const service = new LangfuseService(client);

    const result = await service.getPrompt('contract-extraction');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('LANGFUSE_UNAVAILABLE');
    expect(result.error.details).toBe('Connection refused');
  });
});

describe('LangfuseService.traceGeneration', () => {
  it('records generations for a processo on one trace in the run session', () => {
    const generation = vi.fn();
    const client = createMockClient({ trace: vi.fn().mockReturnValue({ generation }) });
    const service = new LangfuseService(client, { sessionId: 'contracts-2025' });

    service.traceGeneration({
      processo: 'SME-PRO-2025/19222',
      name: 'contract-extraction',
      model: 'llama-3.3-70b-versatile',
      input: 'text',
      output: '{}',
      usage: { input: 100, output: 50, total: 150 },
      prompt: { name: 'contract-extraction', version: 3 },
      startTime: new Date(0),
      endTime: new Date(10),
    });

    expect(client.trace).toHaveBeenCalledWith({
      id: 'contracts-2025:SME-PRO-2025/19222',
      name: 'SME-PRO-2025/19222',
      sessionId: 'contracts-2025',
      metadata: { processo: 'SME-PRO-2025/19222' },
    });
    expect(generation).toHaveBeenCalledWith(
      expect.objectContaining({
        name: 'contract-extraction',
        output: '{}',
        usage: { input: 100, output: 50, total: 150 },
        metadata: { promptName: 'contract-extraction', promptVersion: 3 },
      }),
    );
  });

  it('uses a fresh trace id without a session or processo', () => {
    const service = new LangfuseService(createMockClient());

    expect(service.traceIdFor('SME-PRO-2025/19222')).not.toBe(service.traceIdFor('SME-PRO-2025/19222'));
  });

  it('swallows tracing failures', () => {
    const client = createMockClient({
      trace: vi.fn().mockImplementation(() => {
        throw new Error('boom');
      }),
    });
    const service = new LangfuseService(client);

    expect(() =>
      service.traceGeneration({
        name: 'publication-extraction',
        model: 'm',
        input: 'i',
        output: 'o',
        startTime: new Date(0),
        endTime: new Date(1),
      }),
    ).not.toThrow();
  });
});

describe('LangfuseService.warmCache', () => {
  it('counts the prompts it could load', async () => {
    const client = createMockClient();
    vi.mocked(client.getPrompt)
      .mockResolvedValueOnce(fakePromptResponse)
      .mockRejectedValueOnce(new Error('Connection refused'));
    const service = new LangfuseService(client);

    expect(await service.warmCache(['publication-extraction', 'contract-extraction'], 'production')).toBe(1);
  });
});

describe('LangfuseService.shutdown', () => {
  it('flushes pending events and tolerates a failing flush', async () => {
    const client = createMockClient({ shutdownAsync: vi.fn().mockRejectedValue(new Error('offline')) });
    const service = new LangfuseService(client);

    await expect(service.shutdown()).resolves.toBeUndefined();
    expect(client.shutdownAsync).toHaveBeenCalledTimes(1);
  });
});
