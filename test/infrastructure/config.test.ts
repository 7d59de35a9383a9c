import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { loadConfig } from '../../src/infrastructure/config.js';

const JUNE_2025 = new Date(2025, 5, 1);

describe('loadConfig', () => {
  it('applies defaults', () => {
    const result = loadConfig({}, {}, JUNE_2025);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const config = result.value;
    expect(config.runId).toBe('contracts-2025');
    expect(config.filterYear).toBe(2025);
    expect(config.timeoutMs).toBe(20_000);
    expect(config.headless).toBe(true);
    expect(config.maxCompanies).toBeNull();
    expect(config.paths.checkpointDir).toBe(join('data', 'outputs', 'checkpoints'));
    expect(config.conformity.deadlineDays).toBe(20);
    expect(config.extraction.maxAttempts).toBe(5);
    expect(config.extraction.promptLabel).toBe('production');
    expect(config.langfuse).toBeNull();
    expect(config.databaseUrl).toBeNull();
    expect(config.controlPort).toBeNull();
  });

  it('lets command-line overrides win over the environment', () => {
    const result = loadConfig({ MAX_COMPANIES: '10', FILTER_YEAR: '2024' }, { maxCompanies: 3 }, JUNE_2025);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.maxCompanies).toBe(3);
    expect(result.value.filterYear).toBe(2024);
    expect(result.value.runId).toBe('contracts-2024');
  });

  it('reads boolean flags', () => {
    const result = loadConfig({ HEADLESS: 'no' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.headless).toBe(false);
  });

  it('treats blank values as unset', () => {
    const result = loadConfig({ GROQ_API_KEY: '', DATABASE_URL: '', LANGFUSE_PUBLIC_KEY: '' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.extraction.apiKey).toBeNull();
    expect(result.value.databaseUrl).toBeNull();
    expect(result.value.langfuse).toBeNull();
  });

  it('enables Langfuse when both keys are set', () => {
    const result = loadConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test', LANGFUSE_SECRET_KEY: 'test-secret' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.langfuse).toEqual({
      publicKey: 'pk-test',
      secretKey: 'test-secret',
      baseUrl: 'https://cloud.langfuse.com',
    });
  });

  it('converts seconds to milliseconds', () => {
    const result = loadConfig({ TIMEOUT_SECONDS: '5', CAPTCHA_MANUAL_TIMEOUT_SECONDS: '60' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.timeoutMs).toBe(5000);
    expect(result.value.captcha.manualTimeoutMs).toBe(60_000);
  });

  it('returns a frozen config', () => {
    const result = loadConfig({});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(Object.isFrozen(result.value)).toBe(true);
    expect(Object.isFrozen(result.value.portal)).toBe(true);
  });

  it('rejects an invalid environment value', () => {
    const result = loadConfig({ HEADLESS: 'maybe' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('CONFIG_INVALID');
    expect(result.error.message).toBe('Invalid environment configuration');
    expect(result.error.details).toContain('HEADLESS:');
  });

  it('rejects an invalid override', () => {
    const result = loadConfig({}, { maxCompanies: Number('many') });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Invalid command-line options');
    expect(result.error.retryable).toBe(false);
  });
});
