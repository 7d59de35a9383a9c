import { describe, it, expect } from 'vitest';
import { logger, createRunLogger } from '../../src/infrastructure/logger.js';

describe('logger', () => {
  it('has the service name configured', () => {
    expect(logger.bindings().name).toBe('publication-audit');
  });
});

describe('createRunLogger', () => {
  it('creates a child logger bound to the run', () => {
    const child = createRunLogger('contracts-2025');
    expect(child.bindings().runId).toBe('contracts-2025');
  });

  it('includes company and processo when provided', () => {
    const bindings = createRunLogger('contracts-2025', '12.345.678/0001-99', 'SME-PRO-2025/19222').bindings();
    expect(bindings.companyId).toBe('12.345.678/0001-99');
    expect(bindings.processo).toBe('SME-PRO-2025/19222');
  });

  it('omits company and processo when not provided', () => {
    const bindings = createRunLogger('contracts-2025').bindings();
    expect(bindings.companyId).toBeUndefined();
    expect(bindings.processo).toBeUndefined();
  });
});
