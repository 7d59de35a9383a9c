import { describe, it, expect } from 'vitest';
import {
  isKnownProcessoFormat,
  matchesProcesso,
  normalizeProcesso,
  parseProcesso,
  processoFileKey,
  textContainsProcesso,
} from '../../src/domain/processo.js';

describe('normalizeProcesso', () => {
  it.each([
    ['SME-PRO-2025/19222', 'SME-PRO-2025/19222'],
    ['sme-pro-2025/19222', 'SME-PRO-2025/19222'],
    ['SMEPRO202519222', 'SME-PRO-2025/19222'],
    ['SME PRO 2025/19222', 'SME-PRO-2025/19222'],
    ['1234/2019-7', '01234/2019-7'],
    ['01234 / 2019 - 7', '01234/2019-7'],
  ])('normalizes %s to %s', (raw, canonical) => {
    expect(normalizeProcesso(raw)).toBe(canonical);
  });

  it('is idempotent in both formats', () => {
    for (const raw of ['smepro202519222', 'CVL-PRO-2024/00031', '98/2018-1', 'not a processo']) {
      const once = normalizeProcesso(raw);
      expect(normalizeProcesso(once)).toBe(once);
    }
  });

  it('upper-cases text it does not recognise', () => {
    expect(parseProcesso('abc')).toEqual({ format: 'unknown', canonical: 'ABC', parts: ['ABC'] });
    expect(isKnownProcessoFormat('abc')).toBe(false);
  });
});

describe('matchesProcesso', () => {
  it('matches two spellings of the same processo', () => {
    expect(matchesProcesso('SMEPRO202519222', 'SME-PRO-2025/19222')).toBe(true);
  });

  it('never matches empty identifiers', () => {
    expect(matchesProcesso('', '')).toBe(false);
  });
});

describe('textContainsProcesso', () => {
  it('finds the processo inside gazette text', () => {
    expect(textContainsProcesso('EXTRATO DO CONTRATO - Processo SME-PRO-2025/19222. Objeto', 'SME-PRO-2025/19222')).toBe(true);
  });

  it('does not match a longer number', () => {
    expect(textContainsProcesso('Processo SME-PRO-2025/192223', 'SME-PRO-2025/19222')).toBe(false);
  });

  it('tolerates missing leading zeros on legacy numbers', () => {
    expect(textContainsProcesso('Processo 1234/2019-7', '01234/2019-7')).toBe(true);
  });
});

describe('processoFileKey', () => {
  it('replaces the slash', () => {
    expect(processoFileKey('SME-PRO-2025/19222')).toBe('SME-PRO-2025_19222');
  });
});
