import { describe, it, expect } from 'vitest';
import {
  dateSimilarity,
  moneySimilarity,
  parseDate,
  parseMoney,
  similarityRatio,
  tokenSimilarity,
  tokenize,
  toMatchLevel,
} from '../../src/services/conformity/similarity.js';

describe('toMatchLevel', () => {
  it.each([
    [1.0, 'EXATO'],
    [0.8, 'ALTO'],
    [0.79999, 'MEDIO'],
    [0.5, 'MEDIO'],
    [0.49999, 'BAIXO'],
    [0.2, 'BAIXO'],
    [0.19999, 'NENHUM'],
    [0, 'NENHUM'],
  ])('maps %s to %s', (ratio, level) => {
    expect(toMatchLevel(ratio)).toBe(level);
  });
});

describe('tokenize', () => {
  it('drops accents, case and punctuation', () => {
    expect(tokenize('Secretaria Municipal de Educação, Esportes e Lazer.')).toEqual([
      'secretaria',
      'municipal',
      'de',
      'educacao',
      'esportes',
      'e',
      'lazer',
    ]);
  });
});

describe('tokenSimilarity', () => {
  it('scores an abbreviation as a near match', () => {
    expect(tokenSimilarity('corp', 'corporation')).toBe(0.9);
  });

  it('does not treat two-letter prefixes as abbreviations', () => {
    expect(tokenSimilarity('co', 'corporation')).toBe(0);
  });

  it('keeps close spellings and drops unrelated words', () => {
    expect(tokenSimilarity('fornecimento', 'fornecimeto')).toBeCloseTo(22 / 23);
    expect(tokenSimilarity('limpeza', 'merenda')).toBe(0);
  });
});

describe('similarityRatio', () => {
  it('rates "ACME Corp" against "ACME CORPORATION" as ALTO', () => {
    const ratio = similarityRatio('ACME Corp', 'ACME CORPORATION');
    expect(ratio).toBeCloseTo(0.95);
    expect(toMatchLevel(ratio)).toBe('ALTO');
  });

  it('is exactly 1 when only case, accents and punctuation differ', () => {
    expect(similarityRatio('Secretaria Municipal de Educação', 'SECRETARIA MUNICIPAL DE EDUCACAO.')).toBe(1);
  });

  it('counts shared tokens in order', () => {
    expect(similarityRatio('Servicos de limpeza predial', 'Servicos de limpeza')).toBeCloseTo(6 / 7);
    expect(similarityRatio('Servicos de limpeza', 'Servicos de manutencao predial')).toBeCloseTo(4 / 7);
  });

  it('treats two empty values as matching and one empty value as no match', () => {
    expect(similarityRatio(null, '  ')).toBe(1);
    expect(similarityRatio('ACME', null)).toBe(0);
  });

  it('is symmetric', () => {
    const a = 'Fornecimento de material de escritorio';
    const b = 'Fornecimento de materiais para escritorio';
    expect(similarityRatio(a, b)).toBeCloseTo(similarityRatio(b, a));
  });
});

describe('parseMoney', () => {
  it.each([
    ['R$ 1.234.567,89', 1234567.89],
    ['150000.00', 150000],
    ['R$ 572.734,00 (quinhentos e setenta e dois mil)', 572734],
    ['1.234', 1234],
  ])('parses %s', (text, value) => {
    expect(parseMoney(text)).toBe(value);
  });

  it('returns null without digits', () => {
    expect(parseMoney('nao informado')).toBeNull();
    expect(parseMoney(null)).toBeNull();
  });
});

describe('moneySimilarity', () => {
  it('matches the same amount written differently', () => {
    expect(moneySimilarity('R$ 150.000,00', '150000.00')).toBe(1);
  });

  it('bands small relative differences', () => {
    expect(moneySimilarity('R$ 150.000,00', 'R$ 151.000,00')).toBe(0.99);
    expect(moneySimilarity('R$ 150.000,00', 'R$ 155.000,00')).toBe(0.95);
    expect(moneySimilarity('R$ 150.000,00', 'R$ 160.000,00')).toBe(0.9);
  });

  it('decays with large differences', () => {
    expect(moneySimilarity('R$ 150.000,00', 'R$ 300.000,00')).toBeCloseTo(1 / 3);
  });

  it('scores a missing side as 0', () => {
    expect(moneySimilarity('R$ 10,00', null)).toBe(0);
  });
});

describe('parseDate', () => {
  it('accepts the common Brazilian and ISO forms', () => {
    const expected = Date.UTC(2025, 0, 15);
    expect(parseDate('15/01/2025')?.getTime()).toBe(expected);
    expect(parseDate('2025-01-15')?.getTime()).toBe(expected);
    expect(parseDate('15-01-2025')?.getTime()).toBe(expected);
    expect(parseDate('15.01.2025')?.getTime()).toBe(expected);
  });

  it('rejects impossible dates', () => {
    expect(parseDate('31/02/2025')).toBeNull();
    expect(parseDate('janeiro de 2025')).toBeNull();
  });
});

describe('dateSimilarity', () => {
  it('compares calendar days regardless of format', () => {
    expect(dateSimilarity('01/01/2025', '2025-01-01')).toBe(1);
    expect(dateSimilarity('01/01/2025', '02/01/2025')).toBe(0);
  });
});
