import type { MatchLevel } from '../../domain/types.js';

/** Lower bounds, checked top-down. */
export const MATCH_THRESHOLDS: ReadonlyArray<readonly [MatchLevel, number]> = [
  ['EXATO', 1.0],
  ['ALTO', 0.8],
  ['MEDIO', 0.5],
  ['BAIXO', 0.2],
];

export function toMatchLevel(ratio: number): MatchLevel {
  for (const [level, min] of MATCH_THRESHOLDS) {
    if (ratio >= min) return level;
  }
  return 'NENHUM';
}

const ABBREVIATION_SCORE = 0.9;
const MIN_ABBREVIATION_LENGTH = 3;
const MIN_TOKEN_SIMILARITY = 0.75;

export function tokenize(value: string): string[] {
  return value
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .filter(Boolean);
}

function lcsLength(a: string, b: string): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const row = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      row[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], row[j - 1]);
    }
    prev = row;
  }
  return prev[b.length];
}

/**
 * Token-level score: identical tokens 1, an abbreviation ("corp" for "corporation") 0.9,
 * near-identical spellings their character ratio, anything else 0.
 */
export function tokenSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  if (short.length >= MIN_ABBREVIATION_LENGTH && long.startsWith(short)) return ABBREVIATION_SCORE;
  const ratio = (2 * lcsLength(a, b)) / (a.length + b.length);
  return ratio >= MIN_TOKEN_SIMILARITY ? ratio : 0;
}

/**
 * Similarity of two free-text values in [0, 1]: 2 x the best in-order token alignment weight
 * over the total token count. Case, accents, punctuation and spacing are ignored.
 */
export function similarityRatio(a: string | null, b: string | null): number {
  const left = a?.trim() ?? '';
  const right = b?.trim() ?? '';
  if (left === '' && right === '') return 1;
  if (left === '' || right === '') return 0;

  const ta = tokenize(left);
  const tb = tokenize(right);
  if (ta.length === 0 && tb.length === 0) return 1;
  if (ta.length === 0 || tb.length === 0) return 0;

  let prev = new Array<number>(tb.length + 1).fill(0);
  for (let i = 1; i <= ta.length; i++) {
    const row = new Array<number>(tb.length + 1).fill(0);
    for (let j = 1; j <= tb.length; j++) {
      row[j] = Math.max(prev[j], row[j - 1], prev[j - 1] + tokenSimilarity(ta[i - 1], tb[j - 1]));
    }
    prev = row;
  }

  return Math.min(1, (2 * prev[tb.length]) / (ta.length + tb.length));
}

/** Parses "R$ 1.234.567,89", "1234567.89" and similar; null when no amount is present. */
export function parseMoney(value: string | null): number | null {
  if (!value) return null;
  let cleaned = value.replace(/R\$\s*/gi, '').replace(/\([^)]*\)/g, '').trim();
  if (cleaned.includes(',')) {
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  } else if (/^\d{1,3}(\.\d{3})+$/.test(cleaned)) {
    cleaned = cleaned.replace(/\./g, '');
  }
  const match = /\d+(\.\d+)?/.exec(cleaned);
  return match ? Number(match[0]) : null;
}

/** Relative-difference bands: rounding noise scores 1, under 1% 0.99, under 5% 0.95, under 10% 0.9. */
export function moneySimilarity(a: string | null, b: string | null): number {
  const left = parseMoney(a);
  const right = parseMoney(b);
  if (left === null || right === null) return similarityRatio(a, b);
  if (left === right) return 1;
  if (left === 0 || right === 0) return 0;

  const diffPercent = (Math.abs(left - right) / ((left + right) / 2)) * 100;
  if (diffPercent < 0.01) return 1;
  if (diffPercent < 1) return 0.99;
  if (diffPercent < 5) return 0.95;
  if (diffPercent < 10) return 0.9;
  return Math.max(0, 1 - diffPercent / 100);
}

const DATE_FORMATS: ReadonlyArray<{ pattern: RegExp; order: readonly [number, number, number] }> = [
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: [3, 2, 1] },
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})(?:T.*)?$/, order: [1, 2, 3] },
  { pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, order: [3, 2, 1] },
  { pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, order: [3, 2, 1] },
];

/** Calendar date as UTC midnight; accepts DD/MM/YYYY, YYYY-MM-DD, DD-MM-YYYY and DD.MM.YYYY. */
export function parseDate(value: string | null): Date | null {
  if (!value) return null;
  const text = value.trim();
  for (const { pattern, order } of DATE_FORMATS) {
    const m = pattern.exec(text);
    if (!m) continue;
    const year = Number(m[order[0]]);
    const month = Number(m[order[1]]);
    const day = Number(m[order[2]]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
      return date;
    }
    return null;
  }
  return null;
}

/** Same day scores 1, different days 0; unparseable values fall back to text similarity. */
export function dateSimilarity(a: string | null, b: string | null): number {
  const left = parseDate(a);
  const right = parseDate(b);
  if (left === null || right === null) return similarityRatio(a, b);
  return left.getTime() === right.getTime() ? 1 : 0;
}
