/**
 * Processo identifiers come in two shapes:
 *
 * - current: `SIGLA-PRO-YYYY/NNNNN` (e.g. `SME-PRO-2025/19222`); the portal also renders the
 *   compact form `SMEPRO202519222`
 * - legacy: `NNNNN/NNNN-N` (e.g. `01234/2019-7`)
 *
 * Both are reduced to one canonical spelling so that links, search queries and gazette text
 * can be compared.
 */

export type ProcessoFormat = 'current' | 'legacy' | 'unknown';

export interface ParsedProcesso {
  format: ProcessoFormat;
  canonical: string;
  /** Separator-free parts, in order. */
  parts: string[];
}

const CURRENT_PATTERN = /^([A-Z]{2,6})[-\s]*([A-Z]{3})[-\s]*(\d{4})[/\-\s]*(\d{3,6})$/;
const COMPACT_PATTERN = /^([A-Z]{2,6})([A-Z]{3})(\d{4})(\d{3,6})$/;
const LEGACY_PATTERN = /^(\d{1,5})[/\s]+(\d{4})[-\s]*(\d)$/;
const LEGACY_NUMBER_WIDTH = 5;

function clean(raw: string): string {
  return raw.toUpperCase().replace(/\./g, '').replace(/\s+/g, ' ').trim();
}

export function parseProcesso(raw: string): ParsedProcesso {
  const value = clean(raw);

  const current = CURRENT_PATTERN.exec(value) ?? COMPACT_PATTERN.exec(value.replace(/[\s-]/g, ''));
  if (current) {
    const [, sigla, kind, year, number] = current;
    return {
      format: 'current',
      canonical: `${sigla}-${kind}-${year}/${number}`,
      parts: [sigla, kind, year, number],
    };
  }

  const legacy = LEGACY_PATTERN.exec(value);
  if (legacy) {
    const [, number, year, digit] = legacy;
    const padded = number.padStart(LEGACY_NUMBER_WIDTH, '0');
    return {
      format: 'legacy',
      canonical: `${padded}/${year}-${digit}`,
      parts: [padded, year, digit],
    };
  }

  return { format: 'unknown', canonical: value, parts: value.split(/[^A-Z0-9]+/).filter(Boolean) };
}

export function normalizeProcesso(raw: string): string {
  return parseProcesso(raw).canonical;
}

export function isKnownProcessoFormat(raw: string): boolean {
  return parseProcesso(raw).format !== 'unknown';
}

/** Separator-free comparison key; two spellings of the same processo share it. */
export function processoKey(raw: string): string {
  return parseProcesso(raw).parts.join('');
}

export function matchesProcesso(a: string, b: string): boolean {
  const key = processoKey(a);
  return key.length > 0 && key === processoKey(b);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `text` carries the processo literally, tolerating the separators the gazette
 * uses (hyphen, slash, dot, spaces) and a leading-zero difference on legacy numbers.
 */
export function textContainsProcesso(text: string, processo: string): boolean {
  const parsed = parseProcesso(processo);
  if (parsed.parts.length === 0) return false;

  const parts = parsed.parts.map((part, i) =>
    parsed.format === 'legacy' && i === 0
      ? `0*${escapeRegExp(part.replace(/^0+/, '') || '0')}`
      : escapeRegExp(part),
  );
  const pattern = new RegExp(`(?<![A-Z0-9])${parts.join('[\\s./-]*')}(?![0-9])`, 'i');
  return pattern.test(text.toUpperCase());
}

/** Filesystem-safe key, e.g. `SME-PRO-2025/19222` -> `SME-PRO-2025_19222`. */
export function processoFileKey(processo: string): string {
  return normalizeProcesso(processo).replace(/[^A-Z0-9-]/gi, '_');
}
