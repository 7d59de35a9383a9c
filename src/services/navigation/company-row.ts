import type { CompanyRecord } from '../../domain/types.js';

const ROW_PATTERN = /^([\w./-]+)\s*-\s*(.+)$/;
const CURRENCY_PATTERN = /-?[\d.]+,\d{2}/g;
const NUMERIC_ONLY = /^[\d.,\s-]+$/;
const TOTAL_ROW = /\btotal\b/i;
const VALUE_COLUMNS = 5;

/**
 * Parses a company row of the contracts table:
 * `<tax id> - <name> <contracted> <committed> <balance> <settled> <paid>`.
 * Returns null for totals, numeric-only fragments and rows without the five value columns.
 */
export function parseCompanyRow(rowText: string): CompanyRecord | null {
  const text = rowText.replace(/\s+/g, ' ').trim();
  if (text === '' || TOTAL_ROW.test(text) || NUMERIC_ONLY.test(text)) return null;

  const match = ROW_PATTERN.exec(text);
  if (!match) return null;
  const [, companyId, rest] = match;

  const numbers = rest.match(CURRENCY_PATTERN) ?? [];
  if (numbers.length < VALUE_COLUMNS) return null;

  const firstValue = numbers[numbers.length - VALUE_COLUMNS];
  const name = rest.slice(0, rest.indexOf(firstValue)).trim();
  if (name === '') return null;

  return Object.freeze({ company_id: companyId, name });
}
