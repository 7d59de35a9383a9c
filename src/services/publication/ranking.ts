import type { SearchResultItem } from '../../domain/types.js';
import { textContainsProcesso } from '../../domain/processo.js';
import { parseDate } from '../conformity/similarity.js';
import type { ResultCard } from './types.js';

const STORED_TEXT_CHARS = 500;
const EXTRATO = /\bEXTRATO\b/;

function plain(text: string): string {
  return text.normalize('NFD').replace(/[\u0300-\u036f]/g, '').toUpperCase();
}

/** Publication excerpts, as opposed to notices and corrections. */
export function isExtrato(text: string): boolean {
  return EXTRATO.test(plain(text));
}

export function toSearchItems(cards: readonly ResultCard[], processo: string): SearchResultItem[] {
  return cards.map((card, index) => ({
    index,
    text: card.text.slice(0, STORED_TEXT_CHARS),
    publication_date: card.publication_date,
    edition_number: card.edition_number,
    page_number: card.page_number,
    url: card.url,
    is_extrato: isExtrato(card.text),
    contains_processo: textContainsProcesso(card.text, processo),
  }));
}

function dateValue(item: SearchResultItem): number {
  return parseDate(item.publication_date)?.getTime() ?? Number.NEGATIVE_INFINITY;
}

/**
 * Candidates worth downloading, best first: only items that quote the processo; EXTRATO
 * entries ahead of the rest; the most recent publication first within each group.
 */
export function rankCandidates(items: readonly SearchResultItem[]): SearchResultItem[] {
  return items
    .filter((item) => item.contains_processo)
    .sort((a, b) => {
      if (a.is_extrato !== b.is_extrato) return a.is_extrato ? -1 : 1;
      const byDate = dateValue(b) - dateValue(a);
      if (byDate !== 0 && !Number.isNaN(byDate)) return byDate;
      return a.index - b.index;
    });
}
