import type { ResultCard } from './types.js';

const CARD_HEADER =
  /Di[aá]rio publicado em:\s*(\d{2}\/\d{2}\/\d{4})\s*-\s*Edi[cç][aã]o\s*(\d+)\s*-\s*P[aá]g\.?\s*(\d+)/gi;
const TOTAL_PATTERN = /(\d+)\s+resultados?\s+encontrados?/i;
const NO_RESULTS = /nenhum resultado/i;
const LAST_CARD_CHARS = 1500;

export function pageDownloadUrl(gazetteUrl: string, edition: string, page: string): string {
  return `${gazetteUrl.replace(/\/+$/, '')}/portal/edicoes/download/${edition}/${page}`;
}

/**
 * Splits the rendered results page into cards. Each card starts at its
 * "Diario publicado em: DD/MM/YYYY - Edicao N - Pag. P" header and runs to the next one.
 */
export function parseResultCards(bodyText: string, gazetteUrl: string): ResultCard[] {
  const headers = [...bodyText.matchAll(CARD_HEADER)];
  return headers.map((match, i) => {
    const start = match.index ?? 0;
    const next = headers[i + 1];
    const end = next?.index ?? Math.min(start + LAST_CARD_CHARS, bodyText.length);
    const [, date, edition, page] = match;
    return {
      text: bodyText.slice(start, end).trim(),
      publication_date: date,
      edition_number: edition,
      page_number: page,
      url: pageDownloadUrl(gazetteUrl, edition, page),
    };
  });
}

/** Result count the page reports, or null when the page shows neither a count nor cards. */
export function parseResultTotal(bodyText: string): number | null {
  const count = TOTAL_PATTERN.exec(bodyText);
  if (count) return Number(count[1]);
  if (NO_RESULTS.test(bodyText)) return 0;
  const cards = [...bodyText.matchAll(CARD_HEADER)].length;
  return cards > 0 ? cards : null;
}
