import type { ConformityReasonCode } from '../../domain/types.js';
import { parseDate } from './similarity.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const PUBLICATION_DEADLINE_DAYS = 20;

export interface Timeliness {
  /** null when it cannot be determined; never false for lack of evidence. */
  timely: boolean | null;
  days_difference: number | null;
  reason: ConformityReasonCode | null;
}

export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * `days_difference = publication_date - data_assinatura` in whole days;
 * timely when 0 <= days <= deadline.
 */
export function computeTimeliness(
  dataAssinatura: string | null,
  publicationDate: string | null,
  publicationFound: boolean,
  deadlineDays: number = PUBLICATION_DEADLINE_DAYS,
): Timeliness {
  if (!publicationFound) {
    return { timely: null, days_difference: null, reason: null };
  }

  const signed = parseDate(dataAssinatura);
  const published = parseDate(publicationDate);
  if (signed === null || published === null) {
    return { timely: null, days_difference: null, reason: 'TIMELINESS_UNKNOWN' };
  }

  const days = daysBetween(signed, published);
  if (days < 0) {
    return { timely: false, days_difference: days, reason: 'PUBLISHED_BEFORE_SIGNATURE' };
  }
  if (days > deadlineDays) {
    return { timely: false, days_difference: days, reason: 'PUBLISHED_LATE' };
  }
  return { timely: true, days_difference: days, reason: null };
}
