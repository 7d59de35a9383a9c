import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { SearchResultItem } from '../../domain/types.js';

export type CaptchaStatus = 'clear' | 'blocked';

/** One result card as the gazette renders it, before ranking. */
export interface ResultCard {
  text: string;
  publication_date: string | null;
  edition_number: string | null;
  page_number: string | null;
  url: string | null;
}

export interface ResultsPage {
  /** Total the gazette reports for the query; may exceed the cards read. */
  total: number;
  cards: ResultCard[];
}

/** A page that may hold a CAPTCHA in front of its content. */
export interface CaptchaChallenge {
  captchaStatus(): Promise<Result<CaptchaStatus, AppError>>;
  /** One automated attempt at the challenge. Resolves true when the page reports it solved. */
  solveCaptchaAutomatically(): Promise<Result<boolean, AppError>>;
}

/**
 * Semantic operations over the official gazette search. Implementations own the page
 * structure; the engine drives them one call at a time.
 */
export interface GazettePortal extends CaptchaChallenge {
  submitSearch(processo: string): Promise<Result<void, AppError>>;
  readResults(): Promise<Result<ResultsPage, AppError>>;
  /** Writes the candidate's document to `destination` and returns the URL it came from. */
  downloadCandidate(item: SearchResultItem, destination: string): Promise<Result<string, AppError>>;
}
