import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { normalizeProcesso, textContainsProcesso } from '../../domain/processo.js';
import type { PublicationExtraction } from '../../domain/schemas.js';
import type {
  PublicationFields,
  PublicationResult,
  SearchResultItem,
  SearchState,
  SearchTransition,
} from '../../domain/types.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import { extractTextFromPdf } from '../../infrastructure/pdf-parser.js';
import { withTempFile } from '../../infrastructure/temp-files.js';
import { extractPublicationFields } from '../extraction/index.js';
import type { ExtractionAdapter, RetryHooks, RetryPolicy } from '../extraction/index.js';
import type { CaptchaGate } from './captcha-gate.js';
import { rankCandidates, toSearchItems } from './ranking.js';
import type { GazettePortal } from './types.js';

export { CaptchaGate, ManualSolveSignal } from './captcha-gate.js';
export type { CaptchaGateOptions, ManualWait } from './captcha-gate.js';
export { rankCandidates, toSearchItems, isExtrato } from './ranking.js';
export { parseResultCards, parseResultTotal, pageDownloadUrl } from './results-parser.js';
export type { CaptchaChallenge, CaptchaStatus, GazettePortal, ResultCard, ResultsPage } from './types.js';

/** Candidates downloaded per processo before giving up on the result list. */
const MAX_CANDIDATES = 5;

/** Failures that only rule out one candidate document. */
const CANDIDATE_ERRORS: ReadonlySet<string> = new Set([ErrorCode.DOWNLOAD_FAILED, ErrorCode.PARSING_ERROR]);

export interface PublicationSearchDeps {
  portal: GazettePortal;
  gate: CaptchaGate;
  extractor: ExtractionAdapter;
  policy: RetryPolicy;
  downloadDir: string;
  log?: Logger;
  now?: () => Date;
  retryHooks?: RetryHooks;
}

interface CandidateOutcome {
  url: string;
  containsProcesso: boolean;
  extraction: PublicationExtraction;
}

function toPublicationFields(extraction: PublicationExtraction): PublicationFields {
  return {
    numero_contrato: extraction.numero_contrato,
    valor_contrato: extraction.valor_contrato,
    data_assinatura: extraction.data_assinatura,
    objeto: extraction.objeto,
    partes: extraction.partes,
    prazo: extraction.prazo,
  };
}

/**
 * Searches the gazette for one processo and reads the best matching publication. Runs the
 * search state machine and records every transition in the result's trail. A search without
 * a qualifying candidate is a valid result with `publication_found = false`.
 */
export class PublicationSearchEngine {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: PublicationSearchDeps) {
    this.log = (deps.log ?? logger).child({ module: 'publication-search' });
    this.now = deps.now ?? (() => new Date());
  }

  async search(rawProcesso: string, signal?: AbortSignal): Promise<Result<PublicationResult, AppError>> {
    const processo = normalizeProcesso(rawProcesso);
    const log = this.log.child({ processo });
    const trail: SearchTransition[] = [];
    const enter = (state: SearchState, detail?: string) => {
      trail.push({ state, at: this.now().toISOString(), ...(detail !== undefined && { detail }) });
    };
    const fail = (error: AppError): Result<PublicationResult, AppError> => {
      const state = trail.length > 0 ? trail[trail.length - 1].state : 'SEARCH_SUBMITTED';
      log.warn({ state, errorCode: error.code, retryable: error.retryable }, 'Publication search failed');
      return err({ ...error, state: error.state ?? state });
    };

    enter('SEARCH_SUBMITTED');
    const submitted = await this.deps.portal.submitSearch(processo);
    if (!submitted.ok) return fail(submitted.error);

    enter('CAPTCHA_CHECK');
    const captcha = await this.deps.portal.captchaStatus();
    if (!captcha.ok) return fail(captcha.error);
    if (captcha.value === 'blocked') {
      enter('CAPTCHA_BLOCKED');
      const cleared = await this.deps.gate.clear(this.deps.portal, processo, signal);
      if (!cleared.ok) return fail(cleared.error);
    }
    enter('CAPTCHA_CLEAR');

    const page = await this.deps.portal.readResults();
    if (!page.ok) return fail(page.error);
    const items = toSearchItems(page.value.cards, processo);
    enter('RESULTS_RENDERED', `${page.value.total} results, ${items.length} read`);

    const candidates = rankCandidates(items).slice(0, MAX_CANDIDATES);
    const result = (found: Partial<PublicationResult>): PublicationResult => ({
      processo,
      publication_found: false,
      publication_date: null,
      publication_url: null,
      extracted_fields: null,
      search_result_items: items,
      search_total: page.value.total,
      edition_number: null,
      page_number: null,
      tipo_extrato: null,
      trail,
      ...found,
    });

    let lastError: AppError | null = null;
    let checked = 0;
    for (const candidate of candidates) {
      enter('MATCH_SELECTED', `result ${candidate.index}`);
      const outcome = await this.readCandidate(candidate, processo, enter, signal);
      const reached = trail[trail.length - 1].state;
      enter('CLEANUP');

      if (!outcome.ok) {
        const error = { ...outcome.error, state: outcome.error.state ?? reached };
        if (!CANDIDATE_ERRORS.has(error.code)) return fail(error);
        log.warn({ candidate: candidate.index, state: reached, errorCode: error.code }, 'Candidate document unusable, trying next');
        lastError = error;
        continue;
      }
      checked++;

      const { extraction, url, containsProcesso } = outcome.value;
      if (!containsProcesso && !extraction.processo_matched) {
        log.info({ candidate: candidate.index }, 'Candidate document does not mention the processo');
        continue;
      }

      enter('DONE');
      log.info({ candidate: candidate.index, publicationDate: candidate.publication_date }, 'Publication located');
      return ok(
        result({
          publication_found: true,
          publication_date: candidate.publication_date,
          publication_url: url,
          extracted_fields: toPublicationFields(extraction),
          edition_number: candidate.edition_number,
          page_number: candidate.page_number,
          tipo_extrato: extraction.tipo_extrato,
        }),
      );
    }

    if (checked === 0 && lastError !== null) return fail(lastError);

    enter('NO_MATCH', candidates.length === 0 ? 'no result quotes the processo' : `${checked} documents checked`);
    enter('DONE');
    log.info({ results: items.length, candidates: candidates.length }, 'Publication not located');
    return ok(result({}));
  }

  /** Downloads, reads and extracts one candidate. The downloaded file never outlives the call. */
  private async readCandidate(
    candidate: SearchResultItem,
    processo: string,
    enter: (state: SearchState, detail?: string) => void,
    signal?: AbortSignal,
  ): Promise<Result<CandidateOutcome, AppError>> {
    return withTempFile<Result<CandidateOutcome, AppError>>(this.deps.downloadDir, '.pdf', async (path) => {
      enter('DOWNLOADING');
      const url = await this.deps.portal.downloadCandidate(candidate, path);
      if (!url.ok) return url;

      let data: Uint8Array;
      try {
        data = new Uint8Array(await readFile(path));
      } catch (cause) {
        return err(createAppError(ErrorCode.DOWNLOAD_FAILED, 'Downloaded document is not readable', true, describeCause(cause)));
      }

      const text = await extractTextFromPdf(data, processo);
      if (!text.ok) return text;

      enter('EXTRACTING');
      const extraction = await extractPublicationFields(
        this.deps.extractor,
        text.value,
        processo,
        this.deps.policy,
        { ...this.deps.retryHooks, ...(signal !== undefined && { signal }) },
      );
      if (!extraction.ok) return extraction;

      return ok({
        url: url.value,
        containsProcesso: textContainsProcesso(text.value, processo),
        extraction: extraction.value,
      });
    });
  }
}
