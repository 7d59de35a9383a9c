import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CompanyRecord } from '../../domain/types.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import type { PortalAdapter } from './types.js';

/** Passes without a new company id before the table counts as stable. */
const QUIET_PASSES_TO_CONVERGE = 2;

export interface RowCollectorOptions {
  maxPasses: number;
  log?: Logger;
}

export interface CollectStats {
  passes: number;
  correctivePasses: number;
  /** Companies first seen during the corrective sweep. */
  recoveredByCorrection: number;
  total: number;
}

/**
 * Enumerates every company of the virtualized table. Only the rows in view exist in the page,
 * so the table is read in scroll passes until two consecutive passes add nothing; a full
 * corrective sweep from the top then picks up rows the first cycle failed to render.
 */
export class RowCollector {
  private readonly log: Logger;

  constructor(
    private readonly portal: PortalAdapter,
    private readonly options: RowCollectorOptions,
  ) {
    this.log = (options.log ?? logger).child({ module: 'row-collector' });
  }

  /** Restartable: every call starts again from the top of the table. */
  async *stream(): AsyncGenerator<CompanyRecord, Result<CollectStats, AppError>, void> {
    const seen = new Set<string>();
    const { maxPasses } = this.options;

    const top = await this.portal.scrollTable('top');
    if (!top.ok) return top;

    let passes = 0;
    let quiet = 0;
    while (quiet < QUIET_PASSES_TO_CONVERGE) {
      if (passes >= maxPasses) return err(this.unstable(passes, seen.size));

      const rows = await this.portal.listVisibleCompanies();
      if (!rows.ok) return rows;
      passes++;

      let added = 0;
      for (const company of rows.value) {
        if (seen.has(company.company_id)) continue;
        seen.add(company.company_id);
        added++;
        yield company;
      }
      quiet = added === 0 ? quiet + 1 : 0;

      const scrolled = await this.portal.scrollTable('next');
      if (!scrolled.ok) return scrolled;
      this.log.debug({ pass: passes, added, total: seen.size, atEnd: scrolled.value.atEnd }, 'Table pass read');
    }

    const beforeCorrection = seen.size;
    const restart = await this.portal.scrollTable('top');
    if (!restart.ok) return restart;

    let correctivePasses = 0;
    for (;;) {
      if (correctivePasses >= maxPasses) return err(this.unstable(passes + correctivePasses, seen.size));

      const rows = await this.portal.listVisibleCompanies();
      if (!rows.ok) return rows;
      correctivePasses++;

      for (const company of rows.value) {
        if (seen.has(company.company_id)) continue;
        seen.add(company.company_id);
        yield company;
      }

      const scrolled = await this.portal.scrollTable('next');
      if (!scrolled.ok) return scrolled;
      if (scrolled.value.atEnd) break;
    }

    const stats: CollectStats = {
      passes,
      correctivePasses,
      recoveredByCorrection: seen.size - beforeCorrection,
      total: seen.size,
    };
    this.log.info(stats, 'Company table enumerated');
    return ok(stats);
  }

  async collect(): Promise<Result<CompanyRecord[], AppError>> {
    const companies: CompanyRecord[] = [];
    const iterator = this.stream();
    for (;;) {
      const next = await iterator.next();
      if (next.done) return next.value.ok ? ok(companies) : next.value;
      companies.push(next.value);
    }
  }

  private unstable(passes: number, seen: number): AppError {
    this.log.warn({ passes, seen, errorCode: ErrorCode.NAVIGATION_TIMEOUT }, 'Company table never stabilized');
    return createAppError(
      ErrorCode.NAVIGATION_TIMEOUT,
      `Company table did not stabilize within ${this.options.maxPasses} passes`,
      true,
      `${seen} companies seen`,
    );
  }
}

/**
 * Collects the company list, retrying once from a hard reset (navigate away, return, filter
 * again) when the first attempt fails.
 */
export async function collectCompaniesWithReset(
  portal: PortalAdapter,
  filterYear: number,
  options: RowCollectorOptions,
): Promise<Result<CompanyRecord[], AppError>> {
  const log = (options.log ?? logger).child({ module: 'row-collector' });
  const first = await new RowCollector(portal, options).collect();
  if (first.ok) return first;

  log.warn({ errorCode: first.error.code, details: first.error.details }, 'Company list failed, retrying after hard reset');

  const reset = await portal.hardReset();
  if (!reset.ok) return reset;
  const filtered = await portal.applyFilter(filterYear);
  if (!filtered.ok) return filtered;

  return new RowCollector(portal, options).collect();
}
