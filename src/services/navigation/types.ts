import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { CompanyRecord, NavigationState } from '../../domain/types.js';

/** Anchor as rendered in the portal's processo list. */
export interface RawLink {
  text: string;
  href: string;
  /** Company the portal attributes the row to, when it shows one. */
  companyId?: string;
}

export type ScrollDirection = 'top' | 'next';

/**
 * Semantic operations over the contracts portal. Implementations own every selector and
 * rendering quirk; callers only see these capabilities. A node that is missing from the page
 * comes back as an empty list, not as an error.
 */
export interface PortalAdapter {
  open(): Promise<Result<void, AppError>>;
  applyFilter(year: number): Promise<Result<void, AppError>>;
  /** Rows currently materialized in the virtualized company table. */
  listVisibleCompanies(): Promise<Result<CompanyRecord[], AppError>>;
  scrollTable(direction: ScrollDirection): Promise<Result<{ atEnd: boolean }, AppError>>;
  selectCompany(company: CompanyRecord): Promise<Result<void, AppError>>;
  listOrgans(): Promise<Result<string[], AppError>>;
  selectOrgan(name: string): Promise<Result<void, AppError>>;
  listUnits(): Promise<Result<string[], AppError>>;
  selectUnit(name: string): Promise<Result<void, AppError>>;
  listObjects(): Promise<Result<string[], AppError>>;
  selectObject(name: string): Promise<Result<void, AppError>>;
  collectLinks(): Promise<Result<RawLink[], AppError>>;
  /** Bounded wait for the portal to finish re-rendering after a selection. */
  waitForSettle(): Promise<Result<void, AppError>>;
  /** Back to the initial page, dropping every selection. */
  reset(): Promise<Result<void, AppError>>;
  /** Navigate away and back, discarding any client-side table state. */
  hardReset(): Promise<Result<void, AppError>>;
}

export const NAVIGATION_TRANSITIONS: Readonly<Record<NavigationState, readonly NavigationState[]>> = {
  INIT: ['FILTERED'],
  FILTERED: ['COMPANY_SELECTED'],
  COMPANY_SELECTED: ['ORGAN_SELECTED', 'LEAF_COLLECTED'],
  ORGAN_SELECTED: ['UNIT_SELECTED', 'LEAF_COLLECTED'],
  // selecting an object keeps the unit selected
  UNIT_SELECTED: ['UNIT_SELECTED', 'LEAF_COLLECTED'],
  LEAF_COLLECTED: [],
  RESET: ['INIT'],
};

export function canTransition(from: NavigationState, to: NavigationState): boolean {
  return to === 'RESET' || NAVIGATION_TRANSITIONS[from].includes(to);
}
