import type { AppError } from './errors.js';

export type {
  ContractRecord,
  PublicationFields,
  PublicationResult,
  SearchResultItem,
  FieldCheck,
  ConformityResult,
  Checkpoint,
  ContractPublicationPair,
  AuditRecord,
} from './schemas.js';

export const NAVIGATION_STATES = [
  'INIT',
  'FILTERED',
  'COMPANY_SELECTED',
  'ORGAN_SELECTED',
  'UNIT_SELECTED',
  'LEAF_COLLECTED',
  'RESET',
] as const;

export type NavigationState = (typeof NAVIGATION_STATES)[number];

export const SEARCH_STATES = [
  'SEARCH_SUBMITTED',
  'CAPTCHA_CHECK',
  'CAPTCHA_CLEAR',
  'CAPTCHA_BLOCKED',
  'RESULTS_RENDERED',
  'MATCH_SELECTED',
  'NO_MATCH',
  'DOWNLOADING',
  'EXTRACTING',
  'CLEANUP',
  'DONE',
] as const;

export type SearchState = (typeof SEARCH_STATES)[number];

export const MATCH_LEVELS = ['EXATO', 'ALTO', 'MEDIO', 'BAIXO', 'NENHUM'] as const;

export type MatchLevel = (typeof MATCH_LEVELS)[number];

export const OVERALL_STATUSES = ['CONFORME', 'PARCIAL', 'NAO_CONFORME'] as const;

export type OverallStatus = (typeof OVERALL_STATUSES)[number];

export const PUBLICATION_STATUSES = ['LOCATED', 'NOT_LOCATED'] as const;

export type PublicationStatus = (typeof PUBLICATION_STATUSES)[number];

export const CONFORMITY_REASONS = [
  'PUBLICATION_NOT_LOCATED',
  'PUBLISHED_LATE',
  'PUBLISHED_BEFORE_SIGNATURE',
  'TIMELINESS_UNKNOWN',
  'FIELD_DIVERGENT',
  'FIELD_MISSING',
  'FIELD_PARTIAL',
] as const;

export type ConformityReasonCode = (typeof CONFORMITY_REASONS)[number];

export const CHECKED_FIELDS = [
  'contratante',
  'contratada',
  'objeto',
  'valor_contrato',
  'numero_contrato',
  'data_assinatura',
  'prazo',
] as const;

export type CheckedField = (typeof CHECKED_FIELDS)[number];

export const SKIP_REASONS = ['captcha', 'timeout', 'parse_error', 'extraction', 'other'] as const;

export type SkipReason = (typeof SKIP_REASONS)[number];

export interface CompanyRecord {
  readonly company_id: string;
  readonly name: string;
}

export interface ProcessoLink {
  processo: string;
  url: string;
  company_id: string;
  company_name: string;
  /** organ / unit / object labels walked to reach the link */
  path: string[];
}

export interface NavigationPath {
  company_id: string;
  organ: string;
  unit: string | null;
  object: string | null;
  links: ProcessoLink[];
}

export interface SkippedBranch {
  company_id: string;
  organ: string;
  state: NavigationState;
  error: AppError;
}

export interface CompanyDiscovery {
  company: CompanyRecord;
  paths: NavigationPath[];
  links: ProcessoLink[];
  skippedBranches: SkippedBranch[];
}

export interface SearchTransition {
  state: SearchState;
  at: string;
  detail?: string;
}
