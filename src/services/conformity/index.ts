import type {
  CheckedField,
  ConformityResult,
  ContractRecord,
  FieldCheck,
  MatchLevel,
  OverallStatus,
  PublicationFields,
  PublicationResult,
} from '../../domain/types.js';
import type { ConformityReason } from '../../domain/schemas.js';
import { dateSimilarity, moneySimilarity, similarityRatio, toMatchLevel } from './similarity.js';
import { computeTimeliness, PUBLICATION_DEADLINE_DAYS } from './timeliness.js';

export { similarityRatio, moneySimilarity, dateSimilarity, toMatchLevel, parseDate, parseMoney } from './similarity.js';
export { computeTimeliness, PUBLICATION_DEADLINE_DAYS } from './timeliness.js';
export type { Timeliness } from './timeliness.js';

export interface ConformityOptions {
  deadlineDays?: number;
}

/** Score at or above which a single divergent field does not make the contract non-compliant. */
const COUNTERVAILING_SCORE = 80;

const CONFIDENT_LEVELS: ReadonlySet<MatchLevel> = new Set<MatchLevel>(['EXATO', 'ALTO']);
const DIVERGENT_LEVELS: ReadonlySet<MatchLevel> = new Set<MatchLevel>(['BAIXO', 'NENHUM']);

type Reader = (fields: PublicationFields) => string | null;

interface FieldSpec {
  field: CheckedField;
  read: Reader;
  score: (contract: PublicationFields, publication: PublicationFields) => number;
}

function field(
  name: CheckedField,
  read: Reader,
  compare: (a: string | null, b: string | null) => number,
): FieldSpec {
  return { field: name, read, score: (c, p) => compare(read(c), read(p)) };
}

function prazoText(fields: PublicationFields): string | null {
  const { data_inicio, data_fim } = fields.prazo;
  if (data_inicio === null && data_fim === null) return null;
  return `${data_inicio ?? '?'} a ${data_fim ?? '?'}`;
}

const FIELD_SPECS: readonly FieldSpec[] = [
  field('contratante', (f) => f.partes.contratante, similarityRatio),
  field('contratada', (f) => f.partes.contratada, similarityRatio),
  field('objeto', (f) => f.objeto, similarityRatio),
  field('valor_contrato', (f) => f.valor_contrato, moneySimilarity),
  field('numero_contrato', (f) => f.numero_contrato, similarityRatio),
  field('data_assinatura', (f) => f.data_assinatura, dateSimilarity),
  {
    field: 'prazo',
    read: prazoText,
    score: (c, p) =>
      (dateSimilarity(c.prazo.data_inicio, p.prazo.data_inicio) + dateSimilarity(c.prazo.data_fim, p.prazo.data_fim)) / 2,
  },
];

const EMPTY_FIELDS: PublicationFields = {
  numero_contrato: null,
  valor_contrato: null,
  data_assinatura: null,
  objeto: null,
  partes: { contratante: null, contratada: null },
  prazo: { data_inicio: null, data_fim: null },
};

function compareField(spec: FieldSpec, contract: PublicationFields, publication: PublicationFields): FieldCheck {
  const score = spec.score(contract, publication);
  return {
    field_name: spec.field,
    contract_value: spec.read(contract),
    publication_value: spec.read(publication),
    match_level: toMatchLevel(score),
    similarity_score: score,
  };
}

export function compareFields(contract: PublicationFields, publication: PublicationFields): FieldCheck[] {
  return FIELD_SPECS.map((spec) => compareField(spec, contract, publication));
}

function isMissingOnOneSide(check: FieldCheck): boolean {
  return (check.contract_value === null) !== (check.publication_value === null);
}

/** A contract value with nothing published against it; a missing contract value gives no evidence either way. */
function countsAsDivergent(check: FieldCheck): boolean {
  if (!DIVERGENT_LEVELS.has(check.match_level)) return false;
  return !isMissingOnOneSide(check) || check.contract_value !== null;
}

export function conformityScore(checks: readonly FieldCheck[]): number {
  if (checks.length === 0) return 0;
  const mean = checks.reduce((sum, c) => sum + c.similarity_score, 0) / checks.length;
  return Math.round(mean * 100);
}

/**
 * Reconciles a contract with what the gazette published. Pure: the same inputs always give
 * the same result. A publication that was not located yields NAO_CONFORME with
 * PUBLICATION_NOT_LOCATED and unknown timeliness; it never states that nothing was published.
 */
export function evaluateConformity(
  contract: ContractRecord,
  publication: PublicationResult,
  options: ConformityOptions = {},
): ConformityResult {
  const deadlineDays = options.deadlineDays ?? PUBLICATION_DEADLINE_DAYS;

  if (!publication.publication_found) {
    return {
      processo: contract.processo,
      overall_status: 'NAO_CONFORME',
      conformity_score: 0,
      timely: null,
      days_difference: null,
      deadline_days: deadlineDays,
      publication_status: 'NOT_LOCATED',
      field_checks: [],
      reasons: [{ code: 'PUBLICATION_NOT_LOCATED' }],
    };
  }

  const timeliness = computeTimeliness(contract.data_assinatura, publication.publication_date, true, deadlineDays);
  const checks = compareFields(contract, publication.extracted_fields ?? EMPTY_FIELDS);
  const score = conformityScore(checks);

  const reasons: ConformityReason[] = [];
  if (timeliness.reason !== null) reasons.push({ code: timeliness.reason });
  for (const check of checks) {
    if (isMissingOnOneSide(check)) {
      reasons.push({ code: 'FIELD_MISSING', field: check.field_name });
    } else if (DIVERGENT_LEVELS.has(check.match_level)) {
      reasons.push({ code: 'FIELD_DIVERGENT', field: check.field_name });
    } else if (check.match_level === 'MEDIO') {
      reasons.push({ code: 'FIELD_PARTIAL', field: check.field_name });
    }
  }

  const allConfident = checks.every((c) => CONFIDENT_LEVELS.has(c.match_level));
  const divergent = checks.some(countsAsDivergent);
  const hardDivergence = divergent && score < COUNTERVAILING_SCORE;
  const lateWithDoubts = timeliness.timely === false && !allConfident;

  let status: OverallStatus;
  if (timeliness.timely === true && allConfident) {
    status = 'CONFORME';
  } else if (hardDivergence || lateWithDoubts) {
    status = 'NAO_CONFORME';
  } else {
    status = 'PARCIAL';
  }

  return {
    processo: contract.processo,
    overall_status: status,
    conformity_score: score,
    timely: timeliness.timely,
    days_difference: timeliness.days_difference,
    deadline_days: deadlineDays,
    publication_status: 'LOCATED',
    field_checks: checks,
    reasons,
  };
}
