import { z } from 'zod';
import {
  CHECKED_FIELDS,
  CONFORMITY_REASONS,
  MATCH_LEVELS,
  OVERALL_STATUSES,
  PUBLICATION_STATUSES,
  SEARCH_STATES,
} from './types.js';

/** Free-text value as the extraction service or the gazette renders it; blanks become null. */
const textField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text.length > 0 ? text : null;
  });

export const partesSchema = z.object({
  contratante: textField,
  contratada: textField,
});

export const prazoSchema = z.object({
  data_inicio: textField,
  data_fim: textField,
});

export const publicationFieldsSchema = z.object({
  numero_contrato: textField,
  valor_contrato: textField,
  data_assinatura: textField,
  objeto: textField,
  partes: partesSchema.default({}),
  prazo: prazoSchema.default({}),
});

export const contractRecordSchema = publicationFieldsSchema.extend({
  processo: z.string().trim().min(1, 'processo is required'),
});

/** Output expected from the extraction service when reading a gazette page. */
export const publicationExtractionSchema = publicationFieldsSchema.extend({
  processo_matched: z.boolean().default(false),
  tipo_extrato: textField,
});

export const searchResultItemSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string(),
  publication_date: z.string().nullable(),
  edition_number: z.string().nullable(),
  page_number: z.string().nullable(),
  url: z.string().nullable(),
  is_extrato: z.boolean(),
  contains_processo: z.boolean(),
});

export const searchTransitionSchema = z.object({
  state: z.enum(SEARCH_STATES),
  at: z.string(),
  detail: z.string().optional(),
});

export const publicationResultSchema = z.object({
  processo: z.string().min(1),
  publication_found: z.boolean(),
  publication_date: z.string().nullable().default(null),
  publication_url: z.string().nullable().default(null),
  extracted_fields: publicationFieldsSchema.nullable().default(null),
  search_result_items: z.array(searchResultItemSchema).default([]),
  search_total: z.number().int().nonnegative().default(0),
  edition_number: z.string().nullable().default(null),
  page_number: z.string().nullable().default(null),
  tipo_extrato: z.string().nullable().default(null),
  trail: z.array(searchTransitionSchema).default([]),
});

export const fieldCheckSchema = z.object({
  field_name: z.enum(CHECKED_FIELDS),
  contract_value: z.string().nullable(),
  publication_value: z.string().nullable(),
  match_level: z.enum(MATCH_LEVELS),
  similarity_score: z.number().min(0).max(1),
});

export const conformityReasonSchema = z.object({
  code: z.enum(CONFORMITY_REASONS),
  field: z.enum(CHECKED_FIELDS).optional(),
});

export const conformityResultSchema = z.object({
  processo: z.string().min(1),
  overall_status: z.enum(OVERALL_STATUSES),
  conformity_score: z.number().int().min(0).max(100),
  timely: z.boolean().nullable(),
  days_difference: z.number().int().nullable(),
  deadline_days: z.number().int().positive(),
  publication_status: z.enum(PUBLICATION_STATUSES),
  field_checks: z.array(fieldCheckSchema),
  reasons: z.array(conformityReasonSchema),
});

export const checkpointSchema = z.object({
  run_id: z.string().min(1),
  last_processed_company_id: z.string().nullable(),
  processed_processo_ids: z.array(z.string()),
  completed_company_ids: z.array(z.string()),
  updated_at: z.string(),
});

export const contractPublicationPairSchema = z.object({
  contract: contractRecordSchema,
  publication: publicationResultSchema,
});

export const contractPublicationPairsInput = z.array(contractPublicationPairSchema);

/** Everything persisted for one processo. */
export const auditRecordSchema = z.object({
  processo: z.string().min(1),
  company_id: z.string().nullable(),
  company_name: z.string().nullable(),
  contract: contractRecordSchema,
  publication: publicationResultSchema,
  conformity: conformityResultSchema,
  recorded_at: z.string(),
});

export const companySeedRowSchema = z.object({
  company_id: z.string().trim().min(1, 'company_id is required'),
  name: z.string().trim().default(''),
});

export type ContractRecord = z.infer<typeof contractRecordSchema>;
export type PublicationFields = z.infer<typeof publicationFieldsSchema>;
export type PublicationExtraction = z.infer<typeof publicationExtractionSchema>;
export type SearchResultItem = z.infer<typeof searchResultItemSchema>;
export type PublicationResult = z.infer<typeof publicationResultSchema>;
export type FieldCheck = z.infer<typeof fieldCheckSchema>;
export type ConformityReason = z.infer<typeof conformityReasonSchema>;
export type ConformityResult = z.infer<typeof conformityResultSchema>;
export type Checkpoint = z.infer<typeof checkpointSchema>;
export type ContractPublicationPair = z.infer<typeof contractPublicationPairSchema>;
export type AuditRecord = z.infer<typeof auditRecordSchema>;
