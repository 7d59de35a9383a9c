import {
  pgTable,
  uuid,
  text,
  boolean,
  timestamp,
  jsonb,
  integer,
  uniqueIndex,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const conformityResults = pgTable(
  'conformity_results',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    runId: text('run_id').notNull(),
    processo: text('processo').notNull(),
    companyId: text('company_id'),
    companyName: text('company_name'),
    overallStatus: text('overall_status').notNull(),
    conformityScore: integer('conformity_score').notNull(),
    publicationStatus: text('publication_status').notNull(),
    timely: boolean('timely'),
    daysDifference: integer('days_difference'),
    publicationDate: text('publication_date'),
    publicationUrl: text('publication_url'),
    fieldChecks: jsonb('field_checks').notNull().default([]),
    reasons: jsonb('reasons').notNull().default([]),
    contract: jsonb('contract').notNull(),
    publication: jsonb('publication').notNull(),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('idx_conformity_results_run_processo').on(table.runId, table.processo),
    index('idx_conformity_results_status').on(table.overallStatus),
    check(
      'conformity_results_status_check',
      sql`overall_status IN ('CONFORME', 'PARCIAL', 'NAO_CONFORME')`,
    ),
  ],
);
