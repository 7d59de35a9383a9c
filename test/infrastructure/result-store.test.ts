import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { auditRecordSchema } from '../../src/domain/schemas.js';
import type { AuditRecord } from '../../src/domain/types.js';
import { JsonResultStore, toCsvRow } from '../../src/infrastructure/storage/json-result-store.js';

function record(processo: string, overrides: Partial<AuditRecord> = {}): AuditRecord {
  return auditRecordSchema.parse({
    processo,
    company_id: '11.111.111/0001-11',
    company_name: 'ACME, Servicos "Gerais"',
    contract: { processo, numero_contrato: '045/2025', valor_contrato: 'R$ 150.000,00' },
    publication: {
      processo,
      publication_found: true,
      publication_date: '26/01/2025',
      publication_url: 'https://gazette.test/portal/edicoes/download/1000/12',
    },
    conformity: {
      processo,
      overall_status: 'PARCIAL',
      conformity_score: 80,
      timely: false,
      days_difference: 25,
      deadline_days: 20,
      publication_status: 'LOCATED',
      field_checks: [],
      reasons: [{ code: 'PUBLISHED_LATE' }, { code: 'FIELD_DIVERGENT', field: 'valor_contrato' }],
    },
    recorded_at: '2025-03-01T12:00:00.000Z',
    ...overrides,
  });
}

describe('toCsvRow', () => {
  it('escapes commas and quotes and joins the reasons', () => {
    expect(toCsvRow(record('SME-PRO-2025/00001'))).toBe(
      'SME-PRO-2025/00001,11.111.111/0001-11,"ACME, Servicos ""Gerais""",PARCIAL,80,LOCATED,false,25,' +
        '26/01/2025,https://gazette.test/portal/edicoes/download/1000/12,PUBLISHED_LATE;FIELD_DIVERGENT:valor_contrato',
    );
  });

  it('leaves absent values empty', () => {
    const row = toCsvRow(record('SME-PRO-2025/00001', { company_id: null, company_name: null }));

    expect(row.startsWith('SME-PRO-2025/00001,,,PARCIAL,')).toBe(true);
  });
});

describe('JsonResultStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'result-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one document per processo and replaces it on rewrite', async () => {
    const store = new JsonResultStore(dir, 'run-1');

    await store.write(record('SME-PRO-2025/00002'));
    await store.write(record('SME-PRO-2025/00001'));
    const rewritten = await store.write(record('SME-PRO-2025/00001', { company_name: 'ACME' }));

    expect(rewritten.ok).toBe(true);
    expect(await readdir(store.resultsDir)).toEqual(['SME-PRO-2025_00001.json', 'SME-PRO-2025_00002.json']);
    const listed = await store.list();
    expect(listed.ok).toBe(true);
    if (!listed.ok) return;
    expect(listed.value.map((r) => [r.processo, r.company_name])).toEqual([
      ['SME-PRO-2025/00001', 'ACME'],
      ['SME-PRO-2025/00002', 'ACME, Servicos "Gerais"'],
    ]);
  });

  it('lists nothing before the first write', async () => {
    expect(await new JsonResultStore(dir, 'run-1').list()).toEqual({ ok: true, value: [] });
  });

  it('exports every record to CSV with a header row', async () => {
    const store = new JsonResultStore(dir, 'run-1');
    await store.write(record('SME-PRO-2025/00001'));

    const exported = await store.exportCsv();

    expect(exported).toEqual({ ok: true, value: { path: join(dir, 'run-1', 'conformity.csv'), rows: 1 } });
    const lines = (await readFile(join(dir, 'run-1', 'conformity.csv'), 'utf8')).split('\n');
    expect(lines[0]).toBe(
      'processo,company_id,company_name,overall_status,conformity_score,publication_status,timely,days_difference,publication_date,publication_url,reasons',
    );
    expect(lines[1]).toBe(toCsvRow(record('SME-PRO-2025/00001')));
    expect(lines[2]).toBe('');
  });

  it('refuses a stored document that no longer matches the schema', async () => {
    const store = new JsonResultStore(dir, 'run-1');
    await store.write(record('SME-PRO-2025/00001'));
    await writeFile(store.pathFor('SME-PRO-2025/00001'), JSON.stringify({ processo: 'x' }));

    const listed = await store.list();

    expect(listed.ok).toBe(false);
    if (listed.ok) return;
    expect(listed.error.code).toBe('PERSISTENCE_ERROR');
    expect(listed.error.message).toBe('Result document SME-PRO-2025_00001.json does not match schema');
  });
});
