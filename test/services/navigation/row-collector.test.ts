import { describe, it, expect } from 'vitest';
import type { Result } from '../../../src/domain/result.js';
import type { AppError } from '../../../src/domain/errors.js';
import type { CompanyRecord } from '../../../src/domain/types.js';
import {
  RowCollector,
  collectCompaniesWithReset,
  type CollectStats,
} from '../../../src/services/navigation/row-collector.js';
import { EndlessTablePortal, FakeTablePortal } from './fake-portal.js';

const rows: CompanyRecord[] = Array.from({ length: 7 }, (_, i) => ({ company_id: `C${i}`, name: `Company ${i}` }));

async function drain(
  stream: AsyncGenerator<CompanyRecord, Result<CollectStats, AppError>, void>,
): Promise<{ ids: string[]; result: Result<CollectStats, AppError> }> {
  const ids: string[] = [];
  for (;;) {
    const next = await stream.next();
    if (next.done) return { ids, result: next.value };
    ids.push(next.value.company_id);
  }
}

describe('RowCollector', () => {
  it('reads the table until two passes add nothing', async () => {
    const collector = new RowCollector(new FakeTablePortal(rows), { maxPasses: 20 });

    const { ids, result } = await drain(collector.stream());

    expect(ids).toEqual(['C0', 'C1', 'C2', 'C3', 'C4', 'C5', 'C6']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({ passes: 5, correctivePasses: 2, recoveredByCorrection: 0, total: 7 });
  });

  it('recovers rows the first cycle failed to render', async () => {
    const portal = new FakeTablePortal(rows, { hiddenOnFirstCycle: new Set(['C1']) });

    const { ids, result } = await drain(new RowCollector(portal, { maxPasses: 20 }).stream());

    expect(ids).toEqual(['C0', 'C2', 'C3', 'C4', 'C5', 'C6', 'C1']);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.recoveredByCorrection).toBe(1);
    expect(result.value.total).toBe(7);
  });

  it('never yields the same company twice', async () => {
    const result = await new RowCollector(new FakeTablePortal(rows, { window: 4 }), { maxPasses: 20 }).collect();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(new Set(result.value.map((c) => c.company_id)).size).toBe(result.value.length);
    expect(result.value).toHaveLength(7);
  });

  it('handles an empty table', async () => {
    const result = await new RowCollector(new FakeTablePortal([]), { maxPasses: 20 }).collect();

    expect(result).toEqual({ ok: true, value: [] });
  });

  it('gives up when the table never stabilizes', async () => {
    const result = await new RowCollector(new EndlessTablePortal({}), { maxPasses: 3 }).collect();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('NAVIGATION_TIMEOUT');
    expect(result.error.message).toBe('Company table did not stabilize within 3 passes');
    expect(result.error.details).toBe('3 companies seen');
  });

  it('propagates a read failure', async () => {
    const result = await new RowCollector(new FakeTablePortal(rows, { failingReads: 1 }), { maxPasses: 20 }).collect();

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('Company table did not render');
  });
});

describe('collectCompaniesWithReset', () => {
  it('retries once from a hard reset with the filter applied again', async () => {
    const portal = new FakeTablePortal(rows, { failingReads: 1 });

    const result = await collectCompaniesWithReset(portal, 2025, { maxPasses: 20 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(7);
    expect(portal.hardResets).toBe(1);
    expect(portal.filters).toEqual([2025]);
  });

  it('returns the second failure', async () => {
    const portal = new FakeTablePortal(rows, { failingReads: 2 });

    const result = await collectCompaniesWithReset(portal, 2025, { maxPasses: 20 });

    expect(result.ok).toBe(false);
    expect(portal.hardResets).toBe(1);
  });
});
