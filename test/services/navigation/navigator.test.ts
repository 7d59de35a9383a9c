import { describe, it, expect } from 'vitest';
import { createAppError, ErrorCode } from '../../../src/domain/errors.js';
import type { CompanyRecord } from '../../../src/domain/types.js';
import {
  NavigationSession,
  PathDiscoveryNavigator,
  discoverProcessoLinks,
} from '../../../src/services/navigation/navigator.js';
import { FakeTreePortal, link, timeout, type CompanyTree } from './fake-portal.js';

const company: CompanyRecord = { company_id: '12.345.678/0001-99', name: 'ACME SERVICOS LTDA' };

const EDUCACAO = 'Secretaria de Educacao';
const SAUDE = 'Secretaria de Saude';

function tree(): Record<string, CompanyTree> {
  return {
    [company.company_id]: {
      organs: {
        [EDUCACAO]: {
          units: {
            Gabinete: {
              objects: {
                Obras: [link('SME-PRO-2025/19222')],
                Servicos: [link('SME-PRO-2025/19223')],
              },
            },
            Escolas: { links: [link('sme-pro-2025/19224')] },
          },
        },
        [SAUDE]: { links: [link('SMS-PRO-2025/00101'), link('SMEPRO202519222')] },
      },
    },
  };
}

describe('PathDiscoveryNavigator', () => {
  it('walks every organ, unit and object and merges duplicate processos', async () => {
    const portal = new FakeTreePortal(tree());

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.paths.map((p) => [p.organ, p.unit, p.object])).toEqual([
      [EDUCACAO, 'Gabinete', 'Obras'],
      [EDUCACAO, 'Gabinete', 'Servicos'],
      [EDUCACAO, 'Escolas', null],
      [SAUDE, null, null],
    ]);
    expect(result.value.links.map((l) => l.processo)).toEqual([
      'SME-PRO-2025/19222',
      'SME-PRO-2025/19223',
      'SME-PRO-2025/19224',
      'SMS-PRO-2025/00101',
    ]);
    expect(result.value.links[0]).toEqual({
      processo: 'SME-PRO-2025/19222',
      url: 'https://portal.test/processo/SME-PRO-2025%2F19222',
      company_id: company.company_id,
      company_name: company.name,
      path: [EDUCACAO, 'Gabinete', 'Obras'],
    });
    expect(result.value.skippedBranches).toEqual([]);
  });

  it('re-enters from a reset portal before every leaf', async () => {
    const portal = new FakeTreePortal(tree());

    await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    const collects = portal.calls.filter((c) => c.startsWith('collectLinks:'));
    expect(collects).toEqual([
      `collectLinks:${EDUCACAO}/Gabinete/Obras`,
      `collectLinks:${EDUCACAO}/Gabinete/Servicos`,
      `collectLinks:${EDUCACAO}/Escolas`,
      `collectLinks:${SAUDE}`,
    ]);
    for (const entry of collects) {
      const index = portal.calls.indexOf(entry);
      expect(portal.calls.slice(0, index).lastIndexOf('reset')).toBeGreaterThan(-1);
      expect(portal.calls[index - 1]).not.toBe('reset');
    }
  });

  it('retries a failing branch once, skips it and keeps the other organs', async () => {
    const portal = new FakeTreePortal(tree(), (op, name) =>
      op === 'selectUnit' && name === 'Gabinete' ? timeout() : null,
    );

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(portal.callCount('selectUnit:Gabinete')).toBe(2);
    expect(result.value.links.map((l) => l.processo)).toEqual(['SMS-PRO-2025/00101', 'SME-PRO-2025/19222']);
    expect(result.value.skippedBranches).toHaveLength(1);
    expect(result.value.skippedBranches[0]).toMatchObject({
      company_id: company.company_id,
      organ: EDUCACAO,
      state: 'ORGAN_SELECTED',
      error: { code: 'NAVIGATION_TIMEOUT', state: 'ORGAN_SELECTED' },
    });
  });

  it('keeps the links collected before a branch failed', async () => {
    const portal = new FakeTreePortal(tree(), (op, name) =>
      op === 'selectUnit' && name === 'Escolas' ? timeout() : null,
    );

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.links.map((l) => l.processo)).toEqual([
      'SME-PRO-2025/19222',
      'SME-PRO-2025/19223',
      'SMS-PRO-2025/00101',
    ]);
    expect(result.value.skippedBranches.map((b) => b.organ)).toEqual([EDUCACAO]);
  });

  it('recovers a branch that fails only once', async () => {
    const portal = new FakeTreePortal(tree(), (op, name, call) =>
      op === 'selectOrgan' && name === EDUCACAO && call === 2 ? timeout() : null,
    );

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.skippedBranches).toEqual([]);
    expect(result.value.links).toHaveLength(4);
  });

  it('does not retry a non-retryable failure', async () => {
    const broken = createAppError(ErrorCode.PORTAL_UNREACHABLE, 'Portal closed the session', false);
    const portal = new FakeTreePortal(tree(), (op, name) => (op === 'selectOrgan' && name === SAUDE ? broken : null));

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(portal.callCount(`selectOrgan:${SAUDE}`)).toBe(1);
    expect(result.value.skippedBranches[0].error.code).toBe('PORTAL_UNREACHABLE');
  });

  it('collects at company level when the company has no organs', async () => {
    const portal = new FakeTreePortal({ [company.company_id]: { links: [link('01234/2019-7')] } });

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.paths).toEqual([
      {
        company_id: company.company_id,
        organ: '',
        unit: null,
        object: null,
        links: [expect.objectContaining({ processo: '01234/2019-7', path: [] })],
      },
    ]);
  });

  it('drops links the portal attributes to another company', async () => {
    const portal = new FakeTreePortal({
      [company.company_id]: {
        links: [link('SME-PRO-2025/19222', company.company_id), link('SME-PRO-2025/30000', '98.765.432/0001-10')],
      },
    });

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.links.map((l) => l.processo)).toEqual(['SME-PRO-2025/19222']);
  });

  it('ignores leaf links whose text is not a processo', async () => {
    const portal = new FakeTreePortal({
      [company.company_id]: { links: [link('Ver contrato'), link('SME-PRO-2025/19222')] },
    });

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.links.map((l) => l.processo)).toEqual(['SME-PRO-2025/19222']);
  });

  it('records an empty path for an entry that is gone on re-entry', async () => {
    const absent = createAppError(ErrorCode.PORTAL_NODE_ABSENT, 'Portal shows no entry "Escolas"', false);
    const portal = new FakeTreePortal(tree(), (op, name) => (op === 'selectUnit' && name === 'Escolas' ? absent : null));

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.skippedBranches).toEqual([]);
    expect(result.value.paths.map((p) => [p.organ, p.unit, p.object, p.links.length])).toEqual([
      [EDUCACAO, 'Gabinete', 'Obras', 1],
      [EDUCACAO, 'Gabinete', 'Servicos', 1],
      [EDUCACAO, 'Escolas', null, 0],
      [SAUDE, null, null, 2],
    ]);
    expect(portal.callCount('selectUnit:Escolas')).toBe(1);
  });

  it('treats a company the portal no longer shows as having no processos', async () => {
    const absent = createAppError(ErrorCode.PORTAL_NODE_ABSENT, 'Portal shows no entry', false);
    const portal = new FakeTreePortal(tree(), (op) => (op === 'selectCompany' ? absent : null));

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.paths).toEqual([
      { company_id: company.company_id, organ: '', unit: null, object: null, links: [] },
    ]);
    expect(result.value.links).toEqual([]);
  });

  it('fails the company when its organs cannot be listed', async () => {
    const portal = new FakeTreePortal(tree(), (op) => (op === 'listOrgans' ? timeout() : null));

    const result = await discoverProcessoLinks(portal, company, { filterYear: 2025 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('NAVIGATION_TIMEOUT');
    expect(result.error.state).toBe('COMPANY_SELECTED');
    expect(portal.callCount(`listOrgans:${company.company_id}`)).toBe(2);
  });

  it('ends back at the initial state', async () => {
    const navigator = new PathDiscoveryNavigator(new FakeTreePortal(tree()), { filterYear: 2025 });

    await navigator.discover(company);

    expect(navigator.state).toBe('INIT');
  });
});

describe('NavigationSession', () => {
  it('rejects a selection out of order', async () => {
    const session = new NavigationSession(new FakeTreePortal(tree()));

    await expect(session.selectOrgan(EDUCACAO)).rejects.toThrow('Illegal navigation transition INIT -> ORGAN_SELECTED');
  });

  it('records the states it passed through', async () => {
    const session = new NavigationSession(new FakeTreePortal(tree()));

    await session.filter(2025);
    await session.selectCompany(company);
    await session.selectOrgan(SAUDE);
    await session.collect();

    expect(session.history).toEqual(['INIT', 'FILTERED', 'COMPANY_SELECTED', 'ORGAN_SELECTED', 'LEAF_COLLECTED']);
  });
});
