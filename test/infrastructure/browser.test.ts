import { describe, it, expect } from 'vitest';
import { errors } from 'playwright-core';
import { attempt, documentLinks, searchUrl, toBrowserError } from '../../src/infrastructure/browser/index.js';

describe('toBrowserError', () => {
  it('maps Playwright timeouts to a retryable navigation timeout', () => {
    const error = toBrowserError(new errors.TimeoutError('locator.click: Timeout 20000ms exceeded'), 'select "SME"');

    expect(error).toEqual({
      code: 'NAVIGATION_TIMEOUT',
      message: 'Timed out while trying to select "SME"',
      retryable: true,
      details: 'locator.click: Timeout 20000ms exceeded',
    });
  });

  it('maps anything else to an unreachable portal', () => {
    const error = toBrowserError(new Error('net::ERR_NAME_NOT_RESOLVED'), 'open the contracts portal');

    expect(error.code).toBe('PORTAL_UNREACHABLE');
    expect(error.message).toBe('Browser failed to open the contracts portal');
    expect(error.retryable).toBe(true);
  });
});

describe('attempt', () => {
  it('wraps the value of a successful action', async () => {
    expect(await attempt('read', async () => 42)).toEqual({ ok: true, value: 42 });
  });

  it('turns a thrown error into a result', async () => {
    const result = await attempt('read', async () => {
      throw new Error('Target closed');
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.details).toBe('Target closed');
  });
});

describe('searchUrl', () => {
  it('builds the gazette search route for a processo', () => {
    expect(searchUrl('https://gazette.test/', 'SME-PRO-2025/19222')).toBe(
      'https://gazette.test/buscanova/#/p=1&q=SME-PRO-2025/19222',
    );
  });
});

describe('documentLinks', () => {
  const PAGE = 'https://processo.test/processo/consulta?id=19222';

  it('resolves relative addresses against the processo page', () => {
    expect(
      documentLinks(
        [
          { href: '/arquivo/download?id=1', text: ' Contrato\n parte 1 ' },
          { href: 'https://arquivos.test/2.pdf', text: 'Contrato parte 2' },
        ],
        PAGE,
      ),
    ).toEqual([
      { url: 'https://processo.test/arquivo/download?id=1', name: 'Contrato parte 1' },
      { url: 'https://arquivos.test/2.pdf', name: 'Contrato parte 2' },
    ]);
  });

  it('drops anchors without an address and repeated ones, and names unlabeled parts', () => {
    expect(
      documentLinks(
        [
          { href: null, text: 'Sem link' },
          { href: '  ', text: 'Vazio' },
          { href: 'arquivo?id=7', text: '' },
          { href: '/processo/arquivo?id=7', text: 'Repetido' },
        ],
        PAGE,
      ),
    ).toEqual([{ url: 'https://processo.test/processo/arquivo?id=7', name: 'parte 1' }]);
  });
});
