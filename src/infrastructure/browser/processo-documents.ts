import type { Page } from 'playwright-core';
import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { DocumentLink, ProcessoDocumentPortal } from '../../services/pipeline/contract-source.js';
import type { CaptchaStatus } from '../../services/publication/types.js';
import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { waitUntil } from '../wait.js';
import { attempt, clickCaptchaCheckbox, downloadPdf, hasCaptchaWidget, type BrowserSession } from './session.js';

const log = logger.child({ module: 'processo-documents' });

const CHALLENGE = /verifica[cç][aã]o de seguran[cç]a/i;
const DOCUMENTS = /[uú]ltimos documentos/i;
const NO_DOCUMENT = /n[aã]o h[aá] documento associado/i;
const RENDERED = new RegExp(`${CHALLENGE.source}|${DOCUMENTS.source}|${NO_DOCUMENT.source}`, 'i');
/** PDF parts are the links drawn with the Acrobat icon. */
const PDF_LINK = 'a:has(img[src*="page_white_acrobat"])';

export interface RawDocumentLink {
  href: string | null;
  text: string;
}

/** Resolves the page's PDF anchors to absolute URLs, in page order and without repeats. */
export function documentLinks(anchors: readonly RawDocumentLink[], pageUrl: string): DocumentLink[] {
  const seen = new Set<string>();
  const links: DocumentLink[] = [];
  for (const anchor of anchors) {
    if (anchor.href === null || anchor.href.trim() === '') continue;
    let url: string;
    try {
      url = new URL(anchor.href.trim(), pageUrl).toString();
    } catch {
      log.debug({ href: anchor.href }, 'Ignoring document link with an invalid address');
      continue;
    }
    if (seen.has(url)) continue;
    seen.add(url);
    const name = anchor.text.replace(/\s+/g, ' ').trim();
    links.push({ url, name: name === '' ? `parte ${links.length + 1}` : name });
  }
  return links;
}

/** The processo page a contract link opens, with its security check and document list. */
export class ProcessoRioDocuments implements ProcessoDocumentPortal {
  private readonly page: Page;

  constructor(
    private readonly session: BrowserSession,
    private readonly config: Readonly<AppConfig>,
  ) {
    this.page = session.page;
  }

  async openProcesso(url: string): Promise<Result<void, AppError>> {
    const loaded = await attempt('open the processo page', () =>
      this.page.goto(url, { waitUntil: 'domcontentloaded' }).then(() => undefined),
    );
    if (!loaded.ok) return loaded;
    return this.waitFor(RENDERED, 'processo page');
  }

  async captchaStatus(): Promise<Result<CaptchaStatus, AppError>> {
    return attempt<CaptchaStatus>('check for a CAPTCHA', async () => {
      const text = await this.session.bodyText();
      if (DOCUMENTS.test(text) || NO_DOCUMENT.test(text)) return 'clear';
      return CHALLENGE.test(text) || (await hasCaptchaWidget(this.page)) ? 'blocked' : 'clear';
    });
  }

  /** Ticks the checkbox, then submits the security form the page holds it in. */
  async solveCaptchaAutomatically(): Promise<Result<boolean, AppError>> {
    const solved = await clickCaptchaCheckbox(this.page);
    if (!solved.ok || !solved.value) return solved;

    const submitted = await attempt('submit the security check', () =>
      this.page.getByRole('button', { name: /consultar/i }).first().click(),
    );
    if (!submitted.ok) return submitted;

    const shown = await this.waitFor(new RegExp(`${DOCUMENTS.source}|${NO_DOCUMENT.source}`, 'i'), 'processo documents');
    return shown.ok ? ok(true) : shown;
  }

  async listDocuments(): Promise<Result<DocumentLink[], AppError>> {
    return attempt('list the processo documents', async () => {
      const alert = this.page.locator('p.alert.alert-danger');
      if ((await alert.count()) > 0 && NO_DOCUMENT.test(await alert.first().innerText())) return [];

      const anchors = this.page.locator(PDF_LINK);
      const count = await anchors.count();
      const raw: RawDocumentLink[] = [];
      for (let i = 0; i < count; i++) {
        const anchor = anchors.nth(i);
        raw.push({ href: await anchor.getAttribute('href'), text: await anchor.innerText() });
      }
      const links = documentLinks(raw, this.page.url());
      log.debug({ count: links.length }, 'Processo documents listed');
      return links;
    });
  }

  async download(document: DocumentLink, destination: string): Promise<Result<void, AppError>> {
    const stored = await downloadPdf(this.page, document.url, destination, {
      timeoutMs: this.config.timeoutMs,
      source: 'Processo portal',
    });
    return stored.ok ? ok(undefined) : stored;
  }

  private async waitFor(pattern: RegExp, description: string): Promise<Result<void, AppError>> {
    return waitUntil(
      async () => {
        const text = await attempt('read the page', () => this.session.bodyText());
        return text.ok && pattern.test(text.value);
      },
      {
        timeoutMs: this.config.timeoutMs,
        intervalMs: this.config.portal.pollIntervalMs,
        minSettleMs: this.config.portal.settleMs,
        description,
      },
    );
  }
}
