import type { Page } from 'playwright-core';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { SearchResultItem } from '../../domain/types.js';
import { parseResultCards, parseResultTotal } from '../../services/publication/results-parser.js';
import type { CaptchaStatus, GazettePortal, ResultsPage } from '../../services/publication/types.js';
import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { waitUntil } from '../wait.js';
import { attempt, clickCaptchaCheckbox, downloadPdf, hasCaptchaWidget, type BrowserSession } from './session.js';

const log = logger.child({ module: 'doweb' });

/** Any of these on the page means the search finished rendering, or is held by a CAPTCHA. */
const RENDERED = /resultados?\s+encontrados?|nenhum resultado|Di[aá]rio publicado em|n[aã]o sou um rob[oô]/i;
const CAPTCHA_TEXT = /n[aã]o sou um rob[oô]/i;

export function searchUrl(gazetteUrl: string, processo: string): string {
  return `${gazetteUrl.replace(/\/+$/, '')}/buscanova/#/p=1&q=${processo}`;
}

/** Official gazette search driven through the run's browser page. */
export class DowebGazette implements GazettePortal {
  private readonly page: Page;

  constructor(
    private readonly session: BrowserSession,
    private readonly config: Readonly<AppConfig>,
  ) {
    this.page = session.page;
  }

  async submitSearch(processo: string): Promise<Result<void, AppError>> {
    const url = searchUrl(this.config.portal.gazetteUrl, processo);
    const loaded = await attempt('open the gazette search', () =>
      this.page.goto(url, { waitUntil: 'domcontentloaded' }).then(() => undefined),
    );
    if (!loaded.ok) return loaded;

    log.debug({ processo, url }, 'Gazette search submitted');
    return waitUntil(async () => RENDERED.test(await this.safeBodyText()), {
      timeoutMs: this.config.timeoutMs,
      intervalMs: this.config.portal.pollIntervalMs,
      minSettleMs: this.config.portal.settleMs,
      description: 'gazette results',
    });
  }

  async captchaStatus(): Promise<Result<CaptchaStatus, AppError>> {
    return attempt<CaptchaStatus>('check for a CAPTCHA', async () => {
      if (await hasCaptchaWidget(this.page)) return 'blocked';
      return CAPTCHA_TEXT.test(await this.safeBodyText()) ? 'blocked' : 'clear';
    });
  }

  solveCaptchaAutomatically(): Promise<Result<boolean, AppError>> {
    return clickCaptchaCheckbox(this.page);
  }

  async readResults(): Promise<Result<ResultsPage, AppError>> {
    const text = await attempt('read the gazette results', () => this.session.bodyText());
    if (!text.ok) return text;

    const cards = parseResultCards(text.value, this.config.portal.gazetteUrl);
    const total = parseResultTotal(text.value) ?? cards.length;
    return ok({ total, cards });
  }

  async downloadCandidate(item: SearchResultItem, destination: string): Promise<Result<string, AppError>> {
    const url = item.url ?? (await this.pageLinkFor(item.index));
    if (url === null) {
      return err(createAppError(ErrorCode.DOWNLOAD_FAILED, `No download link for result ${item.index}`, true));
    }

    const stored = await downloadPdf(this.page, url, destination, { timeoutMs: this.config.timeoutMs, source: 'Gazette' });
    if (!stored.ok) return stored;
    return ok(url);
  }

  /** Opens the result's Download menu and reads the single-page link. */
  private async pageLinkFor(index: number): Promise<string | null> {
    const link = await attempt('find the page download link', async () => {
      const buttons = this.page.getByText('Download', { exact: false });
      if ((await buttons.count()) <= index) return null;
      await buttons.nth(index).click();
      const pageLink = this.page.getByRole('link', { name: /Baixar apenas a p[aá]gina/i }).first();
      await pageLink.waitFor({ state: 'attached' });
      const href = await pageLink.getAttribute('href');
      await this.page.locator('body').click();
      return href;
    });
    return link.ok ? link.value : null;
  }

  private async safeBodyText(): Promise<string> {
    const text = await attempt('read the page', () => this.session.bodyText());
    return text.ok ? text.value : '';
  }
}
