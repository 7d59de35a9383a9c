import type { Locator, Page } from 'playwright-core';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { CompanyRecord } from '../../domain/types.js';
import { parseCompanyRow } from '../../services/navigation/company-row.js';
import type { PortalAdapter, RawLink, ScrollDirection } from '../../services/navigation/types.js';
import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { sleep } from '../wait.js';
import { attempt, type BrowserSession } from './session.js';

const log = logger.child({ module: 'contas-rio' });

const SELECTORS = {
  grid: '.v-grid',
  gridRow: '.v-grid-body .v-grid-row',
  scroller: '.v-grid-scroller-vertical, .v-grid-scroller',
  yearInput: '.v-filterselect-input',
  suggestPopup: '.v-filterselect-suggestpopup',
  filterInput: 'input[placeholder="Digite para filtrar"]',
  rowButton: '.v-grid-body div.v-button-link[role="button"]',
  caption: 'span.v-button-caption',
  columnHeader: '.v-grid-column-header-content',
  bodyRow: '.v-grid-tablewrapper table tbody tr',
  loading: '.v-loading-indicator',
} as const;

const PROCESSO_COLUMN = 'Processo';
const YEAR_VALUE = /^\d{4}$/;

/**
 * Contracts portal driver over the Vaadin grid. Each hierarchy level renders as a grid of link
 * buttons; the leaf level is the grid that has a Processo column.
 */
export class ContasRioPortal implements PortalAdapter {
  private readonly page: Page;

  constructor(
    session: BrowserSession,
    private readonly config: Readonly<AppConfig>,
  ) {
    this.page = session.page;
  }

  async open(): Promise<Result<void, AppError>> {
    const opened = await attempt('open the contracts portal', async () => {
      await this.page.goto(this.config.portal.url, { waitUntil: 'domcontentloaded' });
      await this.page.locator(SELECTORS.grid).first().waitFor({ state: 'visible' });
    });
    if (!opened.ok) return opened;
    log.info({ url: this.config.portal.url }, 'Contracts portal opened');
    return this.waitForSettle();
  }

  async applyFilter(year: number): Promise<Result<void, AppError>> {
    const applied = await attempt('apply the year filter', async () => {
      const input = await this.yearInput();
      await input.click();
      await input.fill(String(year));

      const option = this.page.locator(SELECTORS.suggestPopup).getByText(String(year), { exact: true }).first();
      if (await option.isVisible()) {
        await option.click();
      } else {
        await input.press('Enter');
      }
    });
    if (!applied.ok) return applied;
    return this.waitForSettle();
  }

  /** The filter select whose value is a year; the first one when none shows a year yet. */
  private async yearInput(): Promise<Locator> {
    const inputs = this.page.locator(SELECTORS.yearInput);
    const count = await inputs.count();
    for (let i = 0; i < count; i++) {
      const value = (await inputs.nth(i).inputValue()).trim();
      if (YEAR_VALUE.test(value)) return inputs.nth(i);
    }
    return inputs.first();
  }

  async listVisibleCompanies(): Promise<Result<CompanyRecord[], AppError>> {
    const texts = await attempt('read the company table', () => this.page.locator(SELECTORS.gridRow).allInnerTexts());
    if (!texts.ok) return texts;
    const companies = texts.value.map(parseCompanyRow).filter((row): row is CompanyRecord => row !== null);
    return ok(companies);
  }

  async scrollTable(direction: ScrollDirection): Promise<Result<{ atEnd: boolean }, AppError>> {
    const scrolled = await attempt('scroll the company table', () =>
      this.page
        .locator(SELECTORS.scroller)
        .first()
        .evaluate((el, dir) => {
          el.scrollTop = dir === 'top' ? 0 : el.scrollTop + el.clientHeight;
          return el.scrollTop + el.clientHeight >= el.scrollHeight - 1;
        }, direction),
    );
    if (!scrolled.ok) return scrolled;
    await sleep(this.config.portal.settleMs);
    return ok({ atEnd: scrolled.value });
  }

  async selectCompany(company: CompanyRecord): Promise<Result<void, AppError>> {
    const filtered = await attempt('filter the company table', async () => {
      const filter = this.page.locator(SELECTORS.filterInput).first();
      if ((await filter.count()) > 0) await filter.fill(company.company_id);
    });
    if (!filtered.ok) return filtered;
    const settled = await this.waitForSettle();
    if (!settled.ok) return settled;
    return this.clickCaption(company.company_id, false);
  }

  listOrgans(): Promise<Result<string[], AppError>> {
    return this.listLevel();
  }

  selectOrgan(name: string): Promise<Result<void, AppError>> {
    return this.clickCaption(name, true);
  }

  listUnits(): Promise<Result<string[], AppError>> {
    return this.listLevel();
  }

  selectUnit(name: string): Promise<Result<void, AppError>> {
    return this.clickCaption(name, true);
  }

  listObjects(): Promise<Result<string[], AppError>> {
    return this.listLevel();
  }

  selectObject(name: string): Promise<Result<void, AppError>> {
    return this.clickCaption(name, true);
  }

  /** Captions of the next level; empty once the leaf grid is showing. */
  private async listLevel(): Promise<Result<string[], AppError>> {
    const leaf = await this.processoColumn();
    if (!leaf.ok) return leaf;
    if (leaf.value !== null) return ok([]);

    const captions = await attempt('list the next hierarchy level', () =>
      this.page.locator(SELECTORS.rowButton).locator(SELECTORS.caption).allInnerTexts(),
    );
    if (!captions.ok) return captions;
    return ok(captions.value.map((c) => c.trim()).filter(Boolean));
  }

  private async clickCaption(text: string, exact: boolean): Promise<Result<void, AppError>> {
    const button = this.page
      .locator(SELECTORS.rowButton)
      .filter({ has: this.page.locator(SELECTORS.caption).getByText(text, { exact }) })
      .first();

    const clicked = await attempt(`select "${text}"`, async () => {
      if ((await button.count()) === 0) return false;
      await button.scrollIntoViewIfNeeded();
      await button.click();
      return true;
    });
    if (!clicked.ok) return clicked;
    if (!clicked.value) {
      return err(createAppError(ErrorCode.PORTAL_NODE_ABSENT, `Portal shows no entry "${text}"`, false));
    }
    return ok(undefined);
  }

  /** 0-based index of the Processo column, or null when the grid is not a leaf. */
  private async processoColumn(): Promise<Result<number | null, AppError>> {
    const headers = await attempt('read the grid headers', () =>
      this.page.locator(SELECTORS.columnHeader).allInnerTexts(),
    );
    if (!headers.ok) return headers;
    const index = headers.value.findIndex((h) => h.trim() === PROCESSO_COLUMN);
    return ok(index === -1 ? null : index);
  }

  async collectLinks(): Promise<Result<RawLink[], AppError>> {
    const column = await this.processoColumn();
    if (!column.ok) return column;
    if (column.value === null) return ok([]);
    const cell = `td:nth-child(${column.value + 1}) a[href^="http"]`;

    return attempt('collect processo links', async () => {
      const rows = this.page.locator(SELECTORS.bodyRow);
      const links: RawLink[] = [];
      for (const row of await rows.all()) {
        const anchor = row.locator(cell).first();
        if ((await anchor.count()) === 0) continue;
        const href = await anchor.getAttribute('href');
        links.push({ text: (await anchor.innerText()).trim(), href: href ?? '' });
      }
      return links;
    });
  }

  async waitForSettle(): Promise<Result<void, AppError>> {
    return attempt('wait for the portal to settle', async () => {
      await this.page.locator(SELECTORS.loading).first().waitFor({ state: 'hidden' });
      await sleep(this.config.portal.settleMs);
    });
  }

  async reset(): Promise<Result<void, AppError>> {
    const reset = await attempt('reset the contracts portal', async () => {
      await this.page.goto(this.config.portal.url, { waitUntil: 'domcontentloaded' });
      await this.page.reload({ waitUntil: 'domcontentloaded' });
      await this.page.locator(SELECTORS.grid).first().waitFor({ state: 'visible' });
    });
    if (!reset.ok) return reset;
    return this.waitForSettle();
  }

  async hardReset(): Promise<Result<void, AppError>> {
    const left = await attempt('leave the contracts portal', () => this.page.goto('about:blank').then(() => undefined));
    if (!left.ok) return left;
    log.info('Hard reset of the contracts portal');
    return this.reset();
  }
}
