import { writeFile } from 'node:fs/promises';
import { chromium, errors, type Browser, type Page } from 'playwright-core';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import type { AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { sleep } from '../wait.js';

const log = logger.child({ module: 'browser' });

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

/** Maps a Playwright failure to a retryable portal error. */
export function toBrowserError(cause: unknown, action: string): AppError {
  if (cause instanceof errors.TimeoutError) {
    return createAppError(ErrorCode.NAVIGATION_TIMEOUT, `Timed out while trying to ${action}`, true, describeCause(cause));
  }
  return createAppError(ErrorCode.PORTAL_UNREACHABLE, `Browser failed to ${action}`, true, describeCause(cause));
}

/** Runs one browser interaction and turns anything it throws into an AppError. */
export async function attempt<T>(action: string, fn: () => Promise<T>): Promise<Result<T, AppError>> {
  try {
    return ok(await fn());
  } catch (cause) {
    const error = toBrowserError(cause, action);
    log.warn({ action, errorCode: error.code, details: error.details }, 'Browser action failed');
    return err(error);
  }
}

const PDF_MAGIC = '%PDF';
/** Time the checkbox needs to report a solved challenge. */
const CHECKBOX_SETTLE_MS = 3000;

/** True when a reCAPTCHA widget is visible on the page. */
export async function hasCaptchaWidget(page: Page): Promise<boolean> {
  return (await page.locator('iframe[src*="recaptcha"]:visible, .g-recaptcha:visible').count()) > 0;
}

/** Ticks the reCAPTCHA checkbox. `false` when there is no widget or it asks for more. */
export async function clickCaptchaCheckbox(page: Page): Promise<Result<boolean, AppError>> {
  const anchor = page.frames().find((f) => /recaptcha/i.test(f.url()) && /anchor/i.test(f.url()));
  if (anchor === undefined) return ok(false);

  const clicked = await attempt('click the CAPTCHA checkbox', async () => {
    await anchor.locator('#recaptcha-anchor, .recaptcha-checkbox-border').first().click();
    await sleep(CHECKBOX_SETTLE_MS);
    return (await anchor.locator('#recaptcha-anchor[aria-checked="true"]').count()) > 0;
  });
  if (clicked.ok) log.info({ solved: clicked.value }, 'CAPTCHA checkbox clicked');
  return clicked;
}

export interface PdfDownload {
  timeoutMs: number;
  /** Names the portal in error messages. */
  source: string;
}

/** Fetches a PDF with the page's cookies and stores it at `destination`; returns its size. */
export async function downloadPdf(
  page: Page,
  url: string,
  destination: string,
  { timeoutMs, source }: PdfDownload,
): Promise<Result<number, AppError>> {
  const fetched = await attempt(`download from the ${source}`, async () => {
    const response = await page.request.get(url, { timeout: timeoutMs });
    return { status: response.status(), body: await response.body() };
  });
  if (!fetched.ok) {
    return err(createAppError(ErrorCode.DOWNLOAD_FAILED, `${source} download failed`, true, fetched.error.details));
  }

  const { status, body } = fetched.value;
  if (status >= 400 || body.subarray(0, PDF_MAGIC.length).toString('latin1') !== PDF_MAGIC) {
    return err(createAppError(ErrorCode.DOWNLOAD_FAILED, `${source} returned no PDF (HTTP ${status})`, true));
  }

  try {
    await writeFile(destination, body);
  } catch (cause) {
    return err(createAppError(ErrorCode.DOWNLOAD_FAILED, 'Could not store downloaded file', false, describeCause(cause)));
  }
  log.debug({ url, bytes: body.length }, 'PDF downloaded');
  return ok(body.length);
}

/**
 * The single browser the run owns. Portal navigation, gazette search and contract downloads
 * share its one page, one unit of work at a time.
 */
export class BrowserSession {
  private constructor(
    private readonly browser: Browser,
    readonly page: Page,
  ) {}

  static async launch(config: Readonly<AppConfig>): Promise<Result<BrowserSession, AppError>> {
    try {
      const browser = await chromium.launch({
        headless: config.headless,
        ...(config.portal.browserChannel !== null && { channel: config.portal.browserChannel }),
      });
      const context = await browser.newContext({
        userAgent: USER_AGENT,
        viewport: { width: 1920, height: 1080 },
        locale: 'pt-BR',
        acceptDownloads: true,
      });
      context.setDefaultTimeout(config.timeoutMs);
      const page = await context.newPage();
      log.info({ headless: config.headless, channel: config.portal.browserChannel }, 'Browser launched');
      return ok(new BrowserSession(browser, page));
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.CONFIG_INVALID, details }, 'Failed to launch browser');
      return err(createAppError(ErrorCode.CONFIG_INVALID, 'Browser could not be launched', false, details));
    }
  }

  async bodyText(): Promise<string> {
    return this.page.locator('body').innerText();
  }

  async close(): Promise<void> {
    await this.browser.close();
    log.info('Browser closed');
  }
}
