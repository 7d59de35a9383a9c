import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { processoFileKey } from '../../domain/processo.js';
import type { ProcessoLink } from '../../domain/types.js';
import { logger, type Logger } from '../../infrastructure/logger.js';
import { extractTextFromPdf } from '../../infrastructure/pdf-parser.js';
import { withTempFile } from '../../infrastructure/temp-files.js';
import type { CaptchaGate } from '../publication/captcha-gate.js';
import type { CaptchaChallenge } from '../publication/types.js';

/** Supplies the text of the contract behind a processo link. */
export interface ContractDocumentSource {
  textFor(link: ProcessoLink, signal?: AbortSignal): Promise<Result<string, AppError>>;
}

/**
 * Reads contracts downloaded ahead of the run, stored as `<dir>/<processo file key>.pdf`
 * (e.g. `SME-PRO-2025_19222.pdf`).
 */
export class PdfDirectoryContractSource implements ContractDocumentSource {
  constructor(private readonly dir: string) {}

  pathFor(processo: string): string {
    return join(this.dir, `${processoFileKey(processo)}.pdf`);
  }

  async textFor(link: ProcessoLink): Promise<Result<string, AppError>> {
    const path = this.pathFor(link.processo);
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(path));
    } catch (cause) {
      return err(
        createAppError(ErrorCode.CONTRACT_DOCUMENT_MISSING, `No contract document for ${link.processo}`, false, describeCause(cause)),
      );
    }
    return extractTextFromPdf(data, link.processo);
  }
}

/** One downloadable document listed on a processo page. */
export interface DocumentLink {
  url: string;
  name: string;
}

/** Semantic operations over the page a processo link opens. */
export interface ProcessoDocumentPortal extends CaptchaChallenge {
  openProcesso(url: string): Promise<Result<void, AppError>>;
  /** Empty when the page states that the processo has no document. */
  listDocuments(): Promise<Result<DocumentLink[], AppError>>;
  download(document: DocumentLink, destination: string): Promise<Result<void, AppError>>;
}

export interface ProcessoDocumentSourceOptions {
  downloadDir: string;
  /** Consulted first; a document placed there by hand wins over the portal. */
  local?: ContractDocumentSource;
  /** Contracts split into more parts than this keep only the first ones. */
  maxParts?: number;
  log?: Logger;
}

const DEFAULT_MAX_PARTS = 5;

/**
 * Fetches the contract from the processo page: clears the CAPTCHA in front of it, downloads
 * every listed PDF part one at a time and joins their text. Each download lives in a temp file
 * that is removed once its text is read.
 */
export class ProcessoDocumentSource implements ContractDocumentSource {
  private readonly log: Logger;

  constructor(
    private readonly portal: ProcessoDocumentPortal,
    private readonly gate: CaptchaGate,
    private readonly options: ProcessoDocumentSourceOptions,
  ) {
    this.log = (options.log ?? logger).child({ module: 'contract-documents' });
  }

  async textFor(link: ProcessoLink, signal?: AbortSignal): Promise<Result<string, AppError>> {
    if (this.options.local) {
      const local = await this.options.local.textFor(link, signal);
      if (local.ok || local.error.code !== ErrorCode.CONTRACT_DOCUMENT_MISSING) return local;
    }

    const log = this.log.child({ processo: link.processo });
    const opened = await this.portal.openProcesso(link.url);
    if (!opened.ok) return opened;

    const captcha = await this.portal.captchaStatus();
    if (!captcha.ok) return captcha;
    if (captcha.value === 'blocked') {
      const cleared = await this.gate.clear(this.portal, link.processo, signal);
      if (!cleared.ok) return cleared;
    }

    const listed = await this.portal.listDocuments();
    if (!listed.ok) return listed;
    if (listed.value.length === 0) {
      log.warn({ url: link.url }, 'Processo page lists no document');
      return err(createAppError(ErrorCode.CONTRACT_DOCUMENT_MISSING, `Portal has no document for ${link.processo}`, false));
    }

    const maxParts = this.options.maxParts ?? DEFAULT_MAX_PARTS;
    const parts = listed.value.slice(0, maxParts);
    if (listed.value.length > parts.length) {
      log.info({ listed: listed.value.length, kept: parts.length }, 'Contract has more parts than are read');
    }

    const texts: string[] = [];
    for (const part of parts) {
      const text = await this.readPart(part, link.processo);
      if (!text.ok) return text;
      texts.push(text.value);
    }

    log.info({ parts: texts.length, textLength: texts.reduce((n, t) => n + t.length, 0) }, 'Contract document read from portal');
    return ok(texts.join('\n\n'));
  }

  private readPart(part: DocumentLink, processo: string): Promise<Result<string, AppError>> {
    return withTempFile<Result<string, AppError>>(this.options.downloadDir, '.pdf', async (path) => {
      const downloaded = await this.portal.download(part, path);
      if (!downloaded.ok) return downloaded;

      let data: Uint8Array;
      try {
        data = new Uint8Array(await readFile(path));
      } catch (cause) {
        return err(createAppError(ErrorCode.DOWNLOAD_FAILED, `Downloaded ${part.name} is not readable`, true, describeCause(cause)));
      }
      return extractTextFromPdf(data, processo);
    });
  }
}
