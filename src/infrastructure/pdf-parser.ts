import { createRequire } from 'node:module';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { PDFDocumentProxy, TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import { logger } from './logger.js';

const require = createRequire(import.meta.url);
const STANDARD_FONT_DATA_URL = join(require.resolve('pdfjs-dist/package.json'), '../standard_fonts/');

const MAX_PDF_SIZE_BYTES = 50 * 1024 * 1024;
/** Baseline shift, in PDF units, that starts a new line. */
const LINE_TOLERANCE = 2;
/** A word split across lines by the gazette's typesetting: `contra-\ntada`. */
const SPLIT_WORD = /([a-zà-ÿ])-\n([a-zà-ÿ])/g;

function parseError(message: string, details?: string): AppError {
  return createAppError(ErrorCode.PARSING_ERROR, message, false, details);
}

/** Rebuilds the lines of one page from its text items, top to bottom as the PDF lays them out. */
export function linesOf(items: readonly TextItem[]): string[] {
  const lines: string[] = [];
  let current: string[] = [];
  let baseline: number | null = null;

  const flush = () => {
    const line = current.join(' ').replace(/\s+/g, ' ').trim();
    if (line !== '') lines.push(line);
    current = [];
  };

  for (const item of items) {
    const y = item.transform[5];
    if (baseline !== null && Math.abs(y - baseline) > LINE_TOLERANCE) flush();
    baseline = y;
    current.push(item.str);
    if (item.hasEOL) flush();
  }
  flush();
  return lines;
}

/**
 * Extracts the text layer of a PDF: one line per text line, a blank line between pages, and
 * words hyphenated across lines joined again. Scanned documents without a text layer come
 * back as PARSING_ERROR; OCR is left to whoever supplies the document.
 */
export async function extractTextFromPdf(data: Uint8Array, processo?: string): Promise<Result<string, AppError>> {
  const log = logger.child({ module: 'pdf-parser', ...(processo !== undefined && { processo }) });

  if (data.length > MAX_PDF_SIZE_BYTES) {
    log.error({ errorCode: ErrorCode.PARSING_ERROR, sizeBytes: data.length }, 'PDF exceeds size limit');
    return err(parseError(`PDF size ${data.length} bytes exceeds ${MAX_PDF_SIZE_BYTES} byte limit`));
  }

  let pdf: PDFDocumentProxy;
  try {
    // pdfjs transfers the buffer it is given, so hand it a copy.
    pdf = await getDocument({ data: new Uint8Array(data), standardFontDataUrl: STANDARD_FONT_DATA_URL }).promise;
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.PARSING_ERROR, details }, 'Failed to parse PDF');
    return err(parseError('Failed to parse PDF document', details));
  }

  const pages: string[] = [];
  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const content = await (await pdf.getPage(i)).getTextContent();
      const items = content.items.filter((item): item is TextItem => 'str' in item);
      pages.push(linesOf(items).join('\n'));
    }
  } catch (cause) {
    const details = describeCause(cause);
    log.error({ errorCode: ErrorCode.PARSING_ERROR, page: pages.length + 1, details }, 'Failed to extract text from PDF');
    return err(parseError('Failed to extract text from PDF', details));
  } finally {
    await pdf.destroy();
  }

  const text = pages
    .filter((page) => page !== '')
    .join('\n\n')
    .replace(SPLIT_WORD, '$1$2');

  if (text.length === 0) {
    log.error({ errorCode: ErrorCode.PARSING_ERROR, pageCount: pages.length }, 'PDF contains no text');
    return err(parseError('PDF contains no extractable text'));
  }

  log.debug({ pageCount: pages.length, textLength: text.length }, 'PDF text extracted');
  return ok(text);
}
