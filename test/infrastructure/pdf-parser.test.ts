import { describe, it, expect } from 'vitest';
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type { TextItem } from 'pdfjs-dist/types/src/display/api.js';
import { extractTextFromPdf, linesOf } from '../../src/infrastructure/pdf-parser.js';

async function createTestPdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const lines of pages) {
    const page = doc.addPage([595, 842]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 50, y: 780 - i * 16, size: 11, font });
    });
  }
  return doc.save();
}

describe('extractTextFromPdf', () => {
  it('extracts the text of every page', async () => {
    const data = await createTestPdf([
      ['EXTRATO DO CONTRATO'],
      ['Processo SME-PRO-2025/19222'],
    ]);

    const result = await extractTextFromPdf(data);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toContain('EXTRATO DO CONTRATO');
    expect(result.value).toContain('SME-PRO-2025/19222');
    expect(result.value).toBe('EXTRATO DO CONTRATO\n\nProcesso SME-PRO-2025/19222');
  });

  it('keeps one line per drawn line and joins words hyphenated across lines', async () => {
    const data = await createTestPdf([['CONTRATADA: Empresa', 'de Servicos contra-', 'tada em 2025']]);

    const result = await extractTextFromPdf(data);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toBe('CONTRATADA: Empresa\nde Servicos contratada em 2025');
  });

  it('returns PARSING_ERROR for corrupt data', async () => {
    const result = await extractTextFromPdf(new TextEncoder().encode('not a pdf at all'), 'SME-PRO-2025/1');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PARSING_ERROR');
    expect(result.error.message).toBe('Failed to parse PDF document');
    expect(result.error.retryable).toBe(false);
  });

  it('returns PARSING_ERROR for a PDF without a text layer', async () => {
    const data = await createTestPdf([[]]);

    const result = await extractTextFromPdf(data);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PARSING_ERROR');
    expect(result.error.message).toBe('PDF contains no extractable text');
  });

  it('rejects oversized input before parsing', async () => {
    const result = await extractTextFromPdf(new Uint8Array(51 * 1024 * 1024));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('PARSING_ERROR');
    expect(result.error.message).toContain('exceeds');
  });
});

function item(str: string, y: number, hasEOL = false): TextItem {
  return { str, dir: 'ltr', transform: [11, 0, 0, 11, 50, y], width: str.length * 5, height: 11, fontName: 'g_d0_f1', hasEOL };
}

describe('linesOf', () => {
  it('groups items by baseline', () => {
    expect(linesOf([item('Processo', 780), item('SME-PRO-2025/1', 780.5), item('Valor', 764)])).toEqual([
      'Processo SME-PRO-2025/1',
      'Valor',
    ]);
  });

  it('breaks on an end-of-line marker and drops blank lines', () => {
    expect(linesOf([item('EXTRATO', 780, true), item('  ', 780), item('DO CONTRATO', 780)])).toEqual([
      'EXTRATO',
      'DO CONTRATO',
    ]);
  });

  it('collapses runs of whitespace', () => {
    expect(linesOf([item(' R$   1.000,00 ', 700)])).toEqual(['R$ 1.000,00']);
  });
});
