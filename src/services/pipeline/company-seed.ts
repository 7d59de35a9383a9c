import { readFile } from 'node:fs/promises';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { companySeedRowSchema } from '../../domain/schemas.js';
import type { CompanyRecord } from '../../domain/types.js';

const HEADER_CELL = /^(company_id|cnpj|id|favorecido)$/i;

function unquote(cell: string): string {
  return cell.trim().replace(/^"(.*)"$/, '$1').replace(/""/g, '"');
}

/** Splits on the first separator only; the name may contain commas. */
function cells(line: string): [string, string] {
  const at = line.search(/[;,]/);
  return at === -1 ? [unquote(line), ''] : [unquote(line.slice(0, at)), unquote(line.slice(at + 1))];
}

/**
 * Parses a company seed list: one company per line, `company_id[,name]`, with an optional
 * header row. Duplicate ids keep their first line.
 */
export function parseCompanySeed(text: string): Result<CompanyRecord[], AppError> {
  const companies = new Map<string, CompanyRecord>();
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');

  for (const [index, line] of lines.entries()) {
    const [id, name] = cells(line);
    if (index === 0 && HEADER_CELL.test(id)) continue;

    const parsed = companySeedRowSchema.safeParse({ company_id: id, name });
    if (!parsed.success) {
      return err(createAppError(ErrorCode.CONFIG_INVALID, `Invalid company seed line ${index + 1}`, false, parsed.error.message));
    }
    if (!companies.has(parsed.data.company_id)) {
      companies.set(parsed.data.company_id, Object.freeze({ ...parsed.data }));
    }
  }
  return ok([...companies.values()]);
}

export async function loadCompanySeed(path: string): Promise<Result<CompanyRecord[], AppError>> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (cause) {
    return err(createAppError(ErrorCode.CONFIG_INVALID, `Cannot read company list ${path}`, false, describeCause(cause)));
  }
  return parseCompanySeed(text);
}
