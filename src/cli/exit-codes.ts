import { ErrorCode, type AppError } from '../domain/errors.js';

export const ExitCode = {
  OK: 0,
  SETUP_FAILED: 1,
  CONFIG_INVALID: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * A run that finished, even with skipped units, or was cancelled exits 0. Invalid
 * configuration exits 2; anything else that stopped the run exits 1.
 */
export function exitCodeFor(error: AppError | null): ExitCode {
  if (error === null) return ExitCode.OK;
  return error.code === ErrorCode.CONFIG_INVALID ? ExitCode.CONFIG_INVALID : ExitCode.SETUP_FAILED;
}
