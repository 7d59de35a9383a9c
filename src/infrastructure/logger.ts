import pino, { type Logger } from 'pino';

export const logger = pino({
  name: 'publication-audit',
  level: process.env.LOG_LEVEL ?? 'info',
});

export type { Logger };

export function createRunLogger(
  runId: string,
  companyId?: string,
  processo?: string,
): Logger {
  return logger.child({
    runId,
    ...(companyId !== undefined && { companyId }),
    ...(processo !== undefined && { processo }),
  });
}
