import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'control-api' });

/** Routes an operator polls while a run is going; logged at debug. */
const POLLED = new Set(['/status', '/health']);

export const REQUEST_ID_HEADER = 'x-request-id';

function levelFor(req: Request, statusCode: number): 'error' | 'warn' | 'info' | 'debug' {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return req.method === 'GET' && POLLED.has(req.path) ? 'debug' : 'info';
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();
  const requestId = req.get(REQUEST_ID_HEADER) ?? randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const durationMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
    log[levelFor(req, res.statusCode)](
      { requestId, method: req.method, path: req.path, statusCode: res.statusCode, durationMs },
      'HTTP request',
    );
  });

  next();
}
