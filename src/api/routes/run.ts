import { Router, type Request, type Response } from 'express';
import type { RunMonitor } from '../../services/pipeline/index.js';
import { logger } from '../../infrastructure/logger.js';
import { successResponse, errorResponse } from '../middleware/error-handler.js';

const log = logger.child({ module: 'control-api' });

/** Run status, manual CAPTCHA signal and cancellation for the active run. */
export function runRouter(monitor: RunMonitor): Router {
  const router = Router();

  router.get('/status', (_req: Request, res: Response) => {
    res.json(successResponse(monitor.status()));
  });

  router.post('/captcha/solved', (_req: Request, res: Response) => {
    const waiting = monitor.captcha.waiting;
    if (waiting === null || !monitor.captcha.signalSolved()) {
      res.status(409).json(errorResponse('NO_CAPTCHA_PENDING', 'No CAPTCHA is waiting for a manual solve'));
      return;
    }
    log.info({ processo: waiting.processo }, 'Manual CAPTCHA solve signalled');
    res.status(202).json(successResponse({ processo: waiting.processo }));
  });

  router.post('/run/cancel', (_req: Request, res: Response) => {
    if (!monitor.cancel()) {
      res.status(409).json(errorResponse('ALREADY_CANCELLED', 'Cancellation was already requested'));
      return;
    }
    log.warn('Run cancellation requested');
    res.status(202).json(successResponse({ cancelRequested: true }));
  });

  return router;
}
