import express from 'express';
import type { RunMonitor } from '../services/pipeline/index.js';
import { setupOpenAPI } from './openapi/index.js';
import { runRouter } from './routes/run.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';

export function createApp(monitor: RunMonitor): express.Express {
  const app = express();

  app.use(express.json({ limit: '16kb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(runRouter(monitor));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
