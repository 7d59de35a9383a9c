import type { Server } from 'node:http';
import type { RunMonitor } from '../services/pipeline/index.js';
import { logger } from '../infrastructure/logger.js';
import { createApp } from './app.js';

/** Serves the control API for the duration of a run. Resolves once the port is bound. */
export function startControlServer(monitor: RunMonitor, port: number): Promise<Server> {
  const app = createApp(monitor);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info({ port }, 'Control API listening');
      resolve(server);
    });
    server.once('error', reject);
  });
}

export function stopControlServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
