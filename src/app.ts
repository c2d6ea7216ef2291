/**
 * Express status server
 * Liveness, reconciliation health and Prometheus metrics
 */
import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import type { Server } from 'http';
import { logger } from './core/Logger.js';
import { createHealthController } from './api/controllers/healthController.js';
import { asyncHandler, errorHandler, notFoundHandler } from './api/middleware/errorHandler.js';
import type { StatusReader } from './services/ReconcileStatus.js';

/**
 * Create and configure the Express application
 */
export function createStatusApp(status: StatusReader): Express {
  const app = express();
  const health = createHealthController(status);

  app.disable('x-powered-by');

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.trace({ method: req.method, url: req.url }, 'Request received');
    next();
  });

  app.get('/health', health.livenessCheck);
  app.get('/status', health.healthCheck);
  app.get('/metrics', asyncHandler(health.metrics));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Start the status server
 */
export function startServer(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'Status server started');
      resolve(server);
    });

    server.on('error', (error) => {
      logger.error({ error }, 'Status server error');
      reject(error);
    });
  });
}

/**
 * Close the status server
 */
export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
