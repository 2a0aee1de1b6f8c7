import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import {
  createHistoryRouter,
  createSelectionRouter,
  type HistoryRouterDeps,
} from './adapters/http/historyRouter.js';
const logger = createLogger({ component: 'server' });

export function createApp(deps: HistoryRouterDeps): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes
  app.use('/history', createHistoryRouter(deps));
  app.use('/selection', createSelectionRouter(deps));

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', historySize: deps.history.size, timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  deps: HistoryRouterDeps,
  port: number,
  host: string = '127.0.0.1'
): Promise<Server> {
  const app = createApp(deps);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.on('error', reject);
  });
}
