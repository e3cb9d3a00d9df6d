import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import { createWebhookRouter, type WebhookSink } from './adapters/telegram/webhookRouter.js';
const logger = createLogger({ component: 'server' });

export function createApp(adapter: WebhookSink, getState: () => string): express.Express {
  const app = express();

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes
  app.use('/webhook', createWebhookRouter(adapter, getState));

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', state: getState(), timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser marks malformed JSON with a 4xx status
    const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
    if (status === 500) {
      logger.error({ err }, 'Unhandled error in Express');
    }
    res.status(status).json({ error: status === 500 ? 'Internal server error' : 'Bad request' });
  });

  return app;
}

export async function startServer(app: express.Express, port: number, host: string = '0.0.0.0'): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}

export async function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info('HTTP server closed');
      resolve();
    });
  });
}
