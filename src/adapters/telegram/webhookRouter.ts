import type { Router } from 'express';
import express from 'express';
import type { TelegramAdapter } from './TelegramAdapter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

export type WebhookSink = Pick<TelegramAdapter, 'handleWebhook'>;

/**
 * Updates are only taken while the dispatcher is Running. Any other state answers
 * 503, so Telegram keeps the update and delivers it again later.
 */
export function createWebhookRouter(adapter: WebhookSink, getState: () => string): Router {
  const logger = createLogger({ component: 'webhookRouter' });
  const router = express.Router();

  router.post('/telegram', express.json(), (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });

    const state = getState();
    if (state !== 'Running') {
      requestLogger.info({ state }, 'Not accepting updates; asking Telegram to retry');
      res.status(503).json({ ok: false, error: 'Not accepting updates' });
      return;
    }

    const body: unknown = req.body;
    if (!adapter.handleWebhook(body)) {
      requestLogger.warn('Rejected webhook request with an invalid body');
      res.status(400).json({ ok: false, error: 'Invalid update' });
      return;
    }

    // Telegram expects 200 OK; processing happens in the dispatcher loop
    res.status(200).json({ ok: true });
  });

  return router;
}
