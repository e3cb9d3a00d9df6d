import type { MessagePort, OutboundMessage, Update, UpdateBatch } from '../../ports/MessagePort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { TransportError } from '../../utils/errors.js';
import { withRetry } from '../../utils/retry.js';
import { raceAbort, sleep } from '../../utils/async.js';
import { splitIntoChunks } from '../../utils/chunks.js';
import { classifyTelegramError } from './telegramErrors.js';
import { telegramUpdateSchema, toUpdate, type TelegramUpdate } from './updateSchema.js';
import TelegramBot from 'node-telegram-bot-api';

export type TelegramAdapterConfig = Pick<
  Config,
  'botToken' | 'telegramWebhookUrl' | 'pollTimeoutSeconds' | 'sendMaxAttempts'
>;

export interface SendRetryOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  wait?: (ms: number) => Promise<void>;
}

export class TelegramAdapter implements MessagePort {
  private readonly logger = createLogger({ adapter: 'TelegramAdapter' });
  private readonly bot: TelegramBot;
  private readonly inbox: TelegramUpdate[] = [];
  private wakeReceiver: (() => void) | undefined;

  constructor(
    private readonly config: TelegramAdapterConfig,
    private readonly retry: SendRetryOptions = {}
  ) {
    // receiveUpdates drives getUpdates itself, so the library's poller stays off
    this.bot = new TelegramBot(config.botToken, { polling: false });
  }

  get mode(): 'polling' | 'webhook' {
    return this.config.telegramWebhookUrl ? 'webhook' : 'polling';
  }

  async initialize(): Promise<void> {
    const logger = this.logger.child({ method: 'initialize' });
    logger.info({ mode: this.mode }, 'Initializing Telegram bot adapter');

    try {
      // Verify bot token by getting bot info
      const me = await this.bot.getMe();
      logger.info({ botId: me.id, botUsername: me.username }, 'Telegram bot verified');
    } catch (error) {
      const failure = classifyTelegramError(error);
      logger.error({ err: failure, kind: failure.kind }, 'Failed to verify bot token');
      throw failure;
    }

    if (this.config.telegramWebhookUrl) {
      await this.setupWebhook(this.config.telegramWebhookUrl);
      return;
    }

    try {
      // Telegram refuses getUpdates while a webhook is registered
      await this.bot.deleteWebHook();
      logger.info('Polling mode: webhook cleared');
    } catch (error) {
      const failure = classifyTelegramError(error);
      if (failure.kind === 'AuthError') {
        throw failure;
      }
      logger.warn({ err: failure }, 'Failed to clear webhook; polling may be refused');
    }
  }

  private async setupWebhook(webhookUrl: string): Promise<void> {
    const logger = this.logger.child({ method: 'setupWebhook' });
    try {
      // One connection at a time keeps webhook deliveries in update_id order
      await this.bot.setWebHook(webhookUrl, { max_connections: 1, allowed_updates: ['message'] });
      logger.info({ webhookUrl }, 'Webhook set successfully');
    } catch (error) {
      const failure = classifyTelegramError(error);
      if (failure.kind === 'AuthError') {
        throw failure;
      }
      // Keep running so the HTTP server can receive updates once the URL is fixed
      logger.error({ err: failure, webhookUrl }, 'Failed to set webhook (app will keep running)');
    }
  }

  async receiveUpdates(cursor: number, signal: AbortSignal): Promise<UpdateBatch> {
    if (this.mode === 'webhook') {
      return this.drainInbox(cursor, signal);
    }

    let raw: TelegramBot.Update[] | null;
    try {
      raw = await raceAbort(
        this.bot.getUpdates({
          offset: cursor,
          timeout: this.config.pollTimeoutSeconds,
          allowed_updates: ['message'],
        }),
        signal
      );
    } catch (error) {
      throw classifyTelegramError(error);
    }

    if (raw === null) {
      return { updates: [], cursor };
    }
    return this.toBatch(raw, cursor);
  }

  /**
   * Queue an update delivered by the webhook route. Returns false when the body
   * is not a Telegram update.
   */
  handleWebhook(body: unknown): boolean {
    const logger = this.logger.child({ method: 'handleWebhook' });
    const parsed = telegramUpdateSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ issues: parsed.error.issues }, 'Ignoring malformed webhook update');
      return false;
    }

    logger.debug({ updateId: parsed.data.update_id }, 'Queued webhook update');
    this.inbox.push(parsed.data);
    this.wakeReceiver?.();
    return true;
  }

  private async drainInbox(cursor: number, signal: AbortSignal): Promise<UpdateBatch> {
    if (this.inbox.length === 0 && !signal.aborted) {
      const timer = new AbortController();
      const woken = new Promise<void>((resolve) => {
        this.wakeReceiver = resolve;
      });
      const onAbort = (): void => timer.abort();
      signal.addEventListener('abort', onAbort, { once: true });
      try {
        await Promise.race([woken, sleep(this.config.pollTimeoutSeconds * 1000, timer.signal)]);
      } finally {
        this.wakeReceiver = undefined;
        timer.abort();
        signal.removeEventListener('abort', onAbort);
      }
    }
    if (signal.aborted) {
      return { updates: [], cursor };
    }
    return this.toBatch(this.inbox.splice(0), cursor);
  }

  private toBatch(raw: TelegramUpdate[], cursor: number): UpdateBatch {
    const ordered = [...raw].sort((a, b) => a.update_id - b.update_id);
    const updates: Update[] = [];
    let next = cursor;
    for (const item of ordered) {
      next = Math.max(next, item.update_id + 1);
      const update = toUpdate(item);
      if (update) {
        updates.push(update);
      }
    }
    return { updates, cursor: next };
  }

  async send(message: OutboundMessage): Promise<void> {
    const logger = this.logger.child({ method: 'send', chatId: message.chatId });

    const chatId = Number.parseInt(message.chatId, 10);
    if (Number.isNaN(chatId)) {
      throw new TransportError('Rejected', `Invalid chat ID: ${message.chatId}`);
    }

    const chunks = splitIntoChunks(message.body);
    if (chunks.length === 0) {
      logger.warn('Refusing to send an empty message');
      return;
    }

    logger.info({ textLength: message.body.length, chunks: chunks.length }, 'Sending message');
    for (const [index, chunk] of chunks.entries()) {
      const options: TelegramBot.SendMessageOptions =
        index === 0 && message.replyTo !== undefined ? { reply_to_message_id: message.replyTo } : {};
      const sent = await this.withSendRetry(() => this.bot.sendMessage(chatId, chunk, options));
      logger.debug({ messageId: sent.message_id, chunk: index }, 'Message sent');
    }
  }

  private withSendRetry<T>(call: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await call();
        } catch (error) {
          throw classifyTelegramError(error);
        }
      },
      {
        maxAttempts: this.config.sendMaxAttempts,
        baseDelayMs: this.retry.baseDelayMs,
        maxDelayMs: this.retry.maxDelayMs,
        wait: this.retry.wait,
        shouldRetry: (error) => error instanceof TransportError && error.retryable,
        delayFor: (error) => (error instanceof TransportError ? error.retryAfterMs : undefined),
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({ err: error, attempt, delayMs }, 'Telegram call failed; retrying');
        },
      }
    );
  }
}
