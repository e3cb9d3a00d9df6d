import type { MessagePort, OutboundMessage, Update, UpdateBatch } from '../../ports/MessagePort.js';
import type { PromptPort, PromptRequest } from '../../ports/PromptPort.js';
import type { SessionStore } from './SessionStore.js';
import type { RateLimiter } from './RateLimiter.js';
import { SeenUpdates } from './SeenUpdates.js';
import { createLogger, generateCorrelationId, type Logger } from '../../utils/logger.js';
import { PromptHandlerError, PromptTimeoutError, isAuthError } from '../../utils/errors.js';
import { settleWithin, sleep, withTimeout } from '../../utils/async.js';
import { backoffDelay } from '../../utils/retry.js';
import { executeCommand, parseCommand, type Command } from './commands.js';
import { MSG_BUSY, MSG_GENERATING, MSG_RATE_LIMIT, apologyFor, previewOf } from './messages.js';

export type DispatcherState = 'Starting' | 'Running' | 'Draining' | 'Stopped';

export interface DispatcherOptions {
  requestTimeoutMs: number;
  shutdownTimeoutMs: number;
  historyMaxItems: number;
  /** Base delay between failed receive attempts; doubles up to 30s. */
  receiveRetryBaseMs?: number;
  /** How long cancelled tasks get to settle after a forced drain. */
  cancelGraceMs?: number;
}

export interface DispatcherDependencies {
  transport: MessagePort;
  promptPort: PromptPort;
  sessions: SessionStore;
  rateLimiter: RateLimiter;
  options: DispatcherOptions;
}

interface InFlightPrompt {
  updateId: number;
  controller: AbortController;
  promise: Promise<void>;
}

export class Dispatcher {
  private readonly logger = createLogger({ service: 'Dispatcher' });
  private phase: DispatcherState = 'Starting';
  private cursor = 0;
  private readonly seen = new SeenUpdates();
  private stopRequested = false;
  private fatalError: unknown;
  private readonly receiveController = new AbortController();
  private readonly inFlight = new Map<string, InFlightPrompt>();
  private readonly notices = new Set<Promise<void>>();
  private resolveStopped: () => void = () => undefined;
  private readonly stopped: Promise<void>;

  constructor(private readonly deps: DispatcherDependencies) {
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  get state(): DispatcherState {
    return this.phase;
  }

  /**
   * Starts the transport and prompt handler, then processes updates until stop() is
   * called. Rejects on startup failure or an auth failure at any time.
   */
  async run(): Promise<void> {
    const logger = this.logger.child({ method: 'run' });
    if (this.phase !== 'Starting') {
      throw new Error(`Dispatcher cannot run from state ${this.phase}`);
    }

    try {
      await this.deps.transport.initialize();
      await this.deps.promptPort.initialize?.();
    } catch (error) {
      logger.fatal({ err: error }, 'Startup failed');
      this.finish();
      throw error;
    }

    if (!this.stopRequested) {
      this.phase = 'Running';
      logger.info('Dispatcher running');
      await this.receiveLoop();
    }

    await this.drain();
    if (this.fatalError !== undefined) {
      throw this.fatalError;
    }
  }

  /** Begins draining; resolves once the dispatcher has stopped. Safe to call repeatedly. */
  stop(reason = 'stop requested'): Promise<void> {
    if (this.isAccepting()) {
      this.logger.info({ reason }, 'Stopping: no longer accepting updates');
      this.phase = 'Draining';
      this.receiveController.abort();
    } else if (this.phase === 'Starting') {
      this.stopRequested = true;
    }
    return this.stopped;
  }

  private isAccepting(): boolean {
    return this.phase === 'Running';
  }

  private async receiveLoop(): Promise<void> {
    const logger = this.logger.child({ method: 'receiveLoop' });
    const signal = this.receiveController.signal;
    let failures = 0;

    while (this.isAccepting()) {
      let batch: UpdateBatch;
      try {
        batch = await this.deps.transport.receiveUpdates(this.cursor, signal);
        failures = 0;
      } catch (error) {
        if (isAuthError(error)) {
          this.fail(error);
          return;
        }
        failures++;
        const delayMs = backoffDelay(failures, this.deps.options.receiveRetryBaseMs ?? 1000);
        logger.warn({ err: error, failures, delayMs }, 'Receiving updates failed; retrying');
        await sleep(delayMs, signal);
        continue;
      }

      this.cursor = Math.max(this.cursor, batch.cursor);
      for (const update of batch.updates) {
        if (!this.isAccepting()) {
          break;
        }
        this.dispatch(update);
      }
    }
  }

  /** Routes one update. Synchronous: prompt work continues as a background task. */
  dispatch(update: Update): void {
    if (!this.seen.add(update.id)) {
      this.logger.debug({ updateId: update.id }, 'Skipping already seen update');
      return;
    }

    const logger = this.logger.child({
      correlationId: generateCorrelationId(),
      updateId: update.id,
      chatId: update.chatId,
    });

    const text = update.text?.trim();
    if (!text) {
      logger.debug('Ignoring update without text');
      return;
    }

    const command = parseCommand(text);
    if (command) {
      this.handleCommand(update, command, logger);
      return;
    }

    logger.info({ textLength: text.length }, 'Received prompt');
    this.acceptPrompt(
      update,
      { chatId: update.chatId, text, category: this.deps.sessions.get(update.chatId).category },
      logger
    );
  }

  private handleCommand(update: Update, command: Command, logger: Logger): void {
    logger.info({ command: command.name }, 'Received command');
    const outcome = executeCommand(command, update.chatId, this.deps.sessions);
    if (outcome.kind === 'reply') {
      this.notify({ chatId: update.chatId, body: outcome.body }, logger);
      return;
    }
    this.acceptPrompt(
      update,
      {
        chatId: update.chatId,
        text: outcome.changes,
        category: this.deps.sessions.get(update.chatId).category,
        previous: outcome.previous,
      },
      logger
    );
  }

  private acceptPrompt(update: Update, request: PromptRequest, logger: Logger): void {
    const { sessions, rateLimiter } = this.deps;
    const chatId = update.chatId;

    if (sessions.isBusy(chatId)) {
      logger.info('Chat busy; dropping prompt');
      this.notify({ chatId, body: MSG_BUSY, replyTo: update.messageId }, logger);
      return;
    }
    if (!rateLimiter.isAllowed(chatId)) {
      logger.info('Rate limit reached; dropping prompt');
      this.notify({ chatId, body: MSG_RATE_LIMIT, replyTo: update.messageId }, logger);
      return;
    }
    if (!sessions.mark(chatId)) {
      this.notify({ chatId, body: MSG_BUSY, replyTo: update.messageId }, logger);
      return;
    }

    const controller = new AbortController();
    const generation = sessions.get(chatId).generation;
    const promise = this.runPrompt(update, request, generation, controller.signal, logger).finally(() => {
      sessions.clear(chatId);
      this.inFlight.delete(chatId);
    });
    this.inFlight.set(chatId, { updateId: update.id, controller, promise });
  }

  /** Never rejects: every failure ends in a reply, a log line, or both. */
  private async runPrompt(
    update: Update,
    request: PromptRequest,
    generation: number,
    signal: AbortSignal,
    logger: Logger
  ): Promise<void> {
    const { promptPort, options } = this.deps;
    const chatId = update.chatId;
    const replyTo = update.messageId;
    const startedAt = Date.now();
    // Sent alongside the handler call; the reply waits for it so the order holds
    const progress = this.deliver({ chatId, body: MSG_GENERATING, replyTo }, logger);

    try {
      const result = await withTimeout((taskSignal) => promptPort.handle(request, taskSignal), {
        timeoutMs: options.requestTimeoutMs,
        onTimeout: () => new PromptTimeoutError(options.requestTimeoutMs),
        signal,
      });
      await progress;

      if ('reply' in result && result.reply.trim()) {
        this.remember(chatId, result.reply, request, generation);
        await this.deliver({ chatId, body: result.reply, replyTo }, logger);
        logger.info({ durationMs: Date.now() - startedAt, refine: request.previous !== undefined }, 'Prompt handled');
        return;
      }

      const kind = 'error' in result ? result.error : 'empty';
      logger.warn({ kind }, 'Prompt handler returned no reply');
      await this.deliver({ chatId, body: apologyFor(kind), replyTo }, logger);
    } catch (error) {
      await progress;
      if (signal.aborted) {
        logger.warn('Prompt cancelled during shutdown');
        return;
      }
      const kind = error instanceof PromptHandlerError ? error.kind : 'unavailable';
      logger.error({ err: error, kind, durationMs: Date.now() - startedAt }, 'Prompt handler failed');
      await this.deliver({ chatId, body: apologyFor(kind), replyTo }, logger);
    }
  }

  /**
   * History is labelled with the category the prompt was written for. After /cancel
   * (a newer generation) the reply is still logged but no longer becomes lastPrompt.
   */
  private remember(chatId: string, reply: string, request: PromptRequest, generation: number): void {
    const { sessions, options } = this.deps;
    if (sessions.get(chatId).generation === generation) {
      sessions.update(chatId, { lastPrompt: reply });
    }
    const category = request.category ?? 'text';
    sessions.pushHistory(chatId, { category, preview: previewOf(reply) }, options.historyMaxItems);
  }

  private notify(message: OutboundMessage, logger: Logger): void {
    const promise = this.deliver(message, logger).finally(() => {
      this.notices.delete(promise);
    });
    this.notices.add(promise);
  }

  /** Sends and contains failures to this chat; an auth failure stops the process. */
  private async deliver(message: OutboundMessage, logger: Logger): Promise<void> {
    try {
      await this.deps.transport.send(message);
    } catch (error) {
      if (isAuthError(error)) {
        this.fail(error);
        return;
      }
      logger.error({ err: error }, 'Failed to send message');
    }
  }

  private fail(error: unknown): void {
    if (this.fatalError === undefined) {
      this.fatalError = error;
      this.logger.fatal({ err: error }, 'Fatal transport error; shutting down');
    }
    void this.stop('fatal error');
  }

  private async drain(): Promise<void> {
    const logger = this.logger.child({ method: 'drain' });
    this.phase = 'Draining';
    const { shutdownTimeoutMs, cancelGraceMs = 1000 } = this.deps.options;

    const pending = (): Promise<void>[] => [
      ...[...this.inFlight.values()].map((task) => task.promise),
      ...this.notices,
    ];

    logger.info({ inFlight: this.inFlight.size, notices: this.notices.size }, 'Draining');
    const finished = await settleWithin(pending(), shutdownTimeoutMs);

    if (!finished) {
      const inFlight = [...this.inFlight.entries()].map(([chatId, task]) => ({ chatId, updateId: task.updateId }));
      logger.warn({ inFlight }, 'Drain timed out; cancelling in-flight prompts');
      for (const task of this.inFlight.values()) {
        task.controller.abort(new PromptHandlerError('unavailable', 'Cancelled by shutdown'));
      }
      await settleWithin(pending(), cancelGraceMs);
      // Never leave a chat busy, even if its task ignored cancellation
      for (const chatId of this.inFlight.keys()) {
        this.deps.sessions.clear(chatId);
      }
    }

    this.finish();
    logger.info('Dispatcher stopped');
  }

  private finish(): void {
    this.phase = 'Stopped';
    this.resolveStopped();
  }
}
