import type { Server } from 'node:http';
import type express from 'express';
import { loadConfig, type Config, type Env } from './config/index.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import type { MessagePort } from './ports/MessagePort.js';
import type { PromptPort } from './ports/PromptPort.js';
import { TelegramAdapter } from './adapters/telegram/TelegramAdapter.js';
import type { WebhookSink } from './adapters/telegram/webhookRouter.js';
import { HttpPromptAdapter } from './adapters/prompt/HttpPromptAdapter.js';
import { LocalPromptAdapter } from './adapters/prompt/LocalPromptAdapter.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { DisabledLLMAdapter } from './adapters/llm/DisabledLLMAdapter.js';
import { Dispatcher } from './core/relay/Dispatcher.js';
import { SessionStore } from './core/relay/SessionStore.js';
import { RateLimiter } from './core/relay/RateLimiter.js';
import { scheduleSessionSweep, type SweepTask } from './scheduler/index.js';
import { createApp, startServer, stopServer } from './server.js';

const logger = createLogger({ component: 'bootstrap' });

export interface RelayFactories {
  createTransport(config: Config): MessagePort & WebhookSink;
  createPromptPort(config: Config): PromptPort;
  scheduleSweep(sessions: SessionStore, rateLimiter: RateLimiter, idleMs: number): SweepTask;
  startServer(app: express.Express, port: number, host: string): Promise<Server>;
}

export const defaultFactories: RelayFactories = {
  createTransport: (config) => new TelegramAdapter(config),
  createPromptPort: (config) => {
    if (config.promptBackendUrl) {
      return new HttpPromptAdapter(config.promptBackendUrl);
    }
    const llm = config.anthropicApiKey ? new ClaudeAdapter(config) : new DisabledLLMAdapter();
    return new LocalPromptAdapter(llm);
  },
  scheduleSweep: scheduleSessionSweep,
  startServer,
};

type TerminationSignal = 'SIGTERM' | 'SIGINT';

export interface SignalSource {
  once(event: TerminationSignal, listener: () => void): unknown;
  removeListener(event: TerminationSignal, listener: () => void): unknown;
}

/** Runs the bot until it stops. Resolves with the process exit code. */
export async function main(
  env: Env = process.env,
  factories: RelayFactories = defaultFactories,
  signals: SignalSource = process
): Promise<number> {
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    logger.fatal({ err: error }, 'Invalid configuration; not starting');
    return 1;
  }
  setLogLevel(config.logLevel);

  logger.info(
    {
      mode: config.telegramWebhookUrl ? 'webhook' : 'polling',
      promptHandler: config.promptBackendUrl ? 'http' : 'local',
    },
    'Starting prompt relay bot'
  );

  const transport = factories.createTransport(config);
  const sessions = new SessionStore();
  const rateLimiter = new RateLimiter(config.rateLimitPerMinute);
  const dispatcher = new Dispatcher({
    transport,
    promptPort: factories.createPromptPort(config),
    sessions,
    rateLimiter,
    options: {
      requestTimeoutMs: config.requestTimeoutSeconds * 1000,
      shutdownTimeoutMs: config.shutdownTimeoutSeconds * 1000,
      historyMaxItems: config.historyMaxItems,
    },
  });

  const onTerm = (): void => {
    logger.info({ signal: 'SIGTERM' }, 'Termination signal received');
    void dispatcher.stop('SIGTERM');
  };
  const onInt = (): void => {
    logger.info({ signal: 'SIGINT' }, 'Termination signal received');
    void dispatcher.stop('SIGINT');
  };
  signals.once('SIGTERM', onTerm);
  signals.once('SIGINT', onInt);

  const sweep = factories.scheduleSweep(sessions, rateLimiter, config.sessionIdleMinutes * 60_000);
  let server: Server | undefined;

  try {
    if (config.telegramWebhookUrl) {
      server = await factories.startServer(createApp(transport, () => dispatcher.state), config.port, config.host);
    }
    await dispatcher.run();
    logger.info('Shut down cleanly');
    return 0;
  } catch (error) {
    logger.fatal({ err: error }, 'Bot stopped with a fatal error');
    return 1;
  } finally {
    sweep.stop();
    signals.removeListener('SIGTERM', onTerm);
    signals.removeListener('SIGINT', onInt);
    if (server) {
      await stopServer(server).catch((error: unknown) => {
        logger.warn({ err: error }, 'Failed to close HTTP server');
      });
    }
  }
}
