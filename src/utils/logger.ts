import pino from 'pino';

const LEVELS = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function resolveLevel(): string {
  const level = process.env.LOG_LEVEL?.trim().toLowerCase();
  // Until setLogLevel runs; an invalid LOG_LEVEL is reported by the config loader
  return level && LEVELS.has(level) ? level : 'info';
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

let baseLogger: pino.Logger | undefined;

function getBaseLogger(): pino.Logger {
  if (baseLogger) {
    return baseLogger;
  }

  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level: resolveLevel(),
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {
          level: resolveLevel(),
        };

  baseLogger = pino(loggerOptions);
  return baseLogger;
}

// Component loggers are created at import time, before the config is loaded
const componentLoggers = new Set<pino.Logger>();

export function createLogger(context: Record<string, unknown> = {}): pino.Logger {
  const logger = getBaseLogger().child(context);
  componentLoggers.add(logger);
  return logger;
}

/** Applies the configured level to the base logger and every logger made so far. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  getBaseLogger().level = level;
  for (const logger of componentLoggers) {
    logger.level = level;
  }
}

export type Logger = pino.Logger;
