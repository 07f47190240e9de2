import pino from 'pino';

let baseLogger: pino.Logger | undefined;

function buildOptions(): pino.LoggerOptions {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV === 'development') {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level, base: { service: 'notebox' } };
}

function getBaseLogger(): pino.Logger {
  if (!baseLogger) {
    baseLogger = pino(buildOptions());
  }
  return baseLogger;
}

export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({ ...context });
}

export type Logger = pino.Logger;
