import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

// One root logger per process; components get child loggers with their own bindings.
const rootLogger = pino({
  name: 'companion-intent',
  level,
  ...(process.env.NODE_ENV === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
});

export function createLogger(bindings?: { component: string } & Record<string, unknown>): pino.Logger {
  return bindings ? rootLogger.child(bindings) : rootLogger;
}

export const logger = rootLogger;
