import pino from 'pino';

function buildRootLogger(): pino.Logger {
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level: process.env.LOG_LEVEL || 'info',
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
          level: process.env.LOG_LEVEL || 'info',
        };

  return pino(loggerOptions);
}

let rootLogger: pino.Logger | undefined;

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  rootLogger ??= buildRootLogger();
  return rootLogger.child({ ...context });
}
