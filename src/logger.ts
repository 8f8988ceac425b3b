import pino, { Logger } from 'pino';

import { config } from './config';

export type { Logger };

export const logger = pino({
  level: config.env === 'test' ? 'silent' : config.logLevel,
  transport: config.env === 'development'
    ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    }
    : undefined,
  base: {
    service: 'recommendation-service',
    env: config.env,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
