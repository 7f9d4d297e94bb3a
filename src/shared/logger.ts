import pino, { type Logger } from 'pino';
import { config } from './config.js';

export const logger = pino({
  level: config.LOG_LEVEL,
  transport:
    config.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:standard' } }
      : undefined,
  base: { service: 'excavation-field-sync' },
  serializers: pino.stdSerializers,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger };

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
