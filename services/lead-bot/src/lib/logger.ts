// .env must be loaded before the root logger reads LOG_LEVEL
import 'dotenv/config';
import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: { colorize: true },
  } : undefined,
});

export type Logger = pino.Logger;

export function createLogger(context: Record<string, string>): Logger {
  return logger.child(context);
}
