import pino from 'pino';

/**
 * Application logger using Pino
 *
 * Structured JSON in production, pretty printed in development.
 * Tests run with LOG_LEVEL=silent (see vitest.config.ts).
 */

const env = process.env.NODE_ENV || 'development';
const isDevelopment = env === 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',

  // Pretty print in development, JSON everywhere else
  transport: isDevelopment ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env,
  },
});

export type Logger = pino.Logger;

/**
 * Create a child logger with specific context
 * e.g. createLogger({ component: 'QueryGateway' })
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
