import pino from 'pino';

/**
 * Application logger using Pino
 *
 * - Structured JSON in production
 * - Pretty printing while developing
 * - Silent under test unless LOG_LEVEL asks otherwise
 */

const environment = process.env.NODE_ENV || 'development';
const isPretty = environment !== 'production' && environment !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (environment === 'test' ? 'silent' : 'info'),

  transport: isPretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,

  base: {
    env: environment,
  },
});

export type Logger = ReturnType<typeof createLogger>;

/**
 * Create a child logger with specific context
 * Every service gets one tagged with its component name
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
