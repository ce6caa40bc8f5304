/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 */

import pino, { type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const options: LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'fileclassify',
    env: NODE_ENV,
  },
};

// Logs go to stderr; stdout belongs to command output
export const logger = NODE_ENV === 'development'
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

export type Logger = typeof logger;

const children: Logger[] = [];

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  const child = logger.child(context);
  children.push(child);
  return child;
}

/**
 * Change the level of the root logger and every child created so far
 */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
