/**
 * Logger
 *
 * Pino-based structured logger shared by every workspace. Records go to
 * stderr so command output on stdout stays clean; they are pretty-printed
 * outside production when stderr is a terminal.
 */

import { pino, destination, type LevelWithSilent } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

const pretty = NODE_ENV !== 'production' && NODE_ENV !== 'test' && process.stderr.isTTY === true;

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: 'encodeq' },
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          ignore: 'pid,hostname,service',
        },
      }
    : undefined,
}, pretty ? undefined : destination(2));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Change the level of the root logger and of every child created after
 */
export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
