import { createLogger as createWinstonLogger, format, transports } from 'winston';
import type { Logger as WinstonLogger } from 'winston';

export type Logger = WinstonLogger;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
}

/**
 * Root logger shared by every service. Output is silenced under the test runner
 * unless LOG_LEVEL is set explicitly.
 */
export const logger: Logger = createWinstonLogger({
  level: resolveLevel(process.env.LOG_LEVEL),
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple(),
        format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
        })
      ),
    }),
  ],
});

/**
 * Child logger tagged with the emitting service
 */
export function createLogger(service: string): Logger {
  return logger.child({ service });
}
