/**
 * Logger factory using Pino
 * Structured JSON logging, pretty-printed outside production
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  /** pino-pretty transport; set from the NODE_ENV-derived app config */
  pretty: boolean;
  name?: string;
}

export const LOGGER_NAME = 'procurement-award-stats';

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: LoggerConfig): Logger => {
  const options: LoggerOptions = {
    name: config.name ?? LOGGER_NAME,
    level: config.level,
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  return pinoLib(options);
};

export { type Logger } from 'pino';
