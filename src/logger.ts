/**
 * Logger factory using Pino
 * In the browser pino writes through the console; the CLI can opt into pino-pretty.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'county-case-growth',
  pretty: false,
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
    browser: { asObject: false },
  };

  if (finalConfig.pretty === true) {
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

/**
 * Shared logger for modules that are not handed one explicitly.
 */
export const defaultLogger: Logger = createLogger({ level: 'warn' });

export { type Logger } from 'pino';
