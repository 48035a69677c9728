/**
 * Logger factory using Pino
 * Structured JSON logs in production, pino-pretty elsewhere
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  /**
   * Write logs to stderr instead of stdout.
   * The CLI sets this so its report output stays machine-readable.
   */
  toStderr?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'srag-surveillance-server',
  pretty: process.env['NODE_ENV'] !== 'production',
  toStderr: false,
};

const STDERR_FD = 2;

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };
  const toStderr = finalConfig.toStderr === true;

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        ...(toStderr && { destination: STDERR_FD }),
      },
    };
    return pinoLib(options);
  }

  return toStderr ? pinoLib(options, pinoLib.destination(STDERR_FD)) : pinoLib(options);
};

export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export { type Logger } from 'pino';
