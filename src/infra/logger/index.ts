/**
 * Pino loggers for the costing server and the command-line tool.
 *
 * The server logs to stdout. The CLI can print the ledger on stdout, so it
 * logs to stderr instead.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type LogDestination = 'stdout' | 'stderr';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
  destination?: LogDestination;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'programme-costing',
  pretty: process.env['NODE_ENV'] !== 'production',
  destination: 'stdout',
};

const FILE_DESCRIPTORS: Record<LogDestination, number> = { stdout: 1, stderr: 2 };

export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };
  const fd = FILE_DESCRIPTORS[finalConfig.destination ?? 'stdout'];

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
        destination: fd,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(fd));
};

/**
 * Child logger tagged with the part of the engine it reports for, e.g.
 * `{ component: 'reference-data' }` during the snapshot load.
 */
export const createChildLogger = (parent: Logger, context: Record<string, unknown>): Logger => {
  return parent.child(context);
};

export { type Logger } from 'pino';
