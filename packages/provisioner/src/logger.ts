/**
 * Logger factory
 *
 * @module packages/provisioner/logger
 */

import { pino, type Logger } from 'pino';

export interface LoggerOptions {
  level: string;
  /** Pretty-print through pino-pretty (development only) */
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.name,
    level: options.level,
    serializers: {
      ...pino.stdSerializers,
      error: pino.stdSerializers.err,
    },
    transport: options.pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  });
}
