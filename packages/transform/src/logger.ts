import pino, { type DestinationStream, type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Log level; falls back to LOG_LEVEL, then 'info' */
  level?: string;

  /** Output stream; stdout when omitted */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: 'logpipe',
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',

      formatters: {
        level: (label) => ({ level: label }),
      },

      serializers: {
        err: pino.stdSerializers.err,
      },

      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
    },
    options.destination
  );
}
