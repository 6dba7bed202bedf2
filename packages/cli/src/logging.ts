import pino from 'pino';

export type Logger = pino.Logger;

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to stdout. */
  destination?: pino.DestinationStream;
}

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.verbose ? 'debug' : 'info';
  const config: pino.LoggerOptions = {
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination ? pino(config, options.destination) : pino(config);
};
