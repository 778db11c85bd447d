import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

export const createLoggerOptions = (level: string): LoggerOptions => ({
  name: 'pydust-config',
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

/** Build output goes to stdout, so diagnostics are written to stderr. */
export const createLogger = (level: string): Logger =>
  pino(createLoggerOptions(level), pino.destination(2));
