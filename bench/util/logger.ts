import pino, { type DestinationStream, type Logger } from 'pino';

export const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof logLevels)[number];
export type { Logger } from 'pino';

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}

/** Logs go to stderr by default so stdout carries only the report. */
export function createLogger(level: LogLevel = 'info', destination?: DestinationStream): Logger {
  return pino({ name: 'objbench', level }, destination ?? pino.destination(2));
}

export const silentLogger: Logger = pino({ level: 'silent' });
