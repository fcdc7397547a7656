import pino from 'pino';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

export type LogFields = Record<string, unknown>;

/**
 * Thin wrapper over pino. Everything goes to stderr: stdout belongs to the
 * language server protocol stream.
 */
export class Logger {
  private readonly base: pino.Logger;

  constructor(base: pino.Logger) {
    this.base = base;
  }

  setLevel(level: LogLevel) {
    this.base.level = level;
  }

  debug(msg: string, fields?: LogFields) {
    this.base.debug(fields ?? {}, msg);
  }

  info(msg: string, fields?: LogFields) {
    this.base.info(fields ?? {}, msg);
  }

  warn(msg: string, fields?: LogFields) {
    this.base.warn(fields ?? {}, msg);
  }

  error(msg: string, fields?: LogFields) {
    this.base.error(fields ?? {}, msg);
  }
}

export function createLogger(level: LogLevel = LogLevel.INFO): Logger {
  return new Logger(pino({ name: 'wakatime-ls', level }, pino.destination(2)));
}

export const logger = createLogger();
