/**
 * Console logger with levels.
 *
 * Every line is `[nl2sql] <message>` followed by a field object, so that
 * correlation IDs stay greppable in plain console output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export type LogFields = Record<string, unknown>;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return LEVEL_ORDER[isLogLevel(configured) ? configured : 'info'];
}

function emit(level: LogLevel, message: string, fields: LogFields): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  const line = `[nl2sql] ${message}`;
  switch (level) {
    case 'debug':
      console.debug(line, fields);
      break;
    case 'info':
      console.info(line, fields);
      break;
    case 'warn':
      console.warn(line, fields);
      break;
    case 'error':
      console.error(line, fields);
      break;
  }
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** A logger whose lines always carry `bound`. */
  child(bound: LogFields): Logger;
}

function createLogger(bound: LogFields): Logger {
  return {
    debug: (message, fields = {}) => emit('debug', message, { ...bound, ...fields }),
    info: (message, fields = {}) => emit('info', message, { ...bound, ...fields }),
    warn: (message, fields = {}) => emit('warn', message, { ...bound, ...fields }),
    error: (message, fields = {}) => emit('error', message, { ...bound, ...fields }),
    child: (extra) => createLogger({ ...bound, ...extra }),
  };
}

export const logger: Logger = createLogger({});
