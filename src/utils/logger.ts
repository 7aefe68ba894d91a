import type { LogLevel } from '../config/index.js';

type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured logger writing one JSON object per line
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

function errorFields(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function createLogger(level: LogLevel = 'info', bindings: LogFields = {}): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, fields: LogFields = {}): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }

    const entry: LogFields = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...bindings,
    };
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = errorFields(value);
    }

    const line = JSON.stringify(entry);
    if (entryLevel === 'error') {
      console.error(line);
    } else if (entryLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: (fields) => createLogger(level, { ...bindings, ...fields }),
  };
}

/**
 * Logger that drops everything (tests)
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
