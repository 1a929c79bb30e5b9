import { dim, red, yellow } from './ansi.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
}

type LogFn = (message: string, data?: Record<string, unknown>) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  child: (defaults: Record<string, unknown>) => Omit<Logger, 'child'>;
}

function colorFor(level: LogLevel): (s: string) => string {
  switch (level) {
    case 'error': return red;
    case 'warn': return yellow;
    case 'debug': return dim;
    case 'info': return (s) => s;
  }
}

function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = LOG_LEVELS[options.level ?? 'info'];
  const jsonMode = options.json ?? false;

  function log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (LOG_LEVELS[level] < minLevel) return;

    if (jsonMode) {
      const entry = { level, message, timestamp: new Date().toISOString(), ...data };
      process.stderr.write(JSON.stringify(entry) + '\n');
      return;
    }

    const dataStr = data ? ` ${JSON.stringify(data)}` : '';
    process.stderr.write(`${colorFor(level)(`[${level}]`)} ${message}${dataStr}\n`);
  }

  const bind = (defaults: Record<string, unknown>): Omit<Logger, 'child'> => ({
    debug: (msg, data) => log('debug', msg, { ...defaults, ...data }),
    info: (msg, data) => log('info', msg, { ...defaults, ...data }),
    warn: (msg, data) => log('warn', msg, { ...defaults, ...data }),
    error: (msg, data) => log('error', msg, { ...defaults, ...data }),
  });

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: bind,
  };
}

/** Global logger instance; configure via setLoggerOptions() */
export let logger = createLogger();

export function setLoggerOptions(options: LoggerOptions): void {
  logger = createLogger(options);
}
