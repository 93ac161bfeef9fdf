// Scoped structured logger: `[Scope:LEVEL] message {json}` lines on stderr
// stdout stays free for whatever the caller prints

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Logs at info regardless of the threshold (verbose answers) */
  trace(message: string, data?: Record<string, unknown>): void;
}

function write(scope: string, level: LogLevel, message: string, data?: Record<string, unknown>): void {
  const prefix = `[${scope}:${level.toUpperCase()}]`;
  if (data) {
    console.error(`${prefix} ${message}`, JSON.stringify(data));
  } else {
    console.error(`${prefix} ${message}`);
  }
}

export function createLogger(scope: string): Logger {
  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    write(scope, level, message, data);
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    trace: (message, data) => write(scope, 'info', message, data),
  };
}
