import { config, LogLevel } from './config';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Scoped console logger. Entries below `config.logLevel` are dropped; the
 * level is read on every call so tests can lower or raise it at runtime.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (RANK[level] < RANK[config.logLevel]) return;
    const line = `[watchdog:${scope}] ${message}`;
    const args: unknown[] = meta && Object.keys(meta).length > 0 ? [line, JSON.stringify(meta)] : [line];
    switch (level) {
      case 'debug': console.debug(...args); break;
      case 'info': console.info(...args); break;
      case 'warn': console.warn(...args); break;
      case 'error': console.error(...args); break;
    }
  };

  return {
    debug: (message, meta) => emit('debug', message, meta),
    info: (message, meta) => emit('info', message, meta),
    warn: (message, meta) => emit('warn', message, meta),
    error: (message, meta) => emit('error', message, meta),
  };
}
