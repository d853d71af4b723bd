/**
 * Logger Module
 *
 * Observability interfaces shared by every module, plus the default
 * console-backed implementations. Modules accept an injected Logger so tests
 * and embedding applications can capture output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Parse a LOG_LEVEL value, falling back to info
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value ?? '').trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Create a structured console logger for a module.
 * Each record is a single JSON line.
 */
export function createLogger(
  module: string,
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (recordLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[recordLevel] < threshold) return;
    const line = JSON.stringify({
      level: recordLevel,
      module,
      message,
      ...meta,
      timestamp: new Date().toISOString(),
    });
    switch (recordLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    debug: (message, meta) => write('debug', message, meta),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};
