// Structured logging for data access

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type DataLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

/**
 * Console logger. Debug lines are written only when `debug` is set.
 */
export function createConsoleLogger(options: { debug?: boolean; scope?: string } = {}): DataLogger {
  const prefix = options.scope ? ` [${options.scope}]` : '';

  return {
    debug(message: string, data?: Record<string, unknown>) {
      if (options.debug) {
        console.debug(`[DEBUG]${prefix} ${message}`, data ?? '');
      }
    },
    info(message: string, data?: Record<string, unknown>) {
      console.info(`[INFO]${prefix} ${message}`, data ?? '');
    },
    warn(message: string, data?: Record<string, unknown>) {
      console.warn(`[WARN]${prefix} ${message}`, data ?? '');
    },
    error(message: string, data?: Record<string, unknown>) {
      console.error(`[ERROR]${prefix} ${message}`, data ?? '');
    },
  };
}

/**
 * Silent logger for testing
 */
export const silentLogger: DataLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): DataLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
