/**
 * Logger utility for safe logging with fallback to console
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

/**
 * Host-provided log destination (web server, process supervisor, test harness)
 */
export interface LogSink {
  log: (level: LogLevel, message: string, data?: unknown) => void;
}

export interface LoggerOptions {
  /** Minimum level that is emitted */
  logLevel?: LogLevel;
}

/**
 * Creates a level-filtered logger that writes to the sink when one is given
 * and falls back to the console when the sink is missing or throws.
 *
 * @param sink - Host log sink (nullable)
 * @param options - Logger options (nullable)
 */
export function createLogger(
  sink: LogSink | null,
  options: LoggerOptions | null
): Logger {
  const configuredLevel = options?.logLevel || 'info';
  const minLevel = LOG_LEVELS[configuredLevel];

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= minLevel;
  }

  function log(level: LogLevel, message: string, data?: unknown): void {
    if (!shouldLog(level)) {
      return;
    }

    if (sink && typeof sink.log === 'function') {
      try {
        sink.log(level, message, data);
        return;
      } catch {
        // sink failed, the console below still gets the line
      }
    }

    // debug -> console.log so spies on console.debug are not needed
    const consoleMapping: Record<LogLevel, typeof console.log> = {
      debug: console.log,
      info: console.info,
      warn: console.warn,
      error: console.error,
    };
    const consoleMethod = consoleMapping[level];
    if (data !== undefined) {
      consoleMethod(`[promptgate] ${message}`, data);
    } else {
      consoleMethod(`[promptgate] ${message}`);
    }
  }

  return {
    debug: (message: string, data?: unknown): void => log('debug', message, data),
    info: (message: string, data?: unknown): void => log('info', message, data),
    warn: (message: string, data?: unknown): void => log('warn', message, data),
    error: (message: string, data?: unknown): void => log('error', message, data),
  };
}

/**
 * Creates a no-op logger that discards all logs
 */
export function createNoOpLogger(): Logger {
  const noop = (): void => {};
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  };
}
