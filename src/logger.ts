/**
 * Logging for the harness and the editor it drives.
 *
 * Messages carry a category (`harness`, `editor`, `cli`, ...) and go to
 * stderr by default, filtered by the `EDITOR_HARNESS_LOG` level. Tests swap
 * in their own logger with {@link setLogger}.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface Logger {
  debug(category: string, message: string): void;
  info(category: string, message: string): void;
  warn(category: string, message: string): void;
  error(category: string, message: string, error?: Error): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const DEFAULT_LEVEL: LogLevel = 'warn';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value.length === 0) {
    return DEFAULT_LEVEL;
  }
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LEVEL;
}

function createConsoleLogger(level: LogLevel): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  const write = (label: string, category: string, message: string) => {
    process.stderr.write(`[${label}] [${category}] ${message}\n`);
  };
  return {
    debug: (category, message) => {
      if (enabled('debug')) write('DEBUG', category, message);
    },
    info: (category, message) => {
      if (enabled('info')) write('INFO', category, message);
    },
    warn: (category, message) => {
      if (enabled('warn')) write('WARN', category, message);
    },
    error: (category, message, error) => {
      if (!enabled('error')) return;
      write('ERROR', category, error ? `${message}: ${error.message}` : message);
    },
  };
}

const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function defaultLogger(): Logger {
  return createConsoleLogger(resolveLogLevel(process.env.EDITOR_HARNESS_LOG));
}

let globalLogger: Logger = defaultLogger();

function getLogger(): Logger {
  return globalLogger;
}

function setLogger(logger: Logger): void {
  globalLogger = logger;
}

/** Back to the stderr logger at the environment's level. */
function resetLogger(): void {
  globalLogger = defaultLogger();
}

export {
  createConsoleLogger,
  getLogger,
  nullLogger,
  resetLogger,
  resolveLogLevel,
  setLogger,
};
export type { Logger, LogLevel };
