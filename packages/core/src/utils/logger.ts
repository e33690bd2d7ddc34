export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Minimum level from MOTION_LOG_LEVEL, read on every call so tests can change it.
 */
function minimumLevel(): LogLevel {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configured = process.env['MOTION_LOG_LEVEL']?.toLowerCase();
  return configured !== undefined && isLogLevel(configured) ? configured : 'info';
}

function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()} (${entry.scope}): ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  scope: string,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    scope,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

/**
 * Create a logger whose lines are tagged with `scope`.
 */
export function createLogger(scope: string): Logger {
  return {
    debug(message, data) {
      if (shouldLog('debug')) {
        console.debug(formatLog(createLogEntry('debug', scope, message, data)));
      }
    },

    info(message, data) {
      if (shouldLog('info')) {
        console.info(formatLog(createLogEntry('info', scope, message, data)));
      }
    },

    warn(message, data) {
      if (shouldLog('warn')) {
        console.warn(formatLog(createLogEntry('warn', scope, message, data)));
      }
    },

    error(message, data) {
      if (shouldLog('error')) {
        console.error(formatLog(createLogEntry('error', scope, message, data)));
      }
    },
  };
}
