/**
 * Structured JSON logger. One line per entry on stdout/stderr, which the
 * Lambda runtime ships to CloudWatch as-is.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? 'info';
}

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export function formatEntry(
  level: LogLevel,
  service: string,
  message: string,
  context: LogContext = {}
): string {
  const entry: Record<string, unknown> = {
    level,
    message,
    timestamp: new Date().toISOString(),
    service,
  };
  for (const [key, value] of Object.entries(context)) {
    if (value !== undefined) {
      entry[key] = serialize(value);
    }
  }
  return JSON.stringify(entry);
}

export function createLogger(
  service: string,
  minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];

  return {
    debug(message, context) {
      if (enabled('debug')) console.log(formatEntry('debug', service, message, context));
    },
    info(message, context) {
      if (enabled('info')) console.log(formatEntry('info', service, message, context));
    },
    warn(message, context) {
      if (enabled('warn')) console.warn(formatEntry('warn', service, message, context));
    },
    error(message, context) {
      if (enabled('error')) console.error(formatEntry('error', service, message, context));
    },
  };
}
