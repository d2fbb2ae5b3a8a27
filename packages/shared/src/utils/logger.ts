import { ConfigError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string, ...args: unknown[]) => void;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  scope?: string;
  /** Defaults to stderr so a stdio MCP transport keeps stdout to itself. */
  sink?: LogSink;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink: LogSink = options.sink ?? ((line, ...args) => console.error(line, ...args));
  const prefix = options.scope ? `[${options.scope}] ` : '';

  const emit = (at: LogLevel, message: string, args: unknown[]) => {
    if (LEVEL_ORDER[at] < LEVEL_ORDER[level]) return;
    sink(`${at.toUpperCase().padEnd(5)} ${prefix}${message}`, ...args);
  };

  return {
    level,
    debug: (message, ...args) => emit('debug', message, args),
    info: (message, ...args) => emit('info', message, args),
    warn: (message, ...args) => emit('warn', message, args),
    error: (message, ...args) => emit('error', message, args),
    child: (scope) => createLogger({
      level,
      sink,
      scope: options.scope ? `${options.scope}:${scope}` : scope,
    }),
  };
}

/** Accepts the CLI spelling `warning` as well as `warn`. */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  if (normalized === 'debug' || normalized === 'info' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  throw new ConfigError(`unknown log level "${value}" (expected debug, info, warning or error)`);
}
