/**
 * @file telemetry/logger.ts
 * @brief Leveled logger writing to stderr
 *
 * stdout is reserved for machine-readable output (`fhe-ref run --format json`),
 * so every level goes through console.error / console.warn.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export type LoggerFn = (message: string, context?: LogContext) => void;

export interface Logger {
  readonly level: LogLevel;
  debug: LoggerFn;
  info: LoggerFn;
  warn: LoggerFn;
  error: LoggerFn;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Sink used by createLogger; replaceable in tests
 */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string, context?: LogContext) => void;

const consoleSink: LogSink = (level, line, context) => {
  const write = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    write(line, context);
    return;
  }
  write(line);
};

export function createLogger(level: LogLevel = 'warn', sink: LogSink = consoleSink): Logger {
  const emit =
    (at: Exclude<LogLevel, 'silent'>): LoggerFn =>
    (message, context) => {
      if (LEVEL_RANK[at] < LEVEL_RANK[level]) return;
      sink(at, `[fhe-ref] ${at}: ${message}`, context);
    };

  return {
    level,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}

export const silentLogger: Logger = createLogger('silent');
