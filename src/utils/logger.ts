export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function resolveLogLevel(value = process.env.LOG_LEVEL): LogLevel {
  const normalized = (value || '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

/**
 * Console-backed logger that prefixes every line with `[scope]`.
 * The level is read once, when the logger is created.
 */
export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (messageLevel: LogLevel) => LEVEL_ORDER[messageLevel] >= threshold;

  const write =
    (messageLevel: LogLevel, sink: (...args: unknown[]) => void) =>
    (message: string, context?: LogContext) => {
      if (!enabled(messageLevel)) return;
      if (context && Object.keys(context).length > 0) {
        sink(`[${scope}] ${message}`, context);
      } else {
        sink(`[${scope}] ${message}`);
      }
    };

  return {
    error: write('error', console.error),
    warn: write('warn', console.warn),
    info: write('info', console.info),
    debug: write('debug', console.debug),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
