export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/** Console logger that prefixes every line with `[scope]`. */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? console;
  const threshold = LEVEL_RANK[level];
  const prefix = `[${scope}]`;

  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]) => {
    if (LEVEL_RANK[at] < threshold) return;
    sink[at](`${prefix} ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
    child: (child) => createLogger(`${scope}:${child}`, { level, sink })
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
