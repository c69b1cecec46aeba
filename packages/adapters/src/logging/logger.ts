export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_RANK, value);
}

let _threshold: LogLevel = resolveLevel(process.env['LOG_LEVEL']);

/** Case-insensitive; `warning` and `critical` are accepted from older config files. */
export function parseLogLevel(raw: string): LogLevel | null {
  const level = raw.trim().toLowerCase();
  if (level === 'warning') return 'warn';
  if (level === 'critical') return 'error';
  return isLogLevel(level) ? level : null;
}

function resolveLevel(raw: string | undefined): LogLevel {
  return (raw && parseLogLevel(raw)) || 'info';
}

export function setLogLevel(level: string): LogLevel {
  _threshold = resolveLevel(level);
  return _threshold;
}

export function getLogLevel(): LogLevel {
  return _threshold;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]`, e.g. `[bus-listener] connected`.
 * The level threshold is process-wide.
 */
export function createLogger(tag: string): Logger {
  const emit = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[_threshold]) return;
    const line = `[${tag}] ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...details);
        break;
      case 'info':
        console.log(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      case 'error':
        console.error(line, ...details);
        break;
    }
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}

/** Message of an unknown thrown value, for log lines. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
