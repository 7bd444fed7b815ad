/**
 * Leveled logger writing through console
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

/**
 * Parse a level name; unknown values fall back to info
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'warn':
    case 'warning':
      return 'warn';
    case 'error':
      return 'error';
    case 'none':
      return 'none';
    default:
      return 'info';
  }
}

export interface LogSink {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export class Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly sink: LogSink = console
  ) {}

  isEnabled(level: Exclude<LogLevel, 'none'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) this.sink.debug(`[DEBUG] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) this.sink.info(`[INFO] ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) this.sink.warn(`[WARN] ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) this.sink.error(`[ERROR] ${message}`, ...args);
  }
}
