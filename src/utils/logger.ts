/**
 * Simple tagged logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  constructor(prefix?: string) {
    this.prefix = prefix || '';

    // LOG_LEVEL wins over the default
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.level = envLevel;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(tag: string, args: unknown[]): string[] {
    const timestamp = new Date().toISOString().slice(11, 19);
    const prefix = this.prefix ? `${this.prefix}${tag}` : tag;
    return [`[${timestamp}] ${prefix}`, ...args.map(arg =>
      arg instanceof Error ? arg.message : typeof arg === 'object' ? JSON.stringify(arg) : String(arg)
    )];
  }

  debug(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(...this.formatMessage(tag, args));
    }
  }

  info(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      // stdout carries received payloads
      console.error(...this.formatMessage(tag, args));
    }
  }

  warn(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...this.formatMessage(tag, args));
    }
  }

  error(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...this.formatMessage(tag, args));
    }
  }
}

export const logger = new Logger();

export { Logger };
