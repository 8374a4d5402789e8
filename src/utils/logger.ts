/**
 * Logging utilities
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export type LogContext = Record<string, unknown>;

/**
 * Console logger bound to a component tag, e.g. `[RENDER]`
 */
export class AppLogger {
  constructor(private readonly tag: string) {}

  private formatMessage(level: string, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] [${this.tag}] ${message}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled('debug')) return;
    if (context) console.debug(this.formatMessage('DEBUG', message), context);
    else console.debug(this.formatMessage('DEBUG', message));
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled('info')) return;
    if (context) console.log(this.formatMessage('INFO', message), context);
    else console.log(this.formatMessage('INFO', message));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled('warn')) return;
    if (context) console.warn(this.formatMessage('WARN', message), context);
    else console.warn(this.formatMessage('WARN', message));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) return;
    const errorDetails = error instanceof Error ? `\n${error.stack ?? error.message}` : error !== undefined ? `\n${String(error)}` : '';
    if (context) console.error(this.formatMessage('ERROR', message + errorDetails), context);
    else console.error(this.formatMessage('ERROR', message + errorDetails));
  }
}

export function createLogger(tag: string): AppLogger {
  return new AppLogger(tag);
}
