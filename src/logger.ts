type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  prefix?: string;
  enabled?: boolean;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

class ConsoleLogger implements Logger {
  private prefix: string;
  private enabled: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '[Alerts]';
    this.enabled = options.enabled ?? process.env.NODE_ENV !== 'test';
  }

  private formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `${timestamp} ${this.prefix} [${level.toUpperCase()}] ${message}`;
  }

  debug(message: string): void {
    if (this.enabled && process.env.LOG_LEVEL === 'debug') {
      console.debug(this.formatMessage('debug', message));
    }
  }

  info(message: string): void {
    if (this.enabled) {
      console.info(this.formatMessage('info', message));
    }
  }

  warn(message: string): void {
    if (this.enabled) {
      console.warn(this.formatMessage('warn', message));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.enabled) {
      const detail = error instanceof Error ? error.stack || error.message : error ? String(error) : '';
      console.error(this.formatMessage('error', message), detail);
    }
  }
}

export function createLogger(prefix: string): Logger {
  return new ConsoleLogger({ prefix: `[${prefix}]` });
}

