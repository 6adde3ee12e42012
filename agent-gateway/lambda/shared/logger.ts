export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMeta {
  [key: string]: unknown;
}

/**
 * One-line structured logger for Lambda handlers.
 * Debug output is written only when LOG_LEVEL=debug.
 */
export class Logger {
  constructor(
    private readonly serviceName: string,
    private readonly level: string = process.env.LOG_LEVEL ?? 'info'
  ) {}

  format(level: LogLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const metaStr = meta ? ` ${JSON.stringify(meta, errorReplacer)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.level === 'debug') {
      console.log(this.format('debug', message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    console.log(this.format('info', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    console.warn(this.format('warn', message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.format('error', message, meta));
  }
}

// Errors have no enumerable properties and would serialize as {}
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
