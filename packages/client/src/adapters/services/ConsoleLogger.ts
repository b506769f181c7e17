import type { ILogger, LogLevel, LogContext } from '../../core/ports/ILogger.js';

/**
 * Console Logger
 * Writes one JSON line per entry; Error values in the context are flattened
 */
export class ConsoleLogger implements ILogger {
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(
    private readonly minLevel: LogLevel = 'warn',
    private readonly prefix: string = '[pushline]'
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.minLevel];
  }

  private serializeContext(context: LogContext): LogContext {
    const serialized: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      if (value instanceof Error) {
        const code: unknown = Reflect.get(value, 'code');
        serialized[key] = {
          name: value.name,
          message: value.message,
          ...(code !== undefined && { code }),
        };
      } else {
        serialized[key] = value;
      }
    }
    return serialized;
  }

  private formatLog(level: LogLevel, message: string, context?: LogContext): object {
    return {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      prefix: this.prefix,
      message,
      ...(context && { context: this.serializeContext(context) }),
    };
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      console.debug(JSON.stringify(this.formatLog('debug', message, context)));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      console.info(JSON.stringify(this.formatLog('info', message, context)));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      console.warn(JSON.stringify(this.formatLog('warn', message, context)));
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.shouldLog('error')) {
      console.error(JSON.stringify(this.formatLog('error', message, context)));
    }
  }
}
