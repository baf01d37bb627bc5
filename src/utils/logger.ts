export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

/**
 * Simple structured logger with credential redaction
 */
class Logger {
  private level: LogLevel;
  private sensitiveFields = ['password', 'token', 'secret', 'authorization', 'cookie', 'key', 'hash'];

  constructor() {
    const fromEnv = process.env.LOG_LEVEL;
    this.level = isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  private redactSensitive(value: unknown): unknown {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value !== 'object' || value === null) return value;

    if (Array.isArray(value)) {
      return value.map(item => this.redactSensitive(item));
    }

    const redacted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (this.sensitiveFields.some(field => key.toLowerCase().includes(field))) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = this.redactSensitive(entry);
      }
    }

    return redacted;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const redacted = this.redactSensitive(context ?? {});
    const logEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(typeof redacted === 'object' && redacted !== null ? redacted : {}),
    };

    if (level === 'error') {
      console.error(JSON.stringify(logEntry));
    } else {
      console.warn(JSON.stringify(logEntry));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }
}

export const logger = new Logger();

/** Logs a finished HTTP request at a level derived from its status. */
export function logRequest(method: string, path: string, statusCode: number, durationMs: number): void {
  const context = { method, path, statusCode, duration: `${durationMs}ms` };
  if (statusCode >= 500) {
    logger.error('HTTP request', context);
  } else if (statusCode >= 400) {
    logger.warn('HTTP request', context);
  } else {
    logger.info('HTTP request', context);
  }
}
