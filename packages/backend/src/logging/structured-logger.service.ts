import { Injectable, LoggerService, Scope } from '@nestjs/common';
import { v4 as uuid } from 'uuid';

export type LogLevel = 'debug' | 'verbose' | 'info' | 'warn' | 'error';

/**
 * Log context that can be attached to any log entry
 */
export interface LogContext {
  correlationId?: string;
  sessionId?: string;
  formId?: string;
  service?: string;
  method?: string;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Structured log entry format
 */
export interface StructuredLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  sessionId?: string;
  duration?: number;
  trace?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  verbose: 1,
  info: 2,
  warn: 3,
  error: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * StructuredLoggerService
 *
 * JSON-lines logger with correlation ids and persistent context. Installed
 * as the Nest application logger, so `new Logger(Context)` in services
 * ends up here too.
 *
 * @example
 * ```typescript
 * const logger = structuredLogger.child({ sessionId });
 * const done = logger.startTimer('turn');
 * // ...
 * const durationMs = done({ completion: true });
 * ```
 */
@Injectable({ scope: Scope.TRANSIENT })
export class StructuredLoggerService implements LoggerService {
  private context = 'Application';
  private correlationId: string = uuid();
  private persistentContext: LogContext = {};

  /**
   * Minimum level from LOG_LEVEL; development defaults to debug
   */
  private getMinLogLevel(): number {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      return LOG_LEVELS[envLevel];
    }
    return process.env.NODE_ENV === 'development' ? LOG_LEVELS.debug : LOG_LEVELS.info;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.getMinLogLevel();
  }

  /**
   * @returns this - for chaining
   */
  setContext(context: string): this {
    this.context = context;
    return this;
  }

  /**
   * @returns this - for chaining
   */
  setCorrelationId(id: string): this {
    this.correlationId = id;
    return this;
  }

  log(message: string, context?: LogContext | string): void {
    this.emit('info', message, toContext(context));
  }

  error(message: string, trace?: string, context?: LogContext | string): void {
    this.emit('error', message, { ...toContext(context), trace });
  }

  warn(message: string, context?: LogContext | string): void {
    this.emit('warn', message, toContext(context));
  }

  debug(message: string, context?: LogContext | string): void {
    this.emit('debug', message, toContext(context));
  }

  verbose(message: string, context?: LogContext | string): void {
    this.emit('verbose', message, toContext(context));
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): StructuredLoggerService {
    const childLogger = new StructuredLoggerService();
    childLogger.context = this.context;
    childLogger.correlationId = additionalContext.correlationId ?? this.correlationId;
    childLogger.persistentContext = { ...this.persistentContext, ...additionalContext };
    return childLogger;
  }

  /**
   * Time an operation and log its duration
   * @returns A function to call when the operation completes; it logs the
   * result context and returns the duration in milliseconds
   */
  startTimer(operation: string, context?: LogContext): (result?: LogContext) => number {
    const startTime = Date.now();
    this.debug(`Starting: ${operation}`, context);

    return (result) => {
      const duration = Date.now() - startTime;
      this.log(`Completed: ${operation}`, { ...context, ...result, duration });
      return duration;
    };
  }

  private emit(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEntry: StructuredLogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.persistentContext,
      ...context,
      service: context?.service || this.persistentContext.service || this.context,
      correlationId: context?.correlationId || this.persistentContext.correlationId || this.correlationId,
    };

    // Remove undefined values for cleaner output
    const line = JSON.stringify(
      Object.fromEntries(Object.entries(logEntry).filter(([, v]) => v !== undefined)),
    );

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else if (level === 'debug' || level === 'verbose') {
      console.debug(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Nest passes the logger context as a trailing string
 */
function toContext(context?: LogContext | string): LogContext | undefined {
  return typeof context === 'string' ? { service: context } : context;
}
