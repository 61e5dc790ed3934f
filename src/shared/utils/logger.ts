/**
 * Logging utility for the Potato Chamber Twin
 * Provides structured logging with different levels and context
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  runId?: string;
  functionName?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

export type LogData = Record<string, unknown>;

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
  private context: LogContext;
  private logLevel: LogLevel;

  constructor(context: LogContext = {}, logLevel: LogLevel = LogLevel.INFO) {
    this.context = context;
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL || logLevel);
  }

  private parseLogLevel(level: string): LogLevel {
    const upperLevel = level.toUpperCase();
    return LEVEL_ORDER.find(candidate => candidate === upperLevel) ?? LogLevel.INFO;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      data,
    };

    return JSON.stringify(logEntry);
  }

  debug(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(LogLevel.DEBUG, message, data));
    }
  }

  info(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, data));
    }
  }

  warn(message: string, data?: LogData): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, data));
    }
  }

  error(message: string, error?: unknown, data?: LogData): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorData = {
        ...data,
        error: error instanceof Error ? {
          name: error.name,
          message: error.message,
          stack: error.stack,
        } : error,
      };
      console.error(this.formatMessage(LogLevel.ERROR, message, errorData));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({ ...this.context, ...additionalContext }, this.logLevel);
  }

  /**
   * Add context to the current logger
   */
  addContext(additionalContext: LogContext): void {
    this.context = { ...this.context, ...additionalContext };
  }

  /**
   * Log performance metrics
   */
  performance(operation: string, duration: number, data?: LogData): void {
    this.info(`Performance: ${operation}`, {
      operation,
      duration,
      unit: 'ms',
      ...data,
    });
  }
}

/**
 * Create a logger instance for Lambda functions
 */
export function createLambdaLogger(functionName: string, requestId?: string): Logger {
  return new Logger({
    functionName,
    requestId: requestId || process.env.AWS_REQUEST_ID,
    correlationId: process.env.CORRELATION_ID,
  });
}
