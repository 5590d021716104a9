/**
 * STRUCTURED LOGGING
 *
 * Every line is a JSON object with timestamp, level, message and context, so
 * summaries can be picked up by log aggregation and alerting without parsing
 * free text. Context is inherited through child loggers:
 *
 *   logger.child({ runId, trafficType }).info('SUMMARY ...', { totalCycles })
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export const LOG_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.toUpperCase();
  return LOG_LEVELS.find((level) => level === upper);
}

export interface LogContext {
  // Correlation
  runId?: string;
  trafficType?: string;

  // Cycle context
  endpoint?: string;
  injected?: boolean;
  operation?: string;
  duration?: number;

  // Additional context
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;

  // Create child logger with inherited context
  child(context: LogContext): Logger;

  // Start a timed operation
  startTimer(operation: string, context?: LogContext): Timer;
}

/**
 * Timer for measuring operation duration
 */
export interface Timer {
  end(context?: LogContext): number;
  cancel(): void;
}

/**
 * Console Logger Implementation
 */
export class ConsoleLogger implements Logger {
  private inheritedContext: LogContext;

  constructor(
    private minLevel: LogLevel = LogLevel.INFO,
    inheritedContext: LogContext = {}
  ) {
    this.inheritedContext = inheritedContext;
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      this.log(LogLevel.DEBUG, message, context);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.INFO)) {
      this.log(LogLevel.INFO, message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog(LogLevel.WARN)) {
      this.log(LogLevel.WARN, message, context);
    }
  }

  error(message: string, error?: Error, context?: LogContext): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      const errorContext = {
        ...context,
        error: error?.message,
        stack: error?.stack,
        errorType: error?.constructor.name,
      };
      this.log(LogLevel.ERROR, message, errorContext);
    }
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.minLevel, {
      ...this.inheritedContext,
      ...context,
    });
  }

  startTimer(operation: string, context?: LogContext): Timer {
    const startTime = Date.now();
    const timerContext = {
      ...context,
      operation,
    };

    this.debug(`Starting operation: ${operation}`, timerContext);

    return {
      end: (endContext?: LogContext): number => {
        const duration = Date.now() - startTime;
        this.info(`Completed operation: ${operation}`, {
          ...timerContext,
          ...endContext,
          duration,
        });
        return duration;
      },
      cancel: (): void => {
        this.debug(`Cancelled operation: ${operation}`, timerContext);
      },
    };
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.inheritedContext,
      ...context,
    };

    const color = this.getColorForLevel(level);
    console.log(color, JSON.stringify(logEntry));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel);
  }

  private getColorForLevel(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '\x1b[36m%s\x1b[0m'; // Cyan
      case LogLevel.INFO:
        return '\x1b[32m%s\x1b[0m'; // Green
      case LogLevel.WARN:
        return '\x1b[33m%s\x1b[0m'; // Yellow
      case LogLevel.ERROR:
        return '\x1b[31m%s\x1b[0m'; // Red
      default:
        return '\x1b[0m%s'; // Default
    }
  }
}
