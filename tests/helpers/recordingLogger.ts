import { LogContext, LogLevel, Logger, Timer } from '../../src/infra/observability';

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  error?: Error;
}

/**
 * Logger that keeps every entry, children included, in one shared list
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly inherited: LogContext = {}
  ) { }

  debug(message: string, context?: LogContext): void {
    this.push(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.push(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.push(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.push(LogLevel.ERROR, message, context, error);
  }

  child(context: LogContext): Logger {
    return new RecordingLogger(this.entries, { ...this.inherited, ...context });
  }

  startTimer(operation: string): Timer {
    return {
      end: (context?: LogContext) => {
        this.push(LogLevel.INFO, `Completed operation: ${operation}`, context);
        return 0;
      },
      cancel: () => undefined,
    };
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  startingWith(prefix: string): LogEntry[] {
    return this.entries.filter((e) => e.message.startsWith(prefix));
  }

  private push(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    this.entries.push({ level, message, context: { ...this.inherited, ...context }, error });
  }
}
