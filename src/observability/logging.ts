/**
 * Logging for registry events.
 *
 * The registry reports two kinds of event: collector (un)registration at
 * debug level and cardinality overruns at warn level. Each event is one line
 * of the form `[LEVEL] message {context}`.
 */

export enum LogLevel {
  Debug = 'debug',
  Warn = 'warn',
  /** Write nothing */
  Silent = 'silent',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Warn]: 1,
  [LogLevel.Silent]: 2,
};

export type LogContext = Record<string, unknown>;

/**
 * Sink for registry events.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /** Logger whose events carry `context` in addition to this one's. */
  child(context: LogContext): Logger;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: warn) */
  level?: LogLevel;
  /** Context attached to every event */
  context?: LogContext;
}

/**
 * Writes debug events to `console.debug` and warnings to `console.warn`.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: LogContext;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? LogLevel.Warn;
    this.context = options.context ?? {};
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled(LogLevel.Debug)) {
      console.debug(this.format('DEBUG', message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled(LogLevel.Warn)) {
      console.warn(this.format('WARN', message, context));
    }
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({ level: this.level, context: { ...this.context, ...context } });
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  private format(label: string, message: string, context?: LogContext): string {
    const merged = { ...this.context, ...context };
    const line = `[${label}] ${message}`;
    return Object.keys(merged).length > 0 ? `${line} ${JSON.stringify(merged)}` : line;
  }
}

/**
 * Discards every event.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  warn(): void {}
  child(): Logger {
    return this;
  }
}

export function createLogger(options: ConsoleLoggerOptions = {}): Logger {
  return new ConsoleLogger(options);
}

export function createNoopLogger(): Logger {
  return new NoopLogger();
}
