/**
 * Logging utility for the research-orchestrator package
 */

/**
 * Available log levels in order of increasing severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Values prefixed to every message of a child logger
 */
export interface LogContext {
  queryId?: string;
  step?: string;
}

export type CustomLogger = (level: LogLevel, message: string, ...args: unknown[]) => void;

/**
 * Configuration options for the logger
 */
export interface LoggerOptions {
  /** Minimum level to log (defaults to 'info') */
  level?: LogLevel;
  /** Include timestamp in log messages */
  includeTimestamp?: boolean;
  /** Include query id and step name in log messages */
  includeContext?: boolean;
  /** Whether to log to the console */
  logToConsole?: boolean;
  /** Additional custom loggers to send log messages to */
  customLoggers?: CustomLogger[];
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger class that handles log message formatting and output.
 *
 * Children created with {@link Logger.child} share the root's level and sinks,
 * so `setLogLevel` on the root applies to every child, including ones handed
 * to pipelines that are already running.
 */
export class Logger {
  private level: LogLevel;
  private readonly options: {
    includeTimestamp: boolean;
    includeContext: boolean;
    logToConsole: boolean;
    customLoggers: CustomLogger[];
  };
  private readonly root: Logger;
  private readonly context: LogContext;

  constructor(options: LoggerOptions = {}, context: LogContext = {}, root?: Logger) {
    this.level = options.level ?? 'info';
    this.options = {
      includeTimestamp: options.includeTimestamp ?? true,
      includeContext: options.includeContext ?? true,
      logToConsole: options.logToConsole ?? true,
      customLoggers: options.customLoggers ?? [],
    };
    this.context = context;
    this.root = root ?? this;
  }

  /**
   * Creates a logger that prefixes its messages with the given context
   */
  child(context: LogContext): Logger {
    return new Logger({}, { ...this.context, ...context }, this.root);
  }

  /**
   * Set the minimum log level
   */
  setLogLevel(level: LogLevel): void {
    this.root.level = level;
  }

  getLogLevel(): LogLevel {
    return this.root.level;
  }

  /**
   * Register an additional sink for every message
   */
  addCustomLogger(customLogger: CustomLogger): () => void {
    const sinks = this.root.options.customLoggers;
    sinks.push(customLogger);
    return () => {
      const index = sinks.indexOf(customLogger);
      if (index >= 0) sinks.splice(index, 1);
    };
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.root.level]) return;

    const formattedMessage = this.formatMessage(level, message);
    const { logToConsole, customLoggers } = this.root.options;

    if (logToConsole) {
      const consoleMethod = this.getConsoleMethod(level);
      consoleMethod(formattedMessage, ...args);
    }

    for (const customLogger of customLoggers) {
      customLogger(level, formattedMessage, ...args);
    }
  }

  /**
   * Format the log message with optional context and timestamp
   */
  private formatMessage(level: LogLevel, message: string): string {
    const { includeTimestamp, includeContext } = this.root.options;
    const parts = [`[${level.toUpperCase()}]`];

    if (includeContext) {
      if (this.context.queryId) parts.push(`[${this.context.queryId}]`);
      if (this.context.step) parts.push(`[${this.context.step}]`);
    }

    if (includeTimestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(message);
    return parts.join(' ');
  }

  private getConsoleMethod(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case 'debug':
        // eslint-disable-next-line no-console
        return console.debug;
      case 'info':
        // eslint-disable-next-line no-console
        return console.info;
      case 'warn':
        return console.warn;
      case 'error':
        return console.error;
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

/**
 * Creates a step-specific logger that automatically includes the step name
 * and, when known, the query id
 */
export function createStepLogger(stepName: string, queryId?: string): Logger {
  return logger.child(queryId ? { step: stepName, queryId } : { step: stepName });
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
