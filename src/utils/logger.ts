/**
 * Standardized logging utility with consistent formatting and levels
 */

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export type LogFormat = "text" | "json";

interface LogContext {
  [key: string]: string | number | boolean | undefined;
}

class Logger {
  private level: LogLevel;
  private jsonFormat: boolean;

  constructor(level = LogLevel.INFO, jsonFormat = false) {
    this.level = level;
    this.jsonFormat = jsonFormat;
  }

  /**
   * Set the minimum level that gets written
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Enable or disable JSON format
   */
  setJsonFormat(enabled: boolean): void {
    this.jsonFormat = enabled;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  /**
   * Format log message with timestamp, level, and context
   */
  private formatMessage(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): string {
    const timestamp = new Date().toISOString();

    if (this.jsonFormat) {
      const logEntry = {
        timestamp,
        level,
        message,
        ...context,
      };
      return JSON.stringify(logEntry);
    }

    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] ${level} ${message}${contextStr}`;
  }

  debug(message: string, context?: LogContext): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.debug(this.formatMessage(LogLevel.DEBUG, message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.log(this.formatMessage(LogLevel.INFO, message, context));
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(this.formatMessage(LogLevel.WARN, message, context));
    }
  }

  /**
   * Log error message. Error objects contribute their message and stack.
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.isEnabled(LogLevel.ERROR)) {
      return;
    }
    const errorContext: LogContext | undefined =
      error === undefined
        ? context
        : {
            ...context,
            ...(error instanceof Error
              ? { error: error.message, stack: error.stack }
              : { error: String(error) }),
          };
    console.error(this.formatMessage(LogLevel.ERROR, message, errorContext));
  }
}

// Global logger instance
export const logger = new Logger();

/**
 * Initialize logger with configuration
 */
export function initLogger(level: LogLevel, format: LogFormat = "text"): void {
  logger.setLevel(level);
  logger.setJsonFormat(format === "json");
}
