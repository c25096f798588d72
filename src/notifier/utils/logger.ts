/**
 * Notifier logging
 * Structured, module-scoped console logging
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal'
}

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Dotted module path, e.g. notifier.dispatcher */
  module: string;
  operation?: string;
  timestamp: Date;
  data?: LogData;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  consoleOutput?: boolean;
  moduleName?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4
};

interface LevelState {
  minLevel: LogLevel;
}

export class NotifierLogger {
  private moduleName: string;
  private consoleOutput: boolean;
  /** Shared with every sub-logger */
  private levelState: LevelState;

  constructor(options: LoggerOptions = {}, levelState?: LevelState) {
    this.moduleName = options.moduleName ?? 'notifier';
    this.consoleOutput = options.consoleOutput ?? true;
    this.levelState = levelState ?? { minLevel: options.minLevel ?? LogLevel.INFO };
  }

  debug(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.DEBUG, message, data, operation);
  }

  info(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.INFO, message, data, operation);
  }

  warn(message: string, data?: LogData, operation?: string): void {
    this.log(LogLevel.WARN, message, data, operation);
  }

  error(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.log(LogLevel.ERROR, message, data, operation, error);
  }

  fatal(message: string, error?: Error, data?: LogData, operation?: string): void {
    this.log(LogLevel.FATAL, message, data, operation, error);
  }

  /**
   * Change the minimum level of this logger and of every logger derived from it.
   */
  setMinLevel(level: LogLevel): void {
    this.levelState.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.levelState.minLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    data?: LogData,
    operation?: string,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      module: this.moduleName,
      operation,
      timestamp: new Date(),
      data,
      error
    };

    if (this.consoleOutput) {
      this.writeToConsole(entry);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.levelState.minLevel];
  }

  private writeToConsole(entry: LogEntry): void {
    const timestamp = entry.timestamp.toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(5);
    const moduleStr = `[${entry.module}]`;
    const operationStr = entry.operation ? ` [${entry.operation}]` : '';

    let logMessage = `${timestamp} ${levelStr} ${moduleStr}${operationStr} ${entry.message}`;

    if (entry.error) {
      logMessage += `\nError: ${entry.error.message}`;
      if (entry.level === LogLevel.FATAL && entry.error.stack) {
        logMessage += `\nStack: ${entry.error.stack}`;
      }
    }

    if (entry.data && Object.keys(entry.data).length > 0) {
      logMessage += `\nData: ${JSON.stringify(entry.data, null, 2)}`;
    }

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(logMessage);
        break;
      case LogLevel.INFO:
        console.info(logMessage);
        break;
      case LogLevel.WARN:
        console.warn(logMessage);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(logMessage);
        break;
    }
  }

  createSubLogger(moduleName: string): NotifierLogger {
    return new NotifierLogger(
      { consoleOutput: this.consoleOutput, moduleName: `${this.moduleName}.${moduleName}` },
      this.levelState
    );
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

export const defaultLogger = new NotifierLogger();

export function createModuleLogger(moduleName: string): NotifierLogger {
  return defaultLogger.createSubLogger(moduleName);
}
