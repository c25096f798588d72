/**
 * Error Handling Module
 *
 * Typed errors for a notifier run and a handler that logs them by type and
 * turns them into per-task error records for the run summary.
 */

import axios from 'axios';
import { NotifierLogger, createModuleLogger } from '../utils/logger';

export enum NotifierErrorType {
  /** Missing secret or webhook URL, unreadable task list */
  CONFIGURATION_ERROR = 'configuration_error',

  /** Malformed date or time, invalid task record */
  TASK_DATA_ERROR = 'task_data_error',

  /** Content source failed or kind is unknown */
  CONTENT_ERROR = 'content_error',

  SIGNING_ERROR = 'signing_error',

  /** Network failure, timeout or rejected by the chat endpoint */
  DELIVERY_ERROR = 'delivery_error',

  UNKNOWN_ERROR = 'unknown_error'
}

export interface NotifierErrorContext {
  errorType: NotifierErrorType;
  taskIndex?: number;
  operation?: string;
  timestamp: Date;
  details?: Record<string, unknown>;
}

export class NotifierError extends Error {
  public readonly context: NotifierErrorContext;

  constructor(
    message: string,
    errorType: NotifierErrorType,
    options: { taskIndex?: number; operation?: string; details?: Record<string, unknown> } = {}
  ) {
    super(message);
    this.name = 'NotifierError';
    this.context = {
      errorType,
      taskIndex: options.taskIndex,
      operation: options.operation,
      timestamp: new Date(),
      details: options.details
    };
  }

  get errorType(): NotifierErrorType {
    return this.context.errorType;
  }

  toString(): string {
    const task = this.context.taskIndex !== undefined ? `task #${this.context.taskIndex}` : 'run';
    return `[${this.context.errorType}] ${this.message} (${task})`;
  }
}

export class ConfigurationError extends NotifierError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, NotifierErrorType.CONFIGURATION_ERROR, { details });
    this.name = 'ConfigurationError';
  }
}

export function isConfigurationError(error: unknown): error is NotifierError {
  return error instanceof NotifierError && error.errorType === NotifierErrorType.CONFIGURATION_ERROR;
}

/**
 * Message of any thrown value. Errors raised by Node inside Jest come from
 * another realm, so they are read by shape and not with instanceof.
 */
export function getErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (typeof error !== 'object' || error === null || !('code' in error) || typeof error.code !== 'string') {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Per-task error entry of a run summary
 */
export interface TaskErrorRecord {
  taskIndex: number;
  title: string;
  type: NotifierErrorType;
  message: string;
}

/**
 * Wrap any thrown value as a NotifierError. Axios failures become delivery
 * errors carrying the HTTP status or the network error code.
 */
export function toNotifierError(
  error: unknown,
  fallbackType: NotifierErrorType = NotifierErrorType.UNKNOWN_ERROR,
  taskIndex?: number
): NotifierError {
  if (error instanceof NotifierError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const reason = status !== undefined
      ? `HTTP ${status}`
      : error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
        ? 'request timed out'
        : error.code ?? 'network error';
    return new NotifierError(`${reason}: ${error.message}`, NotifierErrorType.DELIVERY_ERROR, {
      taskIndex,
      details: { status, code: error.code }
    });
  }

  return new NotifierError(getErrorMessage(error), fallbackType, { taskIndex });
}

export class NotifierErrorHandler {
  private logger: NotifierLogger;

  constructor(logger?: NotifierLogger) {
    this.logger = logger || createModuleLogger('error-handler');
  }

  /**
   * Log an error according to its type and return the summary record for it
   */
  handleTaskError(
    error: unknown,
    task: { index: number; title: string },
    fallbackType: NotifierErrorType = NotifierErrorType.UNKNOWN_ERROR
  ): TaskErrorRecord {
    const notifierError = toNotifierError(error, fallbackType, task.index);
    this.logError(notifierError, task.title);

    return {
      taskIndex: task.index,
      title: task.title,
      type: notifierError.errorType,
      message: notifierError.message
    };
  }

  private logError(error: NotifierError, title: string): void {
    const { context } = error;
    const logData = {
      errorType: context.errorType,
      taskIndex: context.taskIndex,
      title,
      details: context.details
    };

    switch (context.errorType) {
      case NotifierErrorType.TASK_DATA_ERROR:
      case NotifierErrorType.CONTENT_ERROR:
        this.logger.warn(`Task ${context.errorType}: ${error.message}`, logData, context.operation);
        break;

      case NotifierErrorType.CONFIGURATION_ERROR:
        this.logger.fatal(`Configuration error: ${error.message}`, error, logData, context.operation);
        break;

      case NotifierErrorType.SIGNING_ERROR:
        this.logger.error(`Signing failed: ${error.message}`, error, logData, context.operation);
        break;

      case NotifierErrorType.DELIVERY_ERROR:
        this.logger.error(`Delivery failed: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(`Unexpected error: ${error.message}`, error, logData, context.operation);
    }
  }
}
