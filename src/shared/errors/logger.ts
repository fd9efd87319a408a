/**
 * Error Logger
 *
 * Keeps a bounded in-memory record of recent errors and writes each one
 * through the structured application logger.
 */

import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';
import { createComponentLogger, serializeError } from '../logging/logger';

const log = createComponentLogger('errors');

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? error.toInfo()
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const entry = {
      err: serializeError(error),
      category: errorInfo.category,
      severity: errorInfo.severity,
      details: errorInfo.technicalDetails,
      context: errorInfo.context
    };

    if (errorInfo.severity === ErrorSeverity.HIGH || errorInfo.severity === ErrorSeverity.CRITICAL) {
      log.error(entry, errorInfo.userMessage);
    } else {
      log.warn(entry, errorInfo.userMessage);
    }
  }

  /**
   * Get all logged errors
   */
  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    this.logs = [];
  }

  static getLogsByCategory(category: ErrorCategory): ErrorInfo[] {
    return this.logs.filter(entry => entry.category === category);
  }

  static getLogsBySeverity(severity: ErrorSeverity): ErrorInfo[] {
    return this.logs.filter(entry => entry.severity === severity);
  }

  /**
   * Get recent logs (last N entries)
   */
  static getRecentLogs(count: number): ErrorInfo[] {
    return this.logs.slice(-count);
  }
}
