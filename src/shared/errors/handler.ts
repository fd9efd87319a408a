/**
 * Error Handler
 *
 * Standardized error handling utilities for consistent error management.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';
import { ErrorLogger } from './logger';

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create a storage error
   */
  static createStorageError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check the database file and its permissions, then try again.',
      cause
    });
  }

  /**
   * Create a validation error
   */
  static createValidationError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Please correct the highlighted fields and try again.'
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred. Please try again.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'If the problem persists, please contact support.',
      cause: error
    });
  }

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    ErrorLogger.logError(error);
  }

  static getLogs() {
    return ErrorLogger.getLogs();
  }

  static clearLogs(): void {
    ErrorLogger.clearLogs();
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: AppError | Error): string {
    if (error instanceof AppError) {
      let message = error.userMessage;
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return error.message;
  }

  /**
   * Wrap an operation with error handling.
   * Errors that are already AppErrors pass through untouched.
   */
  static async handleAsync<T>(
    operation: () => Promise<T>,
    errorFactory: (error: unknown) => AppError
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const appError = errorFactory(error);
      this.logError(appError);
      throw appError;
    }
  }

  /**
   * Wrap a synchronous operation with error handling
   */
  static handle<T>(
    operation: () => T,
    errorFactory: (error: unknown) => AppError
  ): T {
    try {
      return operation();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      const appError = errorFactory(error);
      this.logError(appError);
      throw appError;
    }
  }
}
