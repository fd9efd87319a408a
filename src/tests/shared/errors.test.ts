/**
 * Tests for shared error handling utilities
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ErrorHandler,
  ErrorLogger,
  ErrorCategory,
  ErrorSeverity,
  AppError
} from '../../shared/errors';

describe('Shared Error Handler', () => {
  beforeEach(() => {
    ErrorLogger.clearLogs();
  });

  describe('Error Creation', () => {
    it('should create storage errors with their cause', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = ErrorHandler.createStorageError('Write failed', 'database is locked', { table: 'jobs' }, cause);

      expect(error).toBeInstanceOf(AppError);
      expect(error.category).toBe(ErrorCategory.STORAGE);
      expect(error.severity).toBe(ErrorSeverity.HIGH);
      expect(error.recoverable).toBe(false);
      expect(error.cause).toBe(cause);
    });

    it('should create validation errors', () => {
      const error = ErrorHandler.createValidationError('Bad input', 'resume_id is empty');

      expect(error.category).toBe(ErrorCategory.VALIDATION);
      expect(error.severity).toBe(ErrorSeverity.LOW);
      expect(error.recoverable).toBe(true);
    });

    it('should create unexpected errors from anything thrown', () => {
      const error = ErrorHandler.createUnexpectedError('plain string');

      expect(error.category).toBe(ErrorCategory.UNEXPECTED);
      expect(error.technicalDetails).toBe('plain string');
    });
  });

  describe('Error Wrapping', () => {
    it('wraps and logs foreign errors', async () => {
      const wrapped = await ErrorHandler.handleAsync(
        async () => {
          throw new Error('disk full');
        },
        error => ErrorHandler.createStorageError('Save failed', String(error))
      ).catch((caught: unknown) => caught);

      expect(wrapped).toBeInstanceOf(AppError);
      expect(ErrorLogger.getLogs()).toHaveLength(1);
      expect(ErrorLogger.getLogsByCategory(ErrorCategory.STORAGE)).toHaveLength(1);
    });

    it('passes AppErrors through without logging them again', () => {
      const original = ErrorHandler.createValidationError('Bad input', 'details');

      expect(() => ErrorHandler.handle(() => {
        throw original;
      }, ErrorHandler.createUnexpectedError)).toThrow(original);
      expect(ErrorLogger.getLogs()).toHaveLength(0);
    });

    it('returns the value on success', async () => {
      await expect(ErrorHandler.handleAsync(async () => 42, ErrorHandler.createUnexpectedError)).resolves.toBe(42);
    });
  });

  describe('Error Logging', () => {
    it('keeps recent logs and filters by severity', () => {
      ErrorHandler.logError(ErrorHandler.createValidationError('first', 'a'));
      ErrorHandler.logError(new Error('second'));

      expect(ErrorLogger.getRecentLogs(1)[0].technicalDetails).toBe('second');
      expect(ErrorLogger.getLogsBySeverity(ErrorSeverity.CRITICAL)).toHaveLength(1);
    });
  });

  describe('Message Formatting', () => {
    it('appends the suggested action', () => {
      const error = ErrorHandler.createValidationError('Bad input', 'details');

      expect(ErrorHandler.formatUserMessage(error)).toBe(
        'Bad input\n\nPlease correct the highlighted fields and try again.'
      );
    });

    it('uses the plain message for other errors', () => {
      expect(ErrorHandler.formatUserMessage(new Error('oops'))).toBe('oops');
    });
  });
});
