/**
 * Error Types
 *
 * Type definitions for error categories and error structures.
 * Shared by the improvement engine, the ingestion path and the HTTP layer.
 */

/**
 * Error categories for different types of failures
 */
export enum ErrorCategory {
  VALIDATION = 'VALIDATION',
  PARSING = 'PARSING',
  STORAGE = 'STORAGE',
  EXTERNAL_SERVICE = 'EXTERNAL_SERVICE',
  CONCURRENCY = 'CONCURRENCY',
  CONFIGURATION = 'CONFIGURATION',
  UNEXPECTED = 'UNEXPECTED'
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  userMessage: string;
  technicalDetails: string;
  timestamp: Date;
  context?: Record<string, unknown>;
  recoverable: boolean;
  suggestedAction?: string;
  cause?: unknown;
}

/**
 * Custom error class with additional context
 */
export class AppError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly userMessage: string;
  public readonly technicalDetails: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly recoverable: boolean;
  public readonly suggestedAction?: string;

  constructor(info: ErrorInfo) {
    super(info.userMessage, info.cause === undefined ? undefined : { cause: info.cause });
    this.name = 'AppError';
    this.category = info.category;
    this.severity = info.severity;
    this.userMessage = info.userMessage;
    this.technicalDetails = info.technicalDetails;
    this.timestamp = info.timestamp;
    this.context = info.context;
    this.recoverable = info.recoverable;
    this.suggestedAction = info.suggestedAction;
  }

  toInfo(): ErrorInfo {
    return {
      category: this.category,
      severity: this.severity,
      userMessage: this.userMessage,
      technicalDetails: this.technicalDetails,
      timestamp: this.timestamp,
      context: this.context,
      recoverable: this.recoverable,
      suggestedAction: this.suggestedAction
    };
  }
}
