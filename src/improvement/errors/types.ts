/**
 * Improvement Engine Error Types
 *
 * Error codes and response structures for readiness validation, scoring and
 * the rewrite loop. Extends the shared AppError.
 */

import { AppError, ErrorCategory, ErrorSeverity } from '../../shared/errors/types';
import type { EntityKind } from '../types';

export enum ImprovementErrorCode {
  // Readiness gate
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  NOT_PARSED = 'NOT_PARSED',
  KEYWORD_EXTRACTION_MISSING = 'KEYWORD_EXTRACTION_MISSING',

  // External capabilities
  EXTERNAL_CAPABILITY_FAILURE = 'EXTERNAL_CAPABILITY_FAILURE',
  SCHEMA_VALIDATION_FAILED = 'SCHEMA_VALIDATION_FAILED',

  // Ingestion
  STRUCTURED_EXTRACTION_FAILED = 'STRUCTURED_EXTRACTION_FAILED',

  // Run control
  IMPROVEMENT_IN_PROGRESS = 'IMPROVEMENT_IN_PROGRESS',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

/**
 * Where an external call failed
 */
export type CapabilityStage = 'embedding' | 'rewrite' | 'extraction';

/**
 * Error response structure for external communication
 */
export interface ErrorResponse {
  error: ImprovementErrorCode;
  message: string;
  details?: string;
  timestamp: string;
  request_id?: string;
  retryable?: boolean;
  suggested_action?: string;
}

export class ImprovementError extends AppError {
  public readonly code: ImprovementErrorCode;
  public readonly retryable: boolean;

  constructor(
    code: ImprovementErrorCode,
    userMessage: string,
    technicalDetails: string,
    options?: {
      category?: ErrorCategory;
      severity?: ErrorSeverity;
      context?: Record<string, unknown>;
      retryable?: boolean;
      suggestedAction?: string;
      cause?: unknown;
    }
  ) {
    super({
      category: options?.category || ErrorCategory.UNEXPECTED,
      severity: options?.severity || ErrorSeverity.MEDIUM,
      userMessage,
      technicalDetails,
      timestamp: new Date(),
      context: options?.context,
      recoverable: options?.retryable ?? false,
      suggestedAction: options?.suggestedAction,
      cause: options?.cause
    });

    this.name = 'ImprovementError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }

  /**
   * True for failures of the readiness gate (missing or unprocessed data)
   */
  isReadinessFailure(): boolean {
    return (
      this.code === ImprovementErrorCode.RESOURCE_NOT_FOUND ||
      this.code === ImprovementErrorCode.NOT_PARSED ||
      this.code === ImprovementErrorCode.KEYWORD_EXTRACTION_MISSING
    );
  }

  toErrorResponse(requestId?: string): ErrorResponse {
    return {
      error: this.code,
      message: this.userMessage,
      details: this.technicalDetails,
      timestamp: this.timestamp.toISOString(),
      request_id: requestId,
      retryable: this.retryable,
      suggested_action: this.suggestedAction
    };
  }
}

export function isImprovementError(error: unknown, code?: ImprovementErrorCode): error is ImprovementError {
  return error instanceof ImprovementError && (code === undefined || error.code === code);
}

function label(kind: EntityKind): string {
  return kind === 'resume' ? 'Resume' : 'Job';
}

/**
 * Factory functions for common error types
 */
export class ImprovementErrorFactory {
  static notFound(kind: EntityKind, id: string): ImprovementError {
    return new ImprovementError(
      ImprovementErrorCode.RESOURCE_NOT_FOUND,
      `${label(kind)} with id ${id} not found`,
      `No ${kind} source document is stored under ${id}`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.LOW,
        context: { kind, id },
        suggestedAction: `Upload the ${kind} before requesting an improvement`
      }
    );
  }

  /**
   * The entity exists but its structured data is missing, pending or failed.
   */
  static notParsed(kind: EntityKind, id: string, reason?: string): ImprovementError {
    const message = reason ?? `${label(kind)} with id ${id} has not been processed yet`;
    return new ImprovementError(
      ImprovementErrorCode.NOT_PARSED,
      message,
      `Processed ${kind} ${id} is not usable: ${message}`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context: { kind, id },
        suggestedAction: `Wait for ${kind} processing to finish or upload it again`
      }
    );
  }

  static keywordExtractionMissing(kind: EntityKind, id: string): ImprovementError {
    return new ImprovementError(
      ImprovementErrorCode.KEYWORD_EXTRACTION_MISSING,
      `Keyword extraction failed for ${kind} ${id}`,
      `Processed ${kind} ${id} has no usable extracted_keywords`,
      {
        category: ErrorCategory.VALIDATION,
        severity: ErrorSeverity.MEDIUM,
        context: { kind, id },
        suggestedAction: `Re-upload the ${kind} with content that names concrete skills and requirements`
      }
    );
  }

  static externalCapabilityFailure(stage: CapabilityStage, cause: unknown): ImprovementError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ImprovementError(
      ImprovementErrorCode.EXTERNAL_CAPABILITY_FAILURE,
      `The ${stage} service failed: ${reason}`,
      reason,
      {
        category: ErrorCategory.EXTERNAL_SERVICE,
        severity: ErrorSeverity.HIGH,
        context: { stage },
        retryable: true,
        suggestedAction: 'Retry the request later',
        cause
      }
    );
  }

  static schemaValidationFailed(schemaName: string, details: string): ImprovementError {
    return new ImprovementError(
      ImprovementErrorCode.SCHEMA_VALIDATION_FAILED,
      `Model output did not match the ${schemaName} schema`,
      details,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.LOW,
        context: { schemaName },
        retryable: true
      }
    );
  }

  static structuredExtractionFailed(kind: EntityKind, id: string, reason: string, cause?: unknown): ImprovementError {
    return new ImprovementError(
      ImprovementErrorCode.STRUCTURED_EXTRACTION_FAILED,
      reason,
      `Structured extraction for ${kind} ${id} failed: ${reason}`,
      {
        category: ErrorCategory.PARSING,
        severity: ErrorSeverity.MEDIUM,
        context: { kind, id },
        suggestedAction: `Make sure the ${kind} text is clear and contains all the usual sections`,
        cause
      }
    );
  }

  static improvementInProgress(resumeId: string, jobId: string): ImprovementError {
    return new ImprovementError(
      ImprovementErrorCode.IMPROVEMENT_IN_PROGRESS,
      `An improvement run for resume ${resumeId} and job ${jobId} is already in progress`,
      'Advisory lock for this resume/job pair is held by another run',
      {
        category: ErrorCategory.CONCURRENCY,
        severity: ErrorSeverity.LOW,
        context: { resumeId, jobId },
        retryable: true,
        suggestedAction: 'Wait for the running improvement to finish'
      }
    );
  }

  static configurationError(field: string, reason: string): ImprovementError {
    return new ImprovementError(
      ImprovementErrorCode.CONFIGURATION_ERROR,
      'Configuration error',
      `Invalid configuration for ${field}: ${reason}`,
      {
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        context: { field },
        suggestedAction: 'Check configuration settings'
      }
    );
  }
}
