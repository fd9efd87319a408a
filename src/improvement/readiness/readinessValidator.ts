/**
 * Readiness Validator
 *
 * The single gate every scoring path goes through: a resume or job may only
 * be scored once its structured extraction completed and produced keywords.
 * Read-only; safe to call any number of times.
 */

import { KeywordsPayloadSchema } from '../../shared/validation/schemas';
import { ImprovementErrorFactory, isImprovementError } from '../errors/types';
import { ProcessingStatus } from '../types';
import type { EntityKind, EntityStore, ProcessedDocument, ValidatedEntity } from '../types';

export type ReadinessSummary =
  | {
      valid: true;
      resume: ValidatedEntity;
      job: ValidatedEntity;
      message: string;
    }
  | {
      valid: false;
      error: string;
      message: string;
    };

const REQUIRED_STRUCTURED_FIELDS: Record<EntityKind, string[]> = {
  resume: ['personal_data', 'extracted_keywords'],
  job: ['job_title', 'job_summary', 'extracted_keywords']
};

function capitalize(kind: EntityKind): string {
  return kind.charAt(0).toUpperCase() + kind.slice(1);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled processing status: ${String(value)}`);
}

export class ReadinessValidator {
  constructor(private readonly store: EntityStore) {}

  /**
   * Load an entity and its processed data, failing with
   * RESOURCE_NOT_FOUND, NOT_PARSED or KEYWORD_EXTRACTION_MISSING.
   */
  async validateCompleteness(kind: EntityKind, id: string): Promise<ValidatedEntity> {
    const source = await this.store.getSource(kind, id);
    if (!source) {
      throw ImprovementErrorFactory.notFound(kind, id);
    }

    const processed = await this.store.getProcessed(kind, id);
    if (!processed) {
      throw ImprovementErrorFactory.notParsed(kind, id);
    }

    this.assertCompleted(processed, kind, id);

    const keywords = this.parseKeywords(processed.extractedKeywords, kind, id);
    return { source, processed, keywords };
  }

  validateResumeCompleteness(resumeId: string): Promise<ValidatedEntity> {
    return this.validateCompleteness('resume', resumeId);
  }

  validateJobCompleteness(jobId: string): Promise<ValidatedEntity> {
    return this.validateCompleteness('job', jobId);
  }

  /**
   * Deserialize {"extracted_keywords": [...]}. Absent, empty, malformed and
   * empty-list values all fail the same way.
   */
  parseKeywords(raw: string | null | undefined, kind: EntityKind, id: string): string[] {
    if (!raw) {
      throw ImprovementErrorFactory.keywordExtractionMissing(kind, id);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      throw ImprovementErrorFactory.keywordExtractionMissing(kind, id);
    }

    const result = KeywordsPayloadSchema.safeParse(decoded);
    if (!result.success) {
      throw ImprovementErrorFactory.keywordExtractionMissing(kind, id);
    }
    return result.data.extracted_keywords;
  }

  /**
   * Validate both sides of an improvement without throwing
   */
  async validateImprovementReadiness(resumeId: string, jobId: string): Promise<ReadinessSummary> {
    try {
      const resume = await this.validateResumeCompleteness(resumeId);
      const job = await this.validateJobCompleteness(jobId);
      return {
        valid: true,
        resume,
        job,
        message: 'Both resume and job data are ready for improvement'
      };
    } catch (error) {
      if (!isImprovementError(error)) {
        throw error;
      }
      return {
        valid: false,
        error: error.code,
        message: error.message
      };
    }
  }

  /**
   * Check freshly extracted structured data before it is marked completed
   */
  validateStructuredData(data: Record<string, unknown> | null | undefined, kind: EntityKind): boolean {
    if (!data) {
      return false;
    }

    for (const field of REQUIRED_STRUCTURED_FIELDS[kind]) {
      const value = data[field];
      if (value === undefined || value === null || value === '') {
        return false;
      }
    }

    const keywords = data.extracted_keywords;
    return Array.isArray(keywords) && keywords.length > 0;
  }

  private assertCompleted(processed: ProcessedDocument, kind: EntityKind, id: string): void {
    const { processingStatus } = processed;
    switch (processingStatus) {
      case ProcessingStatus.COMPLETED:
        return;
      case ProcessingStatus.FAILED:
        throw ImprovementErrorFactory.notParsed(
          kind,
          id,
          `${capitalize(kind)} processing failed: ${processed.processingError ?? 'unknown error'}`
        );
      case ProcessingStatus.PENDING:
      case ProcessingStatus.PROCESSING:
        throw ImprovementErrorFactory.notParsed(
          kind,
          id,
          `${capitalize(kind)} processing is not complete. Status: ${processingStatus}`
        );
      default:
        return assertNever(processingStatus);
    }
  }
}
