/**
 * Structured Extraction Service
 *
 * Stores uploaded resumes and job descriptions and derives their structured
 * data and keywords through the schema extractor. Every stored source gets a
 * processed record that moves from processing to completed or failed, which
 * is what the readiness gate later inspects.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { loggers, serializeError } from '../../shared/logging/logger';
import { StructuredJobSchema, StructuredResumeSchema } from '../../shared/validation/schemas';
import type { OutputSchema } from '../../shared/validation/types';
import { callCapability } from '../controller/improvementLoop';
import { ImprovementErrorFactory, isImprovementError } from '../errors/types';
import { buildStructuredJobPrompt, buildStructuredResumePrompt } from '../prompts';
import { ReadinessValidator } from '../readiness/readinessValidator';
import { ProcessingStatus } from '../types';
import type { EntityKind, EntityStore, SchemaExtractor } from '../types';

/**
 * Job source and processed data as one record
 */
export interface JobWithProcessedData {
  job_id: string;
  resume_id: string | null;
  content: string;
  created_at: string;
  processing_status: ProcessingStatus;
  structured_data: Record<string, unknown> | null;
  extracted_keywords: string[];
  processed_at: string | null;
}

type ExtractedDocument = Record<string, unknown> & { extracted_keywords: string[] };

interface ExtractionPlan {
  kind: EntityKind;
  id: string;
  content: string;
  parentId: string | null;
  prompt: string;
  schema: OutputSchema<ExtractedDocument>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class StructuredExtractionService {
  private readonly log: Logger;

  constructor(
    private readonly store: EntityStore,
    private readonly extractor: SchemaExtractor,
    private readonly validator: ReadinessValidator = new ReadinessValidator(store),
    logger?: Logger
  ) {
    this.log = logger ?? loggers.ingestion;
  }

  async createAndStoreResume(content: string): Promise<string> {
    const id = randomUUID();
    await this.extractAndStore({
      kind: 'resume',
      id,
      content,
      parentId: null,
      prompt: buildStructuredResumePrompt(content),
      schema: StructuredResumeSchema
    });
    return id;
  }

  /**
   * Store job descriptions uploaded against an existing resume.
   * Descriptions are processed in order; the first failure stops the batch.
   */
  async createAndStoreJobs(resumeId: string, jobDescriptions: string[]): Promise<string[]> {
    const resume = await this.store.getSource('resume', resumeId);
    if (!resume) {
      throw ImprovementErrorFactory.notFound('resume', resumeId);
    }

    const jobIds: string[] = [];
    for (const description of jobDescriptions) {
      const id = randomUUID();
      await this.extractAndStore({
        kind: 'job',
        id,
        content: description,
        parentId: resumeId,
        prompt: buildStructuredJobPrompt(description),
        schema: StructuredJobSchema
      });
      jobIds.push(id);
    }
    return jobIds;
  }

  /**
   * Null when the job is missing or not ready for scoring
   */
  async getJobWithProcessedData(jobId: string): Promise<JobWithProcessedData | null> {
    try {
      const { source, processed, keywords } = await this.validator.validateJobCompleteness(jobId);
      return {
        job_id: source.id,
        resume_id: source.parentId ?? null,
        content: source.content,
        created_at: source.createdAt.toISOString(),
        processing_status: processed.processingStatus,
        structured_data: processed.structuredData,
        extracted_keywords: keywords,
        processed_at: processed.processedAt ? processed.processedAt.toISOString() : null
      };
    } catch (error) {
      if (isImprovementError(error) && error.isReadinessFailure()) {
        this.log.debug({ jobId, code: error.code }, 'Job is not available with processed data');
        return null;
      }
      throw error;
    }
  }

  private async extractAndStore(plan: ExtractionPlan): Promise<void> {
    const { kind, id } = plan;

    await this.store.saveSource({
      id,
      kind,
      content: plan.content,
      parentId: plan.parentId,
      createdAt: new Date()
    });
    await this.store.saveProcessed({
      id,
      kind,
      processingStatus: ProcessingStatus.PROCESSING,
      processingError: null,
      extractedKeywords: null,
      structuredData: null,
      processedAt: null
    });

    let data: ExtractedDocument;
    try {
      data = await callCapability('extraction', () => this.extractor.run(plan.prompt, plan.schema));
    } catch (error) {
      throw await this.markFailed(kind, id, `Failed to extract structured ${kind} data: ${describeError(error)}`, error);
    }

    if (!this.validator.validateStructuredData(data, kind)) {
      throw await this.markFailed(kind, id, `Extracted ${kind} data is missing required fields or keywords`);
    }

    try {
      await this.store.saveProcessed({
        id,
        kind,
        processingStatus: ProcessingStatus.COMPLETED,
        processingError: null,
        extractedKeywords: JSON.stringify({ extracted_keywords: data.extracted_keywords }),
        structuredData: data,
        processedAt: new Date()
      });
    } catch (error) {
      throw await this.markFailed(kind, id, `Failed to store structured ${kind} data: ${describeError(error)}`, error);
    }

    this.log.info({ kind, id, keywords: data.extracted_keywords.length }, 'Structured data extracted');
  }

  /**
   * Record the failure on the processed document and build the error to throw
   */
  private async markFailed(kind: EntityKind, id: string, reason: string, cause?: unknown): Promise<Error> {
    this.log.warn({ kind, id, reason, err: cause === undefined ? undefined : serializeError(cause) }, 'Structured extraction failed');
    try {
      await this.store.saveProcessed({
        id,
        kind,
        processingStatus: ProcessingStatus.FAILED,
        processingError: reason,
        extractedKeywords: null,
        structuredData: null,
        processedAt: new Date()
      });
    } catch (storeError) {
      this.log.error({ kind, id, err: serializeError(storeError) }, 'Could not record extraction failure');
    }
    return ImprovementErrorFactory.structuredExtractionFailed(kind, id, reason, cause);
  }
}
