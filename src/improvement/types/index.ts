/**
 * Improvement Engine Types
 *
 * Entities read from the store, the capabilities the engine consumes, and the
 * shapes it returns to callers.
 */

import type { ResumePreview } from '../../shared/validation/schemas';
import type { OutputSchema } from '../../shared/validation/types';

// ============================================================================
// Entities
// ============================================================================

export type EntityKind = 'resume' | 'job';

/**
 * Lifecycle of the structured data derived from a source document.
 * pending -> processing -> completed | failed
 */
export enum ProcessingStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed'
}

/**
 * Raw resume or job text as uploaded. Never mutated by the engine.
 */
export interface SourceDocument {
  id: string;
  kind: EntityKind;
  content: string;
  /** For jobs, the resume the description was uploaded against */
  parentId?: string | null;
  createdAt: Date;
}

/**
 * Structured data derived 1:1 from a SourceDocument by the extraction step.
 */
export interface ProcessedDocument {
  id: string;
  kind: EntityKind;
  processingStatus: ProcessingStatus;
  processingError: string | null;
  /** Serialized as {"extracted_keywords": [...]} */
  extractedKeywords: string | null;
  structuredData: Record<string, unknown> | null;
  processedAt: Date | null;
}

/**
 * A source document that passed the readiness gate, with its keywords
 * already deserialized.
 */
export interface ValidatedEntity {
  source: SourceDocument;
  processed: ProcessedDocument;
  keywords: string[];
}

/**
 * Numeric embedding. Providers sometimes wrap the vector in extra
 * dimensions ([[...]]); consumers flatten before use.
 */
export type EmbeddingVector = ReadonlyArray<number | EmbeddingVector>;

// ============================================================================
// Consumed capabilities
// ============================================================================

export interface EntityStore {
  getSource(kind: EntityKind, id: string): Promise<SourceDocument | null>;
  getProcessed(kind: EntityKind, id: string): Promise<ProcessedDocument | null>;
  saveSource(document: SourceDocument): Promise<void>;
  saveProcessed(document: ProcessedDocument): Promise<void>;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<EmbeddingVector>;
}

/**
 * Free-form generation, used for resume rewriting. Returns markdown.
 */
export interface GenerativeRewriter {
  run(prompt: string): Promise<string>;
}

/**
 * Schema-constrained generation. Rejects with a SCHEMA_VALIDATION_FAILED
 * ImprovementError when the model output does not match the schema.
 */
export interface SchemaExtractor {
  run<T>(prompt: string, schema: OutputSchema<T>): Promise<T>;
}

export interface MarkupRenderer {
  render(markdown: string): string;
}

// ============================================================================
// Results
// ============================================================================

/**
 * One candidate considered by the improvement loop
 */
export interface ImprovementAttempt {
  text: string;
  score: number;
}

export interface ImprovementOutcome extends ImprovementAttempt {
  /** Number of rewrite calls made */
  attempts: number;
  improved: boolean;
}

/**
 * Aggregate returned by a run. Field names match the wire format consumed
 * by existing clients.
 */
export interface ImprovementResult {
  resume_id: string;
  job_id: string;
  original_score: number;
  new_score: number;
  /** Improved resume rendered to HTML */
  updated_resume: string;
  resume_preview: ResumePreview | null;
}

// ============================================================================
// Progress events
// ============================================================================

export type ProgressStage = 'starting' | 'parsing' | 'scoring' | 'improving' | 'generating';

export type ProgressEvent =
  | { status: ProgressStage; message: string }
  | { status: 'completed'; data: ImprovementResult }
  | { status: 'error'; message: string };

// ============================================================================
// Configuration
// ============================================================================

export type ConcurrencyPolicy = 'unguarded' | 'advisory-lock';

export interface ImprovementConfig {
  /** Rewrite attempts before giving up on improving the baseline */
  maxAttempts: number;
  /** Joins extracted keywords into the text that gets embedded */
  keywordDelimiter: string;
  /** Pause inserted after each progress event, per stage */
  streamDelaysMs: Record<ProgressStage, number>;
  concurrencyPolicy: ConcurrencyPolicy;
}
