/**
 * Score Improvement Service
 *
 * Runs the full pipeline for a resume/job pair: readiness gate, baseline
 * cosine score, rewrite loop, HTML rendering and preview. Exposed as a
 * single-shot call and as a stream of progress events that ends in the same
 * result.
 */

import type { Logger } from 'pino';
import { loggers, serializeError } from '../shared/logging/logger';
import { DEFAULT_CONFIG } from './config';
import { createRunGuard } from './concurrency/runGuard';
import type { RunGuard, RunLease } from './concurrency/runGuard';
import { callCapability, improveScore } from './controller/improvementLoop';
import { PreviewRenderer } from './preview/previewRenderer';
import { ReadinessValidator } from './readiness/readinessValidator';
import { cosineSimilarity } from './scoring/similarity';
import { completedEvent, errorEvent, formatSseEvent, stageEvent } from './streaming/progress';
import type {
  EmbeddingProvider,
  EmbeddingVector,
  GenerativeRewriter,
  ImprovementConfig,
  ImprovementOutcome,
  ImprovementResult,
  MarkupRenderer,
  ProgressEvent,
  ProgressStage,
  SchemaExtractor,
  ValidatedEntity
} from './types';

export interface ScoreImprovementServiceOptions {
  validator: ReadinessValidator;
  embedder: EmbeddingProvider;
  rewriter: GenerativeRewriter;
  extractor: SchemaExtractor;
  renderer: MarkupRenderer;
  config?: ImprovementConfig;
  /** Defaults to the guard matching config.concurrencyPolicy */
  guard?: RunGuard;
  logger?: Logger;
}

export interface StreamOptions {
  /** Aborting ends the stream at the next stage or attempt, without an error event */
  signal?: AbortSignal;
}

interface ValidatedPair {
  resume: ValidatedEntity;
  job: ValidatedEntity;
}

interface PairEmbeddings {
  resumeKeywords: string;
  jobKeywords: string;
  resumeEmbedding: EmbeddingVector;
  jobKeywordsEmbedding: EmbeddingVector;
}

interface Baseline {
  resumeKeywords: string;
  jobKeywords: string;
  jobKeywordsEmbedding: EmbeddingVector;
  score: number;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ScoreImprovementService {
  private readonly validator: ReadinessValidator;
  private readonly embedder: EmbeddingProvider;
  private readonly rewriter: GenerativeRewriter;
  private readonly renderer: MarkupRenderer;
  private readonly previewRenderer: PreviewRenderer;
  private readonly config: ImprovementConfig;
  private readonly guard: RunGuard;
  private readonly log: Logger;

  constructor(options: ScoreImprovementServiceOptions) {
    this.validator = options.validator;
    this.embedder = options.embedder;
    this.rewriter = options.rewriter;
    this.renderer = options.renderer;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.guard = options.guard ?? createRunGuard(this.config.concurrencyPolicy);
    this.log = options.logger ?? loggers.improvement;
    this.previewRenderer = new PreviewRenderer(options.extractor, this.log);
  }

  /**
   * Score, improve and preview a resume against a job in one call.
   * Readiness failures reject with the typed ImprovementError.
   */
  async run(resumeId: string, jobId: string): Promise<ImprovementResult> {
    const lease = this.guard.acquire(resumeId, jobId);
    try {
      const pair = await this.validatePair(resumeId, jobId);
      const baseline = await this.scoreBaseline(pair);
      const outcome = await this.improve(pair, baseline);
      return await this.buildResult(resumeId, jobId, baseline.score, outcome);
    } finally {
      lease.release();
    }
  }

  /**
   * The same pipeline as run(), observed stage by stage. Never throws: any
   * failure becomes a single terminal error event.
   */
  async *runStreaming(
    resumeId: string,
    jobId: string,
    options: StreamOptions = {}
  ): AsyncGenerator<ProgressEvent, void, undefined> {
    const { signal } = options;
    const cancelled = (): boolean => {
      if (signal?.aborted) {
        this.log.info({ resumeId, jobId }, 'Improvement stream cancelled');
        return true;
      }
      return false;
    };

    yield stageEvent('starting');
    await this.pause('starting');
    if (cancelled()) return;

    let lease: RunLease;
    let pair: ValidatedPair;
    try {
      lease = this.guard.acquire(resumeId, jobId);
    } catch (error) {
      yield errorEvent(describeError(error));
      return;
    }

    try {
      try {
        pair = await this.validatePair(resumeId, jobId);
      } catch (error) {
        this.log.warn({ resumeId, jobId, err: serializeError(error) }, 'Streaming run failed validation');
        yield errorEvent(`Validation failed: ${describeError(error)}`);
        return;
      }

      yield stageEvent('parsing');
      await this.pause('parsing');
      if (cancelled()) return;
      const embeddings = await this.embedPair(pair);

      yield stageEvent('scoring');
      await this.pause('scoring');
      if (cancelled()) return;
      const baseline = this.toBaseline(embeddings);

      yield stageEvent('improving');
      await this.pause('improving');
      if (cancelled()) return;
      const outcome = await this.improve(pair, baseline, signal);

      yield stageEvent('generating');
      await this.pause('generating');
      if (cancelled()) return;
      const result = await this.buildResult(resumeId, jobId, baseline.score, outcome);

      yield completedEvent(result);
    } catch (error) {
      if (cancelled()) return;
      this.log.error({ resumeId, jobId, err: serializeError(error) }, 'Streaming run failed');
      yield errorEvent(`Improvement failed: ${describeError(error)}`);
    } finally {
      lease.release();
    }
  }

  /**
   * runStreaming() framed as server-sent events
   */
  async *streamSse(resumeId: string, jobId: string, options: StreamOptions = {}): AsyncGenerator<string, void, undefined> {
    for await (const event of this.runStreaming(resumeId, jobId, options)) {
      yield formatSseEvent(event);
    }
  }

  // ==========================================================================
  // Pipeline steps
  // ==========================================================================

  /**
   * Resume first; a resume failure is reported even if the job is also bad.
   */
  private async validatePair(resumeId: string, jobId: string): Promise<ValidatedPair> {
    const resume = await this.validator.validateResumeCompleteness(resumeId);
    const job = await this.validator.validateJobCompleteness(jobId);
    return { resume, job };
  }

  /**
   * Resume content and job keywords are embedded concurrently
   */
  private async embedPair(pair: ValidatedPair): Promise<PairEmbeddings> {
    const resumeKeywords = pair.resume.keywords.join(this.config.keywordDelimiter);
    const jobKeywords = pair.job.keywords.join(this.config.keywordDelimiter);

    const [resumeEmbedding, jobKeywordsEmbedding] = await Promise.all([
      callCapability('embedding', () => this.embedder.embed(pair.resume.source.content)),
      callCapability('embedding', () => this.embedder.embed(jobKeywords))
    ]);

    return { resumeKeywords, jobKeywords, resumeEmbedding, jobKeywordsEmbedding };
  }

  private toBaseline(embeddings: PairEmbeddings): Baseline {
    return {
      resumeKeywords: embeddings.resumeKeywords,
      jobKeywords: embeddings.jobKeywords,
      jobKeywordsEmbedding: embeddings.jobKeywordsEmbedding,
      score: cosineSimilarity(embeddings.jobKeywordsEmbedding, embeddings.resumeEmbedding)
    };
  }

  private async scoreBaseline(pair: ValidatedPair): Promise<Baseline> {
    return this.toBaseline(await this.embedPair(pair));
  }

  private improve(pair: ValidatedPair, baseline: Baseline, signal?: AbortSignal): Promise<ImprovementOutcome> {
    return improveScore(
      {
        originalText: pair.resume.source.content,
        originalKeywords: baseline.resumeKeywords,
        jobText: pair.job.source.content,
        jobKeywords: baseline.jobKeywords,
        baselineScore: baseline.score,
        jobKeywordsEmbedding: baseline.jobKeywordsEmbedding
      },
      { rewriter: this.rewriter, embedder: this.embedder, logger: this.log, signal },
      this.config.maxAttempts
    );
  }

  private async buildResult(
    resumeId: string,
    jobId: string,
    originalScore: number,
    outcome: ImprovementOutcome
  ): Promise<ImprovementResult> {
    const preview = await this.previewRenderer.render(outcome.text);
    this.log.debug({ resumeId, jobId, preview }, 'Resume preview generated');

    const result: ImprovementResult = {
      resume_id: resumeId,
      job_id: jobId,
      original_score: originalScore,
      new_score: outcome.score,
      updated_resume: this.renderer.render(outcome.text),
      resume_preview: preview
    };

    this.log.info(
      {
        resumeId,
        jobId,
        originalScore,
        newScore: outcome.score,
        attempts: outcome.attempts,
        improved: outcome.improved
      },
      'Improvement run finished'
    );
    return result;
  }

  private pause(stage: ProgressStage): Promise<void> {
    const ms = this.config.streamDelaysMs[stage];
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
