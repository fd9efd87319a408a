/**
 * Improvement Loop
 *
 * Asks the rewriter for a better resume up to maxAttempts times, scoring
 * each candidate against the job keywords embedding. Every attempt is
 * conditioned on the best text and score seen so far, and the loop returns
 * on the first candidate that beats it.
 */

import type { Logger } from 'pino';
import { ErrorHandler } from '../../shared/errors/handler';
import { loggers } from '../../shared/logging/logger';
import { ImprovementErrorFactory } from '../errors/types';
import type { CapabilityStage } from '../errors/types';
import { buildResumeImprovementPrompt } from '../prompts';
import { cosineSimilarity } from '../scoring/similarity';
import type {
  EmbeddingProvider,
  EmbeddingVector,
  GenerativeRewriter,
  ImprovementAttempt,
  ImprovementOutcome
} from '../types';

export const DEFAULT_MAX_ATTEMPTS = 5;

export interface ImprovementLoopInput {
  originalText: string;
  /** Resume keywords, already joined */
  originalKeywords: string;
  jobText: string;
  /** Job keywords, already joined */
  jobKeywords: string;
  baselineScore: number;
  jobKeywordsEmbedding: EmbeddingVector;
}

export interface ImprovementLoopDependencies {
  rewriter: GenerativeRewriter;
  embedder: EmbeddingProvider;
  logger?: Logger;
  /** Checked before every attempt; an aborted signal rejects with its reason */
  signal?: AbortSignal;
}

/**
 * Run an external call, turning any failure into EXTERNAL_CAPABILITY_FAILURE
 */
export function callCapability<T>(stage: CapabilityStage, operation: () => Promise<T>): Promise<T> {
  return ErrorHandler.handleAsync(operation, error =>
    ImprovementErrorFactory.externalCapabilityFailure(stage, error)
  );
}

export async function improveScore(
  input: ImprovementLoopInput,
  deps: ImprovementLoopDependencies,
  maxAttempts: number = DEFAULT_MAX_ATTEMPTS
): Promise<ImprovementOutcome> {
  const log = deps.logger ?? loggers.improvement;
  const best: ImprovementAttempt = { text: input.originalText, score: input.baselineScore };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    deps.signal?.throwIfAborted();
    log.info({ attempt, maxAttempts, bestScore: best.score }, `Attempt ${attempt}/${maxAttempts} to improve resume score`);

    const prompt = buildResumeImprovementPrompt({
      rawJobDescription: input.jobText,
      extractedJobKeywords: input.jobKeywords,
      rawResume: best.text,
      extractedResumeKeywords: input.originalKeywords,
      currentCosineSimilarity: best.score
    });

    const candidate = await callCapability('rewrite', () => deps.rewriter.run(prompt));
    const embedding = await callCapability('embedding', () => deps.embedder.embed(candidate));
    const score = cosineSimilarity(embedding, input.jobKeywordsEmbedding);

    if (score > best.score) {
      log.info({ attempt, score, previousScore: best.score }, 'Rewrite improved the score');
      return { text: candidate, score, attempts: attempt, improved: true };
    }

    log.info(
      { attempt, score, bestScore: best.score },
      `Attempt ${attempt} did not improve score. Current: ${score.toFixed(4)}, Best: ${best.score.toFixed(4)}`
    );
  }

  return { ...best, attempts: maxAttempts, improved: false };
}
