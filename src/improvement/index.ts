/**
 * Resume Score Improvement
 *
 * Readiness gate, cosine scoring, rewrite loop, preview and progress
 * streaming for resume/job pairs.
 */

export * from './types';
export * from './errors/types';
export * from './config';
export * from './scoring/similarity';
export * from './readiness/readinessValidator';
export * from './controller/improvementLoop';
export * from './preview/previewRenderer';
export * from './rendering/markup';
export * from './streaming/progress';
export * from './concurrency/runGuard';
export * from './ingestion/structuredExtraction';
export * from './adapters/llmCapabilities';
export * from './prompts';
export * from './orchestrator';
