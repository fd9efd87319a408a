/**
 * LLM Module
 *
 * Unified LLM client, embeddings client and utilities for Anthropic and OpenAI.
 */

export * from './types';
export * from './client';
export * from './cache';
export * from './prompts';
export * from './embeddings';
