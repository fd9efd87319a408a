/**
 * Validation Module
 *
 * Zod schemas and validation helpers shared by the engine and the HTTP layer.
 */

export * from './validator';
export * from './schemas';
export * from './types';
