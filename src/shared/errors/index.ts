/**
 * Errors Module
 *
 * Standardized error types, handling and logging utilities.
 */

export * from './handler';
export * from './types';
export * from './logger';
