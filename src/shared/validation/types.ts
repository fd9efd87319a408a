/**
 * Validation Types
 *
 * Type definitions for validation results and errors.
 */

import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Any schema producing T, whatever input shape it accepts
 * (schemas with defaults accept a looser input than they output)
 */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown>;

/**
 * Validation error for a specific field
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Result of validation
 */
export interface ValidationResult<T = unknown> {
  isValid: boolean;
  errors: ValidationError[];
  data?: T;
}
