/**
 * Validator Utilities
 *
 * Turns Zod parse results into field-level validation errors.
 */

import type { ZodError } from 'zod';
import { OutputSchema, ValidationResult, ValidationError } from './types';

/**
 * Flatten Zod issues into field/message pairs
 */
export function formatZodIssues(error: ZodError): ValidationError[] {
  return error.errors.map(err => ({
    field: err.path.join('.') || '(root)',
    message: err.message
  }));
}

/**
 * Validates a value against a schema
 * @param schema - Zod schema to check against
 * @param value - Untrusted input
 * @returns Validation result carrying the parsed value when valid
 */
export function validateWithSchema<T>(schema: OutputSchema<T>, value: unknown): ValidationResult<T> {
  const result = schema.safeParse(value);

  if (result.success) {
    return {
      isValid: true,
      errors: [],
      data: result.data
    };
  }

  return {
    isValid: false,
    errors: formatZodIssues(result.error)
  };
}
