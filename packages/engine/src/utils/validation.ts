/**
 * Validation helper utilities
 *
 * Consistent validation and error reporting for configuration, playlist
 * files and caller-supplied time ranges
 */

import { z } from 'zod';
import { InvalidRangeError, ValidationError } from '../types';

/**
 * Validates data against a Zod schema
 *
 * @param context - Name of the validated thing, used in error messages
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.infer<T> {
  try {
    // eslint-disable-next-line @typescript-eslint/no-unsafe-return
    return schema.parse(data) as z.infer<T>;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const message = context
        ? `Validation failed for ${context}: ${formatZodError(error)}`
        : `Validation failed: ${formatZodError(error)}`;

      throw new ValidationError(message, error.errors, {
        validationErrors: error.errors,
        receivedData: data,
      });
    }
    throw error;
  }
}

/**
 * Validates data against a Zod schema, returning null on failure instead of throwing
 */
export function validateSafe<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> | null {
  const result = schema.safeParse(data);
  // eslint-disable-next-line @typescript-eslint/no-unsafe-return
  return result.success ? result.data : null;
}

function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join('; ');
}

/**
 * Validates that a number is within a range
 *
 * @param min - Minimum value (inclusive)
 * @param max - Maximum value (inclusive)
 * @throws ValidationError if value is out of range
 */
export function validateRange(value: number, min: number, max: number, name = 'Value'): number {
  if (Number.isNaN(value) || value < min || value > max) {
    throw new ValidationError(
      `${name} must be between ${min} and ${max}, got ${value}`,
      undefined,
      {
        value,
        min,
        max,
        fieldName: name,
      }
    );
  }
  return value;
}

/**
 * Validates a clip range: non-negative start, end strictly after start
 *
 * @throws ValidationError for a negative start
 * @throws InvalidRangeError when end <= start
 */
export function validateTimeRange(start: number, end: number): { start: number; end: number } {
  if (Number.isNaN(start) || start < 0) {
    throw new ValidationError(`Start time must be non-negative, got ${start}`, undefined, {
      start,
    });
  }
  if (Number.isNaN(end) || end <= start) {
    throw new InvalidRangeError(start, end);
  }
  return { start, end };
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isZodError(error: unknown): error is z.ZodError {
  return error instanceof z.ZodError;
}
