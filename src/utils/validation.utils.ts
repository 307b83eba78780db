/**
 * @fileoverview Zod-based validation helpers returning result unions instead of throwing,
 * plus the reusable primitive schemas used by action and API payloads.
 *
 * Validation Result Types:
 * - ValidationSuccess<T>: Contains validated data
 * - ValidationFailure: Contains AppError and detailed issue array
 * - ValidationResult<T>: Union type for result handling
 */

import { z, ZodError, ZodType, ZodTypeDef } from 'zod';
import { AppError, ErrorCode, fromZodError, toError } from './error.utils';

// ============================================================================
// VALIDATION RESULT TYPES
// ============================================================================

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * Success validation result
 */
export interface ValidationSuccess<T> {
  success: true;
  data: T;
}

/**
 * Failed validation result
 */
export interface ValidationFailure {
  success: false;
  error: AppError;
  issues?: ValidationIssue[];
}

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;

// ============================================================================
// CORE VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate data against a schema with detailed error info
 */
export function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  try {
    return {
      success: true,
      data: schema.parse(data)
    };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        success: false,
        error: fromZodError(error),
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code
        }))
      };
    }

    return {
      success: false,
      error: error instanceof AppError
        ? error
        : new AppError('Validation failed', ErrorCode.VALIDATION, undefined, toError(error))
    };
  }
}

// ============================================================================
// COMMON VALIDATION SCHEMAS
// ============================================================================

/**
 * Trimmed string with at least one character
 */
export const NonEmptyStringSchema = z.string().trim().min(1, 'Value cannot be empty');

/**
 * Positive integer; numeric strings are accepted
 */
export const PositiveIntSchema = z.coerce.number()
  .int('Value must be an integer')
  .positive('Value must be positive');
