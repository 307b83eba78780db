/**
 * @fileoverview Structured error handling with typed error codes and contextual metadata.
 *
 * Two error kinds flow through the application:
 * - AppError: host-level errors (lookups that find nothing, invalid request parameters,
 *   configuration and catalog persistence problems)
 * - PrintProviderError: the distinguished error of the print provider core. Backend
 *   resolution, template location, transport, rendering and hook failures all surface as
 *   this kind, carrying a readable message and the wrapped original error when there is one.
 *
 * A backend operation that an implementation does not provide raises an AppError with
 * BACKEND_UNSUPPORTED, which callers can tell apart from a provider failure.
 *
 * Key exports:
 * - ErrorCode enumeration
 * - AppError / PrintProviderError classes
 * - Factories: fromZodError, notFoundError, validationError, providerError,
 *   unsupportedOperationError
 * - Helpers: isAppError, isPrintProviderError, toAppError, toError
 */

import { ZodError } from 'zod';

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  VALIDATION = 'VALIDATION',
  NOT_FOUND = 'NOT_FOUND',
  NETWORK = 'NETWORK',
  TIMEOUT = 'TIMEOUT',

  // Provider errors
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  PROVIDER_IMPL_MISSING = 'PROVIDER_IMPL_MISSING',
  PROVIDER_IMPL_CLASS_EMPTY = 'PROVIDER_IMPL_CLASS_EMPTY',
  PROVIDER_RESOLVE_FAILED = 'PROVIDER_RESOLVE_FAILED',
  NOT_A_BACKEND = 'NOT_A_BACKEND',

  // Backend errors
  BACKEND_UNSUPPORTED = 'BACKEND_UNSUPPORTED',

  // Template errors
  PRINT_LOCATION_NOT_FOUND = 'PRINT_LOCATION_NOT_FOUND',
  EMPTY_TEMPLATE_LOCATION = 'EMPTY_TEMPLATE_LOCATION',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  UNSUPPORTED_TEMPLATE_EXTENSION = 'UNSUPPORTED_TEMPLATE_EXTENSION',
  TEMPLATE_COMPILE_FAILED = 'TEMPLATE_COMPILE_FAILED',

  // Dispatch errors
  PRINT_JOBS_FAILED = 'PRINT_JOBS_FAILED',

  // Hook errors
  HOOK_FAILED = 'HOOK_FAILED',

  // Configuration errors
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Catalog errors
  CATALOG_LOAD_FAILED = 'CATALOG_LOAD_FAILED',
  CATALOG_SAVE_FAILED = 'CATALOG_SAVE_FAILED'
}

// ============================================================================
// CUSTOM ERROR CLASSES
// ============================================================================

/**
 * Enhanced error class with structured context
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly originalError?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.originalError = originalError;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Convert to plain object for serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError ? {
        name: this.originalError.name,
        message: this.originalError.message,
        stack: this.originalError.stack
      } : undefined
    };
  }

  /**
   * Get user-friendly error message
   */
  public getUserMessage(): string {
    switch (this.code) {
      case ErrorCode.PROVIDER_IMPL_MISSING:
      case ErrorCode.PROVIDER_IMPL_CLASS_EMPTY:
        return 'The print provider has no backend implementation configured';
      case ErrorCode.BACKEND_UNSUPPORTED:
        return 'The configured print backend does not support this operation';
      case ErrorCode.NETWORK:
        return 'Network error. Please check the print provider endpoint';
      case ErrorCode.TIMEOUT:
        return 'The print provider did not answer in time. Please try again';
      case ErrorCode.CONFIG_INVALID:
        return 'Configuration is invalid. Please check your settings';
      default:
        return this.message || 'An unexpected error occurred';
    }
  }
}

/**
 * Error raised by the print provider core
 */
export class PrintProviderError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PROVIDER_ERROR,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, code, context, originalError);
    this.name = 'PrintProviderError';
  }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create error from Zod validation error
 */
export function fromZodError(error: ZodError, code: ErrorCode = ErrorCode.VALIDATION): AppError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code
  }));

  const first = error.issues[0];
  const message = first
    ? (first.path.length > 0 ? `${first.path.join('.')}: ${first.message}` : first.message)
    : 'Validation failed';

  return new AppError(message, code, { issues }, error);
}

/**
 * Create host-level "not found" error
 */
export function notFoundError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.NOT_FOUND, context);
}

/**
 * Create host-level parameter validation error
 */
export function validationError(message: string, context?: Record<string, unknown>): AppError {
  return new AppError(message, ErrorCode.VALIDATION, context);
}

/**
 * Create print provider error wrapping an underlying failure
 */
export function providerError(
  message: string,
  code: ErrorCode = ErrorCode.PROVIDER_ERROR,
  context?: Record<string, unknown>,
  cause?: unknown
): PrintProviderError {
  return new PrintProviderError(message, code, context, cause === undefined ? undefined : toError(cause));
}

/**
 * Create error for a backend operation the implementation does not provide
 */
export function unsupportedOperationError(operation: string, backendName: string): AppError {
  return new AppError(
    `${operation} not implemented by ${backendName}`,
    ErrorCode.BACKEND_UNSUPPORTED,
    { operation, backend: backendName }
  );
}

// ============================================================================
// ERROR HANDLING UTILITIES
// ============================================================================

/**
 * Check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Check if error is the print provider error kind
 */
export function isPrintProviderError(error: unknown): error is PrintProviderError {
  return error instanceof PrintProviderError;
}

/**
 * Normalize any thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === 'string' ? error : String(error));
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown, defaultCode: ErrorCode = ErrorCode.UNKNOWN): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  if (error instanceof Error) {
    return new AppError(
      error.message,
      defaultCode,
      undefined,
      error
    );
  }

  if (typeof error === 'string') {
    return new AppError(error, defaultCode);
  }

  return new AppError(
    'An unknown error occurred',
    defaultCode,
    { error }
  );
}
