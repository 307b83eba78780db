/**
 * @fileoverview Builders turning outcomes and thrown errors into ActionResult values.
 */

import type { ActionResult } from '../types/print-backend';
import { ErrorCode, isAppError, isPrintProviderError } from '../utils/error.utils';

export function success(message: string, extra: Omit<ActionResult, 'type' | 'message'> = {}): ActionResult {
  return { ...extra, type: 'success', message };
}

export function warning(message: string, extra: Omit<ActionResult, 'type' | 'message'> = {}): ActionResult {
  return { ...extra, type: 'warning', message };
}

export function fail(message: string, errorCode: ErrorCode = ErrorCode.UNKNOWN): ActionResult {
  return { type: 'error', message, errorCode };
}

/**
 * Error result for a caught failure; provider failures carry a distinguishing prefix
 */
export function failFromError(error: unknown): ActionResult {
  if (isPrintProviderError(error)) {
    return fail(`Print provider error: ${error.message}`, error.code);
  }
  if (isAppError(error)) {
    return fail(error.message, error.code);
  }
  return fail(error instanceof Error ? error.message : String(error));
}
