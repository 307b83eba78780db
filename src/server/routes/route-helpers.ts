/**
 * @fileoverview Shared helpers and dependency contracts for print API route modules.
 *
 * Centralizes the mapping from error codes and action results to HTTP status codes so the
 * route modules stay focused on their own endpoints:
 * - success and warning results: 200
 * - VALIDATION: 400
 * - NOT_FOUND: 404
 * - anything else: 500
 */

import type { Response } from 'express';
import type { ZodError } from 'zod';
import type { SendLabelToPrinterAction } from '../../actions/SendLabelToPrinterAction';
import type { UpdatePrintersAction } from '../../actions/UpdatePrintersAction';
import type { CatalogManager } from '../../managers/CatalogManager';
import type { PrintBackendRegistry } from '../../managers/PrintBackendRegistry';
import type { PrintDefaultsService } from '../../services/PrintDefaultsService';
import type { ActionResult } from '../../types/print-backend';
import { ErrorCode, fromZodError } from '../../utils/error.utils';
import type { ActionResponse, StandardAPIResponse } from '../types/api.types';

/**
 * Collaborators shared across route modules
 */
export interface RouteDependencies {
  readonly catalog: CatalogManager;
  readonly registry: PrintBackendRegistry;
  readonly defaults: PrintDefaultsService;
  readonly updatePrinters: UpdatePrintersAction;
  readonly sendLabel: SendLabelToPrinterAction;
}

export function statusForErrorCode(code: string | undefined): number {
  switch (code) {
    case ErrorCode.VALIDATION:
      return 400;
    case ErrorCode.NOT_FOUND:
      return 404;
    default:
      return 500;
  }
}

/**
 * Convenience helper for returning standardized error payloads from modules
 */
export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  errorCode?: string
): void {
  const payload: StandardAPIResponse = {
    success: false,
    error: message,
    ...(errorCode ? { errorCode } : {})
  };
  res.status(statusCode).json(payload);
}

/**
 * 400 response describing the first failing field
 */
export function sendValidationError(res: Response, error: ZodError): void {
  const appError = fromZodError(error);
  sendErrorResponse(res, 400, appError.message, appError.code);
}

export function sendActionResult(res: Response, result: ActionResult): void {
  if (result.type === 'error') {
    const payload: ActionResponse = {
      success: false,
      type: result.type,
      error: result.message,
      errorCode: result.errorCode
    };
    res.status(statusForErrorCode(result.errorCode)).json(payload);
    return;
  }

  const payload: ActionResponse = {
    success: true,
    type: result.type,
    message: result.message,
    jobIds: result.jobIds,
    counters: result.counters
  };
  res.json(payload);
}
