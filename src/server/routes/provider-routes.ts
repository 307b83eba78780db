/**
 * @fileoverview Provider and printer catalog routes (list providers, list printers, refresh).
 */

import type { Request, Response, Router } from 'express';
import type { PrinterRecord, ProviderConfig } from '../../types/print-provider';
import { ErrorCode, toAppError } from '../../utils/error.utils';
import { PrinterListQuerySchema, ProviderPathSchema } from '../schemas/api.schemas';
import type {
  PrinterListResponse,
  PrinterSummary,
  ProviderListResponse,
  ProviderSummary
} from '../types/api.types';
import {
  RouteDependencies,
  sendActionResult,
  sendErrorResponse,
  sendValidationError,
  statusForErrorCode
} from './route-helpers';

function toProviderSummary(provider: ProviderConfig): ProviderSummary {
  return {
    id: provider.id,
    name: provider.name,
    implementation: provider.implementation ? provider.implementation.implementation : null,
    paramKeys: provider.params.map(param => param.searchKey)
  };
}

function toPrinterSummary(printer: PrinterRecord): PrinterSummary {
  return {
    id: printer.id,
    externalId: printer.externalId,
    name: printer.name,
    isDefault: printer.isDefault,
    active: printer.active
  };
}

export function registerProviderRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/providers', (_req: Request, res: Response) => {
    try {
      const response: ProviderListResponse = {
        success: true,
        providers: deps.catalog.listProviders().map(toProviderSummary)
      };
      res.json(response);
    } catch (error) {
      const appError = toAppError(error);
      sendErrorResponse(res, 500, appError.message, appError.code);
    }
  });

  router.get('/providers/:providerId/printers', (req: Request, res: Response) => {
    const params = ProviderPathSchema.safeParse(req.params);
    if (!params.success) {
      sendValidationError(res, params.error);
      return;
    }
    const query = PrinterListQuerySchema.safeParse(req.query);
    if (!query.success) {
      sendValidationError(res, query.error);
      return;
    }

    const provider = deps.catalog.getProvider(params.data.providerId);
    if (!provider) {
      sendErrorResponse(res, 404, 'Print provider not found', ErrorCode.NOT_FOUND);
      return;
    }

    let printers = deps.catalog.listPrinters(provider.id);
    if (query.data.active !== undefined) {
      const wanted = query.data.active === 'true';
      printers = printers.filter(printer => printer.active === wanted);
    }

    const response: PrinterListResponse = {
      success: true,
      providerId: provider.id,
      printers: printers.map(toPrinterSummary)
    };
    res.json(response);
  });

  router.post('/printers/refresh', async (req: Request, res: Response) => {
    try {
      const result = await deps.updatePrinters.execute(req.body);
      sendActionResult(res, result);
    } catch (error) {
      const appError = toAppError(error);
      sendErrorResponse(res, statusForErrorCode(appError.code), appError.message, appError.code);
    }
  });
}
