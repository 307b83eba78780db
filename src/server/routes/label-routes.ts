/**
 * @fileoverview Label dispatch route: generate labels for records and send them to a printer.
 */

import type { Request, Response, Router } from 'express';
import { toAppError } from '../../utils/error.utils';
import {
  RouteDependencies,
  sendActionResult,
  sendErrorResponse,
  statusForErrorCode
} from './route-helpers';

export function registerLabelRoutes(router: Router, deps: RouteDependencies): void {
  router.post('/labels/print', async (req: Request, res: Response) => {
    try {
      const result = await deps.sendLabel.execute(req.body);
      sendActionResult(res, result);
    } catch (error) {
      const appError = toAppError(error);
      sendErrorResponse(res, statusForErrorCode(appError.code), appError.message, appError.code);
    }
  });
}
