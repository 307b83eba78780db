/**
 * @fileoverview Print dialog default values.
 */

import type { Request, Response, Router } from 'express';
import { DefaultParamPathSchema } from '../schemas/api.schemas';
import type { DefaultValueResponse } from '../types/api.types';
import { RouteDependencies, sendValidationError } from './route-helpers';

export function registerDefaultsRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/defaults/:param', (req: Request, res: Response) => {
    const validation = DefaultParamPathSchema.safeParse(req.params);
    if (!validation.success) {
      sendValidationError(res, validation.error);
      return;
    }

    const { param } = validation.data;
    const response: DefaultValueResponse = {
      success: true,
      param,
      value: deps.defaults.getDefaultValue(param)
    };
    res.json(response);
  });
}
