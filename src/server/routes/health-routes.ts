/**
 * @fileoverview Liveness route.
 */

import type { Request, Response, Router } from 'express';
import type { HealthResponse } from '../types/api.types';
import type { RouteDependencies } from './route-helpers';

export function registerHealthRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/health', (_req: Request, res: Response) => {
    const response: HealthResponse = {
      success: true,
      status: 'ok',
      backends: deps.registry.getRegisteredIds()
    };
    res.json(response);
  });
}
