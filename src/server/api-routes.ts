/**
 * @fileoverview Express router composition for the print API.
 *
 * Actions and services are built once from the core collaborators and passed to each route
 * module's registration helper.
 */

import { Router } from 'express';
import { SendLabelToPrinterAction } from '../actions/SendLabelToPrinterAction';
import { UpdatePrintersAction } from '../actions/UpdatePrintersAction';
import type { CatalogManager } from '../managers/CatalogManager';
import type { PrintBackendRegistry } from '../managers/PrintBackendRegistry';
import type { TemplateManager } from '../managers/TemplateManager';
import { PrintDefaultsService } from '../services/PrintDefaultsService';
import { registerDefaultsRoutes } from './routes/defaults-routes';
import { registerHealthRoutes } from './routes/health-routes';
import { registerLabelRoutes } from './routes/label-routes';
import { registerProviderRoutes } from './routes/provider-routes';
import type { RouteDependencies } from './routes/route-helpers';

/**
 * Core collaborators the API is built from
 */
export interface PrintApiDependencies {
  readonly catalog: CatalogManager;
  readonly registry: PrintBackendRegistry;
  readonly templateManager: TemplateManager;
}

export function buildRouteDependencies(core: PrintApiDependencies): RouteDependencies {
  return {
    catalog: core.catalog,
    registry: core.registry,
    defaults: new PrintDefaultsService(core.catalog),
    updatePrinters: new UpdatePrintersAction(core),
    sendLabel: new SendLabelToPrinterAction(core)
  };
}

export function createAPIRoutes(deps: RouteDependencies): Router {
  const router = Router();

  registerHealthRoutes(router, deps);
  registerProviderRoutes(router, deps);
  registerLabelRoutes(router, deps);
  registerDefaultsRoutes(router, deps);

  return router;
}
