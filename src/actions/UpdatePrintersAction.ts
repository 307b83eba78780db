/**
 * @fileoverview Refreshes the local printer catalog of one provider from its backend.
 *
 * Flow: validate request, then inside one catalog transaction load provider, resolve backend,
 * fetch the remote list and reconcile. The transaction flushes on success and rolls back on
 * any failure, which yields an error result; execute() never throws.
 */

import { z } from 'zod';
import { failFromError, fail, success } from './action-results';
import type { CatalogManager } from '../managers/CatalogManager';
import type { PrintBackendRegistry } from '../managers/PrintBackendRegistry';
import { PrinterReconciliationService } from '../services/PrinterReconciliationService';
import type { ActionResult } from '../types/print-backend';
import { requireProvider } from '../utils/PrinterUtils';
import { logError, logInfo, logVerbose } from '../utils/logging';
import { NonEmptyStringSchema, validate } from '../utils/validation.utils';

export const UpdatePrintersRequestSchema = z.object({
  providerId: NonEmptyStringSchema
});

export type UpdatePrintersRequest = z.infer<typeof UpdatePrintersRequestSchema>;

export interface UpdatePrintersDependencies {
  readonly catalog: CatalogManager;
  readonly registry: PrintBackendRegistry;
}

export class UpdatePrintersAction {
  private readonly catalog: CatalogManager;
  private readonly registry: PrintBackendRegistry;
  private readonly reconciliation: PrinterReconciliationService;

  constructor(dependencies: UpdatePrintersDependencies) {
    this.catalog = dependencies.catalog;
    this.registry = dependencies.registry;
    this.reconciliation = new PrinterReconciliationService(dependencies.catalog);
  }

  public async execute(request: unknown): Promise<ActionResult> {
    logVerbose('UpdatePrinters', 'Updating printers process started');

    const validation = validate(UpdatePrintersRequestSchema, request);
    if (!validation.success) {
      return fail(validation.error.message, validation.error.code);
    }
    const { providerId } = validation.data;

    try {
      const { provider, counters } = await this.catalog.transaction(async () => {
        const provider = requireProvider(this.catalog, providerId);
        const backend = this.registry.resolve(provider);

        const remote = await backend.fetchPrinters(provider);
        return { provider, counters: this.reconciliation.reconcile(provider, remote) };
      });

      const message =
        `Printers updated: ${counters.created} created, ${counters.updated} updated, ${counters.inactivated} inactivated`;
      logInfo('UpdatePrinters', `${provider.name}: ${message}`);
      return success(message, { counters });
    } catch (error) {
      logError('UpdatePrinters', 'Printer update failed:', error);
      return failFromError(error);
    }
  }
}
