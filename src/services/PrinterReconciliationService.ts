/**
 * @fileoverview Reconciles a backend's printer list against the local catalog for one provider.
 *
 * Full-replace semantics:
 * - unknown external id: a new active printer record is created
 * - known external id: name and default flag are overwritten unconditionally and the record
 *   is reactivated
 * - local printers of the provider missing from the list and still active are deactivated
 *
 * An empty remote list therefore deactivates every active printer of the provider. Changes go
 * to the catalog working set; the caller flushes or rolls back.
 */

import type { CatalogManager } from '../managers/CatalogManager';
import type { ReconcileCounters } from '../types/print-backend';
import type { ProviderConfig, RemotePrinter } from '../types/print-provider';
import { logVerbose } from '../utils/logging';

export class PrinterReconciliationService {
  constructor(private readonly catalog: CatalogManager) {}

  public reconcile(provider: ProviderConfig, remotePrinters: readonly RemotePrinter[]): ReconcileCounters {
    const seen = new Set<string>();
    let created = 0;
    let updated = 0;
    let inactivated = 0;

    for (const remote of remotePrinters) {
      seen.add(remote.id);

      const existing = this.catalog.findPrinter(provider.id, remote.id);
      if (!existing) {
        this.catalog.createPrinter({
          externalId: remote.id,
          name: remote.name,
          isDefault: remote.isDefault,
          providerId: provider.id,
          active: true
        });
        created++;
      } else {
        this.catalog.savePrinter({
          ...existing,
          name: remote.name,
          isDefault: remote.isDefault,
          active: true
        });
        updated++;
      }
    }

    for (const printer of this.catalog.listPrinters(provider.id)) {
      if (!seen.has(printer.externalId) && printer.active) {
        this.catalog.savePrinter({ ...printer, active: false });
        inactivated++;
      }
    }

    logVerbose(
      'Reconcile',
      `Provider ${provider.id}: ${created} created, ${updated} updated, ${inactivated} inactivated`
    );
    return { created, updated, inactivated };
  }
}
