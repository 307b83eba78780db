/**
 * @fileoverview Tests for printer reconciliation
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { CatalogManager } from '../managers/CatalogManager';
import { PrinterReconciliationService } from './PrinterReconciliationService';
import type { ProviderConfig, RemotePrinter } from '../types/print-provider';

const provider: ProviderConfig = { id: 'p1', name: 'Cloud', implementation: null, params: [] };

function remote(id: string, name: string, isDefault = false): RemotePrinter {
  return { id, name, isDefault };
}

describe('PrinterReconciliationService', () => {
  let catalog: CatalogManager;
  let service: PrinterReconciliationService;

  beforeEach(() => {
    catalog = CatalogManager.fromDocument({
      providers: [{ id: 'p1', name: 'Cloud' }, { id: 'p2', name: 'Other' }],
      printers: [
        { id: 'l1', externalId: '1', name: 'Dock', isDefault: true, providerId: 'p1', active: true },
        { id: 'l2', externalId: '2', name: 'Office', providerId: 'p1', active: true },
        { id: 'l3', externalId: '3', name: 'Retired', providerId: 'p1', active: false },
        { id: 'l9', externalId: '9', name: 'Elsewhere', providerId: 'p2', active: true }
      ]
    });
    service = new PrinterReconciliationService(catalog);
  });

  it('should create, update and inactivate in one pass', () => {
    const counters = service.reconcile(provider, [
      remote('1', 'Dock A', false),
      remote('4', 'Warehouse', true)
    ]);

    expect(counters).toEqual({ created: 1, updated: 1, inactivated: 1 });

    expect(catalog.getPrinter('l1')).toMatchObject({ name: 'Dock A', isDefault: false, active: true });
    expect(catalog.getPrinter('l2')?.active).toBe(false);
    expect(catalog.getPrinter('l3')?.active).toBe(false);

    const created = catalog.findPrinter('p1', '4');
    expect(created).toMatchObject({ name: 'Warehouse', isDefault: true, providerId: 'p1', active: true });
  });

  it('should leave other providers untouched', () => {
    service.reconcile(provider, []);

    expect(catalog.getPrinter('l9')?.active).toBe(true);
  });

  it('should deactivate every active printer on an empty list', () => {
    expect(service.reconcile(provider, [])).toEqual({ created: 0, updated: 0, inactivated: 2 });
    expect(catalog.listPrinters('p1').every(p => !p.active)).toBe(true);
  });

  it('should reactivate a returning printer and count it as updated', () => {
    const counters = service.reconcile(provider, [remote('3', 'Back again')]);

    expect(counters).toEqual({ created: 0, updated: 1, inactivated: 2 });
    expect(catalog.getPrinter('l3')).toMatchObject({ name: 'Back again', active: true });
    expect(catalog.findPrinter('p1', '3')?.id).toBe('l3');
  });

  it('should be stable when the same list is applied twice', () => {
    const list = [remote('1', 'Dock'), remote('2', 'Office'), remote('5', 'New')];

    service.reconcile(provider, list);
    const before = catalog.toDocument();
    const second = service.reconcile(provider, list);

    expect(second).toEqual({ created: 0, updated: 3, inactivated: 0 });
    expect(catalog.toDocument()).toEqual(before);
  });

  it('should leave persistence to the caller', () => {
    service.reconcile(provider, [remote('7', 'Fresh')]);
    expect(catalog.hasPendingChanges()).toBe(true);

    catalog.rollback();

    expect(catalog.findPrinter('p1', '7')).toBeNull();
  });
});
