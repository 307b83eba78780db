/**
 * @fileoverview Tests for the printer catalog refresh action
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { UpdatePrintersAction } from './UpdatePrintersAction';
import { CatalogManager } from '../managers/CatalogManager';
import { PrintBackendRegistry } from '../managers/PrintBackendRegistry';
import { BasePrintBackend } from '../print-backends/BasePrintBackend';
import type { ProviderConfig, RemotePrinter } from '../types/print-provider';
import { ErrorCode, PrintProviderError } from '../utils/error.utils';

class ListBackend extends BasePrintBackend {
  constructor(private readonly list: readonly RemotePrinter[] | Error) {
    super();
  }

  public override async fetchPrinters(_provider: ProviderConfig): Promise<readonly RemotePrinter[]> {
    if (this.list instanceof Error) {
      throw this.list;
    }
    return this.list;
  }
}

describe('UpdatePrintersAction', () => {
  let catalog: CatalogManager;
  let registry: PrintBackendRegistry;
  let action: UpdatePrintersAction;

  beforeEach(() => {
    catalog = CatalogManager.fromDocument({
      providers: [
        { id: 'p1', name: 'Cloud', implementation: { id: 'i1', name: 'List', implementation: 'list' } },
        { id: 'p2', name: 'Bare' }
      ],
      printers: [
        { id: 'l1', externalId: '1', name: 'Dock', providerId: 'p1' },
        { id: 'l2', externalId: '2', name: 'Office', providerId: 'p1' }
      ]
    });
    registry = new PrintBackendRegistry();
    action = new UpdatePrintersAction({ catalog, registry });
  });

  it('should reconcile and persist the remote list', async () => {
    registry.register('list', () => new ListBackend([
      { id: '1', name: 'Dock A', isDefault: true },
      { id: '3', name: 'Warehouse', isDefault: false }
    ]));

    const result = await action.execute({ providerId: 'p1' });

    expect(result).toEqual({
      type: 'success',
      message: 'Printers updated: 1 created, 1 updated, 1 inactivated',
      counters: { created: 1, updated: 1, inactivated: 1 }
    });
    expect(catalog.hasPendingChanges()).toBe(false);
    expect(catalog.getPrinter('l2')?.active).toBe(false);
  });

  it('should reject a missing provider id', async () => {
    await expect(action.execute({})).resolves.toEqual({
      type: 'error',
      message: 'providerId: Required',
      errorCode: ErrorCode.VALIDATION
    });
    await expect(action.execute({ providerId: '  ' })).resolves.toMatchObject({
      message: 'providerId: Value cannot be empty'
    });
  });

  it('should report an unknown provider', async () => {
    await expect(action.execute({ providerId: 'nope' })).resolves.toEqual({
      type: 'error',
      message: 'Print provider not found',
      errorCode: ErrorCode.NOT_FOUND
    });
  });

  it('should prefix resolver failures as provider errors', async () => {
    await expect(action.execute({ providerId: 'p2' })).resolves.toEqual({
      type: 'error',
      message: 'Print provider error: Print provider has no backend implementation configured',
      errorCode: ErrorCode.PROVIDER_IMPL_MISSING
    });
  });

  it('should roll back uncommitted changes when the backend fails', async () => {
    registry.register('list', () => new ListBackend(new PrintProviderError('Printer list request failed with status 401: denied')));
    catalog.savePrinter({ id: 'l1', externalId: '1', name: 'Scratch', isDefault: false, providerId: 'p1', active: true });

    const result = await action.execute({ providerId: 'p1' });

    expect(result).toEqual({
      type: 'error',
      message: 'Print provider error: Printer list request failed with status 401: denied',
      errorCode: ErrorCode.PROVIDER_ERROR
    });
    expect(catalog.getPrinter('l1')?.name).toBe('Dock');
    expect(catalog.hasPendingChanges()).toBe(false);
  });

  it('should report plain errors without the provider prefix', async () => {
    registry.register('list', () => new ListBackend(new Error('socket closed')));

    await expect(action.execute({ providerId: 'p1' })).resolves.toEqual({
      type: 'error',
      message: 'socket closed',
      errorCode: ErrorCode.UNKNOWN
    });
  });

  it('should keep a successful refresh when a concurrent one fails', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'refresh-test-'));
    const filePath = path.join(tempDir, 'catalog.json');
    fs.writeFileSync(filePath, JSON.stringify({
      providers: [
        { id: 'p1', name: 'Cloud', implementation: { id: 'i1', name: 'List', implementation: 'list' } },
        { id: 'p2', name: 'Backup', implementation: { id: 'i2', name: 'Down', implementation: 'down' } }
      ]
    }));

    try {
      const fileCatalog = new CatalogManager(filePath);
      registry.register('list', () => new ListBackend([{ id: '7', name: 'Dock', isDefault: true }]));
      registry.register('down', () => new ListBackend(new Error('connection refused')));
      const fileAction = new UpdatePrintersAction({ catalog: fileCatalog, registry });

      const first = fileAction.execute({ providerId: 'p1' });
      await new Promise(resolve => setImmediate(resolve));
      const second = fileAction.execute({ providerId: 'p2' });

      await expect(first).resolves.toMatchObject({ type: 'success' });
      await expect(second).resolves.toMatchObject({ type: 'error', message: 'connection refused' });

      expect(fileCatalog.listPrinters('p1').map(p => p.externalId)).toEqual(['7']);
      expect(new CatalogManager(filePath).listPrinters('p1').map(p => p.externalId)).toEqual(['7']);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});
