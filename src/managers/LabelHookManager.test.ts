/**
 * @fileoverview Tests for the label hook pipeline
 */

import { describe, it, expect, jest } from '@jest/globals';
import {
  DEFAULT_HOOK_PRIORITY,
  GenerateLabelContext,
  GenerateLabelHook,
  LabelHookManager,
  hookPriority
} from './LabelHookManager';
import { ErrorCode, PrintProviderError } from '../utils/error.utils';
import type { ProviderConfig, TableRecord } from '../types/print-provider';

const provider: ProviderConfig = { id: 'p1', name: 'Cloud', implementation: null, params: [] };
const shipment: TableRecord = { id: 't1', name: 'Shipment', dbTableName: 'm_inout' };

class RecordingHook implements GenerateLabelHook {
  constructor(
    private readonly label: string,
    private readonly log: string[],
    private readonly tables: readonly string[] = ['t1'],
    public readonly priority?: number
  ) {}

  public tablesToWhichItApplies(): readonly string[] {
    return this.tables;
  }

  public execute(context: GenerateLabelContext): void {
    this.log.push(this.label);
    context.addParameter('LAST_HOOK', this.label);
  }
}

class ExplodingCheckHook implements GenerateLabelHook {
  public tablesToWhichItApplies(): readonly string[] {
    throw new Error('lookup failed');
  }

  public execute(): void {
    throw new Error('should never run');
  }
}

class CrashingHook implements GenerateLabelHook {
  public tablesToWhichItApplies(): readonly string[] {
    return ['t1'];
  }

  public async execute(): Promise<void> {
    throw new Error('missing carrier code');
  }
}

class RejectingHook implements GenerateLabelHook {
  public readonly priority = 1;

  public tablesToWhichItApplies(): readonly string[] {
    return ['t1'];
  }

  public execute(): void {
    throw new PrintProviderError('Carrier rejected the shipment');
  }
}

function contextFor(table: TableRecord | null): GenerateLabelContext {
  return new GenerateLabelContext(provider, table, 'rec-1', null, {}, { DOCUMENT_ID: 'rec-1' });
}

describe('GenerateLabelContext', () => {
  it('should add, overwrite and read parameters', () => {
    const context = contextFor(shipment);

    context.addParameter('COPIES', 2);
    context.addParameter('DOCUMENT_ID', 'override');

    expect(context.getParameter('COPIES')).toBe(2);
    expect(context.getParameters()).toEqual({ DOCUMENT_ID: 'override', COPIES: 2 });
    expect(context.getParameter('MISSING')).toBeUndefined();
  });
});

describe('LabelHookManager', () => {
  it('should use the default priority when none is declared', () => {
    expect(hookPriority(new RecordingHook('a', []))).toBe(DEFAULT_HOOK_PRIORITY);
  });

  it('should skip execution when the context has no table', async () => {
    const log: string[] = [];
    const manager = new LabelHookManager([new RecordingHook('a', log)]);

    await manager.executeHooks(contextFor(null));

    expect(log).toEqual([]);
  });

  it('should run applicable hooks by ascending priority with stable ties', async () => {
    const log: string[] = [];
    const manager = new LabelHookManager([
      new RecordingHook('late', log, ['t1'], 200),
      new RecordingHook('default-1', log),
      new RecordingHook('other-table', log, ['t9'], 1),
      new RecordingHook('early', log, ['t1'], 10),
      new RecordingHook('default-2', log)
    ]);
    const context = contextFor(shipment);

    await manager.executeHooks(context);

    expect(log).toEqual(['early', 'default-1', 'default-2', 'late']);
    expect(context.getParameter('LAST_HOOK')).toBe('late');
  });

  it('should treat zero applicable hooks as success', async () => {
    const manager = new LabelHookManager([new RecordingHook('x', [], ['t9'])]);

    await expect(manager.executeHooks(contextFor(shipment))).resolves.toBeUndefined();
  });

  it('should skip hooks whose applicability check throws', async () => {
    const log: string[] = [];
    const manager = new LabelHookManager([new ExplodingCheckHook(), new RecordingHook('ok', log)]);

    await manager.executeHooks(contextFor(shipment));

    expect(log).toEqual(['ok']);
    expect(console.warn).toHaveBeenCalledWith(
      '[Hooks]',
      'Error checking applicability of hook ExplodingCheckHook for table m_inout: lookup failed'
    );
  });

  it('should wrap unexpected failures and stop the chain', async () => {
    const log: string[] = [];
    const manager = new LabelHookManager([new CrashingHook(), new RecordingHook('after', log)]);

    const promise = manager.executeHooks(contextFor(shipment));

    await expect(promise).rejects.toBeInstanceOf(PrintProviderError);
    await expect(promise).rejects.toMatchObject({
      code: ErrorCode.HOOK_FAILED,
      message: 'Hook CrashingHook failed: missing carrier code'
    });
    expect(log).toEqual([]);
  });

  it('should propagate provider errors unchanged', async () => {
    const after = jest.fn<(context: GenerateLabelContext) => void>();
    const manager = new LabelHookManager([
      { tablesToWhichItApplies: () => ['t1'], execute: after },
      new RejectingHook()
    ]);

    await expect(manager.executeHooks(contextFor(shipment))).rejects.toMatchObject({
      code: ErrorCode.PROVIDER_ERROR,
      message: 'Carrier rejected the shipment'
    });
    expect(after).not.toHaveBeenCalled();
  });
});
