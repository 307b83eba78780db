/**
 * @fileoverview Tests for backend registration and provider resolution
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { PrintBackendRegistry, isPrintBackend } from './PrintBackendRegistry';
import { BasePrintBackend } from '../print-backends/BasePrintBackend';
import { ErrorCode, PrintProviderError } from '../utils/error.utils';
import type { ImplementationDescriptor, ProviderConfig } from '../types/print-provider';

class NullBackend extends BasePrintBackend {}

class NotABackend {
  public fetchPrinters(): string[] {
    return [];
  }
}

function providerWith(implementation: ImplementationDescriptor | null): ProviderConfig {
  return { id: 'p1', name: 'Provider', implementation, params: [] };
}

function descriptor(implementation: string): ImplementationDescriptor {
  return { id: 'impl', name: 'Impl', implementation };
}

function resolveError(registry: PrintBackendRegistry, provider: ProviderConfig): PrintProviderError {
  try {
    registry.resolve(provider);
  } catch (error) {
    if (error instanceof PrintProviderError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected resolve to fail');
}

describe('PrintBackendRegistry', () => {
  let registry: PrintBackendRegistry;

  beforeEach(() => {
    registry = new PrintBackendRegistry();
    registry.register('null', () => new NullBackend());
    registry.register('wrong', () => new NotABackend());
    registry.register('broken', () => {
      throw new Error('constructor exploded');
    });
  });

  describe('registration', () => {
    it('should track registered ids', () => {
      expect(registry.getRegisteredIds()).toEqual(['null', 'wrong', 'broken']);
      expect(registry.has('null')).toBe(true);
      expect(registry.unregister('null')).toBe(true);
      expect(registry.has('null')).toBe(false);
    });

    it('should reject blank ids', () => {
      expect(() => registry.register('  ', () => new NullBackend())).toThrow('must not be blank');
    });
  });

  describe('resolve', () => {
    it('should return a fresh backend per call', () => {
      const provider = providerWith(descriptor('null'));

      const first = registry.resolve(provider);
      const second = registry.resolve(provider);

      expect(first).toBeInstanceOf(NullBackend);
      expect(first).not.toBe(second);
    });

    it('should trim the implementation identifier', () => {
      expect(registry.resolve(providerWith(descriptor(' null ')))).toBeInstanceOf(NullBackend);
    });

    it('should fail without a descriptor', () => {
      expect(resolveError(registry, providerWith(null)).code).toBe(ErrorCode.PROVIDER_IMPL_MISSING);
    });

    it('should fail with a blank identifier', () => {
      expect(resolveError(registry, providerWith(descriptor('   '))).code).toBe(ErrorCode.PROVIDER_IMPL_CLASS_EMPTY);
    });

    it('should report unknown identifiers as resolution failures', () => {
      const error = resolveError(registry, providerWith(descriptor('missing')));

      expect(error.code).toBe(ErrorCode.PROVIDER_RESOLVE_FAILED);
      expect(error.message).toBe('Unable to resolve print backend: missing');
      expect(error.originalError?.message).toBe('No backend registered for implementation: missing');
    });

    it('should wrap factory failures', () => {
      const error = resolveError(registry, providerWith(descriptor('broken')));

      expect(error.code).toBe(ErrorCode.PROVIDER_RESOLVE_FAILED);
      expect(error.originalError?.message).toBe('constructor exploded');
    });

    it('should name the type that is not a backend', () => {
      const error = resolveError(registry, providerWith(descriptor('wrong')));

      expect(error.code).toBe(ErrorCode.NOT_A_BACKEND);
      expect(error.message).toBe('NotABackend does not implement the print backend contract');
      expect(error.context?.typeName).toBe('NotABackend');
    });
  });

  it('isPrintBackend should check all three operations', () => {
    expect(isPrintBackend(new NullBackend())).toBe(true);
    expect(isPrintBackend(new NotABackend())).toBe(false);
    expect(isPrintBackend({ fetchPrinters: 1, generateLabel: () => '', sendToPrinter: () => '' })).toBe(false);
    expect(isPrintBackend(null)).toBe(false);
  });
});
