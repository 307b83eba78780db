/**
 * @fileoverview Registry of print backend factories and the provider-to-backend resolver.
 *
 * Backends are registered at startup under an implementation identifier. A provider's
 * ImplementationDescriptor names the identifier; resolve() validates the descriptor, calls
 * the factory and checks the product satisfies the PrintBackend contract. Resolution is
 * performed fresh on every call.
 *
 * Every failure surfaces as PrintProviderError:
 * - PROVIDER_IMPL_MISSING: provider has no descriptor
 * - PROVIDER_IMPL_CLASS_EMPTY: descriptor identifier is blank
 * - PROVIDER_RESOLVE_FAILED: identifier not registered, or factory threw
 * - NOT_A_BACKEND: factory product lacks one of the contract operations
 */

import type { PrintBackend } from '../types/print-backend';
import type { ProviderConfig } from '../types/print-provider';
import {
  ErrorCode,
  PrintProviderError,
  providerError
} from '../utils/error.utils';
import { logError, logVerbose } from '../utils/logging';

/**
 * Zero-argument factory producing a backend instance
 */
export type BackendFactory = () => object;

const CONTRACT_OPERATIONS = ['fetchPrinters', 'generateLabel', 'sendToPrinter'] as const;

/**
 * Runtime check that a value satisfies the PrintBackend contract
 */
export function isPrintBackend(value: unknown): value is PrintBackend {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return CONTRACT_OPERATIONS.every(
    operation => operation in value && typeof Reflect.get(value, operation) === 'function'
  );
}

function typeNameOf(value: object): string {
  const name = value.constructor?.name;
  return name && name.length > 0 ? name : 'Object';
}

export class PrintBackendRegistry {
  private static instance: PrintBackendRegistry | null = null;

  private readonly factories = new Map<string, BackendFactory>();

  public static getInstance(): PrintBackendRegistry {
    if (!PrintBackendRegistry.instance) {
      PrintBackendRegistry.instance = new PrintBackendRegistry();
    }
    return PrintBackendRegistry.instance;
  }

  /**
   * Register a factory; a later registration under the same id replaces the earlier one
   */
  public register(implementationId: string, factory: BackendFactory): void {
    const key = implementationId.trim();
    if (key.length === 0) {
      throw new Error('Backend implementation id must not be blank');
    }
    this.factories.set(key, factory);
    logVerbose('BackendRegistry', `Registered backend: ${key}`);
  }

  public unregister(implementationId: string): boolean {
    return this.factories.delete(implementationId.trim());
  }

  public has(implementationId: string): boolean {
    return this.factories.has(implementationId.trim());
  }

  public getRegisteredIds(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Instantiate the backend configured for a provider
   */
  public resolve(provider: ProviderConfig): PrintBackend {
    const descriptor = provider.implementation;
    if (!descriptor) {
      throw new PrintProviderError(
        'Print provider has no backend implementation configured',
        ErrorCode.PROVIDER_IMPL_MISSING,
        { providerId: provider.id }
      );
    }

    const implementationId = descriptor.implementation.trim();
    if (implementationId.length === 0) {
      throw new PrintProviderError(
        'Print provider implementation identifier is empty',
        ErrorCode.PROVIDER_IMPL_CLASS_EMPTY,
        { providerId: provider.id, descriptorId: descriptor.id }
      );
    }

    const product = this.instantiate(provider, implementationId);

    if (!isPrintBackend(product)) {
      const typeName = typeNameOf(product);
      throw new PrintProviderError(
        `${typeName} does not implement the print backend contract`,
        ErrorCode.NOT_A_BACKEND,
        { providerId: provider.id, implementation: implementationId, typeName }
      );
    }

    return product;
  }

  private instantiate(provider: ProviderConfig, implementationId: string): object {
    const factory = this.factories.get(implementationId);
    try {
      if (!factory) {
        throw new Error(`No backend registered for implementation: ${implementationId}`);
      }
      return factory();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logError('BackendRegistry', `Failed to resolve backend ${implementationId}: ${message}`);
      throw providerError(
        `Unable to resolve print backend: ${implementationId}`,
        ErrorCode.PROVIDER_RESOLVE_FAILED,
        { providerId: provider.id, implementation: implementationId },
        error
      );
    }
  }
}

export function getPrintBackendRegistry(): PrintBackendRegistry {
  return PrintBackendRegistry.getInstance();
}
