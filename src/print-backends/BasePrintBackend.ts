/**
 * @fileoverview Abstract base class for print backend implementations.
 *
 * Supplies the inert defaults of the PrintBackend contract so an implementation only
 * overrides what its provider supports:
 * - fetchPrinters(): empty list, never an error
 * - generateLabel() / sendToPrinter(): BACKEND_UNSUPPORTED AppError, which is not a
 *   PrintProviderError and so stays distinguishable from provider failures
 */

import type { PrintBackend, RequestParameters } from '../types/print-backend';
import type {
  PrinterRecord,
  ProviderConfig,
  RemotePrinter,
  TableRecord,
  TemplateLineRecord
} from '../types/print-provider';
import { unsupportedOperationError } from '../utils/error.utils';

export abstract class BasePrintBackend implements PrintBackend {
  /**
   * Name used in log lines and unsupported-operation messages
   */
  protected get backendName(): string {
    return this.constructor.name;
  }

  public async fetchPrinters(_provider: ProviderConfig): Promise<readonly RemotePrinter[]> {
    return [];
  }

  public async generateLabel(
    _provider: ProviderConfig,
    _table: TableRecord,
    _recordId: string,
    _templateLine: TemplateLineRecord | null,
    _params: RequestParameters
  ): Promise<string> {
    throw unsupportedOperationError('generateLabel', this.backendName);
  }

  public async sendToPrinter(
    _provider: ProviderConfig,
    _printer: PrinterRecord,
    _copies: number,
    _file: string
  ): Promise<string> {
    throw unsupportedOperationError('sendToPrinter', this.backendName);
  }
}
