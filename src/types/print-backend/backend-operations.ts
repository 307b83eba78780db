/**
 * @fileoverview Print backend contract and the result types flowing through label dispatch.
 *
 * Every backend implementation satisfies PrintBackend. Operations are asynchronous since
 * transports are non-blocking; callers await each operation before starting the next.
 *
 * Key exports:
 * - PrintBackend: the three-operation capability contract
 * - ReportParameterValue / ReportParameters: values handed to the label renderer
 * - ReconcileCounters: outcome of one printer reconciliation
 * - ActionResult: user-facing outcome of a dispatch action
 */

import type {
  PrinterRecord,
  ProviderConfig,
  RemotePrinter,
  TableRecord,
  TemplateLineRecord
} from '../print-provider';

/**
 * Scalar value a report parameter may hold
 */
export type ReportParameterValue = string | number | boolean | null;

export type ReportParameters = Readonly<Record<string, ReportParameterValue>>;

/**
 * Request parameters passed through from the caller, read-only for backends and hooks
 */
export type RequestParameters = Readonly<Record<string, unknown>>;

export interface PrintBackend {
  /**
   * Authenticate with the provider's parameters and return the current device list
   */
  fetchPrinters(provider: ProviderConfig): Promise<readonly RemotePrinter[]>;

  /**
   * Render one label and return the path of the produced artifact
   */
  generateLabel(
    provider: ProviderConfig,
    table: TableRecord,
    recordId: string,
    templateLine: TemplateLineRecord | null,
    params: RequestParameters
  ): Promise<string>;

  /**
   * Submit an artifact and return the backend job id (or a short non-empty fallback)
   */
  sendToPrinter(
    provider: ProviderConfig,
    printer: PrinterRecord,
    copies: number,
    file: string
  ): Promise<string>;
}

/**
 * Counters produced by printer reconciliation
 */
export interface ReconcileCounters {
  readonly created: number;
  readonly updated: number;
  readonly inactivated: number;
}

export type ActionResultType = 'success' | 'warning' | 'error';

/**
 * Outcome of a dispatch action; actions never throw
 */
export interface ActionResult {
  readonly type: ActionResultType;
  readonly message: string;
  readonly errorCode?: string;
  readonly jobIds?: readonly string[];
  readonly counters?: ReconcileCounters;
}
