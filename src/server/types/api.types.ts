/**
 * @fileoverview Response payloads of the print API.
 *
 * Every response carries `success`; failures add `error` (a message) and, where one applies,
 * `errorCode`. Provider parameter contents (API keys, endpoints) are never serialized, only
 * their keys.
 */

import type { ActionResultType, ReconcileCounters } from '../../types/print-backend';

/**
 * Standard API response
 */
export interface StandardAPIResponse {
  readonly success: boolean;
  readonly message?: string;
  readonly error?: string;
  readonly errorCode?: string;
}

export interface HealthResponse extends StandardAPIResponse {
  readonly status: 'ok';
  readonly backends: readonly string[];
}

export interface ProviderSummary {
  readonly id: string;
  readonly name: string;
  /** Backend implementation identifier, null when none is configured */
  readonly implementation: string | null;
  readonly paramKeys: readonly string[];
}

export interface ProviderListResponse extends StandardAPIResponse {
  readonly providers: readonly ProviderSummary[];
}

export interface PrinterSummary {
  readonly id: string;
  readonly externalId: string;
  readonly name: string;
  readonly isDefault: boolean;
  readonly active: boolean;
}

export interface PrinterListResponse extends StandardAPIResponse {
  readonly providerId: string;
  readonly printers: readonly PrinterSummary[];
}

/**
 * Dispatch action outcome as returned over HTTP
 */
export interface ActionResponse extends StandardAPIResponse {
  readonly type: ActionResultType;
  readonly jobIds?: readonly string[];
  readonly counters?: ReconcileCounters;
}

export interface DefaultValueResponse extends StandardAPIResponse {
  readonly param: string;
  readonly value: string;
}
