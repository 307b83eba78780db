/**
 * @fileoverview Catalog record types for print providers, printers, tables and label templates.
 *
 * These records are read by the dispatch core and persisted by CatalogManager. Providers and
 * templates are administered outside the core; printers are created, updated and deactivated
 * only by printer reconciliation.
 *
 * @module types/print-provider
 */

/**
 * Names the backend implementation a provider uses. `implementation` is the identifier a
 * backend factory is registered under (e.g. `printnode`).
 */
export interface ImplementationDescriptor {
  readonly id: string;
  readonly name: string;
  readonly implementation: string;
}

/**
 * Named provider parameter (endpoint URLs, API keys). Keys match case-insensitively.
 */
export interface ProviderParam {
  readonly searchKey: string;
  readonly content: string;
}

export interface ProviderConfig {
  readonly id: string;
  readonly name: string;
  readonly implementation: ImplementationDescriptor | null;
  readonly params: readonly ProviderParam[];
}

/**
 * Local printer record; natural key is (providerId, externalId)
 */
export interface PrinterRecord {
  readonly id: string;
  readonly externalId: string;
  readonly name: string;
  readonly isDefault: boolean;
  readonly providerId: string;
  readonly active: boolean;
}

export type NewPrinterRecord = Omit<PrinterRecord, 'id'>;

/**
 * Device as reported by a backend; built fresh per fetch and never persisted directly
 */
export interface RemotePrinter {
  readonly id: string;
  readonly name: string;
  readonly isDefault: boolean;
}

export interface TableRecord {
  readonly id: string;
  /** Entity name callers use to address the table */
  readonly name: string;
  readonly dbTableName: string;
}

export interface TemplateRecord {
  readonly id: string;
  readonly tableId: string;
  readonly name: string;
}

export interface TemplateLineRecord {
  readonly id: string;
  readonly templateId: string;
  readonly templateLocation: string;
  readonly isDefault: boolean;
  readonly lineNo: number;
}
