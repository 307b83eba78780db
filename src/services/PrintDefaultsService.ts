/**
 * @fileoverview Default values for the print dialog: the provider and printer preselected
 * when a user opens the label print form.
 */

import type { CatalogManager } from '../managers/CatalogManager';
import type { PrinterRecord } from '../types/print-provider';

export const DEFAULT_PARAMS = ['providerId', 'printerId'] as const;

export type DefaultParam = typeof DEFAULT_PARAMS[number];

export function isDefaultParam(value: string): value is DefaultParam {
  return DEFAULT_PARAMS.some(param => param === value);
}

/**
 * Default-flagged first, then by name; only active printers are considered
 */
function comparePrinters(a: PrinterRecord, b: PrinterRecord): number {
  if (a.isDefault !== b.isDefault) {
    return a.isDefault ? -1 : 1;
  }
  return a.name.localeCompare(b.name);
}

export class PrintDefaultsService {
  constructor(private readonly catalog: CatalogManager) {}

  /**
   * Preselected value for a form field, or an empty string when nothing qualifies
   */
  public getDefaultValue(param: DefaultParam): string {
    const provider = this.catalog.listProviders()[0];
    if (!provider) {
      return '';
    }
    if (param === 'providerId') {
      return provider.id;
    }

    const printer = this.catalog
      .listPrinters(provider.id)
      .filter(candidate => candidate.active)
      .sort(comparePrinters)[0];
    return printer ? printer.id : '';
  }
}
