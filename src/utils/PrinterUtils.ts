/**
 * @fileoverview Host-level catalog lookups and provider parameter helpers used by the
 * dispatch actions and backends.
 *
 * Every helper here raises the host error kind (AppError) rather than PrintProviderError:
 * - requireProvider / requirePrinter / requireTableByName: NOT_FOUND when the record is missing
 * - getRequiredParam: CONFIG_INVALID when the provider lacks the parameter
 * - requireParamContent: CONFIG_INVALID when the parameter has blank content
 *
 * Parameter keys match case-insensitively.
 */

import type { CatalogManager } from '../managers/CatalogManager';
import type {
  PrinterRecord,
  ProviderConfig,
  ProviderParam,
  TableRecord
} from '../types/print-provider';
import { AppError, ErrorCode, notFoundError } from './error.utils';

// Well-known provider parameter keys
export const PRINTERS_URL = 'printersurl';
export const API_KEY = 'apikey';
export const PRINTJOB_URL = 'printjoburl';

export const isBlank = (value: string | null | undefined): boolean =>
  value === null || value === undefined || value.trim().length === 0;

export const requireProvider = (catalog: CatalogManager, providerId: string): ProviderConfig => {
  const provider = catalog.getProvider(providerId);
  if (!provider) {
    throw notFoundError('Print provider not found', { providerId });
  }
  return provider;
};

export const requirePrinter = (catalog: CatalogManager, printerId: string): PrinterRecord => {
  const printer = catalog.getPrinter(printerId);
  if (!printer) {
    throw notFoundError(`Printer not found: ${printerId}`, { printerId });
  }
  return printer;
};

export const requireTableByName = (catalog: CatalogManager, entityName: string): TableRecord => {
  const table = catalog.findTableByName(entityName);
  if (!table) {
    throw notFoundError(`Table not found: ${entityName}`, { entityName });
  }
  return table;
};

/**
 * Find a provider parameter by key, ignoring case
 */
export const findParam = (provider: ProviderConfig, paramKey: string): ProviderParam | null => {
  const wanted = paramKey.toLowerCase();
  return provider.params.find(param => param.searchKey.toLowerCase() === wanted) ?? null;
};

export const getRequiredParam = (provider: ProviderConfig, paramKey: string): ProviderParam => {
  if (isBlank(paramKey)) {
    throw new AppError('Provider parameter key must not be blank', ErrorCode.CONFIG_INVALID);
  }

  const param = findParam(provider, paramKey);
  if (!param) {
    throw new AppError(
      `Provider parameter not found: ${paramKey}`,
      ErrorCode.CONFIG_INVALID,
      { providerId: provider.id, paramKey }
    );
  }
  return param;
};

/**
 * Content of a required parameter, which must not be blank
 */
export const requireParamContent = (provider: ProviderConfig, paramKey: string): string => {
  const param = getRequiredParam(provider, paramKey);
  if (isBlank(param.content)) {
    throw new AppError(
      `Provider parameter has no content: ${paramKey}`,
      ErrorCode.CONFIG_INVALID,
      { providerId: provider.id, paramKey }
    );
  }
  return param.content.trim();
};
