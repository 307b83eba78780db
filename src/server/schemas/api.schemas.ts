/**
 * @fileoverview Zod schemas for print API path and query parameters.
 *
 * Request bodies of the dispatch endpoints are validated by the actions themselves
 * (UpdatePrintersRequestSchema, SendLabelRequestSchema).
 */

import { z } from 'zod';
import { DEFAULT_PARAMS } from '../../services/PrintDefaultsService';
import { NonEmptyStringSchema } from '../../utils/validation.utils';

export const ProviderPathSchema = z.object({
  providerId: NonEmptyStringSchema
});

export const PrinterListQuerySchema = z.object({
  active: z.enum(['true', 'false']).optional()
});

export const DefaultParamPathSchema = z.object({
  param: z.enum(DEFAULT_PARAMS)
});

export type PrinterListQuery = z.infer<typeof PrinterListQuerySchema>;
