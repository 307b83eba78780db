/**
 * @fileoverview Generates a label per record and sends each one to the selected printer.
 *
 * Runs as one catalog transaction, serialized with printer refreshes. Setup (provider,
 * backend, printer, table, template line) must succeed as a whole; after that records are
 * processed one at a time and a failing record does not stop the rest.
 * Every generated file is deleted once its record is done.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { fail, failFromError, success, warning } from './action-results';
import type { CatalogManager } from '../managers/CatalogManager';
import type { PrintBackendRegistry } from '../managers/PrintBackendRegistry';
import type { TemplateManager } from '../managers/TemplateManager';
import type { ActionResult } from '../types/print-backend';
import { ErrorCode } from '../utils/error.utils';
import { isBlank, requirePrinter, requireProvider, requireTableByName } from '../utils/PrinterUtils';
import { logError, logInfo, logVerbose, logWarning } from '../utils/logging';
import { NonEmptyStringSchema, PositiveIntSchema, validate } from '../utils/validation.utils';

export const SendLabelRequestSchema = z.object({
  providerId: NonEmptyStringSchema,
  entityName: NonEmptyStringSchema,
  recordIds: z.array(NonEmptyStringSchema).min(1, 'At least one record is required'),
  printerId: NonEmptyStringSchema,
  numberOfCopies: PositiveIntSchema,
  /** Extra values handed through to backends and hooks */
  parameters: z.record(z.unknown()).default({})
});

export type SendLabelRequest = z.infer<typeof SendLabelRequestSchema>;

export interface SendLabelDependencies {
  readonly catalog: CatalogManager;
  readonly registry: PrintBackendRegistry;
  readonly templateManager: TemplateManager;
}

async function deleteLabelFile(file: string | null, recordId: string): Promise<void> {
  if (!file) {
    return;
  }
  try {
    await fs.promises.rm(file, { force: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logWarning('SendLabel', `Could not delete temp label file for record ${recordId} (${file}): ${message}`);
  }
}

export class SendLabelToPrinterAction {
  private readonly catalog: CatalogManager;
  private readonly registry: PrintBackendRegistry;
  private readonly templateManager: TemplateManager;

  constructor(dependencies: SendLabelDependencies) {
    this.catalog = dependencies.catalog;
    this.registry = dependencies.registry;
    this.templateManager = dependencies.templateManager;
  }

  public async execute(request: unknown): Promise<ActionResult> {
    const validation = validate(SendLabelRequestSchema, request);
    if (!validation.success) {
      return fail(validation.error.message, validation.error.code);
    }
    const input = validation.data;
    logVerbose('SendLabel', `Printing ${input.recordIds.length} ${input.entityName} labels on ${input.printerId}`);

    try {
      return await this.catalog.transaction(() => this.printRecords(input));
    } catch (error) {
      logError('SendLabel', 'Label printing failed:', error);
      return failFromError(error);
    }
  }

  private async printRecords(input: SendLabelRequest): Promise<ActionResult> {
    const provider = requireProvider(this.catalog, input.providerId);
    const backend = this.registry.resolve(provider);
    const printer = requirePrinter(this.catalog, input.printerId);
    const table = requireTableByName(this.catalog, input.entityName);
    const templateLine = this.templateManager.resolveTemplateLine(table);

    const jobIds: string[] = [];
    let failureCount = 0;

    for (const recordId of input.recordIds) {
      let label: string | null = null;
      try {
        label = await backend.generateLabel(provider, table, recordId, templateLine, input);
        const jobId = await backend.sendToPrinter(provider, printer, input.numberOfCopies, label);
        jobIds.push(isBlank(jobId) ? '-' : jobId);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logError('SendLabel', `Error printing record ${recordId} on printer ${printer.id}: ${message}`);
        failureCount++;
      } finally {
        await deleteLabelFile(label, recordId);
      }
    }

    if (failureCount > 0 && failureCount === input.recordIds.length) {
      return fail('All print jobs failed', ErrorCode.PRINT_JOBS_FAILED);
    }
    if (failureCount > 0) {
      return warning(`${failureCount} print jobs failed`, { jobIds });
    }

    const message = `Print jobs sent: ${jobIds.join(', ')}`;
    logInfo('SendLabel', message);
    return success(message, { jobIds });
  }
}
