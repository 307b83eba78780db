/**
 * @fileoverview Print backend for the PrintNode cloud print API.
 *
 * Provider parameters (keys matched case-insensitively):
 * - `printersurl`: GET endpoint listing the account's printers
 * - `printjoburl`: POST endpoint accepting print jobs
 * - `apikey`: account key, sent as HTTP Basic username with an empty password
 *
 * Labels are rendered locally to PDF and submitted base64-encoded. Any failure leaves this
 * class as a PrintProviderError.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { BasePrintBackend } from './BasePrintBackend';
import { GenerateLabelContext, LabelHookManager } from '../managers/LabelHookManager';
import type { TemplateManager } from '../managers/TemplateManager';
import type { LabelRenderService } from '../services/LabelRenderService';
import type { RequestParameters } from '../types/print-backend';
import type {
  PrinterRecord,
  ProviderConfig,
  RemotePrinter,
  TableRecord,
  TemplateLineRecord
} from '../types/print-provider';
import {
  ErrorCode,
  PrintProviderError,
  fromZodError,
  isAppError,
  isPrintProviderError,
  providerError
} from '../utils/error.utils';
import {
  buildBasicAuth,
  buildJsonGet,
  buildJsonPost,
  encodeFileToBase64,
  extractJobIdOrPreview,
  sendRequest,
  truncate
} from '../utils/http.utils';
import { API_KEY, PRINTERS_URL, PRINTJOB_URL, requireParamContent } from '../utils/PrinterUtils';
import { logVerbose } from '../utils/logging';

export const PRINTNODE_IMPLEMENTATION_ID = 'printnode';

const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
const ERROR_PREVIEW_LENGTH = 500;
const JOB_ID_PREVIEW_LENGTH = 200;
const JOB_SOURCE = 'label-dispatch';
const UNNAMED_PRINTER = 'Unnamed printer';

const RemotePrinterListSchema = z.array(
  z.object({
    id: z.unknown(),
    name: z.unknown().optional(),
    default: z.unknown().optional(),
    is_default: z.unknown().optional()
  }).passthrough()
);

export interface PrintNodeBackendOptions {
  readonly templateManager: TemplateManager;
  readonly hookManager: LabelHookManager;
  readonly renderService: LabelRenderService;
  readonly requestTimeoutMs?: number;
}

/**
 * PrintNode job submission body
 */
export interface PrintJobBody {
  readonly printerId: number;
  readonly title: string;
  readonly contentType: 'pdf_base64';
  readonly content: string;
  readonly source: string;
  readonly options: { readonly copies: number };
}

function asFlag(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string' && /^(true|false)$/i.test(value)) {
    return value.toLowerCase() === 'true';
  }
  return undefined;
}

/**
 * Parse a `/printers` response into remote printer DTOs
 */
export function parsePrinters(body: string): RemotePrinter[] {
  const parsed = RemotePrinterListSchema.safeParse(JSON.parse(body));
  if (!parsed.success) {
    const detail = fromZodError(parsed.error).message;
    throw new PrintProviderError(`Unexpected printer list response: ${detail}`, ErrorCode.PROVIDER_ERROR);
  }

  return parsed.data.map(entry => ({
    id: String(entry.id),
    name: entry.name === undefined || entry.name === null ? UNNAMED_PRINTER : String(entry.name),
    isDefault: asFlag(entry.default) ?? asFlag(entry.is_default) ?? false
  }));
}

/**
 * PrintNode printer ids are 32-bit integers; surrounding whitespace is rejected
 */
export function parseExternalPrinterId(externalId: string): number {
  const value = Number(externalId);

  if (!/^[+-]?\d+$/.test(externalId) || value > 2147483647 || value < -2147483648) {
    throw new PrintProviderError(
      `Invalid printer id: "${externalId}"`,
      ErrorCode.PROVIDER_ERROR,
      { externalId }
    );
  }
  return value;
}

export function buildPrintJobBody(printerId: number, copies: number, base64: string): PrintJobBody {
  return {
    printerId,
    title: `Label ${Date.now()}`,
    contentType: 'pdf_base64',
    content: base64,
    source: JOB_SOURCE,
    options: { copies }
  };
}

/**
 * Re-raise anything that is not already a PrintProviderError as one, keeping its message
 */
function asProviderError(error: unknown): PrintProviderError {
  if (isPrintProviderError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return providerError(
    message,
    isAppError(error) ? error.code : ErrorCode.PROVIDER_ERROR,
    isAppError(error) ? error.context : undefined,
    error
  );
}

export class PrintNodeBackend extends BasePrintBackend {
  private readonly templateManager: TemplateManager;
  private readonly hookManager: LabelHookManager;
  private readonly renderService: LabelRenderService;
  private readonly requestTimeoutMs: number;

  constructor(options: PrintNodeBackendOptions) {
    super();
    this.templateManager = options.templateManager;
    this.hookManager = options.hookManager;
    this.renderService = options.renderService;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  public override async fetchPrinters(provider: ProviderConfig): Promise<readonly RemotePrinter[]> {
    try {
      const printersUrl = requireParamContent(provider, PRINTERS_URL);
      const apiKey = requireParamContent(provider, API_KEY);

      const response = await sendRequest(
        buildJsonGet(printersUrl, buildBasicAuth(apiKey)),
        this.requestTimeoutMs
      );

      if (!response.ok) {
        throw new PrintProviderError(
          `Printer list request failed with status ${response.status}: ${truncate(response.body, ERROR_PREVIEW_LENGTH)}`,
          ErrorCode.PROVIDER_ERROR,
          { status: response.status }
        );
      }

      const printers = parsePrinters(response.body);
      logVerbose('PrintNode', `Fetched ${printers.length} printers for provider ${provider.id}`);
      return printers;
    } catch (error) {
      throw asProviderError(error);
    }
  }

  public override async generateLabel(
    provider: ProviderConfig,
    table: TableRecord,
    recordId: string,
    templateLine: TemplateLineRecord | null,
    params: RequestParameters
  ): Promise<string> {
    try {
      const templateFile = this.templateManager.resolveTemplateFile(templateLine);
      const compiled = await this.renderService.loadOrCompileTemplate(templateFile);

      const context = new GenerateLabelContext(provider, table, recordId, templateLine, params, {
        DOCUMENT_ID: recordId,
        SUBREPORT_DIR: path.dirname(templateFile) + path.sep
      });
      await this.hookManager.executeHooks(context);

      return await this.renderService.renderToPdf(compiled, context.getParameters());
    } catch (error) {
      throw asProviderError(error);
    }
  }

  public override async sendToPrinter(
    provider: ProviderConfig,
    printer: PrinterRecord,
    copies: number,
    file: string
  ): Promise<string> {
    try {
      if (!fs.existsSync(file) || !fs.statSync(file).isFile()) {
        throw new PrintProviderError('Label file not found', ErrorCode.PROVIDER_ERROR, { file });
      }

      const printJobUrl = requireParamContent(provider, PRINTJOB_URL);
      const apiKey = requireParamContent(provider, API_KEY);

      const printerId = parseExternalPrinterId(printer.externalId);
      const body = buildPrintJobBody(printerId, copies, await encodeFileToBase64(file));

      const response = await sendRequest(
        buildJsonPost(printJobUrl, buildBasicAuth(apiKey), JSON.stringify(body)),
        this.requestTimeoutMs
      );

      if (!response.ok) {
        throw new PrintProviderError(
          `Print job request failed with status ${response.status}: ${truncate(response.body, ERROR_PREVIEW_LENGTH)}`,
          ErrorCode.PROVIDER_ERROR,
          { status: response.status, printerId: printer.id }
        );
      }

      const jobId = extractJobIdOrPreview(response.body, JOB_ID_PREVIEW_LENGTH);
      logVerbose('PrintNode', `Submitted ${copies} copies to printer ${printer.name}: job ${jobId}`);
      return jobId;
    } catch (error) {
      throw asProviderError(error);
    }
  }
}
