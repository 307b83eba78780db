/**
 * @fileoverview Label rendering: compiles or loads label layouts, fills them with report
 * parameters and exports the result as a single-page PDF.
 *
 * Template files are chosen by extension:
 * - `.json`: source layout, validated and compiled in memory
 * - `.lbl`: layout compiled earlier by saveCompiledTemplate()
 *
 * Text and barcode values reference parameters as `$P{NAME}`. A parameter missing from
 * the map renders as an empty string. Barcodes are rasterized with bwip-js and embedded
 * as PNG images.
 *
 * Key exports:
 * - tokenizeTemplateText(): split a value into literal and parameter segments
 * - compileLabelTemplate(): source layout to compiled layout
 * - LabelRenderService: file loading, filling and PDF export
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { randomUUID } from 'crypto';
import PDFDocument from 'pdfkit';
import bwipjs from 'bwip-js';
import { ZodError } from 'zod';
import type { ReportParameterValue, ReportParameters } from '../types/print-backend';
import {
  COMPILED_TEMPLATE_FORMAT,
  COMPILED_TEMPLATE_VERSION,
  CompiledElement,
  CompiledTemplate,
  CompiledTemplateSchema,
  FilledElement,
  FilledLabel,
  SourceElement,
  SourceTemplate,
  SourceTemplateSchema,
  TemplateSegment
} from '../types/label-template';
import { ErrorCode, PrintProviderError, isPrintProviderError } from '../utils/error.utils';
import { logVerbose, logWarning } from '../utils/logging';

export const SOURCE_TEMPLATE_EXTENSION = '.json';
export const COMPILED_TEMPLATE_EXTENSION = '.lbl';

const PARAMETER_PATTERN = /\$P\{([A-Za-z0-9_]+)\}/g;

// ============================================================================
// COMPILATION
// ============================================================================

export function tokenizeTemplateText(text: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let cursor = 0;

  for (const match of text.matchAll(PARAMETER_PATTERN)) {
    const start = match.index ?? 0;
    if (start > cursor) {
      segments.push({ kind: 'literal', value: text.substring(cursor, start) });
    }
    segments.push({ kind: 'param', name: match[1] });
    cursor = start + match[0].length;
  }

  if (cursor < text.length) {
    segments.push({ kind: 'literal', value: text.substring(cursor) });
  }

  return segments;
}

function compileElement(element: SourceElement): CompiledElement {
  switch (element.type) {
    case 'text': {
      const { text, ...rest } = element;
      return { ...rest, segments: tokenizeTemplateText(text) };
    }
    case 'barcode': {
      const { value, ...rest } = element;
      return { ...rest, segments: tokenizeTemplateText(value) };
    }
    case 'line':
    case 'rect':
      return { ...element };
  }
}

function collectParameters(elements: readonly CompiledElement[]): string[] {
  const names = new Set<string>();
  for (const element of elements) {
    if (element.type === 'text' || element.type === 'barcode') {
      for (const segment of element.segments) {
        if (segment.kind === 'param') {
          names.add(segment.name);
        }
      }
    }
  }
  return [...names];
}

export function compileLabelTemplate(source: SourceTemplate): CompiledTemplate {
  const elements = source.elements.map(compileElement);
  return {
    format: COMPILED_TEMPLATE_FORMAT,
    version: COMPILED_TEMPLATE_VERSION,
    name: source.name,
    page: { ...source.page },
    parameters: collectParameters(elements),
    elements
  };
}

// ============================================================================
// FILLING
// ============================================================================

function formatParameter(value: ReportParameterValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

function fillSegments(segments: readonly TemplateSegment[], params: ReportParameters): string {
  return segments
    .map(segment => (segment.kind === 'literal' ? segment.value : formatParameter(params[segment.name])))
    .join('');
}

function fillElement(element: CompiledElement, params: ReportParameters): FilledElement {
  switch (element.type) {
    case 'text': {
      const { segments, ...rest } = element;
      return { ...rest, text: fillSegments(segments, params) };
    }
    case 'barcode': {
      const { segments, ...rest } = element;
      return { ...rest, value: fillSegments(segments, params) };
    }
    case 'line':
    case 'rect':
      return { ...element };
  }
}

// ============================================================================
// SERVICE
// ============================================================================

export interface LabelRenderOptions {
  /** Directory receiving rendered PDFs; defaults to the OS temp directory */
  readonly outputDir?: string;
}

function compileFailed(filePath: string, error: unknown): PrintProviderError {
  const detail = error instanceof ZodError
    ? error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    : error instanceof Error ? error.message : String(error);

  return new PrintProviderError(
    `Failed to load label template ${path.basename(filePath)}: ${detail}`,
    ErrorCode.TEMPLATE_COMPILE_FAILED,
    { filePath },
    error instanceof Error ? error : undefined
  );
}

export class LabelRenderService {
  private readonly outputDir: string;

  constructor(options: LabelRenderOptions = {}) {
    this.outputDir = options.outputDir ?? os.tmpdir();
  }

  /**
   * Load a layout, compiling it first when it is a source layout
   *
   * @throws PrintProviderError UNSUPPORTED_TEMPLATE_EXTENSION or TEMPLATE_COMPILE_FAILED
   */
  public async loadOrCompileTemplate(filePath: string): Promise<CompiledTemplate> {
    const extension = path.extname(filePath).toLowerCase();

    if (extension !== SOURCE_TEMPLATE_EXTENSION && extension !== COMPILED_TEMPLATE_EXTENSION) {
      throw new PrintProviderError(
        `Unsupported template extension: ${extension || '(none)'}`,
        ErrorCode.UNSUPPORTED_TEMPLATE_EXTENSION,
        { filePath }
      );
    }

    try {
      const raw: unknown = JSON.parse(await fs.promises.readFile(filePath, 'utf8'));

      if (extension === SOURCE_TEMPLATE_EXTENSION) {
        logVerbose('Render', `Compiling label template ${filePath}`);
        return compileLabelTemplate(SourceTemplateSchema.parse(raw));
      }

      return CompiledTemplateSchema.parse(raw);
    } catch (error) {
      throw compileFailed(filePath, error);
    }
  }

  /**
   * Write a compiled layout so later loads skip compilation
   */
  public async saveCompiledTemplate(compiled: CompiledTemplate, filePath: string): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify(compiled, null, 2), 'utf8');
  }

  public fillTemplate(compiled: CompiledTemplate, params: ReportParameters): FilledLabel {
    return {
      name: compiled.name,
      page: { ...compiled.page },
      elements: compiled.elements.map(element => fillElement(element, params))
    };
  }

  /**
   * Fill the layout and export it to a new temporary PDF
   *
   * @returns Absolute path of the PDF; the caller deletes it
   */
  public async renderToPdf(compiled: CompiledTemplate, params: ReportParameters): Promise<string> {
    const label = this.fillTemplate(compiled, params);
    const outputPath = path.join(this.outputDir, `label-${randomUUID()}.pdf`);

    try {
      const doc = new PDFDocument({
        size: [label.page.width, label.page.height],
        margin: 0,
        info: { Title: label.name }
      });
      const stream = fs.createWriteStream(outputPath);
      const finished = new Promise<void>((resolve, reject) => {
        stream.on('finish', () => resolve());
        stream.on('error', reject);
      });
      // Awaited on both paths below; a stream error raised while drawing waits for that
      finished.catch(() => undefined);
      doc.pipe(stream);

      try {
        for (const element of label.elements) {
          await this.drawElement(doc, element, label.page.margin);
        }
      } catch (error) {
        doc.end();
        // The stream has to settle before the partial file is removed
        await finished.catch(streamError => {
          logVerbose('Render', 'Write stream failed after a drawing error:', streamError);
        });
        throw error;
      }

      doc.end();
      await finished;
    } catch (error) {
      await fs.promises.rm(outputPath, { force: true });
      if (isPrintProviderError(error)) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new PrintProviderError(
        `Failed to render label ${label.name}: ${message}`,
        ErrorCode.PROVIDER_ERROR,
        { template: label.name },
        error instanceof Error ? error : undefined
      );
    }

    logVerbose('Render', `Rendered ${label.name} to ${outputPath}`);
    return outputPath;
  }

  private async drawElement(doc: PDFKit.PDFDocument, element: FilledElement, offset: number): Promise<void> {
    switch (element.type) {
      case 'text':
        doc
          .font(element.bold ? 'Helvetica-Bold' : 'Helvetica')
          .fontSize(element.fontSize)
          .fillColor('black')
          .text(element.text, element.x + offset, element.y + offset, {
            width: element.width,
            align: element.align,
            lineBreak: element.width !== undefined
          });
        break;

      case 'line':
        doc
          .lineWidth(element.lineWidth)
          .moveTo(element.x1 + offset, element.y1 + offset)
          .lineTo(element.x2 + offset, element.y2 + offset)
          .stroke();
        break;

      case 'rect': {
        doc.rect(element.x + offset, element.y + offset, element.width, element.height);
        if (element.fill && element.lineWidth > 0) {
          doc.lineWidth(element.lineWidth).fillAndStroke(element.fill, 'black');
        } else if (element.fill) {
          doc.fill(element.fill);
        } else {
          doc.lineWidth(element.lineWidth).stroke();
        }
        break;
      }

      case 'barcode': {
        if (element.value.length === 0) {
          logWarning('Render', `Skipping ${element.barcodeType} barcode with an empty value`);
          break;
        }
        const png = await bwipjs.toBuffer({
          bcid: element.barcodeType,
          text: element.value,
          scale: 3,
          includetext: element.showText,
          textxalign: 'center'
        });
        doc.image(png, element.x + offset, element.y + offset, {
          fit: [element.width, element.height],
          align: 'center',
          valign: 'center'
        });
        break;
      }
    }
  }
}
