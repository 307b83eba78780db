/**
 * @fileoverview Label template layouts: the source form authored as `.json` and the
 * precompiled form stored as `.lbl`.
 *
 * Coordinates and sizes are PDF points measured from the top-left corner of the page.
 * Text and barcode values may reference report parameters as `$P{NAME}`; compilation
 * splits them into literal and parameter segments.
 *
 * @module types/label-template
 */

import { z } from 'zod';

const PageSchema = z.object({
  width: z.number().positive(),
  height: z.number().positive(),
  margin: z.number().min(0).default(0)
});

const TextElementSchema = z.object({
  type: z.literal('text'),
  x: z.number(),
  y: z.number(),
  width: z.number().positive().optional(),
  text: z.string(),
  fontSize: z.number().positive().default(10),
  bold: z.boolean().default(false),
  align: z.enum(['left', 'center', 'right']).default('left')
});

const LineElementSchema = z.object({
  type: z.literal('line'),
  x1: z.number(),
  y1: z.number(),
  x2: z.number(),
  y2: z.number(),
  lineWidth: z.number().positive().default(1)
});

const RectElementSchema = z.object({
  type: z.literal('rect'),
  x: z.number(),
  y: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
  lineWidth: z.number().min(0).default(1),
  fill: z.string().optional()
});

const BarcodeElementSchema = z.object({
  type: z.literal('barcode'),
  x: z.number(),
  y: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
  /** bwip-js encoder id, e.g. code128, qrcode, datamatrix */
  barcodeType: z.string().min(1).default('code128'),
  value: z.string(),
  showText: z.boolean().default(false)
});

export const SourceElementSchema = z.discriminatedUnion('type', [
  TextElementSchema,
  LineElementSchema,
  RectElementSchema,
  BarcodeElementSchema
]);

export const SourceTemplateSchema = z.object({
  name: z.string().default('label'),
  page: PageSchema,
  elements: z.array(SourceElementSchema)
});

export type LabelPage = z.infer<typeof PageSchema>;
export type SourceElement = z.infer<typeof SourceElementSchema>;
export type SourceTemplate = z.infer<typeof SourceTemplateSchema>;

// ============================================================================
// COMPILED FORM
// ============================================================================

const SegmentSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('literal'), value: z.string() }),
  z.object({ kind: z.literal('param'), name: z.string().min(1) })
]);

export type TemplateSegment = z.infer<typeof SegmentSchema>;

export const COMPILED_TEMPLATE_FORMAT = 'label-template/compiled';
export const COMPILED_TEMPLATE_VERSION = 1;

export const CompiledElementSchema = z.discriminatedUnion('type', [
  TextElementSchema.omit({ text: true }).extend({ segments: z.array(SegmentSchema) }),
  LineElementSchema,
  RectElementSchema,
  BarcodeElementSchema.omit({ value: true }).extend({ segments: z.array(SegmentSchema) })
]);

export const CompiledTemplateSchema = z.object({
  format: z.literal(COMPILED_TEMPLATE_FORMAT),
  version: z.literal(COMPILED_TEMPLATE_VERSION),
  name: z.string(),
  page: PageSchema,
  parameters: z.array(z.string()),
  elements: z.array(CompiledElementSchema)
});

export type CompiledElement = z.infer<typeof CompiledElementSchema>;
export type CompiledTemplate = z.infer<typeof CompiledTemplateSchema>;

/**
 * Element with every parameter substituted
 */
export type FilledElement = SourceElement;

export interface FilledLabel {
  readonly name: string;
  readonly page: LabelPage;
  readonly elements: readonly FilledElement[];
}
