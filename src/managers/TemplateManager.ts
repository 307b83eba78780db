/**
 * @fileoverview Template line selection and template file resolution.
 *
 * A table owns at most one template; the template's lines are ranked default-flagged first,
 * then by ascending line number, and the first one wins. A line's location string is
 * resolved against two search roots, the design root first and the web root second:
 *
 * - `@basedesign@/labels/a.json` (token matched case-insensitively) -> `labels/a.json`
 * - `@shipping@/labels/a.json` -> `shipping/labels/a.json`
 * - `labels/a.json` or `/labels/a.json` -> `labels/a.json`
 *
 * At most one leading slash is stripped from the remainder.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { CatalogManager } from './CatalogManager';
import type { AppConfig } from '../types/config';
import type { TableRecord, TemplateLineRecord } from '../types/print-provider';
import { ErrorCode, PrintProviderError } from '../utils/error.utils';
import { logVerbose } from '../utils/logging';

const TOKEN_BASEDESIGN = '@basedesign@';

export interface TemplateRoots {
  readonly designRoot: string;
  readonly webRoot: string;
}

export function stripLeadingSlash(value: string): string {
  return value.startsWith('/') ? value.substring(1) : value;
}

/**
 * Turn a template location string into a path relative to a search root
 */
export function parseTemplateLocation(location: string): string {
  const raw = location.trim();

  if (raw.slice(0, TOKEN_BASEDESIGN.length).toLowerCase() === TOKEN_BASEDESIGN) {
    return stripLeadingSlash(raw.substring(TOKEN_BASEDESIGN.length));
  }

  if (raw.startsWith('@')) {
    const second = raw.indexOf('@', 1);
    if (second > 1) {
      const moduleName = raw.substring(1, second);
      const rest = stripLeadingSlash(raw.substring(second + 1));
      return `${moduleName}/${rest}`;
    }
  }

  return stripLeadingSlash(raw);
}

/**
 * Orders template lines: default first, then lowest line number
 */
export function compareTemplateLines(a: TemplateLineRecord, b: TemplateLineRecord): number {
  if (a.isDefault !== b.isDefault) {
    return a.isDefault ? -1 : 1;
  }
  return a.lineNo - b.lineNo;
}

export class TemplateManager {
  private readonly designRoot: string;
  private readonly webRoot: string;

  constructor(
    private readonly catalog: CatalogManager,
    roots: TemplateRoots
  ) {
    this.designRoot = path.resolve(roots.designRoot);
    this.webRoot = path.resolve(roots.webRoot);
  }

  public static fromConfig(catalog: CatalogManager, config: Readonly<AppConfig>): TemplateManager {
    return new TemplateManager(catalog, { designRoot: config.DesignRoot, webRoot: config.WebRoot });
  }

  /**
   * Best template line for a table, or null when its template has no lines
   *
   * @throws PrintProviderError PRINT_LOCATION_NOT_FOUND when the table has no template
   */
  public resolveTemplateLine(table: TableRecord): TemplateLineRecord | null {
    const template = this.catalog.findTemplateByTable(table.id);
    if (!template) {
      throw new PrintProviderError(
        `Print location not found for table ${table.name}`,
        ErrorCode.PRINT_LOCATION_NOT_FOUND,
        { tableId: table.id, tableName: table.name }
      );
    }

    const lines = this.catalog.listTemplateLines(template.id).sort(compareTemplateLines);
    return lines[0] ?? null;
  }

  /**
   * Absolute path of the template file a line points at
   *
   * @throws PrintProviderError EMPTY_TEMPLATE_LOCATION or TEMPLATE_NOT_FOUND
   */
  public resolveTemplateFile(templateLine: TemplateLineRecord | null): string {
    if (!templateLine || templateLine.templateLocation.trim().length === 0) {
      throw new PrintProviderError(
        'Template location is empty',
        ErrorCode.EMPTY_TEMPLATE_LOCATION,
        templateLine ? { templateLineId: templateLine.id } : undefined
      );
    }

    const relativePath = parseTemplateLocation(templateLine.templateLocation);
    const designPath = path.join(this.designRoot, relativePath);
    if (fs.existsSync(designPath)) {
      return designPath;
    }

    const webPath = path.join(this.webRoot, relativePath);
    if (fs.existsSync(webPath)) {
      return webPath;
    }

    logVerbose('Templates', `Template ${templateLine.templateLocation} not found under either root`);
    throw new PrintProviderError(
      `Template not found. Tried: ${designPath} and ${webPath}`,
      ErrorCode.TEMPLATE_NOT_FOUND,
      { templateLineId: templateLine.id, tried: [designPath, webPath] }
    );
  }
}
