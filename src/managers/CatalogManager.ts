/**
 * @fileoverview Catalog persistence manager for providers, printers, tables and label templates.
 *
 * Keeps the catalog document in memory with a working set and a committed snapshot:
 * - Reads go against the working set and return copies
 * - Writes change the working set only
 * - flush() persists the working set to catalog.json and makes it the committed snapshot
 * - rollback() discards every change made since the last flush
 * - transaction() runs an action's reads and writes as one serialized unit of work, so
 *   concurrent requests never flush or roll back each other's changes
 *
 * The document is validated with zod on load. Passing `null` as the file path keeps the
 * catalog in memory, which is what tests and embedded callers use.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import {
  NewPrinterRecord,
  PrinterRecord,
  ProviderConfig,
  TableRecord,
  TemplateLineRecord,
  TemplateRecord
} from '../types/print-provider';
import { AppError, ErrorCode, fromZodError, toError } from '../utils/error.utils';
import { getCatalogFilePath } from '../utils/setup';
import { logInfo, logVerbose } from '../utils/logging';

// ============================================================================
// DOCUMENT SCHEMA
// ============================================================================

const ImplementationSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  implementation: z.string()
});

const ProviderSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  implementation: ImplementationSchema.nullable().default(null),
  params: z.array(z.object({
    searchKey: z.string(),
    content: z.string()
  })).default([])
});

const PrinterSchema = z.object({
  id: z.string().min(1),
  externalId: z.string(),
  name: z.string(),
  isDefault: z.boolean().default(false),
  providerId: z.string().min(1),
  active: z.boolean().default(true)
});

const TableSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  dbTableName: z.string()
});

const TemplateSchema = z.object({
  id: z.string().min(1),
  tableId: z.string().min(1),
  name: z.string().default('')
});

const TemplateLineSchema = z.object({
  id: z.string().min(1),
  templateId: z.string().min(1),
  templateLocation: z.string(),
  isDefault: z.boolean().default(false),
  lineNo: z.number().int()
});

export const CatalogDocumentSchema = z.object({
  providers: z.array(ProviderSchema).default([]),
  printers: z.array(PrinterSchema).default([]),
  tables: z.array(TableSchema).default([]),
  templates: z.array(TemplateSchema).default([]),
  templateLines: z.array(TemplateLineSchema).default([])
});

export type CatalogDocument = z.infer<typeof CatalogDocumentSchema>;

/**
 * Catalog contents as accepted by seeding; every collection is optional
 */
export type CatalogSeed = z.input<typeof CatalogDocumentSchema>;

function emptyDocument(): CatalogDocument {
  return { providers: [], printers: [], tables: [], templates: [], templateLines: [] };
}

function byName<T extends { readonly name: string }>(a: T, b: T): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Replace the element with the same id, or append it
 */
function upsert<T extends { readonly id: string }>(list: T[], record: T): void {
  const index = list.findIndex(item => item.id === record.id);
  if (index === -1) {
    list.push(record);
  } else {
    list[index] = record;
  }
}

// ============================================================================
// CATALOG MANAGER
// ============================================================================

export class CatalogManager {
  private static instance: CatalogManager | null = null;

  private readonly filePath: string | null;
  private state: CatalogDocument;
  private committed: CatalogDocument;
  // Bumped on every change; equal to committedRevision when nothing is pending
  private revision = 0;
  private committedRevision = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(filePath: string | null = getCatalogFilePath()) {
    this.filePath = filePath;
    this.committed = filePath ? CatalogManager.readDocument(filePath) : emptyDocument();
    this.state = structuredClone(this.committed);
  }

  /**
   * Create an in-memory catalog holding the given records
   */
  public static fromDocument(seed: CatalogSeed): CatalogManager {
    const manager = new CatalogManager(null);
    const parsed = CatalogDocumentSchema.safeParse(seed);
    if (!parsed.success) {
      throw fromZodError(parsed.error, ErrorCode.CATALOG_LOAD_FAILED);
    }
    manager.committed = parsed.data;
    manager.state = structuredClone(parsed.data);
    return manager;
  }

  public static getInstance(): CatalogManager {
    if (!CatalogManager.instance) {
      CatalogManager.instance = new CatalogManager();
    }
    return CatalogManager.instance;
  }

  private static readDocument(filePath: string): CatalogDocument {
    if (!fs.existsSync(filePath)) {
      logInfo('Catalog', `No catalog at ${filePath}, starting empty`);
      return emptyDocument();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new AppError(
        `Failed to read catalog file: ${filePath}`,
        ErrorCode.CATALOG_LOAD_FAILED,
        { filePath },
        toError(error)
      );
    }

    const parsed = CatalogDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw fromZodError(parsed.error, ErrorCode.CATALOG_LOAD_FAILED);
    }
    return parsed.data;
  }

  // --------------------------------------------------------------------------
  // Providers
  // --------------------------------------------------------------------------

  public getProvider(id: string): ProviderConfig | null {
    const provider = this.state.providers.find(p => p.id === id);
    return provider ? structuredClone(provider) : null;
  }

  /**
   * All providers ordered by name
   */
  public listProviders(): ProviderConfig[] {
    return structuredClone(this.state.providers).sort(byName);
  }

  // --------------------------------------------------------------------------
  // Printers
  // --------------------------------------------------------------------------

  public getPrinter(id: string): PrinterRecord | null {
    const printer = this.state.printers.find(p => p.id === id);
    return printer ? { ...printer } : null;
  }

  /**
   * Lookup by natural key
   */
  public findPrinter(providerId: string, externalId: string): PrinterRecord | null {
    const printer = this.state.printers.find(
      p => p.providerId === providerId && p.externalId === externalId
    );
    return printer ? { ...printer } : null;
  }

  public listPrinters(providerId: string): PrinterRecord[] {
    return this.state.printers
      .filter(p => p.providerId === providerId)
      .map(p => ({ ...p }));
  }

  public createPrinter(record: NewPrinterRecord): PrinterRecord {
    const created: PrinterRecord = { ...record, id: randomUUID() };
    this.state.printers.push({ ...created });
    this.revision++;
    logVerbose('Catalog', `Created printer ${created.id} (${created.externalId})`);
    return created;
  }

  public savePrinter(printer: PrinterRecord): void {
    upsert(this.state.printers, { ...printer });
    this.revision++;
  }

  // --------------------------------------------------------------------------
  // Tables and templates
  // --------------------------------------------------------------------------

  public getTable(id: string): TableRecord | null {
    const table = this.state.tables.find(t => t.id === id);
    return table ? { ...table } : null;
  }

  public findTableByName(name: string): TableRecord | null {
    const table = this.state.tables.find(t => t.name === name);
    return table ? { ...table } : null;
  }

  public saveTable(table: TableRecord): void {
    upsert(this.state.tables, { ...table });
    this.revision++;
  }

  /**
   * The template owned by a table, if any
   */
  public findTemplateByTable(tableId: string): TemplateRecord | null {
    const template = this.state.templates.find(t => t.tableId === tableId);
    return template ? { ...template } : null;
  }

  public listTemplateLines(templateId: string): TemplateLineRecord[] {
    return this.state.templateLines
      .filter(line => line.templateId === templateId)
      .map(line => ({ ...line }));
  }

  // --------------------------------------------------------------------------
  // Unit of work
  // --------------------------------------------------------------------------

  public hasPendingChanges(): boolean {
    return this.revision !== this.committedRevision;
  }

  /**
   * Snapshot of the working set
   */
  public toDocument(): CatalogDocument {
    return structuredClone(this.state);
  }

  /**
   * Run `work` as one unit of work. Units run one at a time in call order. When `work`
   * resolves the catalog is flushed; when it rejects, or the flush fails, the catalog is
   * rolled back and the rejection propagates.
   */
  public transaction<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      try {
        const result = await work();
        await this.flush();
        return result;
      } catch (error) {
        this.rollback();
        throw error;
      }
    });
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Persist the working set and make that snapshot the committed one.
   * Changes made while the file is being written stay pending.
   */
  public async flush(): Promise<void> {
    if (!this.hasPendingChanges()) {
      return;
    }

    const revision = this.revision;
    const snapshot = structuredClone(this.state);

    if (this.filePath) {
      const tempPath = `${this.filePath}.tmp`;
      try {
        await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.promises.writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8');
        await fs.promises.rename(tempPath, this.filePath);
      } catch (error) {
        throw new AppError(
          `Failed to save catalog file: ${this.filePath}`,
          ErrorCode.CATALOG_SAVE_FAILED,
          { filePath: this.filePath },
          toError(error)
        );
      }
    }

    this.committed = snapshot;
    this.committedRevision = revision;
  }

  /**
   * Discard uncommitted changes
   */
  public rollback(): void {
    if (this.hasPendingChanges()) {
      logVerbose('Catalog', 'Rolling back uncommitted catalog changes');
    }
    this.state = structuredClone(this.committed);
    this.revision++;
    this.committedRevision = this.revision;
  }
}

export function getCatalogManager(): CatalogManager {
  return CatalogManager.getInstance();
}
