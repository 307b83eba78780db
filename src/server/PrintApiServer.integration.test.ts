/**
 * @fileoverview Integration tests for the print API
 * Drives the Express application in process against an in-memory catalog
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import request from 'supertest';
import { createApp } from './PrintApiServer';
import { CatalogManager } from '../managers/CatalogManager';
import { PrintBackendRegistry } from '../managers/PrintBackendRegistry';
import { TemplateManager } from '../managers/TemplateManager';
import { BasePrintBackend } from '../print-backends/BasePrintBackend';
import type { RemotePrinter } from '../types/print-provider';

class StubBackend extends BasePrintBackend {
  constructor(private readonly outputDir: string) {
    super();
  }

  public override async fetchPrinters(): Promise<readonly RemotePrinter[]> {
    return [
      { id: '1', name: 'Dock', isDefault: true },
      { id: '9', name: 'Annex', isDefault: false }
    ];
  }

  public override async generateLabel(
    ...args: Parameters<BasePrintBackend['generateLabel']>
  ): Promise<string> {
    const file = path.join(this.outputDir, `${args[2]}.pdf`);
    fs.writeFileSync(file, 'pdf');
    return file;
  }

  public override async sendToPrinter(
    ...args: Parameters<BasePrintBackend['sendToPrinter']>
  ): Promise<string> {
    return `job-${path.basename(args[3], '.pdf')}`;
  }
}

describe('Print API', () => {
  let tempDir: string;
  let catalog: CatalogManager;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'print-api-test-'));
    catalog = CatalogManager.fromDocument({
      providers: [
        {
          id: 'p1',
          name: 'Cloud',
          implementation: { id: 'i1', name: 'Stub', implementation: 'stub' },
          params: [
            { searchKey: 'apikey', content: 'test-secret' },
            { searchKey: 'printersurl', content: 'https://print.example.test/printers' }
          ]
        },
        { id: 'p2', name: 'Unconfigured' }
      ],
      printers: [
        { id: 'l1', externalId: '1', name: 'Dock', providerId: 'p1' },
        { id: 'l2', externalId: '2', name: 'Old', providerId: 'p1', active: false }
      ],
      tables: [{ id: 't1', name: 'Shipment', dbTableName: 'm_inout' }],
      templates: [{ id: 'tpl1', tableId: 't1' }],
      templateLines: [{ id: 'tl1', templateId: 'tpl1', templateLocation: 'labels/a.json', lineNo: 10 }]
    });

    const registry = new PrintBackendRegistry();
    registry.register('stub', () => new StubBackend(tempDir));

    app = createApp({
      catalog,
      registry,
      templateManager: new TemplateManager(catalog, { designRoot: tempDir, webRoot: tempDir })
    });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report health and registered backends', async () => {
    const response = await request(app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, status: 'ok', backends: ['stub'] });
  });

  it('should list providers with parameter keys only', async () => {
    const response = await request(app).get('/api/providers');

    expect(response.status).toBe(200);
    expect(response.body.providers).toEqual([
      { id: 'p1', name: 'Cloud', implementation: 'stub', paramKeys: ['apikey', 'printersurl'] },
      { id: 'p2', name: 'Unconfigured', implementation: null, paramKeys: [] }
    ]);
  });

  describe('GET /api/providers/:providerId/printers', () => {
    it('should filter by active flag', async () => {
      const response = await request(app).get('/api/providers/p1/printers?active=false');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        providerId: 'p1',
        printers: [{ id: 'l2', externalId: '2', name: 'Old', isDefault: false, active: false }]
      });
    });

    it('should return 404 for an unknown provider', async () => {
      const response = await request(app).get('/api/providers/nope/printers');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, error: 'Print provider not found', errorCode: 'NOT_FOUND' });
    });

    it('should reject an invalid filter', async () => {
      const response = await request(app).get('/api/providers/p1/printers?active=maybe');

      expect(response.status).toBe(400);
      expect(response.body.errorCode).toBe('VALIDATION');
    });
  });

  describe('POST /api/printers/refresh', () => {
    it('should reconcile and return the counters', async () => {
      const response = await request(app).post('/api/printers/refresh').send({ providerId: 'p1' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        type: 'success',
        message: 'Printers updated: 1 created, 1 updated, 0 inactivated',
        counters: { created: 1, updated: 1, inactivated: 0 }
      });
      expect(catalog.findPrinter('p1', '9')?.name).toBe('Annex');
    });

    it('should map validation failures to 400', async () => {
      const response = await request(app).post('/api/printers/refresh').send({});

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        type: 'error',
        error: 'providerId: Required',
        errorCode: 'VALIDATION'
      });
    });

    it('should map provider failures to 500', async () => {
      const response = await request(app).post('/api/printers/refresh').send({ providerId: 'p2' });

      expect(response.status).toBe(500);
      expect(response.body.error).toBe(
        'Print provider error: Print provider has no backend implementation configured'
      );
    });
  });

  describe('POST /api/labels/print', () => {
    const body = {
      providerId: 'p1',
      entityName: 'Shipment',
      recordIds: ['r1', 'r2'],
      printerId: 'l1',
      numberOfCopies: 1
    };

    it('should print and list job ids', async () => {
      const response = await request(app).post('/api/labels/print').send(body);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        type: 'success',
        message: 'Print jobs sent: job-r1, job-r2',
        jobIds: ['job-r1', 'job-r2']
      });
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });

    it('should map missing records to 404', async () => {
      const response = await request(app).post('/api/labels/print').send({ ...body, printerId: 'ghost' });

      expect(response.status).toBe(404);
      expect(response.body.error).toBe('Printer not found: ghost');
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/labels/print')
        .set('Content-Type', 'application/json')
        .send('{"providerId":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, error: 'Malformed request body', errorCode: 'VALIDATION' });
    });
  });

  describe('GET /api/defaults/:param', () => {
    it('should return the preselected printer', async () => {
      const response = await request(app).get('/api/defaults/printerId');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, param: 'printerId', value: 'l1' });
    });

    it('should reject unknown parameters', async () => {
      const response = await request(app).get('/api/defaults/copies');

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
    });
  });

  it('should answer unknown API paths with JSON 404', async () => {
    const response = await request(app).get('/api/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: 'API endpoint not found: GET /api/unknown',
      errorCode: 'NOT_FOUND'
    });
  });
});
