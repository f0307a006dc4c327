import assert from 'node:assert/strict';
import test from 'node:test';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { DocumentRenderer, RenderRequest, Row, TableRef } from '../types/index.js';
import { DEFAULT_CONFIG } from './config.js';
import type { Credentials, DataSource } from './datasource.js';
import type { ApiReply, ApiRequest, FileReply, JsonReply } from './http-server.js';
import { MergeServer, getErrorStatusCode } from './http-server.js';
import { FileTemplateStore } from './template-store.js';
import { readArchive } from './zip-handler.js';

class FakeDataSource implements DataSource {
  constructor(private readonly rows: Row[], private readonly connected = true) {}

  async listTables(): Promise<TableRef[]> {
    return [{ id: 'Personnes' }];
  }

  async listColumns(): Promise<string[]> {
    return ['nom', 'Pdf_print'];
  }

  async listRows(_table: string, limit?: number): Promise<Row[]> {
    return limit ? this.rows.slice(0, limit) : this.rows;
  }

  async testConnection(): Promise<boolean> {
    return this.connected;
  }
}

class FakeRenderer implements DocumentRenderer {
  readonly requests: RenderRequest[] = [];

  constructor(private readonly failing = false) {}

  async render(request: RenderRequest): Promise<Buffer> {
    this.requests.push(request);
    if (this.failing) throw new Error('chromium crashed');
    return Buffer.from(`%PDF ${request.filename}`);
  }

  async close(): Promise<void> {}
}

const ROWS: Row[] = [
  { nom: 'Ann', Pdf_print: true },
  { nom: 'Bob', Pdf_print: false },
  { nom: 'Cy', Pdf_print: 1 },
];

const CREDENTIALS = { api_key: 'test-key', doc_id: 'doc1' };

interface Harness {
  server: MergeServer;
  renderer: FakeRenderer;
  credentials: Credentials[];
  call(method: string, pathname: string, body?: unknown): Promise<ApiReply>;
}

function harness(options: { rows?: Row[]; connected?: boolean; failing?: boolean; templatesDir?: string } = {}): Harness {
  const renderer = new FakeRenderer(options.failing);
  const credentials: Credentials[] = [];
  const server = new MergeServer({
    config: { ...DEFAULT_CONFIG, templatesDir: options.templatesDir ?? 'unused' },
    renderer,
    templates: new FileTemplateStore(options.templatesDir ?? 'unused', () => new Date('2024-01-15T09:30:00Z')),
    createDataSource: (given) => {
      credentials.push(given);
      return new FakeDataSource(options.rows ?? ROWS, options.connected);
    },
    now: () => new Date(1700000000000),
  });

  return {
    server,
    renderer,
    credentials,
    call: (method, pathname, body) => {
      const url = new URL(pathname, 'http://localhost');
      const request: ApiRequest = {
        method,
        pathname: url.pathname,
        query: url.searchParams,
        body,
        requestId: 'req-1',
      };
      return server.dispatch(request);
    },
  };
}

function asJson(reply: ApiReply): JsonReply {
  if (reply.kind !== 'json') throw new Error(`Expected JSON reply, got ${reply.kind}`);
  return reply;
}

function asFile(reply: ApiReply): FileReply {
  if (reply.kind !== 'file') throw new Error(`Expected file reply, got ${JSON.stringify(reply.payload)}`);
  return reply;
}

test('getErrorStatusCode maps error codes to HTTP statuses', () => {
  assert.equal(getErrorStatusCode('BAD_REQUEST'), 400);
  assert.equal(getErrorStatusCode('NO_ROWS'), 404);
  assert.equal(getErrorStatusCode('RENDER_TIMEOUT'), 422);
  assert.equal(getErrorStatusCode('CONNECTION_ERROR'), 502);
  assert.equal(getErrorStatusCode('ALL_ROWS_FAILED'), 500);
});

test('GET /api/version', async () => {
  const reply = asJson(await harness().call('GET', '/api/version'));
  assert.equal(reply.status, 200);
  assert.deepEqual(reply.payload, { version: '0.1.0', api: 'api/v1', request_id: 'req-1' });
});

test('GET /api/config/filter-column', async () => {
  const reply = asJson(await harness().call('GET', '/api/config/filter-column'));
  assert.equal(reply.payload.filter_column, 'Pdf_print');
});

test('unknown routes reply 404', async () => {
  const reply = asJson(await harness().call('GET', '/api/nothing'));
  assert.equal(reply.status, 404);
  assert.equal(reply.payload.error?.code, 'NOT_FOUND');
});

test('POST /api/test-connection', async () => {
  const ok = harness();
  assert.equal(asJson(await ok.call('POST', '/api/test-connection', CREDENTIALS)).payload.connected, true);
  assert.deepEqual(ok.credentials, [{ apiKey: 'test-key', docId: 'doc1' }]);

  const down = asJson(await harness({ connected: false }).call('POST', '/api/test-connection', CREDENTIALS));
  assert.equal(down.status, 502);
  assert.equal(down.payload.error?.code, 'CONNECTION_ERROR');
});

test('data source routes require credentials', async () => {
  const reply = asJson(await harness().call('POST', '/api/tables', { api_key: 'test-key' }));
  assert.equal(reply.status, 400);
  assert.equal(reply.payload.error?.code, 'BAD_REQUEST');
  assert.equal(reply.payload.error?.message, 'Invalid credentials');
});

test('POST /api/tables and /api/columns/:table', async () => {
  const h = harness();
  assert.deepEqual(asJson(await h.call('POST', '/api/tables', CREDENTIALS)).payload.tables, [{ id: 'Personnes' }]);
  assert.deepEqual(asJson(await h.call('POST', '/api/columns/Personnes', CREDENTIALS)).payload.columns, ['nom', 'Pdf_print']);
});

test('POST /api/records/:table with and without the filter', async () => {
  const h = harness();

  const all = asJson(await h.call('POST', '/api/records/Personnes', CREDENTIALS));
  assert.equal(all.payload.count, 3);
  assert.equal(all.payload.total_count, 3);
  assert.equal(all.payload.filtered, false);

  const filtered = asJson(await h.call('POST', '/api/records/Personnes?filter=true', CREDENTIALS));
  assert.deepEqual(filtered.payload.records, [ROWS[0], ROWS[2]]);
  assert.equal(filtered.payload.count, 2);
  assert.equal(filtered.payload.total_count, 3);
  assert.equal(filtered.payload.filter_column, 'Pdf_print');

  const limited = asJson(await h.call('POST', '/api/records/Personnes?limit=1', CREDENTIALS));
  assert.equal(limited.payload.count, 1);

  const invalid = asJson(await h.call('POST', '/api/records/Personnes?limit=zero', CREDENTIALS));
  assert.equal(invalid.status, 400);
});

test('POST /api/preview returns merged HTML and missing fields', async () => {
  const reply = asJson(await harness().call('POST', '/api/preview', {
    template_content: '<p>{{nom}} {{absent}}</p>',
    record_data: { nom: 'Ann' },
    filename_pattern: 'lettre_{nom}',
  }));

  assert.equal(reply.status, 200);
  assert.ok(String(reply.payload.html).includes('<p>Ann {{absent}}</p>'));
  assert.equal(reply.payload.filename, 'lettre_Ann.pdf');
  assert.deepEqual(reply.payload.missing_fields, ['absent']);
});

test('POST /api/preview rejects an empty template', async () => {
  const reply = asJson(await harness().call('POST', '/api/preview', { template_content: '' }));
  assert.equal(reply.status, 400);
  assert.equal(reply.payload.error?.message, 'Invalid preview request');
});

test('POST /api/generate-pdf returns one document', async () => {
  const h = harness();
  const reply = asFile(await h.call('POST', '/api/generate-pdf', {
    template_content: '<p>{{nom}}</p>',
    record_data: { nom: 'Ann' },
    filename_pattern: '{nom}',
    service_name: 'DSI',
  }));

  assert.equal(reply.contentType, 'application/pdf');
  assert.equal(reply.filename, 'Ann.pdf');
  assert.equal(reply.content.toString(), '%PDF Ann');
  assert.deepEqual(h.renderer.requests[0]?.assets, { logo: undefined, signature: undefined, serviceName: 'DSI' });
});

test('POST /api/generate-pdf replies 500 on unexpected renderer errors', async () => {
  const reply = asJson(await harness({ failing: true }).call('POST', '/api/generate-pdf', {
    template_content: '<p>{{nom}}</p>',
    record_data: { nom: 'Ann' },
  }));

  assert.equal(reply.status, 500);
  assert.equal(reply.payload.error?.code, 'INTERNAL_ERROR');
});

test('POST /api/generate-multiple zips the flagged rows', async () => {
  const reply = asFile(await harness().call('POST', '/api/generate-multiple', {
    ...CREDENTIALS,
    template_content: '<p>{{nom}}</p>',
    table_id: 'Personnes',
    apply_filter: true,
    filename_pattern: '{nom}',
  }));

  assert.equal(reply.contentType, 'application/zip');
  assert.equal(reply.filename, 'merge_Personnes_1700000000.zip');
  assert.deepEqual(reply.headers, {
    'X-Batch-Total': '2',
    'X-Batch-Succeeded': '2',
    'X-Batch-Failed': '0',
    'X-Batch-Failed-Rows': '',
  });

  const files = await readArchive(reply.content);
  assert.deepEqual(files.map(f => f.name).sort(), ['Ann.pdf', 'Cy.pdf']);
});

test('POST /api/generate-multiple reports an empty selection', async () => {
  const reply = asJson(await harness({ rows: [{ nom: 'Bob', Pdf_print: false }] }).call('POST', '/api/generate-multiple', {
    ...CREDENTIALS,
    template_content: '<p>{{nom}}</p>',
    table_id: 'Personnes',
    apply_filter: true,
  }));

  assert.equal(reply.status, 404);
  assert.equal(reply.payload.error?.code, 'NO_ROWS');
  assert.equal(reply.payload.error?.message, 'No rows with Pdf_print set among 1');
});

test('POST /api/generate-multiple lists failures when every row fails', async () => {
  const reply = asJson(await harness({ failing: true }).call('POST', '/api/generate-multiple', {
    ...CREDENTIALS,
    template_content: '<p>{{nom}}</p>',
    table_id: 'Personnes',
  }));

  assert.equal(reply.status, 500);
  assert.equal(reply.payload.error?.code, 'ALL_ROWS_FAILED');
  assert.deepEqual(reply.payload.error?.details, {
    reason: 'chromium crashed',
    failures: [
      { row: 1, reason: 'chromium crashed' },
      { row: 2, reason: 'chromium crashed' },
      { row: 3, reason: 'chromium crashed' },
    ],
  });
});

test('template routes save, list, load and delete', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docmerge-http-'));
  try {
    const h = harness({ templatesDir: dir });

    const saved = asJson(await h.call('POST', '/api/save-template', {
      template_name: 'Relance',
      template_content: '<p>{{nom}}</p>',
      filename_pattern: 'relance_{nom}',
    }));
    assert.deepEqual(saved.payload, {
      saved: true,
      name: 'Relance',
      updated_at: '2024-01-15T09:30:00.000Z',
      request_id: 'req-1',
    });

    assert.deepEqual(asJson(await h.call('GET', '/api/templates')).payload.templates, ['Relance']);

    const loaded = asJson(await h.call('GET', '/api/template/Relance'));
    assert.deepEqual(loaded.payload.template, {
      template_content: '<p>{{nom}}</p>',
      template_css: '',
      logo: null,
      signature: null,
      service_name: null,
      table_id: null,
      filename_pattern: 'relance_{nom}',
    });

    const deleted = asJson(await h.call('DELETE', '/api/template/Relance'));
    assert.equal(deleted.payload.deleted, true);

    const missing = asJson(await h.call('GET', '/api/template/Relance'));
    assert.equal(missing.status, 404);
    assert.equal(missing.payload.error?.code, 'NOT_FOUND');
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('malformed path segments reply 400', async () => {
  const reply = asJson(await harness().call('GET', '/api/template/%E0%A4%A'));
  assert.equal(reply.status, 400);
  assert.equal(reply.payload.error?.message, 'Malformed URL');
});
