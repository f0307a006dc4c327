// core/http-server.ts
// HTTP API for previews, single documents, batches and template storage

import * as http from 'http';
import type {
  Assets,
  DocumentRenderer,
  Row,
  Template,
  TemplateStore,
} from '../types/index.js';
import {
  AllRowsFailedError,
  InputError,
  MergeError,
  RESERVED_PLACEHOLDERS,
} from '../types/index.js';
import type { AppConfig } from './config.js';
import type { Credentials, DataSource } from './datasource.js';
import { GristDataSource } from './datasource.js';
import { applyFilter } from './filter-engine.js';
import { findMissingFields } from './field-resolver.js';
import { sanitizeFilename, withPdfExtension } from './filename-resolver.js';
import { buildRenderRequest } from './merge-context.js';
import { composeDocument } from './html-writer.js';
import { runBatch } from './batch-orchestrator.js';
import {
  assertValid,
  validateBatchRequest,
  validateCredentialsRequest,
  validateGenerateRequest,
  validatePreviewRequest,
  validateSaveTemplateRequest,
  type AssetFields,
} from './schema-registry.js';

export const PACKAGE_VERSION = '0.1.0';
const API_VERSION = 'api/v1';

export interface ServerDependencies {
  config: AppConfig;
  renderer: DocumentRenderer;
  templates: TemplateStore;
  createDataSource?: (credentials: Credentials) => DataSource;
  now?: () => Date;
}

export interface ApiRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
  body: unknown;
  requestId: string;
}

interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface JsonReply {
  kind: 'json';
  status: number;
  payload: { error?: ApiError; [key: string]: unknown };
}

export interface FileReply {
  kind: 'file';
  status: number;
  contentType: string;
  filename: string;
  content: Buffer;
  headers: Record<string, string>;
}

export type ApiReply = JsonReply | FileReply;

function json(payload: JsonReply['payload'], status = 200): JsonReply {
  return { kind: 'json', status, payload };
}

function toAssets(fields: AssetFields): Assets {
  return {
    logo: fields.logo ?? undefined,
    signature: fields.signature ?? undefined,
    serviceName: fields.service_name ?? undefined,
  };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InputError('Malformed URL', segment);
  }
}

export function getErrorStatusCode(code: string): number {
  switch (code) {
    case 'BAD_REQUEST':
    case 'INVALID_JSON':
      return 400;
    case 'NOT_FOUND':
    case 'NO_ROWS':
      return 404;
    case 'PAYLOAD_TOO_LARGE':
      return 413;
    case 'RENDER_ERROR':
    case 'RENDER_TIMEOUT':
    case 'INVALID_MARKUP':
    case 'ASSET_DECODE':
      return 422;
    case 'CONNECTION_ERROR':
      return 502;
    default:
      return 500;
  }
}

export class MergeServer {
  private server: http.Server;
  private readonly createDataSource: (credentials: Credentials) => DataSource;
  private readonly now: () => Date;

  constructor(private readonly deps: ServerDependencies) {
    this.createDataSource = deps.createDataSource ?? ((credentials) => new GristDataSource({
      ...credentials,
      server: deps.config.gristServer,
      timeoutMs: deps.config.dataSourceTimeoutMs,
    }));
    this.now = deps.now ?? (() => new Date());
    this.server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
  }

  start(): Promise<void> {
    const { port, host } = this.deps.config;

    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        console.log(`Mail merge server started on http://${host}:${port}`);
        console.log(`Templates folder: ${this.deps.config.templatesDir}`);
        if (host !== '127.0.0.1') {
          console.warn('Warning: Server bound to non-localhost address. Ensure proper firewall rules.');
        }
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Route a parsed request. Errors become JSON error replies.
   */
  async dispatch(request: ApiRequest): Promise<ApiReply> {
    let reply: ApiReply;

    try {
      reply = await this.route(request);
    } catch (error) {
      reply = this.errorReply(error, request.requestId);
    }

    if (reply.kind === 'json') {
      reply.payload.request_id = request.requestId;
    }
    return reply;
  }

  private async route(request: ApiRequest): Promise<ApiReply> {
    const { method, pathname, query, body } = request;
    const segments = pathname.split('/').filter(Boolean).map(decodeSegment);

    if (segments[0] !== 'api') {
      return json({ error: { code: 'NOT_FOUND', message: `Not found: ${pathname}` } }, 404);
    }

    const [, resource, param] = segments;
    const route = `${method} ${resource ?? ''}`;

    switch (route) {
      case 'GET version':
        return json({ version: PACKAGE_VERSION, api: API_VERSION });
      case 'GET config':
        if (param === 'filter-column') {
          return json({ filter_column: this.deps.config.filterColumn });
        }
        break;
      case 'POST test-connection':
        return this.handleTestConnection(body);
      case 'POST tables':
        return this.handleTables(body);
      case 'POST columns':
        if (param) return this.handleColumns(param, body);
        break;
      case 'POST records':
        if (param) return this.handleRecords(param, query, body);
        break;
      case 'POST preview':
        return this.handlePreview(body);
      case 'POST generate-pdf':
        return this.handleGeneratePdf(body);
      case 'POST generate-multiple':
        return this.handleGenerateMultiple(body);
      case 'POST save-template':
        return this.handleSaveTemplate(body);
      case 'GET templates':
        return json({ templates: await this.deps.templates.list() });
      case 'GET template':
        if (param) return this.handleLoadTemplate(param);
        break;
      case 'DELETE template':
        if (param) {
          await this.deps.templates.delete(param);
          return json({ deleted: true, name: param });
        }
        break;
      default:
        break;
    }

    return json({ error: { code: 'NOT_FOUND', message: `API endpoint not found: ${method} ${pathname}` } }, 404);
  }

  // ============================================
  // Data source
  // ============================================

  private dataSourceFor(body: unknown): DataSource {
    const { api_key, doc_id } = assertValid(validateCredentialsRequest, body, 'credentials');
    return this.createDataSource({ apiKey: api_key, docId: doc_id });
  }

  private async handleTestConnection(body: unknown): Promise<ApiReply> {
    const connected = await this.dataSourceFor(body).testConnection();
    if (!connected) {
      return json({ error: { code: 'CONNECTION_ERROR', message: 'Connection to data source failed' } }, 502);
    }
    return json({ connected: true });
  }

  private async handleTables(body: unknown): Promise<ApiReply> {
    const tables = await this.dataSourceFor(body).listTables();
    return json({ tables });
  }

  private async handleColumns(table: string, body: unknown): Promise<ApiReply> {
    const columns = await this.dataSourceFor(body).listColumns(table);
    return json({ columns });
  }

  private async handleRecords(table: string, query: URLSearchParams, body: unknown): Promise<ApiReply> {
    const rawLimit = query.get('limit');
    let limit: number | undefined;
    if (rawLimit !== null) {
      limit = Number(rawLimit);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new InputError('Invalid limit', `Expected a positive integer, got "${rawLimit}"`);
      }
    }

    const rows = await this.dataSourceFor(body).listRows(table, limit);

    if (query.get('filter')?.toLowerCase() === 'true') {
      const columnName = this.deps.config.filterColumn;
      const result = applyFilter(rows, { enabled: true, columnName });
      return json({
        records: result.rows,
        count: result.filteredCount,
        total_count: result.totalCount,
        filtered: true,
        filter_column: columnName,
      });
    }

    return json({ records: rows, count: rows.length, total_count: rows.length, filtered: false });
  }

  // ============================================
  // Documents
  // ============================================

  private handlePreview(body: unknown): ApiReply {
    const input = assertValid(validatePreviewRequest, body, 'preview request');
    const template: Template = { bodyMarkup: input.template_content, css: input.template_css ?? '' };
    const row: Row = input.record_data ?? {};

    const request = buildRenderRequest({
      template,
      row,
      assets: toAssets(input),
      filenamePattern: input.filename_pattern ?? 'document',
    });

    return json({
      html: composeDocument(request),
      filename: withPdfExtension(request.filename),
      missing_fields: findMissingFields(template.bodyMarkup, row, RESERVED_PLACEHOLDERS),
    });
  }

  private async handleGeneratePdf(body: unknown): Promise<ApiReply> {
    const input = assertValid(validateGenerateRequest, body, 'document request');

    const request = buildRenderRequest({
      template: { bodyMarkup: input.template_content, css: input.template_css ?? '' },
      row: input.record_data,
      assets: toAssets(input),
      filenamePattern: input.filename_pattern ?? 'document',
    });

    const content = await this.deps.renderer.render(request);
    const filename = withPdfExtension(request.filename);
    console.log(`PDF generated: ${filename} (${content.length} bytes)`);

    return {
      kind: 'file',
      status: 200,
      contentType: 'application/pdf',
      filename,
      content,
      headers: {},
    };
  }

  private async handleGenerateMultiple(body: unknown): Promise<ApiReply> {
    const input = assertValid(validateBatchRequest, body, 'batch request');
    const dataSource = this.createDataSource({ apiKey: input.api_key, docId: input.doc_id });
    const rows = await dataSource.listRows(input.table_id);

    const result = await runBatch({
      rows,
      template: { bodyMarkup: input.template_content, css: input.template_css ?? '' },
      assets: toAssets(input),
      filenamePattern: input.filename_pattern ?? 'document_{index}',
      filter: { enabled: input.apply_filter ?? false, columnName: this.deps.config.filterColumn },
      renderer: this.deps.renderer,
      concurrency: this.deps.config.renderConcurrency,
    });

    console.log(
      `Batch ${input.table_id}: ${result.succeeded}/${result.filteredCount} documents generated` +
      ` (${result.totalCount} rows in table)`
    );

    const failedRows = result.entries
      .filter(entry => entry.outcome.status === 'failure')
      .map(entry => String(entry.index + 1));

    const stamp = Math.floor(this.now().getTime() / 1000);
    return {
      kind: 'file',
      status: 200,
      contentType: 'application/zip',
      filename: `merge_${sanitizeFilename(input.table_id)}_${stamp}.zip`,
      content: result.archive,
      headers: {
        'X-Batch-Total': String(result.filteredCount),
        'X-Batch-Succeeded': String(result.succeeded),
        'X-Batch-Failed': String(result.failed),
        'X-Batch-Failed-Rows': failedRows.join(','),
      },
    };
  }

  // ============================================
  // Templates
  // ============================================

  private async handleSaveTemplate(body: unknown): Promise<ApiReply> {
    const input = assertValid(validateSaveTemplateRequest, body, 'template');

    const saved = await this.deps.templates.save(input.template_name, {
      name: input.template_name,
      content: input.template_content,
      css: input.template_css ?? '',
      logo: input.logo ?? null,
      signature: input.signature ?? null,
      service_name: input.service_name ?? null,
      table_id: input.table_id ?? null,
      filename_pattern: input.filename_pattern ?? null,
    });

    return json({ saved: true, name: saved.name, updated_at: saved.updated_at });
  }

  private async handleLoadTemplate(name: string): Promise<ApiReply> {
    const stored = await this.deps.templates.load(name);
    return json({
      template: {
        template_content: stored.content,
        template_css: stored.css,
        logo: stored.logo,
        signature: stored.signature,
        service_name: stored.service_name,
        table_id: stored.table_id,
        filename_pattern: stored.filename_pattern,
      },
    });
  }

  // ============================================
  // Transport
  // ============================================

  private errorReply(error: unknown, requestId: string): JsonReply {
    if (error instanceof MergeError) {
      const details: Record<string, unknown> = {};
      if (error.reason) details.reason = error.reason;
      if (error instanceof AllRowsFailedError) {
        details.failures = error.failures.map(entry => ({
          row: entry.index + 1,
          reason: entry.outcome.status === 'failure' ? entry.outcome.reason : '',
        }));
      }

      const status = getErrorStatusCode(error.code);
      if (status >= 500) {
        console.error(`[${requestId}] ${error.name}: ${error.message}${error.reason ? ` (${error.reason})` : ''}`);
      }

      return json({
        error: {
          code: error.code,
          message: error.message,
          ...(Object.keys(details).length > 0 ? { details } : {}),
        },
      }, status);
    }

    console.error(`[${requestId}] Error:`, error);
    return json({
      error: {
        code: 'INTERNAL_ERROR',
        message: error instanceof Error ? error.message : 'Unknown error',
      },
    }, 500);
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = this.generateRequestId();
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    let reply: ApiReply;
    try {
      const body = method === 'POST' ? await this.parseBody(req) : undefined;
      reply = await this.dispatch({ method, pathname: url.pathname, query: url.searchParams, body, requestId });
    } catch (error) {
      reply = this.errorReply(error, requestId);
      reply.payload.request_id = requestId;
    }

    res.statusCode = reply.status;
    if (reply.kind === 'file') {
      res.setHeader('Content-Type', reply.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${reply.filename}"`);
      res.setHeader('Content-Length', reply.content.length);
      for (const [name, value] of Object.entries(reply.headers)) {
        res.setHeader(name, value);
      }
      res.end(reply.content);
      return;
    }

    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify(reply.payload));
  }

  private generateRequestId(): string {
    return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
  }

  private parseBody(req: http.IncomingMessage): Promise<unknown> {
    const limit = this.deps.config.maxBodyBytes;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
        if (rejected) return;
        size += chunk.length;
        if (size > limit) {
          rejected = true;
          reject(new MergeError('Request body too large', 'PAYLOAD_TOO_LARGE', `Limit is ${limit} bytes`));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (rejected) return;
        const text = Buffer.concat(chunks).toString('utf-8');
        try {
          resolve(text ? JSON.parse(text) : {});
        } catch {
          reject(new MergeError('Invalid JSON in request body', 'INVALID_JSON'));
        }
      });
      req.on('error', reject);
    });
  }
}
