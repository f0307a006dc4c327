// core/datasource.ts
// Tabular data sources: Grist REST API and local CSV directories

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import type { CellValue, ColumnName, Row, TableRef } from '../types/index.js';
import { ConnectionError, NotFoundError, describeError } from '../types/index.js';

export interface DataSource {
  listTables(): Promise<TableRef[]>;
  listColumns(table: string): Promise<ColumnName[]>;
  listRows(table: string, limit?: number): Promise<Row[]>;
  testConnection(): Promise<boolean>;
}

export interface Credentials {
  apiKey: string;
  docId: string;
}

// ============================================
// Normalization
// ============================================

/**
 * Reduce an upstream cell to a scalar. Lists, references and other
 * structured cells become their JSON text.
 */
export function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  return JSON.stringify(value);
}

export function normalizeRow(record: unknown): Row {
  const row: Record<string, CellValue> = {};
  if (!record || typeof record !== 'object' || Array.isArray(record)) {
    return row;
  }
  for (const [key, value] of Object.entries(record)) {
    row[key] = normalizeCell(value);
  }
  return row;
}

/**
 * Columns arrive as plain names or as `{ id }` objects depending on the source
 */
export function normalizeColumnName(column: unknown): ColumnName | null {
  if (typeof column === 'string') return column;
  if (column && typeof column === 'object' && 'id' in column) {
    const id: unknown = column.id;
    return typeof id === 'string' ? id : null;
  }
  return null;
}

// ============================================
// Grist
// ============================================

export interface GristDataSourceOptions extends Credentials {
  server: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

const HIDDEN_COLUMN_PREFIX = 'gristHelper_';

export class GristDataSource implements DataSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GristDataSourceOptions) {
    this.baseUrl = `${options.server.replace(/\/+$/, '')}/api/docs/${encodeURIComponent(options.docId)}`;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.request('');
      return true;
    } catch (error) {
      if (error instanceof ConnectionError || error instanceof NotFoundError) {
        console.warn(`[grist] Connection test failed: ${error.message}`);
        return false;
      }
      throw error;
    }
  }

  async listTables(): Promise<TableRef[]> {
    const body = await this.request('/tables');
    const tables = readArray(body, 'tables');
    const refs: TableRef[] = [];
    for (const table of tables) {
      const id = normalizeColumnName(table);
      if (id) refs.push({ id });
    }
    return refs;
  }

  async listColumns(table: string): Promise<ColumnName[]> {
    const body = await this.request(`/tables/${encodeURIComponent(table)}/columns`);
    return readArray(body, 'columns')
      .map(normalizeColumnName)
      .filter((name): name is ColumnName => name !== null && !name.startsWith(HIDDEN_COLUMN_PREFIX));
  }

  async listRows(table: string, limit?: number): Promise<Row[]> {
    const query = limit ? `?limit=${limit}` : '';
    const body = await this.request(`/tables/${encodeURIComponent(table)}/records${query}`);
    return readArray(body, 'records').map(record => {
      const fields = record && typeof record === 'object' && 'fields' in record ? record.fields : {};
      return normalizeRow(fields);
    });
  }

  private async request(pathname: string): Promise<unknown> {
    const url = `${this.baseUrl}${pathname}`;
    let response: Response;

    try {
      response = await this.fetchImpl(url, {
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          Accept: 'application/json',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ConnectionError('Data source unreachable', describeError(error));
    }

    if (response.status === 404) {
      throw new NotFoundError('Not found in data source', pathname || '/');
    }
    if (response.status === 401 || response.status === 403) {
      throw new ConnectionError('Data source rejected the credentials', `HTTP ${response.status}`);
    }
    if (!response.ok) {
      throw new ConnectionError('Data source request failed', `HTTP ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new ConnectionError('Invalid JSON from data source', describeError(error));
    }
  }
}

function readArray(body: unknown, key: string): unknown[] {
  if (!body || typeof body !== 'object') return [];
  const value: unknown = Object.getOwnPropertyDescriptor(body, key)?.value;
  return Array.isArray(value) ? value : [];
}

// ============================================
// CSV directory
// ============================================

/**
 * Cast CSV text so flag and numeric columns compare like remote data:
 * "true"/"false" become booleans, numeric literals numbers, empty cells null.
 */
export function castCsvValue(value: string): CellValue {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  if (trimmed === 'true' || trimmed === 'TRUE') return true;
  if (trimmed === 'false' || trimmed === 'FALSE') return false;
  if (/^-?\d+(\.\d+)?$/.test(trimmed) && !/^-?0\d/.test(trimmed)) return Number(trimmed);
  return value;
}

/**
 * Parse CSV content with a header row into rows
 */
export function parseCsvRows(content: Buffer | string, delimiter = ','): Row[] {
  const records: unknown[] = parse(content, {
    delimiter,
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });

  return records.map(record => {
    const row: Record<string, CellValue> = {};
    if (record && typeof record === 'object') {
      for (const [key, value] of Object.entries(record)) {
        row[key] = typeof value === 'string' ? castCsvValue(value) : normalizeCell(value);
      }
    }
    return row;
  });
}

/**
 * A directory of `<table>.csv` files
 */
export class CsvDataSource implements DataSource {
  constructor(
    private readonly dir: string,
    private readonly delimiter = ','
  ) {}

  async testConnection(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.dir);
      return stats.isDirectory();
    } catch (error) {
      console.warn(`[csv] Cannot read ${this.dir}: ${describeError(error)}`);
      return false;
    }
  }

  async listTables(): Promise<TableRef[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.dir);
    } catch (error) {
      throw new ConnectionError(`Cannot read data directory: ${this.dir}`, describeError(error));
    }
    return files
      .filter(file => file.toLowerCase().endsWith('.csv'))
      .sort()
      .map(file => ({ id: path.basename(file, path.extname(file)) }));
  }

  async listColumns(table: string): Promise<ColumnName[]> {
    const content = await this.readTable(table);
    const firstLine = parse(content, {
      delimiter: this.delimiter,
      to_line: 1,
      trim: true,
      bom: true,
    });
    const header: unknown = Array.isArray(firstLine) ? firstLine[0] : undefined;
    return Array.isArray(header) ? header.map(String) : [];
  }

  async listRows(table: string, limit?: number): Promise<Row[]> {
    const rows = parseCsvRows(await this.readTable(table), this.delimiter);
    return limit ? rows.slice(0, limit) : rows;
  }

  private async readTable(table: string): Promise<Buffer> {
    if (!/^[\w.-]+$/.test(table) || table.startsWith('.')) {
      throw new NotFoundError(`Table not found: ${table}`);
    }
    const filePath = path.join(this.dir, `${table}.csv`);
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw new NotFoundError(`Table not found: ${table}`, describeError(error));
    }
  }
}
