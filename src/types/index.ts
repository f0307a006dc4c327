// types/index.ts

// ============================================
// Data Types
// ============================================

export type CellValue = string | number | boolean | null;

/**
 * One record of a table. Keys are column names; the key set may differ between rows.
 */
export type Row = Readonly<Record<string, CellValue>>;

export type ColumnName = string;

export interface TableRef {
  id: string;
}

// ============================================
// Template Types
// ============================================

export interface Template {
  readonly bodyMarkup: string;
  readonly css: string;
}

export function templatesEqual(a: Template, b: Template): boolean {
  return a.bodyMarkup === b.bodyMarkup && a.css === b.css;
}

/**
 * Branding attached to a render request. Images are data URIs.
 */
export interface Assets {
  readonly logo?: string;
  readonly signature?: string;
  readonly serviceName?: string;
}

/**
 * Placeholder names filled from Assets by the renderer, never from row data.
 */
export const RESERVED_PLACEHOLDERS = ['logo', 'signature', 'service_name'] as const;

export interface FilterSpec {
  enabled: boolean;
  columnName: string;
}

export interface FilterResult {
  rows: Row[];
  totalCount: number;
  filteredCount: number;
}

// ============================================
// Render Types
// ============================================

export interface RenderRequest {
  readonly bodyMarkup: string;
  readonly css: string;
  readonly row: Row;
  readonly assets: Assets;
  /** Sanitized, without extension */
  readonly filename: string;
}

export interface DocumentRenderer {
  render(request: RenderRequest): Promise<Buffer>;
  close(): Promise<void>;
}

export interface RenderSuccess {
  status: 'success';
  bytes: Buffer;
  filename: string;
}

export interface RenderFailure {
  status: 'failure';
  reason: string;
  code: string;
}

export type RenderOutcome = RenderSuccess | RenderFailure;

export interface BatchEntry {
  /** Index into the filtered row set */
  index: number;
  outcome: RenderOutcome;
}

export interface BatchResult {
  entries: BatchEntry[];
  totalCount: number;
  filteredCount: number;
  succeeded: number;
  failed: number;
  archive: Buffer;
}

// ============================================
// Template Storage Types
// ============================================

export interface StoredTemplate {
  schema: 'docmerge-template/v1';
  name: string;
  content: string;
  css: string;
  logo: string | null;
  signature: string | null;
  service_name: string | null;
  table_id: string | null;
  filename_pattern: string | null;
  created_at: string;
  updated_at: string;
}

export type TemplateDraft = Omit<StoredTemplate, 'schema' | 'created_at' | 'updated_at'>;

export interface TemplateStore {
  save(name: string, draft: TemplateDraft): Promise<StoredTemplate>;
  load(name: string): Promise<StoredTemplate>;
  list(): Promise<string[]>;
  delete(name: string): Promise<void>;
}

// ============================================
// Error Types
// ============================================

export class MergeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly reason?: string
  ) {
    super(message);
    this.name = 'MergeError';
  }
}

export class InputError extends MergeError {
  constructor(message: string, reason?: string) {
    super(message, 'BAD_REQUEST', reason);
    this.name = 'InputError';
  }
}

export class ConnectionError extends MergeError {
  constructor(message: string, reason?: string) {
    super(message, 'CONNECTION_ERROR', reason);
    this.name = 'ConnectionError';
  }
}

export class NotFoundError extends MergeError {
  constructor(message: string, reason?: string) {
    super(message, 'NOT_FOUND', reason);
    this.name = 'NotFoundError';
  }
}

export class RenderError extends MergeError {
  constructor(message: string, code = 'RENDER_ERROR', reason?: string) {
    super(message, code, reason);
    this.name = 'RenderError';
  }
}

export class RenderTimeoutError extends RenderError {
  constructor(message: string, reason?: string) {
    super(message, 'RENDER_TIMEOUT', reason);
    this.name = 'RenderTimeoutError';
  }
}

export class InvalidMarkupError extends RenderError {
  constructor(message: string, reason?: string) {
    super(message, 'INVALID_MARKUP', reason);
    this.name = 'InvalidMarkupError';
  }
}

export class AssetDecodeError extends RenderError {
  constructor(message: string, reason?: string) {
    super(message, 'ASSET_DECODE', reason);
    this.name = 'AssetDecodeError';
  }
}

export class NoRowsError extends MergeError {
  constructor(message = 'No rows to render', reason?: string) {
    super(message, 'NO_ROWS', reason);
    this.name = 'NoRowsError';
  }
}

function firstFailureReason(entries: BatchEntry[]): string | undefined {
  for (const entry of entries) {
    if (entry.outcome.status === 'failure') return entry.outcome.reason;
  }
  return undefined;
}

export class AllRowsFailedError extends MergeError {
  constructor(public readonly failures: BatchEntry[]) {
    super(
      `All ${failures.length} documents failed to render`,
      'ALL_ROWS_FAILED',
      firstFailureReason(failures)
    );
    this.name = 'AllRowsFailedError';
  }
}

export class PackagingError extends MergeError {
  constructor(message: string, reason?: string) {
    super(message, 'PACKAGING_ERROR', reason);
    this.name = 'PackagingError';
  }
}

/**
 * Render an unknown thrown value as a one-line reason.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
