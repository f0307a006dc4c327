// core/schema-registry.ts
// Centralized AJV schema registry for validation

import AjvModule, { type ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { CellValue, StoredTemplate } from '../types/index.js';
import { InputError } from '../types/index.js';
import { DOCMERGE_TEMPLATE_V1_SCHEMA } from '../schemas/docmerge-template-v1.js';
import {
  BATCH_REQUEST_SCHEMA,
  CREDENTIALS_REQUEST_SCHEMA,
  GENERATE_REQUEST_SCHEMA,
  PREVIEW_REQUEST_SCHEMA,
  SAVE_TEMPLATE_REQUEST_SCHEMA,
} from '../schemas/api-requests.js';

// ============================================
// Request body types
// ============================================

export interface CredentialsRequest {
  api_key: string;
  doc_id: string;
}

export interface AssetFields {
  logo?: string | null;
  signature?: string | null;
  service_name?: string | null;
}

export interface PreviewRequest extends AssetFields {
  template_content: string;
  template_css?: string;
  record_data?: Record<string, CellValue>;
  filename_pattern?: string;
}

export interface GenerateRequest extends PreviewRequest {
  record_data: Record<string, CellValue>;
}

export interface BatchRequest extends CredentialsRequest, AssetFields {
  template_content: string;
  template_css?: string;
  table_id: string;
  apply_filter?: boolean;
  filename_pattern?: string;
}

export interface SaveTemplateRequest extends AssetFields {
  template_name: string;
  template_content: string;
  template_css?: string;
  table_id?: string | null;
  filename_pattern?: string | null;
}

// Both packages are CommonJS; under ESM the classes sit on `default`
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

// Create singleton AJV instance
const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
addFormats(ajv);

export const validateStoredTemplate: ValidateFunction<StoredTemplate> =
  ajv.compile<StoredTemplate>(DOCMERGE_TEMPLATE_V1_SCHEMA);

export const validateCredentialsRequest: ValidateFunction<CredentialsRequest> =
  ajv.compile<CredentialsRequest>(CREDENTIALS_REQUEST_SCHEMA);

export const validatePreviewRequest: ValidateFunction<PreviewRequest> =
  ajv.compile<PreviewRequest>(PREVIEW_REQUEST_SCHEMA);

export const validateGenerateRequest: ValidateFunction<GenerateRequest> =
  ajv.compile<GenerateRequest>(GENERATE_REQUEST_SCHEMA);

export const validateBatchRequest: ValidateFunction<BatchRequest> =
  ajv.compile<BatchRequest>(BATCH_REQUEST_SCHEMA);

export const validateSaveTemplateRequest: ValidateFunction<SaveTemplateRequest> =
  ajv.compile<SaveTemplateRequest>(SAVE_TEMPLATE_REQUEST_SCHEMA);

/**
 * Join validator errors into one line
 */
export function describeSchemaErrors(validate: Pick<ValidateFunction, 'errors'>): string {
  const errors = validate.errors ?? [];
  return errors.map(e => `${e.instancePath || 'root'}: ${e.message ?? 'invalid'}`).join('; ');
}

/**
 * Validate a parsed JSON value, throwing InputError with the schema reasons
 */
export function assertValid<T>(validate: ValidateFunction<T>, value: unknown, label: string): T {
  if (!validate(value)) {
    throw new InputError(`Invalid ${label}`, describeSchemaErrors(validate));
  }
  return value;
}
