// schemas/api-requests.ts
// JSON request body schemas for the HTTP API

const nullableString = { type: ['string', 'null'] } as const;

const credentials = {
  api_key: { type: 'string', minLength: 1 },
  doc_id: { type: 'string', minLength: 1 },
} as const;

const assets = {
  logo: nullableString,
  signature: nullableString,
  service_name: nullableString,
} as const;

const recordData = {
  type: 'object',
  additionalProperties: { type: ['string', 'number', 'boolean', 'null'] },
} as const;

export const CREDENTIALS_REQUEST_SCHEMA = {
  $id: 'docmerge-api/credentials.schema.json',
  type: 'object',
  required: ['api_key', 'doc_id'],
  properties: credentials,
} as const;

export const PREVIEW_REQUEST_SCHEMA = {
  $id: 'docmerge-api/preview.schema.json',
  type: 'object',
  required: ['template_content'],
  properties: {
    template_content: { type: 'string', minLength: 1 },
    template_css: { type: 'string' },
    record_data: recordData,
    filename_pattern: { type: 'string' },
    ...assets,
  },
} as const;

export const GENERATE_REQUEST_SCHEMA = {
  $id: 'docmerge-api/generate.schema.json',
  type: 'object',
  required: ['template_content', 'record_data'],
  properties: {
    ...PREVIEW_REQUEST_SCHEMA.properties,
    record_data: { ...recordData, minProperties: 1 },
  },
} as const;

export const BATCH_REQUEST_SCHEMA = {
  $id: 'docmerge-api/batch.schema.json',
  type: 'object',
  required: ['api_key', 'doc_id', 'template_content', 'table_id'],
  properties: {
    ...credentials,
    template_content: { type: 'string', minLength: 1 },
    template_css: { type: 'string' },
    table_id: { type: 'string', minLength: 1 },
    apply_filter: { type: 'boolean' },
    filename_pattern: { type: 'string' },
    ...assets,
  },
} as const;

export const SAVE_TEMPLATE_REQUEST_SCHEMA = {
  $id: 'docmerge-api/save-template.schema.json',
  type: 'object',
  required: ['template_name', 'template_content'],
  properties: {
    template_name: { type: 'string', minLength: 1 },
    template_content: { type: 'string', minLength: 1 },
    template_css: { type: 'string' },
    table_id: nullableString,
    filename_pattern: nullableString,
    ...assets,
  },
} as const;
