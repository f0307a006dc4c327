// schemas/docmerge-template-v1.ts
// Stored template record schema as inline TypeScript constant

const nullableString = { type: ['string', 'null'] } as const;

export const DOCMERGE_TEMPLATE_V1_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'docmerge-template/v1.schema.json',
  title: 'Mail merge template v1',
  type: 'object',
  required: [
    'schema',
    'name',
    'content',
    'css',
    'logo',
    'signature',
    'service_name',
    'table_id',
    'filename_pattern',
    'created_at',
    'updated_at',
  ],
  properties: {
    schema: { const: 'docmerge-template/v1' },
    name: { type: 'string', minLength: 1 },
    content: { type: 'string', description: 'Rich-text body with {{field}} placeholders.' },
    css: { type: 'string' },
    logo: { ...nullableString, description: 'Image data URI.' },
    signature: { ...nullableString, description: 'Image data URI.' },
    service_name: nullableString,
    table_id: { ...nullableString, description: 'Table the template was written for.' },
    filename_pattern: { ...nullableString, description: 'Output name with {field} tokens.' },
    created_at: { type: 'string', format: 'date-time' },
    updated_at: { type: 'string', format: 'date-time' },
  },
  additionalProperties: false,
} as const;
