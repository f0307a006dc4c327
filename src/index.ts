// index.ts
// Main exports for docmerge

export * from './types/index.js';
export * from './core/config.js';
export * from './core/formatter.js';
export * from './core/field-resolver.js';
export * from './core/filter-engine.js';
export * from './core/filename-resolver.js';
export * from './core/merge-context.js';
export * from './core/html-writer.js';
export * from './core/limiter.js';
export * from './core/document-renderer.js';
export * from './core/zip-handler.js';
export * from './core/batch-orchestrator.js';
export * from './core/datasource.js';
export * from './core/schema-registry.js';
export * from './core/template-store.js';
export * from './core/http-server.js';
