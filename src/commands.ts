// commands.ts
// CLI command bodies, kept apart from argument parsing so they can be tested

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Assets, BatchResult, DocumentRenderer, Row, StoredTemplate, Template } from './types/index.js';
import { MergeError } from './types/index.js';
import { loadConfig, parseIntOption, type AppConfig } from './core/config.js';
import { CsvDataSource } from './core/datasource.js';
import { FileTemplateStore } from './core/template-store.js';
import { ChromiumRenderer, type ChromiumRendererOptions } from './core/document-renderer.js';
import { buildRenderRequest } from './core/merge-context.js';
import { composeDocument } from './core/html-writer.js';
import { runBatch } from './core/batch-orchestrator.js';

export interface CommonOptions {
  templates?: string;
  concurrency?: string;
}

export interface PreviewOptions extends CommonOptions {
  row: string;
  output: string;
}

export interface BatchCommandOptions extends CommonOptions {
  filter?: string | boolean;
  pattern?: string;
  output: string;
  chromium?: string;
}

export type RendererFactory = (options: ChromiumRendererOptions) => DocumentRenderer;

export function templateOf(stored: StoredTemplate): Template {
  return { bodyMarkup: stored.content, css: stored.css };
}

export function assetsOf(stored: StoredTemplate): Assets {
  return {
    logo: stored.logo ?? undefined,
    signature: stored.signature ?? undefined,
    serviceName: stored.service_name ?? undefined,
  };
}

export function configWith(options: CommonOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = loadConfig(env);
  if (options.templates) config.templatesDir = options.templates;
  if (options.concurrency) {
    config.renderConcurrency = parseIntOption('concurrency', options.concurrency, 1);
  }
  return config;
}

/**
 * A CSV file is read as a table of a CSV data source rooted at its directory
 */
export async function loadCsvRows(csvPath: string): Promise<Row[]> {
  const source = new CsvDataSource(path.dirname(csvPath));
  return source.listRows(path.basename(csvPath, path.extname(csvPath)));
}

export async function previewCommand(templateName: string, csvPath: string, options: PreviewOptions): Promise<void> {
  const config = configWith(options);
  const stored = await new FileTemplateStore(config.templatesDir).load(templateName);
  const rows = await loadCsvRows(csvPath);

  const position = parseIntOption('row', options.row, 1);
  const row = rows[position - 1];
  if (!row) {
    throw new MergeError(`Row ${position} not found`, 'NOT_FOUND', `${csvPath} has ${rows.length} rows`);
  }

  const request = buildRenderRequest({
    template: templateOf(stored),
    row,
    assets: assetsOf(stored),
    filenamePattern: stored.filename_pattern ?? 'document',
    position,
  });

  await fs.writeFile(options.output, composeDocument(request), 'utf-8');
  console.log(`Written: ${options.output}`);
}

export async function batchCommand(
  templateName: string,
  csvPath: string,
  options: BatchCommandOptions,
  createRenderer: RendererFactory = (rendererOptions) => new ChromiumRenderer(rendererOptions)
): Promise<BatchResult> {
  const config = configWith(options);
  const renderer = createRenderer({
    maxConcurrency: config.renderConcurrency,
    timeoutMs: config.renderTimeoutMs,
    executablePath: options.chromium ?? config.chromiumPath,
  });

  try {
    const stored = await new FileTemplateStore(config.templatesDir).load(templateName);
    const rows = await loadCsvRows(csvPath);
    console.log(`Loaded ${rows.length} rows from ${csvPath}`);

    const filterColumn = typeof options.filter === 'string' ? options.filter : config.filterColumn;

    const result = await runBatch({
      rows,
      template: templateOf(stored),
      assets: assetsOf(stored),
      filenamePattern: options.pattern ?? stored.filename_pattern ?? 'document_{index}',
      filter: { enabled: options.filter !== undefined, columnName: filterColumn },
      renderer,
      concurrency: config.renderConcurrency,
      onProgress: (processed, total, entry) => {
        const status = entry.outcome.status === 'success' ? entry.outcome.filename : 'failed';
        console.log(`  [${processed}/${total}] row ${entry.index + 1}: ${status}`);
      },
    });

    await fs.writeFile(options.output, result.archive);
    console.log(`\n✓ ${result.succeeded}/${result.filteredCount} documents written to ${options.output}`);
    if (result.failed > 0) {
      console.log(`✗ ${result.failed} failed`);
      for (const entry of result.entries) {
        if (entry.outcome.status === 'failure') {
          console.log(`  - row ${entry.index + 1}: ${entry.outcome.reason}`);
        }
      }
    }
    return result;
  } finally {
    await renderer.close().catch((error: unknown) => console.error(error));
  }
}
