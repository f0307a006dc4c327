#!/usr/bin/env node
// cli.ts
// CLI entry point for docmerge

import { Command } from 'commander';
import { AllRowsFailedError, MergeError } from './types/index.js';
import { parseIntOption } from './core/config.js';
import { FileTemplateStore } from './core/template-store.js';
import { ChromiumRenderer } from './core/document-renderer.js';
import { MergeServer, PACKAGE_VERSION } from './core/http-server.js';
import {
  batchCommand,
  configWith,
  previewCommand,
  type BatchCommandOptions,
  type PreviewOptions,
} from './commands.js';

const program = new Command();

program
  .name('docmerge')
  .description('Mail merge: render one PDF per table row from a rich-text template')
  .version(PACKAGE_VERSION);

program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port (default: $PORT or 5000)')
  .option('-H, --host <host>', 'Host (default: $HOST or 127.0.0.1)')
  .option('-t, --templates <path>', 'Templates directory')
  .option('-c, --concurrency <n>', 'Documents rendered at once')
  .option('--chromium <path>', 'Chromium executable')
  .action(async (options: { port?: string; host?: string; templates?: string; concurrency?: string; chromium?: string }) => {
    try {
      const config = configWith(options);
      if (options.port) config.port = parseIntOption('port', options.port, 0);
      if (options.host) config.host = options.host;
      if (options.chromium) config.chromiumPath = options.chromium;

      const renderer = new ChromiumRenderer({
        maxConcurrency: config.renderConcurrency,
        timeoutMs: config.renderTimeoutMs,
        executablePath: config.chromiumPath,
      });
      const server = new MergeServer({
        config,
        renderer,
        templates: new FileTemplateStore(config.templatesDir),
      });

      await server.start();

      const shutdown = async (): Promise<void> => {
        console.log('\nShutting down...');
        await server.stop();
        await renderer.close();
        process.exit(0);
      };
      process.once('SIGINT', () => void shutdown().catch(handleError));
      process.once('SIGTERM', () => void shutdown().catch(handleError));
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('preview')
  .description('Write the merged HTML of one CSV row')
  .argument('<template>', 'Saved template name')
  .argument('<csv>', 'CSV file with a header row')
  .option('-r, --row <n>', 'Row number, 1-based', '1')
  .option('-o, --output <path>', 'Output HTML file', 'preview.html')
  .option('-t, --templates <path>', 'Templates directory')
  .action(async (templateName: string, csvPath: string, options: PreviewOptions) => {
    try {
      await previewCommand(templateName, csvPath, options);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('batch')
  .description('Render every CSV row to PDF and write a zip')
  .argument('<template>', 'Saved template name')
  .argument('<csv>', 'CSV file with a header row')
  .option('-f, --filter [column]', 'Only rows whose flag column is true or 1')
  .option('-p, --pattern <pattern>', 'Filename pattern with {column} tokens')
  .option('-o, --output <path>', 'Output zip file', 'documents.zip')
  .option('-c, --concurrency <n>', 'Documents rendered at once')
  .option('-t, --templates <path>', 'Templates directory')
  .option('--chromium <path>', 'Chromium executable')
  .action(async (templateName: string, csvPath: string, options: BatchCommandOptions) => {
    try {
      await batchCommand(templateName, csvPath, options);
    } catch (error) {
      handleError(error);
    }
  });

const templates = program
  .command('templates')
  .description('Manage saved templates');

templates
  .command('list')
  .option('-t, --templates <path>', 'Templates directory')
  .action(async (options: { templates?: string }) => {
    try {
      const names = await new FileTemplateStore(configWith(options).templatesDir).list();
      if (names.length === 0) {
        console.log('No templates');
      }
      for (const name of names) {
        console.log(name);
      }
    } catch (error) {
      handleError(error);
    }
  });

templates
  .command('delete')
  .argument('<name>', 'Template name')
  .option('-t, --templates <path>', 'Templates directory')
  .action(async (name: string, options: { templates?: string }) => {
    try {
      await new FileTemplateStore(configWith(options).templatesDir).delete(name);
    } catch (error) {
      handleError(error);
    }
  });

function handleError(error: unknown): void {
  if (error instanceof MergeError) {
    console.error(`\nError: ${error.message}`);
    if (error.reason) console.error(`  Reason: ${error.reason}`);
    if (error instanceof AllRowsFailedError) {
      for (const entry of error.failures) {
        if (entry.outcome.status === 'failure') {
          console.error(`  - row ${entry.index + 1}: ${entry.outcome.reason}`);
        }
      }
    }
  } else if (error instanceof Error) {
    console.error(`\nError: ${error.message}`);
    console.error(error.stack);
  } else {
    console.error('\nUnknown error:', error);
  }
  process.exit(1);
}

await program.parseAsync();
