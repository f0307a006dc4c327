// core/batch-orchestrator.ts
// Render one document per row and package the successes into a zip

import type {
  Assets,
  BatchEntry,
  BatchResult,
  DocumentRenderer,
  FilterSpec,
  Row,
  Template,
} from '../types/index.js';
import {
  AllRowsFailedError,
  MergeError,
  NoRowsError,
  describeError,
} from '../types/index.js';
import { applyFilter } from './filter-engine.js';
import { buildRenderRequest } from './merge-context.js';
import { withPdfExtension } from './filename-resolver.js';
import { buildArchive, uniqueEntryName, type ArchiveEntry } from './zip-handler.js';
import { createLimiter } from './limiter.js';

export interface BatchOptions {
  rows: readonly Row[];
  template: Template;
  assets?: Assets;
  filenamePattern?: string;
  filter?: FilterSpec;
  renderer: DocumentRenderer;
  /** Renders in flight at once (default: 1, sequential) */
  concurrency?: number;
  /** Called after each row completes or fails */
  onProgress?: (processed: number, total: number, entry: BatchEntry) => void;
}

const DEFAULT_PATTERN = 'document_{index}';

/**
 * Run a batch over the (optionally filtered) rows.
 *
 * A failing row is recorded and the remaining rows are still rendered.
 * Entries keep the order of the filtered rows whatever order renders finish in.
 *
 * @throws NoRowsError when the filter leaves nothing, before any render
 * @throws AllRowsFailedError when no document could be rendered
 * @throws PackagingError when the archive cannot be built
 */
export async function runBatch(options: BatchOptions): Promise<BatchResult> {
  const {
    rows,
    template,
    assets = {},
    filenamePattern = DEFAULT_PATTERN,
    filter = { enabled: false, columnName: '' },
    renderer,
    concurrency = 1,
    onProgress,
  } = options;

  const selection = applyFilter(rows, filter);
  if (selection.filteredCount === 0) {
    throw new NoRowsError(
      filter.enabled
        ? `No rows with ${filter.columnName} set among ${selection.totalCount}`
        : 'No rows to render'
    );
  }

  const limit = createLimiter(concurrency);
  const total = selection.filteredCount;
  let processed = 0;

  const renderRow = async (row: Row, index: number): Promise<BatchEntry> => {
    let entry: BatchEntry;
    try {
      const request = buildRenderRequest({
        template,
        row,
        assets,
        filenamePattern,
        position: index + 1,
      });
      const bytes = await renderer.render(request);
      entry = { index, outcome: { status: 'success', bytes, filename: request.filename } };
    } catch (error) {
      const code = error instanceof MergeError ? error.code : 'RENDER_ERROR';
      const reason = error instanceof MergeError && error.reason
        ? `${error.message}: ${error.reason}`
        : describeError(error);
      console.error(`[batch] Row ${index + 1}/${total} failed: ${reason}`);
      entry = { index, outcome: { status: 'failure', reason, code } };
    }

    processed++;
    onProgress?.(processed, total, entry);
    return entry;
  };

  const rendered = await Promise.all(
    selection.rows.map((row, index) => limit(() => renderRow(row, index)))
  );

  // Success entries report the name they carry inside the archive
  const taken = new Set<string>();
  const files: ArchiveEntry[] = [];
  const entries = rendered.map((entry): BatchEntry => {
    if (entry.outcome.status !== 'success') return entry;
    const name = uniqueEntryName(withPdfExtension(entry.outcome.filename), entry.index + 1, taken);
    files.push({ name, content: entry.outcome.bytes });
    return { index: entry.index, outcome: { ...entry.outcome, filename: name } };
  });

  if (files.length === 0) {
    throw new AllRowsFailedError(entries);
  }

  const archive = await buildArchive(files);

  return {
    entries,
    totalCount: selection.totalCount,
    filteredCount: selection.filteredCount,
    succeeded: files.length,
    failed: entries.length - files.length,
    archive,
  };
}
