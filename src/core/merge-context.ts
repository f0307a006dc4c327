// core/merge-context.ts
// Assemble the render request for one row

import type { Assets, RenderRequest, Row, Template } from '../types/index.js';
import { RESERVED_PLACEHOLDERS } from '../types/index.js';
import { resolveFields } from './field-resolver.js';
import { resolveFilename } from './filename-resolver.js';
import { escapeCss, escapeHtml, markAssetSlots } from './html-writer.js';

export interface MergeInput {
  template: Template;
  row: Row;
  assets?: Assets;
  filenamePattern?: string;
  /** 1-based position of the row in a batch */
  position?: number;
}

/**
 * Build the render request for a row. Deterministic: the same input always
 * yields an equal request, so previews can be regenerated at will.
 */
export function buildRenderRequest(input: MergeInput): RenderRequest {
  const { template, row, assets = {}, filenamePattern = '', position } = input;

  // Asset slots are marked before substitution so row values never fill them
  const bodyMarkup = resolveFields(markAssetSlots(template.bodyMarkup), row, {
    escape: escapeHtml,
    reserved: RESERVED_PLACEHOLDERS,
  });
  const css = resolveFields(template.css, row, {
    escape: escapeCss,
    reserved: RESERVED_PLACEHOLDERS,
  });

  return Object.freeze({
    bodyMarkup,
    css,
    row,
    assets,
    filename: resolveFilename(filenamePattern, row, position),
  });
}
