// core/filename-resolver.ts
// Output filenames from {key} patterns, reduced to a filesystem-safe charset

import type { Row } from '../types/index.js';
import { resolveFields } from './field-resolver.js';

export const FALLBACK_FILENAME = 'document';
export const MAX_FILENAME_LENGTH = 200;

/**
 * Replace every character outside [A-Za-z0-9_-] with '_'
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, MAX_FILENAME_LENGTH);
}

/**
 * Resolve a filename pattern against a row.
 *
 * `position` is the 1-based place of the row in a batch; it fills `{index}`
 * and keeps the fallback name unique inside an archive.
 */
export function resolveFilename(pattern: string, row: Row, position?: number): string {
  const source = pattern.trim() || FALLBACK_FILENAME;
  const values: Row = position === undefined ? row : { ...row, index: position };

  const sanitized = sanitizeFilename(resolveFields(source, values, { syntax: 'single' }));

  if (!/[A-Za-z0-9]/.test(sanitized)) {
    return position === undefined ? FALLBACK_FILENAME : `${FALLBACK_FILENAME}_${position}`;
  }

  return sanitized;
}

export function withPdfExtension(name: string): string {
  return name.toLowerCase().endsWith('.pdf') ? name : `${name}.pdf`;
}
