// core/field-resolver.ts
// Placeholder substitution of row values into template text

import type { CellValue, Row } from '../types/index.js';
import { getFormatter } from './formatter.js';

export type PlaceholderSyntax = 'double' | 'single';

export interface ResolveOptions {
  /** '{{key}}' for document bodies (default), '{key}' for filename patterns */
  syntax?: PlaceholderSyntax;
  /** Applied to every substituted value, e.g. HTML escaping */
  escape?: (value: string) => string;
  /** Names never substituted from row data */
  reserved?: readonly string[];
}

const PATTERNS: Record<PlaceholderSyntax, RegExp> = {
  double: /\{\{([^{}|]+)(?:\|([A-Za-z_]+))?\}\}/g,
  single: /\{([^{}|]+)(?:\|([A-Za-z_]+))?\}/g,
};

function hasKey(row: Row, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(row, key);
}

/**
 * Replace placeholders with the row's display values.
 *
 * The text is scanned once, so values containing placeholder-shaped text are
 * inserted as-is. Placeholders naming no key of the row (or an unknown
 * formatter) are left verbatim.
 */
export function resolveFields(text: string, row: Row, options: ResolveOptions = {}): string {
  if (!text) return '';

  const { syntax = 'double', escape, reserved = [] } = options;
  // Fresh RegExp: the shared pattern is global and carries lastIndex state
  const pattern = new RegExp(PATTERNS[syntax].source, 'g');

  return text.replace(pattern, (token: string, name: string, formatName: string | undefined) => {
    if (reserved.includes(name) || !hasKey(row, name)) {
      return token;
    }

    const formatter = getFormatter(formatName);
    if (!formatter) {
      return token;
    }

    const value: CellValue = row[name] ?? null;
    const display = formatter(value);
    return escape ? escape(display) : display;
  });
}

/**
 * List distinct placeholder names in order of first occurrence
 */
export function extractPlaceholders(text: string, syntax: PlaceholderSyntax = 'double'): string[] {
  const pattern = new RegExp(PATTERNS[syntax].source, 'g');
  const names: string[] = [];

  for (const match of text.matchAll(pattern)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }

  return names;
}

/**
 * Placeholders of the text with no matching key in the row
 */
export function findMissingFields(
  text: string,
  row: Row,
  reserved: readonly string[] = []
): string[] {
  return extractPlaceholders(text).filter(name => !reserved.includes(name) && !hasKey(row, name));
}
