// core/formatter.ts
// Display formatting for cell values ({{key|formatter}} placeholders)

import type { CellValue } from '../types/index.js';

// ============================================
// Formatter Registry
// ============================================

export type Formatter = (value: CellValue) => string;

const formatters: Map<string, Formatter> = new Map();

/**
 * Register a formatter by name
 */
export function registerFormatter(name: string, fn: Formatter): void {
  formatters.set(name, fn);
}

/**
 * Get formatter by name. Unknown names return undefined so the caller can
 * leave the placeholder untouched.
 */
export function getFormatter(name: string | undefined): Formatter | undefined {
  if (!name || name === 'raw') {
    return rawFormatter;
  }

  const formatter = formatters.get(name);
  if (formatter) {
    return formatter;
  }

  switch (name) {
    case 'date':
      return dateFormatter;
    case 'datetime':
      return dateTimeFormatter;
    case 'number':
      return numberFormatter;
    case 'currency':
    case 'euro':
      return euroFormatter;
    case 'upper':
      return (value) => toDisplayString(value).toUpperCase();
    case 'lower':
      return (value) => toDisplayString(value).toLowerCase();
    default:
      return undefined;
  }
}

/**
 * Coerce a cell to the string shown in a document. null becomes ''.
 */
export function toDisplayString(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

// ============================================
// Built-in Formatters
// ============================================

export const rawFormatter: Formatter = (value) => toDisplayString(value);

// Unix timestamps between 2000-01-01 and the millisecond range upper bound
const MIN_TIMESTAMP = 946684800;
const MAX_TIMESTAMP = 4000000000000;

/**
 * Interpret a cell as a date: Unix seconds, Unix milliseconds or an ISO string.
 */
export function toDate(value: CellValue): Date | null {
  if (typeof value === 'number') {
    if (value < MIN_TIMESTAMP || value > MAX_TIMESTAMP) return null;
    return new Date(value > 10000000000 ? value : value * 1000);
  }
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}/.test(value)) {
    const date = new Date(value);
    return isNaN(date.getTime()) ? null : date;
  }
  return null;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Date formatter - dd/mm/yyyy in UTC
 */
export const dateFormatter: Formatter = (value) => {
  const date = toDate(value);
  if (!date) return toDisplayString(value);
  return `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${date.getUTCFullYear()}`;
};

export const dateTimeFormatter: Formatter = (value) => {
  const date = toDate(value);
  if (!date) return toDisplayString(value);
  return `${dateFormatter(value)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
};

function toNumber(value: CellValue): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const num = Number(value);
    return isNaN(num) ? null : num;
  }
  return null;
}

/**
 * Number formatter - French thousand separators
 */
export const numberFormatter: Formatter = (value) => {
  const num = toNumber(value);
  if (num === null) return toDisplayString(value);
  return num.toLocaleString('fr-FR');
};

export const euroFormatter: Formatter = (value) => {
  const num = toNumber(value);
  if (num === null) return toDisplayString(value);
  return num.toLocaleString('fr-FR', { style: 'currency', currency: 'EUR' });
};

// ============================================
// Format Application
// ============================================

/**
 * Format a value using the specified formatter
 */
export function format(value: CellValue, formatName: string | undefined): string {
  const formatter = getFormatter(formatName) ?? rawFormatter;
  return formatter(value);
}
