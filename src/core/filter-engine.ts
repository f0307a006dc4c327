// core/filter-engine.ts
// Narrow a row set to the rows flagged for printing

import type { FilterResult, FilterSpec, Row } from '../types/index.js';

/**
 * A row is selected only when its flag cell is exactly `true` or the number 1.
 * Boolean columns reach us as either type depending on the source; strings
 * such as "true" or "1" are not accepted.
 */
export function isRowSelected(row: Row, columnName: string): boolean {
  if (!Object.prototype.hasOwnProperty.call(row, columnName)) {
    return false;
  }
  const value = row[columnName];
  return value === true || value === 1;
}

export function applyFilter(rows: readonly Row[], spec: FilterSpec): FilterResult {
  const selected = spec.enabled
    ? rows.filter(row => isRowSelected(row, spec.columnName))
    : [...rows];

  return {
    rows: selected,
    totalCount: rows.length,
    filteredCount: selected.length,
  };
}
