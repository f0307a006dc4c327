import assert from 'node:assert/strict';
import test from 'node:test';
import type { Row } from '../types/index.js';
import { applyFilter, isRowSelected } from './filter-engine.js';

const rows: Row[] = [{ flag: true }, { flag: 1 }, { flag: false }, { flag: 'true' }, {}];

test('applyFilter returns a copy of all rows when disabled', () => {
  const result = applyFilter(rows, { enabled: false, columnName: 'x' });
  assert.deepEqual(result.rows, rows);
  assert.notEqual(result.rows, rows);
  assert.equal(result.totalCount, 5);
  assert.equal(result.filteredCount, 5);
});

test('applyFilter keeps only rows flagged true or 1', () => {
  const result = applyFilter(rows, { enabled: true, columnName: 'flag' });
  assert.deepEqual(result.rows, [{ flag: true }, { flag: 1 }]);
  assert.equal(result.totalCount, 5);
  assert.equal(result.filteredCount, 2);
});

test('applyFilter preserves order of selected rows', () => {
  const ordered: Row[] = [
    { id: 'a', ok: 1 },
    { id: 'b', ok: 0 },
    { id: 'c', ok: true },
    { id: 'd', ok: '1' },
    { id: 'e', ok: 1 },
  ];
  const result = applyFilter(ordered, { enabled: true, columnName: 'ok' });
  assert.deepEqual(result.rows.map(r => r.id), ['a', 'c', 'e']);
});

test('isRowSelected rejects other truthy values', () => {
  assert.equal(isRowSelected({ f: 'yes' }, 'f'), false);
  assert.equal(isRowSelected({ f: '1' }, 'f'), false);
  assert.equal(isRowSelected({ f: 2 }, 'f'), false);
  assert.equal(isRowSelected({ f: null }, 'f'), false);
  assert.equal(isRowSelected({ other: true }, 'f'), false);
});

test('applyFilter on an empty set', () => {
  const result = applyFilter([], { enabled: true, columnName: 'flag' });
  assert.deepEqual(result, { rows: [], totalCount: 0, filteredCount: 0 });
});
