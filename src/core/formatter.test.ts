import assert from 'node:assert/strict';
import test from 'node:test';
import {
  dateFormatter,
  dateTimeFormatter,
  format,
  getFormatter,
  numberFormatter,
  registerFormatter,
  toDisplayString,
} from './formatter.js';

test('toDisplayString renders null as empty and scalars as text', () => {
  assert.equal(toDisplayString(null), '');
  assert.equal(toDisplayString(undefined), '');
  assert.equal(toDisplayString(true), 'true');
  assert.equal(toDisplayString(3.5), '3.5');
  assert.equal(toDisplayString('abc'), 'abc');
});

test('dateFormatter accepts Unix seconds, milliseconds and ISO dates', () => {
  assert.equal(dateFormatter(1700000000), '14/11/2023');
  assert.equal(dateFormatter(1700000000000), '14/11/2023');
  assert.equal(dateFormatter('2024-03-05'), '05/03/2024');
});

test('dateFormatter leaves values that are not dates untouched', () => {
  assert.equal(dateFormatter(42), '42');
  assert.equal(dateFormatter('soon'), 'soon');
  assert.equal(dateFormatter(null), '');
});

test('dateTimeFormatter appends UTC hours and minutes', () => {
  assert.equal(dateTimeFormatter(1700000000), '14/11/2023 22:13');
});

test('numberFormatter keeps non-numeric text', () => {
  assert.equal(numberFormatter('abc'), 'abc');
  assert.equal(numberFormatter(''), '');
});

test('getFormatter returns undefined for unknown names', () => {
  assert.equal(getFormatter('bogus'), undefined);
  assert.equal(getFormatter('upper')?.('abc'), 'ABC');
  assert.equal(getFormatter('lower')?.('ABC'), 'abc');
});

test('registered formatters take precedence', () => {
  registerFormatter('initials', (value) => toDisplayString(value).split(' ').map(w => w[0] ?? '').join(''));
  assert.equal(format('Jean Paul Martin', 'initials'), 'JPM');
  assert.equal(format('x', 'missing-formatter'), 'x');
});
