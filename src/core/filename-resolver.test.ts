import assert from 'node:assert/strict';
import test from 'node:test';
import { resolveFilename, sanitizeFilename, withPdfExtension } from './filename-resolver.js';

test('resolveFilename sanitizes substituted values', () => {
  assert.equal(resolveFilename('doc_{id}', { id: 'A/B' }), 'doc_A_B');
});

test('resolveFilename replaces every unsafe character with an underscore', () => {
  assert.equal(resolveFilename('{nom} {prenom}', { nom: 'Dupont', prenom: 'Jean-Luc' }), 'Dupont_Jean-Luc');
  assert.equal(sanitizeFilename('a.b:c*d'), 'a_b_c_d');
});

test('resolveFilename fills {index} with the batch position', () => {
  assert.equal(resolveFilename('{index}_{nom}', { nom: 'Ann' }, 4), '4_Ann');
  assert.equal(resolveFilename('{index}_{nom}', { nom: 'Ann', index: 'x' }, 4), '4_Ann');
});

test('resolveFilename never returns an empty name', () => {
  assert.equal(resolveFilename('{nom}', { nom: null }), 'document');
  assert.equal(resolveFilename('{nom}', { nom: null }, 3), 'document_3');
  assert.equal(resolveFilename('{nom}', { nom: 'ééé' }, 2), 'document_2');
  assert.equal(resolveFilename('   ', {}), 'document');
});

test('resolveFilename keeps unresolved tokens as sanitized text', () => {
  assert.equal(resolveFilename('doc_{missing}', {}), 'doc__missing_');
});

test('resolveFilename caps the length', () => {
  assert.equal(resolveFilename('x'.repeat(300), {}).length, 200);
});

test('withPdfExtension appends .pdf once', () => {
  assert.equal(withPdfExtension('a'), 'a.pdf');
  assert.equal(withPdfExtension('a.PDF'), 'a.PDF');
});
