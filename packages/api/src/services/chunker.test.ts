import test from 'node:test';
import assert from 'node:assert/strict';

import type { BoundaryPreference, Chunk, SourceDocument } from '@groundwork/shared';
import { chunkDocument } from './chunker';
import { ConfigError } from '../utils/errors';

const doc = (text: string): SourceDocument => ({ id: 'doc-1', text });

function reconstruct(chunks: Chunk[]): string {
  return chunks.map((chunk) => chunk.text.slice(chunk.overlap)).join('');
}

const sample = [
  'The committee met on a Tuesday. Its members reviewed the draft clause by clause!',
  'Several objections were raised about the second article? Most were resolved quickly.',
  '   ',
  'A final vote was scheduled for the following week, and the chair adjourned the meeting.',
]
  .map((paragraph) => paragraph.repeat(3))
  .join('\n\n');

test('fixed windows advance by size minus overlap', () => {
  const chunks = [...chunkDocument(doc('abcdefghij'), { size: 4, overlap: 1, boundary: 'none' })];

  assert.deepEqual(
    chunks.map((c) => [c.index, c.start, c.end, c.text, c.overlap]),
    [
      [0, 0, 4, 'abcd', 0],
      [1, 3, 7, 'defg', 1],
      [2, 6, 10, 'ghij', 1],
    ]
  );
});

test('sentence boundaries pull chunk ends back to the last sentence break', () => {
  const text = 'One two. Three four. Five six.';
  const chunks = [...chunkDocument(doc(text), { size: 16, overlap: 2, boundary: 'sentence' })];

  assert.deepEqual(
    chunks.map((c) => [c.start, c.end]),
    [
      [0, 9],
      [7, 21],
      [19, 30],
    ]
  );
  assert.equal(chunks[0].text, 'One two. ');
  assert.equal(reconstruct(chunks), text);
});

test('paragraph boundaries prefer blank-line breaks', () => {
  const text = 'Alpha beta.\n\nGamma delta.\n\nEpsilon.';
  const chunks = [...chunkDocument(doc(text), { size: 28, overlap: 0, boundary: 'paragraph' })];

  assert.deepEqual(
    chunks.map((c) => c.text),
    ['Alpha beta.\n\nGamma delta.\n\n', 'Epsilon.']
  );
});

test('documents shorter than the chunk size yield exactly one chunk', () => {
  const text = 'Short document.';
  const chunks = [...chunkDocument(doc(text), { size: 100, overlap: 10, boundary: 'sentence' })];

  assert.equal(chunks.length, 1);
  assert.deepEqual(chunks[0], { sourceId: 'doc-1', index: 0, start: 0, end: text.length, text, overlap: 0 });
});

test('an empty document yields a single empty chunk', () => {
  const chunks = [...chunkDocument(doc(''), { size: 10, overlap: 0, boundary: 'none' })];
  assert.deepEqual(chunks.map((c) => c.text), ['']);
});

test('chunks minus overlaps reconstruct the document for every configuration', () => {
  const boundaries: BoundaryPreference[] = ['none', 'sentence', 'paragraph'];
  const sizings = [
    { size: 7, overlap: 0 },
    { size: 50, overlap: 10 },
    { size: 120, overlap: 119 },
    { size: 333, overlap: 40 },
  ];

  for (const boundary of boundaries) {
    for (const sizing of sizings) {
      const chunks = [...chunkDocument(doc(sample), { ...sizing, boundary })];

      assert.equal(reconstruct(chunks), sample, `${boundary} ${sizing.size}/${sizing.overlap}`);
      chunks.forEach((chunk, i) => {
        assert.equal(chunk.index, i);
        assert.ok(chunk.text.length <= sizing.size);
        assert.equal(chunk.text, sample.slice(chunk.start, chunk.end));
        if (i > 0) {
          assert.equal(chunks[i - 1].end - chunk.start, sizing.overlap);
          assert.equal(chunk.overlap, sizing.overlap);
        }
      });
    }
  }
});

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

test('chunk edges never split a surrogate pair', () => {
  const text = '漢字😀'.repeat(20);
  const boundaries: BoundaryPreference[] = ['none', 'sentence', 'paragraph'];

  for (const boundary of boundaries) {
    for (const sizing of [
      { size: 7, overlap: 2 },
      { size: 7, overlap: 3 },
      { size: 3, overlap: 2 },
      { size: 10, overlap: 0 },
    ]) {
      const chunks = [...chunkDocument(doc(text), { ...sizing, boundary })];
      const label = `${boundary} ${sizing.size}/${sizing.overlap}`;

      assert.equal(reconstruct(chunks), text, label);
      for (const chunk of chunks) {
        assert.equal(LONE_SURROGATE.test(chunk.text), false, `${label} chunk ${chunk.index}`);
      }
    }
  }

  const first = [...chunkDocument(doc(text), { size: 7, overlap: 2, boundary: 'none' })].slice(0, 2);
  assert.deepEqual(
    first.map((c) => [c.start, c.end, c.overlap]),
    [
      [0, 6, 0],
      [4, 10, 2],
    ]
  );
});

test('a window too narrow to step back grows past the pair instead', () => {
  const chunks = [...chunkDocument(doc('😀😀😀'), { size: 3, overlap: 2, boundary: 'none' })];

  assert.deepEqual(
    chunks.map((c) => [c.start, c.end, c.text, c.overlap]),
    [
      [0, 4, '😀😀', 0],
      [2, 6, '😀😀', 2],
    ]
  );
});

test('the chunk sequence is restartable', () => {
  const sequence = chunkDocument(doc(sample), { size: 60, overlap: 5, boundary: 'sentence' });
  const first = [...sequence];
  const second = [...sequence];

  assert.ok(first.length > 1);
  assert.deepEqual(second, first);
});

test('invalid sizing fails with ConfigError before iteration', () => {
  assert.throws(() => chunkDocument(doc('x'), { size: 10, overlap: 10, boundary: 'none' }), ConfigError);
  assert.throws(() => chunkDocument(doc('x'), { size: 10, overlap: 12, boundary: 'none' }), ConfigError);
  assert.throws(() => chunkDocument(doc('x'), { size: 0, overlap: 0, boundary: 'none' }), ConfigError);
  assert.throws(() => chunkDocument(doc('x'), { size: 10, overlap: -1, boundary: 'none' }), ConfigError);
});
