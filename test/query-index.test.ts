import test from 'node:test';
import assert from 'node:assert/strict';
import { classifyLine } from '../src/todo/classify.js';
import { buildQueryIndex, candidates, updateQueryIndex } from '../src/todo/query-index.js';

const lines = ['[work] plan @alice', '[home] [work] sweep @bob', '[Project X] ship @alice'].map(
  classifyLine
);

test('candidates are prefix-matched and sorted by code unit', () => {
  const index = buildQueryIndex(lines);
  assert.deepEqual(candidates(index, 'category', ''), ['Project X', 'home', 'work']);
  assert.deepEqual(candidates(index, 'category', 'w'), ['work']);
  assert.deepEqual(candidates(index, 'category', 'W'), []);
  assert.deepEqual(candidates(index, 'tag', 'a'), ['alice']);
});

test('a name stays while any line still mentions it', () => {
  const index = buildQueryIndex(lines);
  const first = lines[0];
  const second = lines[1];
  assert.ok(first && second);

  const once = updateQueryIndex(index, [first], []);
  assert.deepEqual(candidates(once, 'category', 'w'), ['work']);
  assert.deepEqual(candidates(once, 'tag', ''), ['alice', 'bob']);

  const twice = updateQueryIndex(once, [second], []);
  assert.deepEqual(candidates(twice, 'category', ''), ['Project X']);
  assert.deepEqual(candidates(twice, 'tag', ''), ['alice']);
});

test('updates return a new index and leave the old one intact', () => {
  const index = buildQueryIndex(lines);
  const next = updateQueryIndex(index, [], [classifyLine('[garden] water @carol')]);
  assert.deepEqual(candidates(next, 'category', 'g'), ['garden']);
  assert.deepEqual(candidates(index, 'category', 'g'), []);
});

test('comment and blank lines contribute nothing', () => {
  const index = buildQueryIndex(['# [work] @alice', ''].map(classifyLine));
  assert.equal(index.categories.size, 0);
  assert.equal(index.tags.size, 0);
});
