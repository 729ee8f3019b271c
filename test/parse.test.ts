import test from 'node:test';
import assert from 'node:assert/strict';
import { joinLines, parseDocument, splitLines } from '../src/todo/parse.js';

test('splitLines drops the empty line after a trailing newline', () => {
  assert.deepEqual(splitLines(''), { lines: [], eol: '\n', endsWithNewline: false });
  assert.deepEqual(splitLines('\n'), { lines: [''], eol: '\n', endsWithNewline: true });
  assert.deepEqual(splitLines('a\r\nb\r\n'), {
    lines: ['a', 'b'],
    eol: '\r\n',
    endsWithNewline: true,
  });
});

test('joinLines restores the trailing newline only when there are lines', () => {
  assert.equal(joinLines(['a', 'b'], '\r\n', true), 'a\r\nb\r\n');
  assert.equal(joinLines([], '\n', true), '');
});

test('parseDocument nests entries by tab depth', () => {
  const { forest } = parseDocument('a\n\tb\n\t\tc\nd\n\te\n');
  assert.deepEqual(forest.roots, [0, 3]);
  assert.deepEqual(
    forest.nodes.map((node) => [node.entry.body, node.parent, node.children]),
    [
      ['a', undefined, [1]],
      ['b', 0, [2]],
      ['c', 1, []],
      ['d', undefined, [4]],
      ['e', 3, []],
    ]
  );
});

test('over-indented lines are clamped to one below their parent', () => {
  const { forest } = parseDocument('root\n\t\t\t\tdeep\n');
  assert.equal(forest.nodes[1]?.depth, 1);
  assert.equal(forest.nodes[1]?.parent, 0);
});

test('clamping uses effective depth for later lines', () => {
  const { forest } = parseDocument('a\n\t\t\tb\n\t\tc\n');
  assert.deepEqual(
    forest.nodes.map((node) => [node.entry.body, node.depth, node.parent]),
    [
      ['a', 0, undefined],
      ['b', 1, 0],
      ['c', 2, 1],
    ]
  );
});

test('attribute-only lines are headers only when they have children', () => {
  assert.equal(parseDocument('[x]\n').forest.nodes[0]?.kind, 'task');
  assert.equal(parseDocument('[x]\n\tchild\n').forest.nodes[0]?.kind, 'header');
});

test('blank and comment lines are kept as lines but are not nodes', () => {
  const { forest } = parseDocument('a\n\n\t# note\n\tb\n');
  assert.equal(forest.lines.length, 4);
  assert.equal(forest.nodes.length, 2);
  assert.equal(forest.nodes[1]?.line, 3);
  assert.equal(forest.nodes[1]?.parent, 0);
});

test('empty and comment-only documents give empty forests', () => {
  assert.deepEqual(parseDocument('').forest, { lines: [], nodes: [], roots: [] });
  const { forest } = parseDocument('# a\n\n# b\n');
  assert.deepEqual(forest.nodes, []);
  assert.deepEqual(forest.roots, []);
});
