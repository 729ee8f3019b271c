import test from 'node:test';
import assert from 'node:assert/strict';
import type { DocumentState } from '../src/todo/document.js';
import { createDocumentState } from '../src/todo/document.js';
import type { LineRange } from '../src/todo/incremental.js';
import { applyEdit } from '../src/todo/incremental.js';
import { joinLines, splitLines } from '../src/todo/parse.js';

const BASE = [
  '[work]',
  '\t* (A) Write report @alice',
  '\t\tdraft outline',
  '\t\t\tfind sources',
  '\t- [Project X] Ship release @bob',
  '',
  '# comment',
  '[home]',
  '\t+ (B) Fix sink',
  '\tcall plumber @bob',
  'Loose task',
].join('\n');

function currentLines(state: DocumentState): string[] {
  return state.forest.lines.map((line) => line.raw);
}

/**
 * Apply an edit incrementally and compare against a parse of the edited text.
 */
function checkEdit(state: DocumentState, range: LineRange, newText: string): DocumentState {
  const before = JSON.stringify({ forest: state.forest, resolution: state.resolution });
  const lines = currentLines(state);
  const start = Math.min(Math.max(range.startLine, 0), lines.length);
  const end = Math.min(Math.max(range.endLine, start), lines.length);
  const edited = [...lines.slice(0, start), ...splitLines(newText).lines, ...lines.slice(end)];

  const next = applyEdit(state, range, newText);
  const expected = createDocumentState(joinLines(edited, '\n', true));

  assert.deepEqual(next.forest, expected.forest);
  assert.deepEqual(next.resolution, expected.resolution);
  assert.deepEqual(next.index, expected.index);
  assert.equal(JSON.stringify({ forest: state.forest, resolution: state.resolution }), before);
  return next;
}

const CASES: { name: string; range: LineRange; text: string }[] = [
  { name: 'insert a root at the top', range: { startLine: 0, endLine: 0 }, text: 'new root\n' },
  { name: 'delete a header', range: { startLine: 0, endLine: 1 }, text: '' },
  { name: 'over-indent a line', range: { startLine: 2, endLine: 3 }, text: '\t\t\t\t\tdeep\n' },
  { name: 'dedent a line', range: { startLine: 2, endLine: 3 }, text: 'draft outline\n' },
  { name: 'turn a header into a task', range: { startLine: 8, endLine: 10 }, text: '' },
  { name: 'turn a task into a header', range: { startLine: 1, endLine: 2 }, text: '\t* (A)\n' },
  { name: 'change a header status', range: { startLine: 0, endLine: 1 }, text: '- [work]\n' },
  { name: 'replace everything', range: { startLine: 0, endLine: 11 }, text: 'x\n\ty\n' },
  { name: 'append past the end', range: { startLine: 20, endLine: 30 }, text: 'tail\n' },
  { name: 'insert only blank and comment lines', range: { startLine: 5, endLine: 5 }, text: '\n# hi\n' },
  { name: 'remove blank and comment lines', range: { startLine: 5, endLine: 7 }, text: '' },
  {
    name: 'insert mixed depths in the middle',
    range: { startLine: 4, endLine: 4 },
    text: '\t\tsub a\n\tsibling\n\t\t\t\tover\n',
  },
  {
    name: 'add a due date deep in the tree',
    range: { startLine: 3, endLine: 4 },
    text: '\t\t\t(2024-01-01) find sources [research]\n',
  },
  { name: 'insert a single empty line', range: { startLine: 3, endLine: 3 }, text: '\n' },
  { name: 'delete everything', range: { startLine: 0, endLine: 11 }, text: '' },
];

for (const { name, range, text } of CASES) {
  test(`applyEdit matches a full parse: ${name}`, () => {
    checkEdit(createDocumentState(BASE), range, text);
  });
}

test('applyEdit matches a full parse across a long run of edits', () => {
  const snippets = [
    '',
    '\n',
    'root @x\n',
    '\tchild [a]\n',
    '\t\tgrandchild (B)\n',
    '[hdr] (2024-02-01)\n',
    '- done\n\t* doing\n',
    '\t\t\t\tvery deep @y\n',
    '# note\n\t\n',
    '= [b] @x\n\t(C)\n\t\tleaf\n',
  ];
  let seed = 7;
  const next = (limit: number): number => {
    seed = (seed * 48271) % 2147483647;
    return limit === 0 ? 0 : seed % limit;
  };

  let state = createDocumentState(BASE);
  for (let step = 0; step < 200; step += 1) {
    const count = state.forest.lines.length;
    const startLine = next(count + 1);
    const endLine = startLine + next(Math.min(3, count - startLine) + 1);
    const text = snippets[next(snippets.length)] ?? '';
    state = checkEdit(state, { startLine, endLine }, text);
  }
});

test('a no-op edit keeps the same tasks', () => {
  const state = createDocumentState(BASE);
  const next = applyEdit(state, { startLine: 4, endLine: 4 }, '');
  assert.deepEqual(next.resolution.tasks, state.resolution.tasks);
});
