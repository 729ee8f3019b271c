import test from 'node:test';
import assert from 'node:assert/strict';
import { format, formatText } from '../src/todo/format.js';
import { parseDocument } from '../src/todo/parse.js';
import { resolve } from '../src/todo/resolve.js';

const SAMPLE = [
  '# Weekly plan',
  '[work] (2024-06-10)',
  '\t*  (A)  Write report @alice   # draft first',
  '\t\t\t\tover-indented step',
  '\t- [Project X] Ship release @bob',
  '\t\t+ follow up',
  ' ',
  '[home]',
  '\t+ (B) (B) Fix sink [plumbing]',
  '\t=   Cancelled chore',
  '\t+ - literal dash',
  'Loose task (AB) @misc',
  'price \\# 5 #',
].join('\n');

function tasksOf(text: string) {
  return resolve(parseDocument(text).forest).tasks;
}

test('raw mode writes canonical token order and spacing', () => {
  assert.equal(
    formatText('root\n\t\t\t[work]  (A)   Task @x  #  note  \n'),
    'root\n\t(A) [work] Task @x # note\n'
  );
});

test('raw mode keeps blank lines empty and comments at their depth', () => {
  assert.equal(formatText('a\n  \t\nb'), 'a\n\nb\n');
  assert.equal(formatText('\t\t#   hi\n'), '\t\t# hi\n');
  assert.equal(formatText('task #\n'), 'task #\n');
});

test('raw mode keeps an explicit todo symbol', () => {
  assert.equal(formatText('+ Buy\n'), '+ Buy\n');
});

test('the document line terminator is preserved', () => {
  assert.equal(formatText('a\r\nb'), 'a\r\nb\r\n');
  assert.equal(formatText(''), '');
});

test('formatting is idempotent in both modes', () => {
  for (const mode of ['raw', 'normalized'] as const) {
    const once = formatText(SAMPLE, mode);
    assert.equal(formatText(once, mode), once);
  }
});

test('formatting preserves resolved tasks in both modes', () => {
  const expected = tasksOf(SAMPLE);
  assert.equal(expected.length, 9);
  for (const mode of ['raw', 'normalized'] as const) {
    assert.deepEqual(tasksOf(formatText(SAMPLE, mode)), expected);
  }
});

test('normalized mode keeps only tokens that take effect', () => {
  assert.equal(formatText('+ (A) (B) [x] [x] Buy\n', 'normalized'), '(B) [x] Buy\n');
});

test('normalized mode keeps + where it overrides an inherited status', () => {
  assert.equal(formatText('* Parent\n\t+ child\n', 'normalized'), '* Parent\n\t+ child\n');
});

test('normalized mode keeps + when dropping it would change the line', () => {
  assert.equal(formatText('+ - x\n', 'normalized'), '+ - x\n');
});

test('format never writes inherited values onto children', () => {
  const { forest } = parseDocument('(A) [work] parent\n\tchild\n');
  assert.equal(format(forest, 'normalized'), '(A) [work] parent\n\tchild\n');
});
