import test from 'node:test';
import assert from 'node:assert/strict';
import { dateDiagnostics, overdue } from '../src/todo/diagnostics.js';
import { parseDocument } from '../src/todo/parse.js';
import { resolve } from '../src/todo/resolve.js';

const TEXT = [
  '- (2024-01-01) done late',
  '(2024-01-05) overdue task',
  '= (2024-01-01) cancelled',
  '(2024-01-10) due today',
  '(2024-01-12) due soon',
  '(2024-01-17) due in a week',
  '(2024-01-18) due later',
  '[work] (2024-01-01)',
  '\tinherits overdue',
  'no due date',
].join('\n');

const resolution = resolve(parseDocument(TEXT).forest);

test('overdue skips closed tasks and reports inherited due dates', () => {
  assert.deepEqual(overdue(resolution, '2024-01-10'), [
    {
      severity: 'error',
      code: 'OVERDUE',
      message: 'Task is overdue by 5 days (due 2024-01-05).',
      line: 1,
      node: 1,
      dueDate: '2024-01-05',
      daysOverdue: 5,
      source: 'todo-outline',
    },
    {
      severity: 'error',
      code: 'OVERDUE',
      message: 'Task is overdue by 9 days (due 2024-01-01).',
      line: 8,
      node: 8,
      dueDate: '2024-01-01',
      daysOverdue: 9,
      source: 'todo-outline',
    },
  ]);
});

test('a task due on the reference date is not overdue', () => {
  const singular = overdue(resolution, '2024-01-06');
  assert.deepEqual(
    singular.map((diagnostic) => diagnostic.message),
    ['Task is overdue by 1 day (due 2024-01-05).', 'Task is overdue by 5 days (due 2024-01-01).']
  );
});

test('dateDiagnostics adds due-today and due-soon reminders in document order', () => {
  const diagnostics = dateDiagnostics(resolution, '2024-01-10');
  assert.deepEqual(
    diagnostics.map((diagnostic) => [diagnostic.line, diagnostic.code, diagnostic.severity]),
    [
      [1, 'OVERDUE', 'error'],
      [3, 'DUE_TODAY', 'warning'],
      [4, 'DUE_SOON', 'information'],
      [5, 'DUE_SOON', 'information'],
      [8, 'OVERDUE', 'error'],
    ]
  );
  assert.equal(diagnostics[2]?.message, 'Task is due in 2 days (2024-01-12).');
  assert.equal(diagnostics[1]?.message, 'Task is due today.');
});

test('a done task written without a space before its due date is not overdue', () => {
  const glued = resolve(parseDocument('-(2020-01-01) paid\n(2020-01-01) unpaid\n').forest);
  assert.deepEqual(
    overdue(glued, '2024-01-10').map((diagnostic) => diagnostic.line),
    [1]
  );
});

test('documents without tasks have no diagnostics', () => {
  assert.deepEqual(dateDiagnostics(resolve(parseDocument('# only a comment\n').forest), '2024-01-10'), []);
});
