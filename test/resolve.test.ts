import test from 'node:test';
import assert from 'node:assert/strict';
import { parseDocument } from '../src/todo/parse.js';
import { resolve } from '../src/todo/resolve.js';

function tasksOf(text: string) {
  return resolve(parseDocument(text).forest).tasks;
}

test('a parent task hands its status down; priority stays per branch', () => {
  const tasks = tasksOf('- Shopping\n\tmilk\n\t(C) 6 eggs\n');
  assert.deepEqual(
    tasks.map((task) => [task.body, task.attributes.status, task.attributes.priority]),
    [
      ['Shopping', 'done', undefined],
      ['milk', 'done', undefined],
      ['6 eggs', 'done', 'C'],
    ]
  );
});

test('headers pass attributes down but are not tasks', () => {
  const text = '[shopping]\n\t- Buy milk\n\t6 eggs\n';
  const tasks = tasksOf(text);
  assert.deepEqual(
    tasks.map((task) => [task.body, task.attributes.status, task.attributes.categories]),
    [
      ['Buy milk', 'done', ['shopping']],
      ['6 eggs', 'todo', ['shopping']],
    ]
  );

  const resolution = resolve(parseDocument(text).forest);
  assert.equal(resolution.attributes[0], undefined);
  assert.deepEqual(resolution.contexts[0], { categories: ['shopping'] });
});

test('categories accumulate down the tree', () => {
  const [task] = tasksOf('[work]\n\t[Project X] Ship it\n');
  assert.deepEqual(task?.attributes.categories, ['work', 'Project X']);
});

test('siblings never see each other overrides', () => {
  const tasks = tasksOf('parent\n\t(A) one\n\ttwo\n');
  assert.equal(tasks[1]?.attributes.priority, 'A');
  assert.equal(tasks[2]?.attributes.priority, undefined);
});

test('each field is overridden independently', () => {
  const [, step] = tasksOf('* (B) (2024-05-01) Plan\n\t- Step\n');
  assert.deepEqual(step?.attributes, {
    status: 'done',
    priority: 'B',
    due: '2024-05-01',
    categories: [],
    tags: [],
  });
});

test('the last priority token wins and categories are de-duplicated', () => {
  const [task] = tasksOf('(A) (B) [a] [a] x @t\n');
  assert.equal(task?.attributes.priority, 'B');
  assert.deepEqual(task?.attributes.categories, ['a']);
  assert.deepEqual(task?.attributes.tags, ['t']);
});

test('an over-indented child still inherits from its clamped parent', () => {
  const [, child] = tasksOf('[work] (A)\n\t\t\tdeep\n');
  assert.equal(child?.attributes.priority, 'A');
  assert.deepEqual(child?.attributes.categories, ['work']);
});

test('empty and comment-only documents resolve to no tasks', () => {
  assert.deepEqual(resolve(parseDocument('').forest), { contexts: [], attributes: [], tasks: [] });
  assert.deepEqual(tasksOf('# a\n\n# b\n'), []);
});
