import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { loadConfigFromArgs, parseTodayOption } from '../src/config.js';

test('loadConfigFromArgs defaults to cwd without a reference date', () => {
  assert.deepEqual(loadConfigFromArgs([], '/srv/notes'), { rootDir: '/srv/notes' });
});

test('loadConfigFromArgs resolves --root against cwd and reads --today', () => {
  const config = loadConfigFromArgs(['--root', 'sub', '--today', '2024-02-29'], '/srv/notes');
  assert.deepEqual(config, { rootDir: path.resolve('/srv/notes', 'sub'), today: '2024-02-29' });
});

test('loadConfigFromArgs rejects bad input', () => {
  assert.throws(() => loadConfigFromArgs(['--root'], '/srv'), { message: 'Missing value for --root' });
  assert.throws(() => loadConfigFromArgs(['--x'], '/srv'), { message: 'Unknown argument: --x' });
  assert.throws(() => parseTodayOption('2023-02-29'), {
    message: 'Invalid --today: "2023-02-29" (expected YYYY-MM-DD)',
  });
});
