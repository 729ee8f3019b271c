#!/usr/bin/env node

/**
 * `todo-outline` - local CLI for outline todo files.
 *
 * This CLI shares the API layer with the stdio server so both report the same
 * tasks, formatting and diagnostics.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { TodoOutlineConfig } from './config.js';
import { parseTodayOption } from './config.js';
import type { TaskView } from './todo/api.js';
import { checkFile, formatFile, listTasks } from './todo/api.js';
import type { FormatMode } from './todo/format.js';

export interface OutlineIo {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

function helpText(defaultRoot: string): string {
  return [
    'todo-outline: indentation-based todo outlines',
    '',
    'Usage:',
    '  todo-outline [--root <dir>] [--today <YYYY-MM-DD>] <cmd>',
    '',
    'Commands:',
    '  todo-outline format <file> [--mode raw|normalized]',
    '  todo-outline format <file> [--mode raw|normalized] --write [--if-match <etag>]',
    '  todo-outline format <file> [--mode raw|normalized] --check',
    '  todo-outline tasks <file> [--view tree|flat]',
    '  todo-outline check <file>',
    '',
    'Notes:',
    `  Defaults: --root=${defaultRoot} --today=<local date>`,
    '  format prints the formatted text; --write and --check print JSON.',
    '  format --check exits 1 when the file is not formatted.',
    '  check exits 1 when a task is overdue.',
    '  Output: JSON to stdout; errors to stderr.',
    '',
  ].join('\n');
}

function writeHelp(io: OutlineIo, defaultRoot: string): void {
  io.stdout.write(helpText(defaultRoot));
}

function writeJson(io: OutlineIo, value: unknown): void {
  io.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Consume a boolean flag from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], flag: string): boolean {
  const index = argv.indexOf(flag);
  if (index === -1) return false;
  argv.splice(index, 1);
  return true;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], flag: string): string | undefined {
  const indexEq = argv.findIndex((arg) => arg.startsWith(`${flag}=`));
  if (indexEq !== -1) {
    const value = argv[indexEq]?.slice(flag.length + 1);
    argv.splice(indexEq, 1);
    if (!value) throw new Error(`Missing value for ${flag}`);
    return value;
  }

  const index = argv.indexOf(flag);
  if (index === -1) return undefined;
  const value = argv[index + 1];
  argv.splice(index, 2);
  if (!value || value.startsWith('--')) throw new Error(`Missing value for ${flag}`);
  return value;
}

function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find((arg) => arg.startsWith('--'));
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function assertNoExtraArgs(argv: string[]): void {
  if (argv.length > 0) throw new Error(`Unexpected argument: ${argv[0]}`);
}

function parseMode(value: string | undefined): FormatMode | undefined {
  if (!value) return undefined;
  if (value === 'raw' || value === 'normalized') return value;
  throw new Error(`Invalid --mode: ${JSON.stringify(value)}`);
}

function parseView(value: string | undefined): TaskView | undefined {
  if (!value) return undefined;
  if (value === 'tree' || value === 'flat') return value;
  throw new Error(`Invalid --view: ${JSON.stringify(value)}`);
}

/**
 * Parse global CLI options (`--root`, `--today`) into an API config object.
 *
 * Commands share the same config shape as the MCP server.
 */
function takeCliConfig(argv: string[], defaultRoot: string): TodoOutlineConfig {
  let rootDir = defaultRoot;
  const rootArg = takeOption(argv, '--root');
  if (rootArg) rootDir = resolvePath(defaultRoot, rootArg);

  const todayArg = takeOption(argv, '--today');
  return todayArg ? { rootDir, today: parseTodayOption(todayArg) } : { rootDir };
}

async function handleFormatCommand(
  config: TodoOutlineConfig,
  argv: string[],
  io: OutlineIo
): Promise<number> {
  const mode = parseMode(takeOption(argv, '--mode'));
  const write = takeFlag(argv, '--write');
  const check = takeFlag(argv, '--check');
  const ifMatch = takeOption(argv, '--if-match');
  assertNoUnknownFlags(argv);
  const path = argv.shift();
  assertNoExtraArgs(argv);
  if (!path) throw new Error('Missing <file>');
  if (write && check) throw new Error('--write and --check are mutually exclusive');
  if (ifMatch && !write) throw new Error('--if-match requires --write');

  const result = await formatFile(config, { path, mode, write, ifMatch });
  if (write) {
    writeJson(io, { path: result.path, changed: result.changed, etag: result.etag });
    return 0;
  }
  if (check) {
    writeJson(io, { path: result.path, changed: result.changed });
    return result.changed ? 1 : 0;
  }
  io.stdout.write(result.text);
  return 0;
}

async function handleTasksCommand(
  config: TodoOutlineConfig,
  argv: string[],
  io: OutlineIo
): Promise<number> {
  const view = parseView(takeOption(argv, '--view'));
  assertNoUnknownFlags(argv);
  const path = argv.shift();
  assertNoExtraArgs(argv);
  if (!path) throw new Error('Missing <file>');
  const { tasks, stats, etag } = await listTasks(config, { path, view });
  writeJson(io, { tasks, stats, etag });
  return 0;
}

async function handleCheckCommand(
  config: TodoOutlineConfig,
  argv: string[],
  io: OutlineIo
): Promise<number> {
  assertNoUnknownFlags(argv);
  const path = argv.shift();
  assertNoExtraArgs(argv);
  if (!path) throw new Error('Missing <file>');
  const { today, diagnostics } = await checkFile(config, { path });
  writeJson(io, { today, diagnostics });
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error') ? 1 : 0;
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runOutlineCli(
  args: string[],
  io: OutlineIo = { stdout: process.stdout, stderr: process.stderr },
  defaultRoot: string = process.cwd()
): Promise<number> {
  const argv = [...args];

  try {
    if (takeFlag(argv, '--help') || takeFlag(argv, '-h') || argv.length === 0) {
      writeHelp(io, defaultRoot);
      return 0;
    }

    const config = takeCliConfig(argv, defaultRoot);
    const cmd = argv.shift();
    if (!cmd || cmd === 'help') {
      writeHelp(io, defaultRoot);
      return 0;
    }

    if (cmd === 'format') return await handleFormatCommand(config, argv, io);
    if (cmd === 'tasks') return await handleTasksCommand(config, argv, io);
    if (cmd === 'check') return await handleCheckCommand(config, argv, io);

    throw new Error(`Unknown command: ${cmd}`);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    io.stderr.write('\n');
    writeHelp(io, defaultRoot);
    return 1;
  }
}

const isMain = resolvePath(process.argv[1] ?? '') === fileURLToPath(import.meta.url);
if (isMain) {
  const exitCode = await runOutlineCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
