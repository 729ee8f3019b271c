#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * This module stays small:
 * - Parse CLI flags into a `TodoOutlineConfig`.
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { loadConfigFromArgs } from './config.js';
import { runStdioServer, SERVER_NAME, SERVER_VERSION } from './server.js';

function printHelp(): void {
  process.stdout.write(
    [
      `${SERVER_NAME} (stdio MCP server)`,
      '',
      'Usage:',
      `  ${SERVER_NAME} [--root <dir>] [--today <YYYY-MM-DD>]`,
      '',
      'Options:',
      '  --root   Root directory for file.* tools (default: cwd)',
      '  --today  Reference date for due-date diagnostics and completion (default: local date)',
      '  --help   Show help',
      '',
    ].join('\n')
  );
}

function argsContainHelp(argv: string[]): boolean {
  return argv.includes('--help') || argv.includes('-h');
}

function argsContainVersion(argv: string[]): boolean {
  return argv.includes('--version') || argv.includes('-v');
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argsContainHelp(argv)) {
    printHelp();
    return;
  }

  if (argsContainVersion(argv)) {
    process.stdout.write(`${SERVER_NAME} ${SERVER_VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
}

try {
  await main();
} catch (error) {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
