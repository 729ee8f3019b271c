import { resolve } from 'node:path';
import { isCalendarDate } from './todo/date.js';
import type { CalendarDate } from './todo/model.js';

/**
 * Runtime configuration shared by the CLI and the stdio server.
 *
 * `rootDir` is treated as a trust boundary: document paths must resolve within it.
 */
export interface TodoOutlineConfig {
  rootDir: string;
  /**
   * Fixed reference date for date diagnostics and due-date completion.
   *
   * Default is undefined, meaning "the local date at the time of the call".
   */
  today?: CalendarDate;
}

/**
 * Parse a `--today` value.
 */
export function parseTodayOption(value: string): CalendarDate {
  if (!isCalendarDate(value)) {
    throw new Error(`Invalid --today: ${JSON.stringify(value)} (expected YYYY-MM-DD)`);
  }
  return value;
}

/**
 * Parse CLI args into a `TodoOutlineConfig`.
 *
 * Supported flags:
 * - `--root <dir>`: filesystem root (defaults to `cwd`).
 * - `--today <YYYY-MM-DD>`: reference date override.
 */
export function loadConfigFromArgs(
  argv: string[],
  cwd: string
): TodoOutlineConfig {
  const args = [...argv];

  let rootDir = cwd;
  let today: CalendarDate | undefined;

  while (args.length > 0) {
    const flag = args.shift();
    if (!flag) break;

    if (flag === '--root') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --root');
      rootDir = resolve(cwd, value);
      continue;
    }

    if (flag === '--today') {
      const value = args.shift();
      if (!value) throw new Error('Missing value for --today');
      today = parseTodayOption(value);
      continue;
    }

    throw new Error(`Unknown argument: ${flag}`);
  }

  return today ? { rootDir, today } : { rootDir };
}
