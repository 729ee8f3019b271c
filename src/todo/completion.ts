import { findCommentStart } from './classify.js';
import { addDays } from './date.js';
import type { DocumentState } from './document.js';
import type { CalendarDate } from './model.js';
import { candidates } from './query-index.js';

/**
 * Completion candidates at a cursor position.
 *
 * The token being typed is found by scanning the line before the cursor:
 * - `[` not yet closed => category names
 * - `@` followed by tag characters => tag names
 * - `(` not yet closed => due-date suggestions relative to `today`
 *
 * Nothing is offered inside a comment.
 */
export interface Position {
  /** 0-based line. */
  line: number;
  /** 0-based UTF-16 offset within the line. */
  character: number;
}

export interface CompletionRange {
  start: Position;
  end: Position;
}

export type CompletionKind = 'category' | 'tag' | 'due';

export interface CompletionItem {
  kind: CompletionKind;
  label: string;
  /** Replaces `range`, which spans the opening character up to the cursor (plus a closing `]`/`)` right after it). */
  insertText: string;
  detail?: string;
  range: CompletionRange;
}

export interface CompletionOptions {
  /** Reference date for due-date suggestions. */
  today: CalendarDate;
}

interface OpenToken {
  kind: CompletionKind;
  /** Index of the opening character in the line. */
  start: number;
  prefix: string;
}

const DUE_SUGGESTIONS: readonly { days: number; detail: string }[] = [
  { days: 0, detail: 'today' },
  { days: 1, detail: 'tomorrow' },
  { days: 2, detail: '2 days later' },
  { days: 7, detail: '1 week later' },
];

const TAG_PREFIX_RE = /^[A-Za-z0-9_-]*$/;

function findOpenToken(before: string): OpenToken | undefined {
  const found: OpenToken[] = [];

  const bracket = before.lastIndexOf('[');
  if (bracket !== -1 && bracket > before.lastIndexOf(']')) {
    found.push({ kind: 'category', start: bracket, prefix: before.slice(bracket + 1) });
  }

  const paren = before.lastIndexOf('(');
  if (paren !== -1 && paren > before.lastIndexOf(')')) {
    const prefix = before.slice(paren + 1);
    if (!/\s/.test(prefix)) found.push({ kind: 'due', start: paren, prefix });
  }

  const at = before.lastIndexOf('@');
  if (at !== -1) {
    const prefix = before.slice(at + 1);
    if (TAG_PREFIX_RE.test(prefix)) found.push({ kind: 'tag', start: at, prefix });
  }

  let innermost: OpenToken | undefined;
  for (const token of found) {
    if (!innermost || token.start > innermost.start) innermost = token;
  }
  return innermost;
}

export function completeAt(
  state: DocumentState,
  position: Position,
  options: CompletionOptions
): CompletionItem[] {
  const line = state.forest.lines[position.line];
  if (!line) return [];

  const raw = line.raw;
  const character = Math.min(Math.max(position.character, 0), raw.length);
  const before = raw.slice(0, character);
  if (findCommentStart(before) !== -1) return [];

  const token = findOpenToken(before);
  if (!token) return [];

  const start: Position = { line: position.line, character: token.start };
  const rangeEnd = (closing: string | undefined): Position => ({
    line: position.line,
    character: closing !== undefined && raw[character] === closing ? character + 1 : character,
  });

  if (token.kind === 'category') {
    const range = { start, end: rangeEnd(']') };
    return candidates(state.index, 'category', token.prefix).map((name): CompletionItem => ({
      kind: 'category',
      label: `[${name}]`,
      insertText: `[${name}]`,
      range,
    }));
  }

  if (token.kind === 'tag') {
    const range = { start, end: rangeEnd(undefined) };
    return candidates(state.index, 'tag', token.prefix).map((name): CompletionItem => ({
      kind: 'tag',
      label: `@${name}`,
      insertText: `@${name}`,
      range,
    }));
  }

  const range = { start, end: rangeEnd(')') };
  return DUE_SUGGESTIONS.map(({ days, detail }) => ({ date: addDays(options.today, days), detail }))
    .filter(({ date }) => date.startsWith(token.prefix))
    .map(({ date, detail }): CompletionItem => ({
      kind: 'due',
      label: `(${date})`,
      insertText: `(${date})`,
      detail,
      range,
    }));
}
