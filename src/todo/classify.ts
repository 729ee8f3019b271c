import {
  CATEGORY_TOKEN_RE,
  COMMENT_CHAR,
  DUE_TOKEN_RE,
  ESCAPE_CHAR,
  INDENT_CHAR,
  PRIORITY_TOKEN_RE,
  TAG_RE,
} from './constants.js';
import { parseCalendarDate } from './date.js';
import type { Attribute, ClassifiedLine, TaskLine, TaskStatus } from './model.js';
import { isStatusSymbol, symbolToStatus } from './status.js';

/**
 * Line classifier for todo-outline documents.
 *
 * The notation is lenient: anything that does not match a token pattern is
 * body text, so classification never fails.
 */
interface AttributeToken {
  attribute: Attribute;
  length: number;
}

/** Characters that may directly follow an attribute token. */
const TOKEN_BOUNDARY_RE = /^[\s([]/;

function countIndent(text: string): number {
  let count = 0;
  while (count < text.length && text[count] === INDENT_CHAR) count += 1;
  return count;
}

/**
 * Index of the first unescaped `#`, or -1. A `#` is escaped by an odd run of
 * backslashes right before it (`\\#` is a backslash followed by a comment).
 */
export function findCommentStart(text: string): number {
  for (let index = 0; index < text.length; index += 1) {
    if (text[index] !== COMMENT_CHAR) continue;
    let escapes = 0;
    while (index - escapes > 0 && text[index - escapes - 1] === ESCAPE_CHAR) escapes += 1;
    if (escapes % 2 === 1) continue;
    return index;
  }
  return -1;
}

function matchAttribute(text: string): AttributeToken | undefined {
  const priority = text.match(PRIORITY_TOKEN_RE);
  if (priority) {
    return {
      attribute: { kind: 'priority', value: priority[1] ?? '' },
      length: priority[0].length,
    };
  }

  const due = text.match(DUE_TOKEN_RE);
  if (due) {
    const value = parseCalendarDate(due[1] ?? '');
    if (!value) return undefined;
    return { attribute: { kind: 'due', value }, length: due[0].length };
  }

  const category = text.match(CATEGORY_TOKEN_RE);
  if (category) {
    return {
      attribute: { kind: 'category', value: category[1] ?? '' },
      length: category[0].length,
    };
  }

  return undefined;
}

/**
 * Tag names (without `@`) in first-seen order, de-duplicated.
 */
export function extractTags(body: string): string[] {
  const tags: string[] = [];
  for (const match of body.matchAll(TAG_RE)) {
    const name = match[1];
    if (name && !tags.includes(name)) tags.push(name);
  }
  return tags;
}

/**
 * What may follow a status symbol: nothing, whitespace, or an attribute token
 * that itself ends at a token boundary (`-(A) x`, but not `-5 degrees`).
 */
function startsStatusSuffix(rest: string): boolean {
  if (rest.length === 0 || /^\s/.test(rest)) return true;
  const token = matchAttribute(rest);
  if (!token) return false;
  const after = rest.slice(token.length);
  return after.length === 0 || TOKEN_BOUNDARY_RE.test(after);
}

function skipWhitespace(text: string, from: number): number {
  let index = from;
  while (index < text.length && /\s/.test(text[index] ?? '')) index += 1;
  return index;
}

/**
 * Classify one line of raw text (without its line terminator).
 *
 * Order of recognition:
 * - leading tabs (depth), then any further leading whitespace is skipped
 * - trailing comment from the first unescaped `#`
 * - optional status symbol followed by whitespace or an attribute token
 * - greedy attribute tokens; the first non-token starts the body
 */
export function classifyLine(raw: string): ClassifiedLine {
  const depth = countIndent(raw);
  const rest = raw.slice(depth).replace(/^[ \t]+/, '');

  const commentStart = findCommentStart(rest);
  const content = (commentStart === -1 ? rest : rest.slice(0, commentStart)).trimEnd();
  const comment = commentStart === -1 ? undefined : rest.slice(commentStart + 1).trim();

  if (content.length === 0) {
    if (comment !== undefined) return { kind: 'comment', raw, depth, comment };
    return { kind: 'blank', raw, depth };
  }

  let status: TaskStatus | undefined;
  let cursor = 0;
  const first = content[0] ?? '';
  if (isStatusSymbol(first) && startsStatusSuffix(content.slice(1))) {
    status = symbolToStatus(first);
    cursor = 1;
  }

  const attributes: Attribute[] = [];
  while (true) {
    cursor = skipWhitespace(content, cursor);
    if (cursor >= content.length) break;
    const remaining = content.slice(cursor);
    const token = matchAttribute(remaining);
    if (!token) break;
    const after = remaining.slice(token.length);
    if (after.length > 0 && !TOKEN_BOUNDARY_RE.test(after)) break;
    attributes.push(token.attribute);
    cursor += token.length;
  }

  const body = content.slice(cursor).trim();
  const tags = extractTags(body);
  const entry: Omit<TaskLine, 'kind'> = { raw, depth, attributes, body, tags };
  if (status) entry.status = status;
  if (comment !== undefined) entry.comment = comment;
  return body.length === 0 ? { kind: 'header', ...entry } : { kind: 'task', ...entry };
}
