import { classifyLine } from './classify.js';
import { INDENT_CHAR } from './constants.js';
import type { Attribute, ClassifiedLine, EntryLine, Resolution, TaskStatus, TodoForest, TodoNode } from './model.js';
import type { Eol } from './parse.js';
import { isEntryLine, parseDocument } from './parse.js';
import { entryOverrides, resolve } from './resolve.js';
import { statusToSymbol } from './status.js';

/**
 * Canonical serialization of a forest.
 *
 * Line shape: tabs, status, priority, due date, categories, body, `# comment`,
 * separated by single spaces.
 *
 * Modes:
 * - `raw`: every explicit token of the line, reordered into canonical order
 * - `normalized`: only the tokens that take effect (last priority/due, unique
 *   categories), and no `+` when the inherited status already reads as todo
 *
 * Inherited values are never written onto a child.
 */
export type FormatMode = 'raw' | 'normalized';

export interface FormatOptions {
  eol?: Eol;
  /** Reused by `normalized` mode; computed when omitted. */
  resolution?: Resolution;
}

const ATTRIBUTE_ORDER: Record<Attribute['kind'], number> = {
  priority: 0,
  due: 1,
  category: 2,
};

function attributeToken(attribute: Attribute): string {
  if (attribute.kind === 'category') return `[${attribute.value}]`;
  return `(${attribute.value})`;
}

function commentToken(comment: string): string {
  return comment ? `# ${comment}` : '#';
}

function canonicalAttributes(entry: EntryLine, mode: FormatMode): Attribute[] {
  if (mode === 'raw') {
    return [...entry.attributes].sort((a, b) => ATTRIBUTE_ORDER[a.kind] - ATTRIBUTE_ORDER[b.kind]);
  }
  const overrides = entryOverrides(entry);
  const attributes: Attribute[] = [];
  if (overrides.priority) attributes.push({ kind: 'priority', value: overrides.priority });
  if (overrides.due) attributes.push({ kind: 'due', value: overrides.due });
  for (const category of overrides.categories) attributes.push({ kind: 'category', value: category });
  return attributes;
}

function renderEntry(
  depth: number,
  status: TaskStatus | undefined,
  attributes: readonly Attribute[],
  entry: EntryLine
): string {
  const tokens: string[] = [];
  if (status) tokens.push(statusToSymbol(status));
  tokens.push(...attributes.map(attributeToken));
  if (entry.body) tokens.push(entry.body);
  if (entry.comment !== undefined) tokens.push(commentToken(entry.comment));
  return `${INDENT_CHAR.repeat(depth)}${tokens.join(' ')}`;
}

/**
 * Render without an explicit `+`, but only if the line still reads the same
 * (same kind, same body, same tokens) once the symbol is gone.
 */
function withoutTodoSymbol(node: TodoNode, attributes: readonly Attribute[]): string | undefined {
  const candidate = renderEntry(node.depth, undefined, attributes, node.entry);
  const reread = classifyLine(candidate);
  if (!isEntryLine(reread) || reread.kind !== node.entry.kind) return undefined;
  if (reread.status !== undefined) return undefined;
  if (reread.body !== node.entry.body) return undefined;
  if (reread.attributes.length !== attributes.length) return undefined;
  return candidate;
}

function formatNode(node: TodoNode, mode: FormatMode, resolution: Resolution | undefined): string {
  const attributes = canonicalAttributes(node.entry, mode);
  const status = node.entry.status;
  if (mode === 'normalized' && status === 'todo' && resolution) {
    const inherited =
      node.parent === undefined ? undefined : resolution.contexts[node.parent]?.status;
    if (inherited === undefined || inherited === 'todo') {
      const candidate = withoutTodoSymbol(node, attributes);
      if (candidate !== undefined) return candidate;
    }
  }
  return renderEntry(node.depth, status, attributes, node.entry);
}

function formatNonEntry(line: ClassifiedLine): string {
  if (line.kind === 'comment') return `${INDENT_CHAR.repeat(line.depth)}${commentToken(line.comment)}`;
  return '';
}

/**
 * Serialize a forest back to canonical text. Output ends with a line
 * terminator whenever the document has at least one line.
 */
export function format(forest: TodoForest, mode: FormatMode = 'raw', options: FormatOptions = {}): string {
  const eol = options.eol ?? '\n';
  const resolution =
    mode === 'normalized' ? options.resolution ?? resolve(forest) : options.resolution;

  const out: string[] = [];
  let nodeCursor = 0;
  forest.lines.forEach((line, index) => {
    const node = forest.nodes[nodeCursor];
    if (node && node.line === index) {
      out.push(formatNode(node, mode, resolution));
      nodeCursor += 1;
      return;
    }
    out.push(formatNonEntry(line));
  });

  return out.length > 0 ? `${out.join(eol)}${eol}` : '';
}

/**
 * Text in, canonical text out. Keeps the document's line terminator style.
 */
export function formatText(text: string, mode: FormatMode = 'raw'): string {
  const { forest, eol } = parseDocument(text);
  return format(forest, mode, { eol });
}
