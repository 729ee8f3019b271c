import { classifyLine } from './classify.js';
import type { ClassifiedLine, EntryLine, TodoForest, TodoNode } from './model.js';

/**
 * Tree builder for todo-outline documents.
 *
 * Entries nest by tab depth. The builder keeps a stack of open ancestors and
 * never fails:
 * - over-indented lines attach one level below the deepest open ancestor
 * - blank and comment lines are kept in `lines` but never become nodes
 * - attribute-only lines become headers only when something is indented under them
 */
export type Eol = '\n' | '\r\n';

export interface SplitText {
  lines: string[];
  eol: Eol;
  endsWithNewline: boolean;
}

function detectEol(text: string): Eol {
  return text.includes('\r\n') ? '\r\n' : '\n';
}

/**
 * Split text into lines. A trailing newline ends the last line; it does not
 * start an empty one, so `''` has no lines and `'\n'` has one empty line.
 */
export function splitLines(text: string): SplitText {
  const eol = detectEol(text);
  const endsWithNewline = text.endsWith('\n');
  let lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines = lines.slice(0, -1);
  }
  return { lines, eol, endsWithNewline };
}

export function joinLines(lines: readonly string[], eol: Eol, endsWithNewline: boolean): string {
  const text = lines.join(eol);
  return endsWithNewline && lines.length > 0 ? `${text}${eol}` : text;
}

/**
 * Mutable state of one builder pass. The incremental engine resumes a pass by
 * seeding `stack` with (copies of) the ancestors open before an edit.
 */
export interface ForestBuilder {
  nodes: TodoNode[];
  roots: number[];
  /** Arena indices of open ancestors, shallowest first. */
  stack: number[];
}

/**
 * Attach one entry: pop ancestors at the same depth or deeper, clamp the depth
 * to one below the new top, then open the entry as the deepest ancestor.
 */
export function placeEntry(builder: ForestBuilder, entry: EntryLine, line: number): TodoNode {
  const { nodes, roots, stack } = builder;
  while (stack.length > 0) {
    const topIndex = stack[stack.length - 1];
    const top = topIndex === undefined ? undefined : nodes[topIndex];
    if (!top || top.depth < entry.depth) break;
    stack.pop();
  }

  const parentIndex = stack[stack.length - 1];
  const parent = parentIndex === undefined ? undefined : nodes[parentIndex];
  const depth = Math.min(entry.depth, parent ? parent.depth + 1 : 0);

  const node: TodoNode = {
    index: nodes.length,
    line,
    depth,
    kind: entry.kind,
    entry,
    children: [],
  };
  if (parent) {
    node.parent = parent.index;
    parent.children.push(node.index);
  } else {
    roots.push(node.index);
  }
  nodes.push(node);
  stack.push(node.index);
  return node;
}

/**
 * Decide header vs task for an entry once its children are known.
 */
export function settleKind(node: TodoNode): void {
  node.kind = node.entry.kind === 'header' && node.children.length > 0 ? 'header' : 'task';
}

export function isEntryLine(line: ClassifiedLine): line is EntryLine {
  return line.kind === 'task' || line.kind === 'header';
}

/**
 * Build the forest for a classified document in one linear pass.
 */
export function buildForest(lines: readonly ClassifiedLine[]): TodoForest {
  const builder: ForestBuilder = { nodes: [], roots: [], stack: [] };
  lines.forEach((line, index) => {
    if (isEntryLine(line)) placeEntry(builder, line, index);
  });
  for (const node of builder.nodes) settleKind(node);
  return { lines, nodes: builder.nodes, roots: builder.roots };
}

export interface ParsedDocument {
  forest: TodoForest;
  eol: Eol;
  endsWithNewline: boolean;
}

/**
 * Classify every line of `text` and build its forest.
 */
export function parseDocument(text: string): ParsedDocument {
  const { lines, eol, endsWithNewline } = splitLines(text);
  return { forest: buildForest(lines.map(classifyLine)), eol, endsWithNewline };
}
