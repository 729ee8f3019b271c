import { classifyLine } from './classify.js';
import type { DocumentState } from './document.js';
import type { InheritedContext, ResolvedAttributes, ResolvedTask, TodoNode } from './model.js';
import type { ForestBuilder } from './parse.js';
import { isEntryLine, placeEntry, settleKind, splitLines } from './parse.js';
import { updateQueryIndex } from './query-index.js';
import { EMPTY_CONTEXT, resolveNode, toResolvedTask } from './resolve.js';

/**
 * Incremental re-parse after a line-range edit.
 *
 * The builder's state before the edit is the ancestor chain of the last entry
 * above it, which the edit cannot change. From there only these nodes are
 * rebuilt:
 * - the inserted entries
 * - the run of following entries indented deeper than the shallowest entry
 *   the edit inserted or removed (they may change parent)
 *
 * The first following entry at or above that depth pops back to the same
 * ancestors as before, so it and everything after it keep their parents and
 * resolved attributes; they are only renumbered.
 *
 * The result always equals `createDocumentState` on the edited text.
 */
export interface LineRange {
  /** 0-based first replaced line. */
  startLine: number;
  /** 0-based line after the last replaced line (exclusive). */
  endLine: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function firstNodeAtOrAfter(nodes: readonly TodoNode[], line: number, from: number): number {
  let index = from;
  while (index < nodes.length && (nodes[index]?.line ?? line) < line) index += 1;
  return index;
}

function copyNode(node: TodoNode, children: number[]): TodoNode {
  return { ...node, children };
}

/**
 * Replace lines `[startLine, endLine)` of `state` with the lines of `newText`
 * (split like a document: `''` inserts nothing, `'\n'` one empty line).
 */
export function applyEdit(state: DocumentState, range: LineRange, newText: string): DocumentState {
  const { forest } = state;
  const oldLines = forest.lines;
  const oldNodes = forest.nodes;

  const start = clamp(Math.trunc(range.startLine) || 0, 0, oldLines.length);
  const end = clamp(Math.trunc(range.endLine) || 0, start, oldLines.length);
  const inserted = splitLines(newText).lines.map(classifyLine);
  const removedLines = oldLines.slice(start, end);
  const lineDelta = inserted.length - removedLines.length;
  const lines = [...oldLines.slice(0, start), ...inserted, ...oldLines.slice(end)];

  const prefixCount = firstNodeAtOrAfter(oldNodes, start, 0);
  const removedEnd = firstNodeAtOrAfter(oldNodes, end, prefixCount);

  // Open ancestors at the edit point, shallowest first.
  const chain: number[] = [];
  let cursor: number | undefined = prefixCount > 0 ? prefixCount - 1 : undefined;
  while (cursor !== undefined) {
    chain.unshift(cursor);
    cursor = oldNodes[cursor]?.parent;
  }

  const nodes: TodoNode[] = oldNodes.slice(0, prefixCount);
  for (const index of chain) {
    const node = oldNodes[index];
    if (node) nodes[index] = copyNode(node, node.children.filter((child) => child < prefixCount));
  }
  const builder: ForestBuilder = {
    nodes,
    roots: forest.roots.filter((root) => root < prefixCount),
    stack: [...chain],
  };

  let minDepth = Number.POSITIVE_INFINITY;
  for (let index = prefixCount; index < removedEnd; index += 1) {
    minDepth = Math.min(minDepth, oldNodes[index]?.depth ?? minDepth);
  }
  inserted.forEach((line, offset) => {
    if (!isEntryLine(line)) return;
    const node = placeEntry(builder, line, start + offset);
    minDepth = Math.min(minDepth, node.depth);
  });

  let resync = removedEnd;
  while (resync < oldNodes.length) {
    const old = oldNodes[resync];
    if (!old || old.entry.depth <= minDepth) break;
    placeEntry(builder, old.entry, old.line + lineDelta);
    resync += 1;
  }

  const rebuiltEnd = nodes.length;
  for (let index = prefixCount; index < rebuiltEnd; index += 1) {
    const node = nodes[index];
    if (node) settleKind(node);
  }

  // Untouched tail: shift indices and lines, keep structure.
  const indexDelta = rebuiltEnd - resync;
  const shift = (index: number): number => (index < prefixCount ? index : index + indexDelta);
  for (let index = resync; index < oldNodes.length; index += 1) {
    const old = oldNodes[index];
    if (!old) continue;
    const moved: TodoNode = {
      index: old.index + indexDelta,
      line: old.line + lineDelta,
      depth: old.depth,
      kind: old.kind,
      entry: old.entry,
      children: old.children.map(shift),
    };
    if (old.parent !== undefined) moved.parent = shift(old.parent);
    nodes.push(moved);
  }
  for (const index of chain) {
    const node = nodes[index];
    const old = oldNodes[index];
    if (!node || !old) continue;
    for (const child of old.children) {
      if (child >= resync) node.children.push(child + indexDelta);
    }
    settleKind(node);
  }
  for (const root of forest.roots) {
    if (root >= resync) builder.roots.push(root + indexDelta);
  }

  // Resolution: ancestors keep their context (only a header/task flip can
  // change what they surface); rebuilt nodes resolve afresh; the tail reuses
  // its previous results.
  const previous = state.resolution;
  const contexts: InheritedContext[] = previous.contexts.slice(0, prefixCount);
  const attributes: (ResolvedAttributes | undefined)[] = previous.attributes.slice(0, prefixCount);
  for (const index of chain) {
    const node = nodes[index];
    if (!node) continue;
    const parentContext =
      node.parent === undefined ? EMPTY_CONTEXT : contexts[node.parent] ?? EMPTY_CONTEXT;
    attributes[index] = resolveNode(node, parentContext).attributes;
  }
  for (let index = prefixCount; index < rebuiltEnd; index += 1) {
    const node = nodes[index];
    if (!node) continue;
    const parentContext =
      node.parent === undefined ? EMPTY_CONTEXT : contexts[node.parent] ?? EMPTY_CONTEXT;
    const resolved = resolveNode(node, parentContext);
    contexts.push(resolved.context);
    attributes.push(resolved.attributes);
  }
  for (let index = resync; index < oldNodes.length; index += 1) {
    contexts.push(previous.contexts[index] ?? EMPTY_CONTEXT);
    attributes.push(previous.attributes[index]);
  }

  const tasks: ResolvedTask[] = [];
  nodes.forEach((node, index) => {
    const resolved = attributes[index];
    if (resolved) tasks.push(toResolvedTask(node, resolved));
  });

  return {
    eol: state.eol,
    endsWithNewline: state.endsWithNewline,
    forest: { lines, nodes, roots: builder.roots },
    resolution: { contexts, attributes, tasks },
    index: updateQueryIndex(state.index, removedLines, inserted),
  };
}
