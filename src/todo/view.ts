import type { CalendarDate, NodeKind, Resolution, TaskStatus, TodoForest } from './model.js';

/**
 * View/presentation helpers for outline documents.
 *
 * The forest keeps arena indices and raw entries for the formatter and the
 * incremental engine. Tool/CLI output should not expose that, so these helpers
 * translate nodes into stable JSON shapes.
 *
 * Notes:
 * - Uses explicit stacks to avoid recursion depth issues on deeply nested documents.
 * - Headers appear in the tree (they group tasks) but never in the flat list.
 */
export type OutlineTreeViewNode = {
  line: number;
  kind: NodeKind;
  body: string;
  status?: TaskStatus;
  priority?: string;
  due?: CalendarDate;
  categories: string[];
  tags: string[];
  comment?: string;
  children: OutlineTreeViewNode[];
};

export type TaskFlatRow = {
  line: number;
  body: string;
  status: TaskStatus;
  priority?: string;
  due?: CalendarDate;
  categories: string[];
  tags: string[];
  parentLine?: number;
};

/**
 * Convert a resolved forest into nested view nodes.
 *
 * Task nodes carry resolved attributes; header nodes carry what they hand
 * down to their children.
 */
export function buildTaskTreeView(forest: TodoForest, resolution: Resolution): OutlineTreeViewNode[] {
  const out: OutlineTreeViewNode[] = [];
  const stack: { index: number; outArray: OutlineTreeViewNode[] }[] = [];

  // Seed the stack in reverse so we push into `out` in the original order.
  for (let index = forest.roots.length - 1; index >= 0; index -= 1) {
    const root = forest.roots[index];
    if (root === undefined) continue;
    stack.push({ index: root, outArray: out });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;

    const node = forest.nodes[frame.index];
    if (!node) continue;
    const resolved = resolution.attributes[frame.index] ?? resolution.contexts[frame.index];

    const view: OutlineTreeViewNode = {
      line: node.line,
      kind: node.kind,
      body: node.entry.body,
      categories: [...(resolved?.categories ?? [])],
      tags: [...node.entry.tags],
      children: [],
    };
    if (resolved?.status) view.status = resolved.status;
    if (resolved?.priority) view.priority = resolved.priority;
    if (resolved?.due) view.due = resolved.due;
    if (node.entry.comment !== undefined) view.comment = node.entry.comment;

    frame.outArray.push(view);

    // Push children in reverse so traversal preserves the original order.
    for (let index = node.children.length - 1; index >= 0; index -= 1) {
      const child = node.children[index];
      if (child === undefined) continue;
      stack.push({ index: child, outArray: view.children });
    }
  }

  return out;
}

export function toTaskFlatRows(forest: TodoForest, resolution: Resolution): TaskFlatRow[] {
  return resolution.tasks.map((task) => {
    const row: TaskFlatRow = {
      line: task.line,
      body: task.body,
      status: task.attributes.status,
      categories: [...task.attributes.categories],
      tags: [...task.attributes.tags],
    };
    if (task.attributes.priority) row.priority = task.attributes.priority;
    if (task.attributes.due) row.due = task.attributes.due;
    const parent = forest.nodes[task.node]?.parent;
    const parentLine = parent === undefined ? undefined : forest.nodes[parent]?.line;
    if (parentLine !== undefined) row.parentLine = parentLine;
    return row;
  });
}
