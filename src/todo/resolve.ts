import type {
  AttributeOverrides,
  EntryLine,
  InheritedContext,
  ResolvedAttributes,
  ResolvedTask,
  Resolution,
  TodoForest,
  TodoNode,
} from './model.js';

/**
 * Attribute resolution: merge each node's explicit attributes with what its
 * ancestors hand down.
 *
 * Per field:
 * - status, priority, due: an explicit value replaces the inherited one
 * - categories: explicit values are added to the inherited set
 *
 * Headers take part in inheritance but produce no task-facing attributes.
 */
export const EMPTY_CONTEXT: InheritedContext = { categories: [] };

/**
 * Explicit values written on one line. Repeated single-valued tokens: the last
 * one wins. Repeated categories collapse to their first occurrence.
 */
export function entryOverrides(entry: EntryLine): AttributeOverrides {
  const categories: string[] = [];
  const overrides: AttributeOverrides = { categories };
  if (entry.status) overrides.status = entry.status;
  for (const attribute of entry.attributes) {
    if (attribute.kind === 'priority') overrides.priority = attribute.value;
    else if (attribute.kind === 'due') overrides.due = attribute.value;
    else if (!categories.includes(attribute.value)) categories.push(attribute.value);
  }
  return overrides;
}

/**
 * Pure top-down merge of an inherited context with a node's overrides.
 */
export function mergeContext(
  inherited: InheritedContext,
  overrides: AttributeOverrides
): InheritedContext {
  const categories = [...inherited.categories];
  for (const category of overrides.categories) {
    if (!categories.includes(category)) categories.push(category);
  }

  const merged: InheritedContext = { categories };
  const status = overrides.status ?? inherited.status;
  const priority = overrides.priority ?? inherited.priority;
  const due = overrides.due ?? inherited.due;
  if (status) merged.status = status;
  if (priority) merged.priority = priority;
  if (due) merged.due = due;
  return merged;
}

export function toResolvedAttributes(
  context: InheritedContext,
  tags: readonly string[]
): ResolvedAttributes {
  const resolved: ResolvedAttributes = {
    status: context.status ?? 'todo',
    categories: context.categories,
    tags,
  };
  if (context.priority) resolved.priority = context.priority;
  if (context.due) resolved.due = context.due;
  return resolved;
}

/**
 * Context and task attributes for one node, given what its parent hands down.
 */
export function resolveNode(
  node: TodoNode,
  inherited: InheritedContext
): { context: InheritedContext; attributes?: ResolvedAttributes } {
  const context = mergeContext(inherited, entryOverrides(node.entry));
  if (node.kind === 'header') return { context };
  return { context, attributes: toResolvedAttributes(context, node.entry.tags) };
}

export function toResolvedTask(node: TodoNode, attributes: ResolvedAttributes): ResolvedTask {
  return { node: node.index, line: node.line, body: node.entry.body, attributes };
}

/**
 * Resolve every node in one pre-order pass.
 *
 * The arena is already in pre-order (document order) and every parent
 * precedes its children, so a single forward sweep visits each node once with
 * its parent's context ready.
 */
export function resolve(forest: TodoForest): Resolution {
  const contexts: InheritedContext[] = [];
  const attributes: (ResolvedAttributes | undefined)[] = [];
  const tasks: ResolvedTask[] = [];

  for (const node of forest.nodes) {
    const inherited =
      node.parent === undefined ? EMPTY_CONTEXT : contexts[node.parent] ?? EMPTY_CONTEXT;
    const resolved = resolveNode(node, inherited);
    contexts.push(resolved.context);
    attributes.push(resolved.attributes);
    if (resolved.attributes) tasks.push(toResolvedTask(node, resolved.attributes));
  }

  return { contexts, attributes, tasks };
}
