/**
 * Parsed representation of a todo-outline document.
 *
 * Notes:
 * - Line numbers are 0-based to match typical array indexing in JS/TS.
 * - `depth` is measured in leading tabs (leading spaces never count).
 */
export type TaskStatus = 'todo' | 'doing' | 'done' | 'cancelled';

/** A calendar date written as `YYYY-MM-DD`. Produced by `parseCalendarDate`. */
export type CalendarDate = `${string}-${string}-${string}`;

export type Attribute =
  | { kind: 'priority'; value: string }
  | { kind: 'due'; value: CalendarDate }
  | { kind: 'category'; value: string };

interface LineBase {
  /** The line exactly as it appeared in the document (no EOL). */
  raw: string;
  /** Count of leading tab characters. */
  depth: number;
}

export interface BlankLine extends LineBase {
  kind: 'blank';
}

export interface CommentLine extends LineBase {
  kind: 'comment';
  comment: string;
}

interface EntryBase extends LineBase {
  /** Explicit status; undefined when the line carries no symbol. */
  status?: TaskStatus;
  attributes: Attribute[];
  body: string;
  /** Tag names (without `@`) found in the body, in first-seen order. */
  tags: string[];
  comment?: string;
}

/** A line with body text. */
export interface TaskLine extends EntryBase {
  kind: 'task';
}

/**
 * A line with only status/attributes. Provisional: the tree builder turns it
 * into a task with an empty body when nothing is indented under it.
 */
export interface HeaderLine extends EntryBase {
  kind: 'header';
}

export type EntryLine = TaskLine | HeaderLine;
export type ClassifiedLine = BlankLine | CommentLine | EntryLine;

export type NodeKind = 'task' | 'header';

export interface TodoNode {
  /** Position in the arena (document order). */
  index: number;
  /** 0-based line index of the entry. */
  line: number;
  /** Effective depth after clamping. */
  depth: number;
  kind: NodeKind;
  entry: EntryLine;
  /** Parent arena index (upward traversal only). */
  parent?: number;
  children: number[];
}

export interface TodoForest {
  /** One classified line per document line. */
  lines: readonly ClassifiedLine[];
  /** Arena of entry nodes in document order. */
  nodes: readonly TodoNode[];
  roots: readonly number[];
}

/**
 * Explicit per-field values a node writes down. Single-valued fields are
 * optional slots; categories accumulate.
 */
export interface AttributeOverrides {
  status?: TaskStatus;
  priority?: string;
  due?: CalendarDate;
  categories: readonly string[];
}

/** What a node hands down to its children. */
export type InheritedContext = AttributeOverrides;

export interface ResolvedAttributes {
  status: TaskStatus;
  priority?: string;
  due?: CalendarDate;
  categories: readonly string[];
  tags: readonly string[];
}

export interface ResolvedTask {
  node: number;
  line: number;
  body: string;
  attributes: ResolvedAttributes;
}

export interface Resolution {
  /** Context each node passes to its children, by node index. */
  contexts: readonly InheritedContext[];
  /** Task-facing attributes by node index; undefined for headers. */
  attributes: readonly (ResolvedAttributes | undefined)[];
  /** Tasks in document order. */
  tasks: readonly ResolvedTask[];
}
