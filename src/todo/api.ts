import { relative } from 'node:path';
import type { TodoOutlineConfig } from '../config.js';
import type { CompletionItem } from './completion.js';
import { completeAt } from './completion.js';
import { localCalendarDate } from './date.js';
import type { DueDateDiagnostic } from './diagnostics.js';
import { dateDiagnostics } from './diagnostics.js';
import type { DocumentState } from './document.js';
import { createDocumentState } from './document.js';
import type { FormatMode } from './format.js';
import { format } from './format.js';
import type { CalendarDate } from './model.js';
import type { DocumentStore } from './session.js';
import { readTodoFile, requireIfMatch, sha256Hex, writeFileAtomic } from './storage.js';
import type { OutlineTreeViewNode, TaskFlatRow } from './view.js';
import { buildTaskTreeView, toTaskFlatRows } from './view.js';

/**
 * Public API used by the CLI and the stdio server.
 *
 * This module is the boundary between:
 * - filesystem storage (`storage.ts`)
 * - open-document sessions (`session.ts`)
 * - the parsing/resolution core (`document.ts`, `format.ts`, `diagnostics.ts`, ...)
 *
 * Concurrency model:
 * - Mutating operations accept `ifMatch` (etag) for optimistic concurrency.
 * - The etag is a SHA-256 of the full document content.
 */
export type TaskView = 'tree' | 'flat';

export interface TaskStats {
  total: number;
  todo: number;
  doing: number;
  done: number;
  cancelled: number;
}

function computeStats(state: DocumentState): TaskStats {
  const stats: TaskStats = { total: 0, todo: 0, doing: 0, done: 0, cancelled: 0 };
  for (const task of state.resolution.tasks) {
    stats.total += 1;
    stats[task.attributes.status] += 1;
  }
  return stats;
}

/**
 * Reference date: explicit argument, then `config.today`, then the local date.
 */
export function referenceDate(config: TodoOutlineConfig, today?: CalendarDate): CalendarDate {
  return today ?? config.today ?? localCalendarDate();
}

function taskView(state: DocumentState, view: TaskView): OutlineTreeViewNode[] | TaskFlatRow[] {
  return view === 'tree'
    ? buildTaskTreeView(state.forest, state.resolution)
    : toTaskFlatRows(state.forest, state.resolution);
}

// ---------------------------------------------------------------------------
// Files under `config.rootDir`

export interface FormatFileOptions {
  path: string;
  mode?: FormatMode;
  /** Write the formatted text back (atomic rename). */
  write?: boolean;
  ifMatch?: string;
}

export interface FormatFileResult {
  path: string;
  changed: boolean;
  etag: string;
  text: string;
}

/**
 * Format a file. Without `write` this is a dry run that reports whether the
 * file is already canonical.
 */
export async function formatFile(
  config: TodoOutlineConfig,
  options: FormatFileOptions
): Promise<FormatFileResult> {
  const { absolutePath, text, etag } = await readTodoFile(config, options.path);
  requireIfMatch(etag, options.ifMatch);

  const state = createDocumentState(text);
  const formatted = format(state.forest, options.mode ?? 'raw', {
    eol: state.eol,
    resolution: state.resolution,
  });
  const changed = formatted !== text;
  const path = relative(config.rootDir, absolutePath);

  if (options.write && changed) {
    await writeFileAtomic(absolutePath, formatted);
    return { path, changed, etag: sha256Hex(formatted), text: formatted };
  }
  return { path, changed, etag, text: formatted };
}

export async function listTasks(
  config: TodoOutlineConfig,
  options: { path: string; view?: TaskView }
): Promise<{ tasks: OutlineTreeViewNode[] | TaskFlatRow[]; stats: TaskStats; etag: string }> {
  const { text, etag } = await readTodoFile(config, options.path);
  const state = createDocumentState(text);
  return { tasks: taskView(state, options.view ?? 'tree'), stats: computeStats(state), etag };
}

export async function checkFile(
  config: TodoOutlineConfig,
  options: { path: string; today?: CalendarDate }
): Promise<{ diagnostics: DueDateDiagnostic[]; today: CalendarDate }> {
  const { text } = await readTodoFile(config, options.path);
  const today = referenceDate(config, options.today);
  const state = createDocumentState(text);
  return { diagnostics: dateDiagnostics(state.resolution, today), today };
}

// ---------------------------------------------------------------------------
// Open documents

export interface DocumentSummary {
  uri: string;
  version: number;
  etag: string;
  stats: TaskStats;
}

export function openDocument(
  store: DocumentStore,
  options: { uri: string; text: string }
): DocumentSummary {
  const snapshot = store.open(options.uri, options.text);
  return {
    uri: snapshot.uri,
    version: snapshot.version,
    etag: snapshot.etag,
    stats: computeStats(snapshot.state),
  };
}

export interface EditDocumentOptions {
  uri: string;
  startLine: number;
  endLine: number;
  text: string;
  ifMatch?: string;
}

export function editDocument(store: DocumentStore, options: EditDocumentOptions): DocumentSummary {
  const snapshot = store
    .get(options.uri)
    .applyEdit({ startLine: options.startLine, endLine: options.endLine }, options.text, {
      ifMatch: options.ifMatch,
    });
  return {
    uri: snapshot.uri,
    version: snapshot.version,
    etag: snapshot.etag,
    stats: computeStats(snapshot.state),
  };
}

export function closeDocument(store: DocumentStore, options: { uri: string }): { closed: boolean } {
  return { closed: store.close(options.uri) };
}

export function documentTasks(
  store: DocumentStore,
  options: { uri: string; view?: TaskView }
): { tasks: OutlineTreeViewNode[] | TaskFlatRow[]; etag: string } {
  const snapshot = store.get(options.uri).snapshot;
  return { tasks: taskView(snapshot.state, options.view ?? 'tree'), etag: snapshot.etag };
}

export function formatDocument(
  store: DocumentStore,
  options: { uri: string; mode?: FormatMode }
): { text: string; etag: string } {
  const snapshot = store.get(options.uri).snapshot;
  const { state } = snapshot;
  const text = format(state.forest, options.mode ?? 'raw', {
    eol: state.eol,
    resolution: state.resolution,
  });
  return { text, etag: snapshot.etag };
}

export function completeDocument(
  config: TodoOutlineConfig,
  store: DocumentStore,
  options: { uri: string; line: number; character: number; today?: CalendarDate }
): { items: CompletionItem[] } {
  const snapshot = store.get(options.uri).snapshot;
  const items = completeAt(
    snapshot.state,
    { line: options.line, character: options.character },
    { today: referenceDate(config, options.today) }
  );
  return { items };
}

export function documentDiagnostics(
  config: TodoOutlineConfig,
  store: DocumentStore,
  options: { uri: string; today?: CalendarDate }
): { diagnostics: DueDateDiagnostic[]; today: CalendarDate } {
  const snapshot = store.get(options.uri).snapshot;
  const today = referenceDate(config, options.today);
  return { diagnostics: dateDiagnostics(snapshot.state.resolution, today), today };
}
