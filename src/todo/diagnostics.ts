import { DIAGNOSTIC_SOURCE, DUE_SOON_DAYS } from './constants.js';
import { daysBetween } from './date.js';
import type { CalendarDate, Resolution, ResolvedTask } from './model.js';
import { isClosedStatus } from './status.js';

/**
 * Diagnostics derived from a resolved document.
 *
 * The goal is to keep all "user-facing" feedback structured:
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 * - `line`: 0-based line index (when applicable).
 *
 * Parsing itself never reports anything; these are informational only.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'information';

export type DiagnosticCode = 'OVERDUE' | 'DUE_TODAY' | 'DUE_SOON';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  line?: number; // 0-based
  source: string;
}

export interface DueDateDiagnostic extends Diagnostic {
  line: number;
  /** Arena index of the task. */
  node: number;
  dueDate: CalendarDate;
}

export interface OverdueDiagnostic extends DueDateDiagnostic {
  code: 'OVERDUE';
  /** `referenceDate - dueDate`, always >= 1. */
  daysOverdue: number;
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function openTasksWithDue(resolution: Resolution): (ResolvedTask & { dueDate: CalendarDate })[] {
  const out: (ResolvedTask & { dueDate: CalendarDate })[] = [];
  for (const task of resolution.tasks) {
    const dueDate = task.attributes.due;
    if (!dueDate || isClosedStatus(task.attributes.status)) continue;
    out.push({ ...task, dueDate });
  }
  return out;
}

/**
 * One diagnostic per open task whose resolved due date is before
 * `referenceDate`. Done and cancelled tasks never appear.
 */
export function overdue(resolution: Resolution, referenceDate: CalendarDate): OverdueDiagnostic[] {
  const out: OverdueDiagnostic[] = [];
  for (const task of openTasksWithDue(resolution)) {
    const daysOverdue = daysBetween(task.dueDate, referenceDate);
    if (daysOverdue <= 0) continue;
    out.push({
      severity: 'error',
      code: 'OVERDUE',
      message: `Task is overdue by ${plural(daysOverdue, 'day')} (due ${task.dueDate}).`,
      line: task.line,
      node: task.node,
      dueDate: task.dueDate,
      daysOverdue,
      source: DIAGNOSTIC_SOURCE,
    });
  }
  return out;
}

/**
 * Overdue diagnostics plus reminders for open tasks due today or within the
 * next week, in document order.
 */
export function dateDiagnostics(
  resolution: Resolution,
  referenceDate: CalendarDate
): DueDateDiagnostic[] {
  const overdueByNode = new Map(
    overdue(resolution, referenceDate).map((diagnostic) => [diagnostic.node, diagnostic])
  );

  const out: DueDateDiagnostic[] = [];
  for (const task of openTasksWithDue(resolution)) {
    const late = overdueByNode.get(task.node);
    if (late) {
      out.push(late);
      continue;
    }

    const daysLeft = daysBetween(referenceDate, task.dueDate);
    const base = {
      line: task.line,
      node: task.node,
      dueDate: task.dueDate,
      source: DIAGNOSTIC_SOURCE,
    };
    if (daysLeft === 0) {
      out.push({ ...base, severity: 'warning', code: 'DUE_TODAY', message: 'Task is due today.' });
    } else if (daysLeft <= DUE_SOON_DAYS) {
      out.push({
        ...base,
        severity: 'information',
        code: 'DUE_SOON',
        message: `Task is due in ${plural(daysLeft, 'day')} (${task.dueDate}).`,
      });
    }
  }
  return out;
}
