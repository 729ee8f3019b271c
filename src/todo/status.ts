import type { TaskStatus } from './model.js';

/**
 * The set of allowed status symbols at the start of a line.
 *
 * In the notation:
 * - `+` => todo (explicit; an absent symbol also reads as todo)
 * - `*` => doing
 * - `-` => done
 * - `=` => cancelled
 */
export type TaskStatusSymbol = '+' | '*' | '-' | '=';

export function isStatusSymbol(value: string): value is TaskStatusSymbol {
  return value === '+' || value === '*' || value === '-' || value === '=';
}

/**
 * Convert a normalized task status to its symbol.
 */
export function statusToSymbol(status: TaskStatus): TaskStatusSymbol {
  if (status === 'todo') return '+';
  if (status === 'doing') return '*';
  if (status === 'done') return '-';
  return '=';
}

/**
 * Convert a status symbol into a normalized task status.
 */
export function symbolToStatus(symbol: TaskStatusSymbol): TaskStatus {
  if (symbol === '+') return 'todo';
  if (symbol === '*') return 'doing';
  if (symbol === '-') return 'done';
  return 'cancelled';
}

/** True for statuses that no longer need attention. */
export function isClosedStatus(status: TaskStatus): boolean {
  return status === 'done' || status === 'cancelled';
}
