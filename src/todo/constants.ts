/**
 * todo-outline notation constants.
 *
 * These values define the "wire format" of outline documents:
 * - which characters mark indentation, comments and escapes
 * - the token patterns for attributes and tags
 */
export const INDENT_CHAR = '\t';
export const COMMENT_CHAR = '#';
export const ESCAPE_CHAR = '\\';

export const PRIORITY_TOKEN_RE = /^\(([A-Z])\)/;
export const DUE_TOKEN_RE = /^\((\d{4}-\d{2}-\d{2})\)/;
export const CATEGORY_TOKEN_RE = /^\[([^[\]#\n]+)\]/;
export const TAG_RE = /@([A-Za-z0-9][A-Za-z0-9_-]*)/g;

/** Due dates closer than this (in days) produce a `DUE_SOON` diagnostic. */
export const DUE_SOON_DAYS = 7;

/** Diagnostic `source` reported to editors. */
export const DIAGNOSTIC_SOURCE = 'todo-outline';
