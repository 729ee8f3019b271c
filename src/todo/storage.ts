import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { TodoOutlineConfig } from '../config.js';

/**
 * Filesystem helpers for outline documents.
 *
 * Responsibilities:
 * - Ensure all reads/writes stay within `config.rootDir`.
 * - Provide content hashing (etag) and atomic writes.
 */
export interface ReadTodoFileResult {
  absolutePath: string;
  text: string;
  etag: string;
}

/**
 * Compute a stable hex-encoded SHA-256 digest.
 *
 * Used as:
 * - an etag for optimistic concurrency checks
 * - a change detector for idempotent operations
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Enforce optimistic concurrency when an `ifMatch` etag is provided.
 */
export function requireIfMatch(currentEtag: string, ifMatch: string | undefined): void {
  if (!ifMatch) return;
  if (ifMatch !== currentEtag) {
    throw new Error(`CONFLICT: etag mismatch (current=${currentEtag}, ifMatch=${ifMatch})`);
  }
}

/**
 * Enforce that `absolutePath` does not escape `rootDir`.
 *
 * This is a lexical/path-traversal guard only; symlinks are not resolved.
 */
function assertPathWithinRoot(rootDir: string, absolutePath: string): void {
  const rel = relative(rootDir, absolutePath);
  if (rel === '' || rel === '.') return;

  // On Windows, `path.relative()` can return an absolute path if drives differ.
  if (isAbsolute(rel)) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }

  const parts = rel.split(sep);
  if (parts.includes('..')) {
    throw new Error(`Resolved path escapes rootDir: ${absolutePath}`);
  }
}

/**
 * Resolve a document path relative to `rootDir` and validate it stays inside.
 */
export function resolveTodoPath(config: TodoOutlineConfig, path: string): string {
  const rootDir = resolve(config.rootDir);
  const absolutePath = resolve(rootDir, path);
  assertPathWithinRoot(rootDir, absolutePath);
  return absolutePath;
}

/**
 * Read a document and compute its etag.
 */
export async function readTodoFile(
  config: TodoOutlineConfig,
  path: string
): Promise<ReadTodoFileResult> {
  const absolutePath = resolveTodoPath(config, path);
  const text = await readFile(absolutePath, 'utf8');
  return { absolutePath, text, etag: sha256Hex(text) };
}

/**
 * Write a file via a temporary path and atomic rename.
 */
export async function writeFileAtomic(
  absolutePath: string,
  text: string
): Promise<void> {
  const dir = dirname(absolutePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = `${absolutePath}.tmp.${randomUUID()}`;
  await writeFile(tmpPath, text, 'utf8');
  await rename(tmpPath, absolutePath);
}
