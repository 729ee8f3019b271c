import type { DocumentState } from './document.js';
import { createDocumentState, documentText } from './document.js';
import type { LineRange } from './incremental.js';
import { applyEdit } from './incremental.js';
import { requireIfMatch, sha256Hex } from './storage.js';

/**
 * Per-document sessions.
 *
 * A session owns the latest `DocumentState` of one document. Edits run
 * synchronously in arrival order and publish a new snapshot in one
 * assignment, so readers holding an older snapshot never see a half-built
 * tree.
 *
 * Concurrency model:
 * - Every snapshot carries an etag (SHA-256 of the full text).
 * - Mutations accept `ifMatch` for optimistic concurrency.
 */
export interface DocumentSnapshot {
  uri: string;
  /** Starts at 1 and grows by one per applied change. */
  version: number;
  etag: string;
  state: DocumentState;
}

export interface MutationOptions {
  ifMatch?: string;
}

function snapshotOf(uri: string, version: number, state: DocumentState): DocumentSnapshot {
  return { uri, version, etag: sha256Hex(documentText(state)), state };
}

export class DocumentSession {
  readonly uri: string;
  private current: DocumentSnapshot;
  private disposed = false;

  constructor(uri: string, text: string) {
    this.uri = uri;
    this.current = snapshotOf(uri, 1, createDocumentState(text));
  }

  get snapshot(): DocumentSnapshot {
    this.assertOpen();
    return this.current;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Replace lines `[startLine, endLine)` with `text`.
   */
  applyEdit(range: LineRange, text: string, options: MutationOptions = {}): DocumentSnapshot {
    this.assertOpen();
    requireIfMatch(this.current.etag, options.ifMatch);
    const state = applyEdit(this.current.state, range, text);
    this.current = snapshotOf(this.uri, this.current.version + 1, state);
    return this.current;
  }

  /**
   * Replace the whole document (full re-parse).
   */
  replaceText(text: string, options: MutationOptions = {}): DocumentSnapshot {
    this.assertOpen();
    requireIfMatch(this.current.etag, options.ifMatch);
    this.current = snapshotOf(this.uri, this.current.version + 1, createDocumentState(text));
    return this.current;
  }

  dispose(): void {
    this.disposed = true;
  }

  private assertOpen(): void {
    if (this.disposed) throw new Error(`Document is closed: ${this.uri}`);
  }
}

/**
 * Sessions by document uri. Each server (or test) owns its own store; there
 * is no process-wide document state.
 */
export class DocumentStore {
  private readonly sessions = new Map<string, DocumentSession>();

  /**
   * Open a document. Re-opening an open uri replaces its session.
   */
  open(uri: string, text: string): DocumentSnapshot {
    this.sessions.get(uri)?.dispose();
    const session = new DocumentSession(uri, text);
    this.sessions.set(uri, session);
    return session.snapshot;
  }

  get(uri: string): DocumentSession {
    const session = this.sessions.get(uri);
    if (!session) throw new Error(`Document not open: ${uri}`);
    return session;
  }

  has(uri: string): boolean {
    return this.sessions.has(uri);
  }

  close(uri: string): boolean {
    const session = this.sessions.get(uri);
    if (!session) return false;
    session.dispose();
    this.sessions.delete(uri);
    return true;
  }

  uris(): string[] {
    return [...this.sessions.keys()].sort();
  }
}
