import { classifyLine } from './classify.js';
import type { Resolution, TodoForest } from './model.js';
import type { Eol } from './parse.js';
import { buildForest, joinLines, splitLines } from './parse.js';
import type { QueryIndex } from './query-index.js';
import { buildQueryIndex } from './query-index.js';
import { resolve } from './resolve.js';

/**
 * Everything derived from one version of a document. Treated as immutable:
 * edits produce a new state and leave this one valid for readers.
 */
export interface DocumentState {
  eol: Eol;
  endsWithNewline: boolean;
  forest: TodoForest;
  resolution: Resolution;
  index: QueryIndex;
}

export function createDocumentState(text: string): DocumentState {
  const { lines, eol, endsWithNewline } = splitLines(text);
  const classified = lines.map(classifyLine);
  const forest = buildForest(classified);
  return {
    eol,
    endsWithNewline,
    forest,
    resolution: resolve(forest),
    index: buildQueryIndex(classified),
  };
}

export function documentText(state: DocumentState): string {
  return joinLines(
    state.forest.lines.map((line) => line.raw),
    state.eol,
    state.endsWithNewline
  );
}
