import type { ClassifiedLine } from './model.js';
import { isEntryLine } from './parse.js';

/**
 * Per-document vocabulary of category and tag names, used for completion.
 *
 * Names are reference-counted by the number of lines that mention them, so an
 * edit only has to subtract the lines it removes and add the lines it inserts.
 * Indexes are never mutated once built: updates return a new index and older
 * snapshots stay valid.
 */
export type CandidateKind = 'category' | 'tag';

export interface QueryIndex {
  categories: ReadonlyMap<string, number>;
  tags: ReadonlyMap<string, number>;
}

export interface LineVocabulary {
  categories: string[];
  tags: string[];
}

/**
 * Distinct category and tag names mentioned by one line.
 */
export function lineVocabulary(line: ClassifiedLine): LineVocabulary {
  if (!isEntryLine(line)) return { categories: [], tags: [] };
  const categories: string[] = [];
  for (const attribute of line.attributes) {
    if (attribute.kind !== 'category') continue;
    if (!categories.includes(attribute.value)) categories.push(attribute.value);
  }
  return { categories, tags: [...line.tags] };
}

function adjust(counts: Map<string, number>, names: readonly string[], delta: 1 | -1): void {
  for (const name of names) {
    const next = (counts.get(name) ?? 0) + delta;
    if (next > 0) counts.set(name, next);
    else counts.delete(name);
  }
}

export function buildQueryIndex(lines: readonly ClassifiedLine[]): QueryIndex {
  return updateQueryIndex({ categories: new Map(), tags: new Map() }, [], lines);
}

/**
 * Apply the vocabulary diff of an edit: `removed` lines leave, `added` lines
 * arrive.
 */
export function updateQueryIndex(
  index: QueryIndex,
  removed: readonly ClassifiedLine[],
  added: readonly ClassifiedLine[]
): QueryIndex {
  const categories = new Map(index.categories);
  const tags = new Map(index.tags);
  for (const line of removed) {
    const vocabulary = lineVocabulary(line);
    adjust(categories, vocabulary.categories, -1);
    adjust(tags, vocabulary.tags, -1);
  }
  for (const line of added) {
    const vocabulary = lineVocabulary(line);
    adjust(categories, vocabulary.categories, 1);
    adjust(tags, vocabulary.tags, 1);
  }
  return { categories, tags };
}

/**
 * Known names starting with `prefix` (case-sensitive), sorted by code unit so
 * the answer only depends on the document's content.
 */
export function candidates(index: QueryIndex, kind: CandidateKind, prefix: string): string[] {
  const names = kind === 'category' ? index.categories : index.tags;
  return [...names.keys()].filter((name) => name.startsWith(prefix)).sort();
}
