/**
 * Citation keys for corpus sources
 */

import type { SourceDocument } from '../source-corpus/types';
import type { CitationMetadata } from './types';
import { isValidKey, normalizeKey } from './markers';
import { surname } from './formatters';

/**
 * `metadata.citationKey` when usable, else first-author surname + year
 * (`smith2024`), else `ref<year>`, else `ref_<id>`
 */
export function citationKeyFor(doc: SourceDocument): string {
  const explicit = doc.metadata.citationKey;
  if (explicit && isValidKey(explicit)) {
    return normalizeKey(explicit);
  }

  const year = (doc.metadata.year ?? '').replace(/[^0-9a-z]/gi, '').toLowerCase();
  const firstAuthor = doc.metadata.authors[0];

  if (firstAuthor) {
    const lastName = surname(firstAuthor)
      .normalize('NFD')
      .replace(/[^a-zA-Z]/g, '')
      .toLowerCase();
    return `${lastName || 'unknown'}${year}`;
  }

  return year ? `ref${year}` : normalizeKey(`ref_${doc.id}`);
}

/**
 * Bibliography metadata carried over from a source
 */
export function citationMetadataFor(doc: SourceDocument): CitationMetadata {
  const rawMetadata: Record<string, unknown> = { kind: doc.kind };
  if (doc.metadata.url) rawMetadata.url = doc.metadata.url;
  if (doc.metadata.keywords && doc.metadata.keywords.length > 0) rawMetadata.keywords = [...doc.metadata.keywords];
  if (doc.kind === 'web') rawMetadata.entryType = 'misc';

  return {
    title: doc.title,
    authors: doc.metadata.authors,
    year: doc.metadata.year,
    sourceDocumentId: doc.id,
    rawMetadata,
  };
}

/**
 * Index a corpus snapshot by citation key; the earliest source wins a collision
 */
export function indexSourcesByKey(sources: readonly SourceDocument[]): Map<string, SourceDocument> {
  const index = new Map<string, SourceDocument>();
  for (const doc of sources) {
    const key = citationKeyFor(doc);
    if (!index.has(key)) index.set(key, doc);
  }
  return index;
}
