/**
 * Citation Resolver - Type Definitions
 */

import { z } from 'zod';

/**
 * Inline output variants
 */
export type CitationFormat = 'latex' | 'markdown-author-year';

export const CITATION_FORMATS: readonly CitationFormat[] = ['latex', 'markdown-author-year'];

/**
 * Reference list styles
 */
export type BibliographyStyle = 'apa' | 'ieee';

export interface BibliographyEntry {
  key: string;
  title: string;
  authors: string[];
  year: string;
  sourceDocumentId?: string;
  rawMetadata: Record<string, unknown>;
}

/**
 * Fields accepted by register(); anything missing stays as it was
 */
export interface CitationMetadata {
  title?: string;
  authors?: string[];
  year?: string | number;
  sourceDocumentId?: string;
  rawMetadata?: Record<string, unknown>;
}

export interface RegisterResult {
  entry: BibliographyEntry;
  created: boolean;
  /** Fields that were empty and are now populated */
  enrichedFields: string[];
}

/**
 * Anything that can say which keys are still referenced
 */
export interface CitationReferenceSource {
  referencedCitationKeys(): Promise<Set<string>>;
}

/**
 * Turns one bibliography entry into inline citation text
 */
export interface CitationFormatter {
  readonly format: CitationFormat;
  inline(key: string, entry: BibliographyEntry): string;
}

export interface IngestResult {
  /** Text with markers in canonical `[CITE:key]` form */
  text: string;
  keys: string[];
  /** Keys registered from matching corpus sources during ingest */
  registered: string[];
  unresolved: string[];
  malformed: string[];
}

// ============================================================================
// Persisted records
// ============================================================================

export const bibliographyEntrySchema = z.object({
  key: z.string().min(1),
  title: z.string(),
  authors: z.array(z.string()),
  year: z.string(),
  sourceDocumentId: z.string().optional(),
  rawMetadata: z.record(z.unknown()),
});

export const bibliographyRecordSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('entry'), entry: bibliographyEntrySchema }),
  z.object({ type: z.literal('removed'), key: z.string().min(1), removedAt: z.string() }),
]);

export type BibliographyRecord = z.infer<typeof bibliographyRecordSchema>;
