/**
 * Source Corpus - Type Definitions
 */

import { z } from 'zod';

export type SourceKind = 'pdf' | 'web' | 'text' | 'note';

export const SOURCE_KINDS: readonly SourceKind[] = ['pdf', 'web', 'text', 'note'];

export interface SourceMetadata {
  authors: string[];
  year?: string;
  url?: string;
  /** Explicit citation key; otherwise one is derived from author and year */
  citationKey?: string;
  keywords?: string[];
}

export interface SourceDocument {
  id: string;
  kind: SourceKind;
  title: string;
  extractedText: string;
  metadata: SourceMetadata;
  /** ISO timestamp */
  addedAt: string;
}

/**
 * What an extractor hands to the corpus; id and addedAt are assigned on add
 */
export interface SourceInput {
  kind: SourceKind;
  title: string;
  extractedText: string;
  metadata?: Partial<SourceMetadata>;
}

/**
 * Turns something on disk or on the web into corpus input.
 * PDF and web extraction live outside this package.
 */
export interface SourceExtractor {
  readonly name: string;
  supports(location: string): boolean;
  extract(location: string): Promise<SourceInput>;
}

// ============================================================================
// Persisted records
// ============================================================================

export const sourceDocumentSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(['pdf', 'web', 'text', 'note']),
  title: z.string(),
  extractedText: z.string(),
  metadata: z.object({
    authors: z.array(z.string()),
    year: z.string().optional(),
    url: z.string().optional(),
    citationKey: z.string().optional(),
    keywords: z.array(z.string()).optional(),
  }),
  addedAt: z.string(),
});

export const sourceRecordSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('added'), document: sourceDocumentSchema }),
  z.object({ type: z.literal('removed'), id: z.string().min(1), removedAt: z.string() }),
]);

export type SourceRecord = z.infer<typeof sourceRecordSchema>;
