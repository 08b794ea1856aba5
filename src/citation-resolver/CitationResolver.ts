/**
 * CitationResolver - marker scanning, registration and rendering
 *
 * Render is a pure pass over the loaded bibliography: registered keys become
 * inline citations in the requested format, anything else is left exactly as
 * written so the author can see it.
 */

import type { SourceDocument } from '../source-corpus/types';
import { createLogger } from '../logger';
import { Bibliography } from './Bibliography';
import { DEFAULT_FORMATTERS, exportBibtex, formatBibliography } from './formatters';
import { citationMetadataFor, indexSourcesByKey } from './keys';
import {
  canonicalizeMarkers,
  extractCitationKeys,
  extractMarkers,
  findMalformedMarkers,
  normalizeKey,
  replaceMarkers,
  type MalformedMarker,
} from './markers';
import type {
  BibliographyEntry,
  BibliographyStyle,
  CitationFormat,
  CitationFormatter,
  CitationMetadata,
  CitationReferenceSource,
  IngestResult,
  RegisterResult,
} from './types';

const log = createLogger('Citations');

export class CitationResolver {
  constructor(
    private bibliography: Bibliography,
    private references: CitationReferenceSource,
    private formatters: Record<CitationFormat, CitationFormatter> = DEFAULT_FORMATTERS
  ) {}

  async init(): Promise<void> {
    await this.bibliography.load();
  }

  extractMarkers(text: string): Set<string> {
    return extractMarkers(text);
  }

  findMalformedMarkers(text: string): MalformedMarker[] {
    return findMalformedMarkers(text);
  }

  register(key: string, metadata: CitationMetadata = {}): Promise<RegisterResult> {
    return this.bibliography.register(key, metadata);
  }

  /**
   * Replace registered markers with inline citations
   */
  render(text: string, format: CitationFormat): string {
    const formatter = this.formatters[format];
    return replaceMarkers(text, key => {
      const entry = this.bibliography.get(key);
      return entry ? formatter.inline(key, entry) : null;
    });
  }

  /**
   * Keys with no bibliography entry
   */
  unresolved(keys: Iterable<string>): Set<string> {
    const missing = new Set<string>();
    for (const key of keys) {
      const normalized = normalizeKey(key);
      if (!this.bibliography.has(normalized)) missing.add(normalized);
    }
    return missing;
  }

  /**
   * Post-generation pass: canonicalize markers and register every key that
   * names a corpus source. Keys matching nothing stay unresolved.
   */
  async ingest(text: string, sources: readonly SourceDocument[] = []): Promise<IngestResult> {
    const canonical = canonicalizeMarkers(text);
    const keys = extractCitationKeys(canonical);
    const bySource = indexSourcesByKey(sources);
    const registered: string[] = [];

    for (const key of keys) {
      const source = bySource.get(key);
      if (!source) continue;

      const result = await this.bibliography.register(key, citationMetadataFor(source));
      if (result.created || result.enrichedFields.length > 0) {
        registered.push(key);
      }
    }

    const unresolved = Array.from(this.unresolved(keys)).sort();
    const malformed = findMalformedMarkers(canonical).map(m => m.raw);

    if (unresolved.length > 0) {
      log.warn(`Unresolved citation keys: ${unresolved.join(', ')}`);
    }
    if (malformed.length > 0) {
      log.warn(`Ignoring ${malformed.length} malformed citation marker(s)`);
    }

    return { text: canonical, keys, registered, unresolved, malformed };
  }

  entries(): BibliographyEntry[] {
    return this.bibliography.list();
  }

  formatBibliography(style: BibliographyStyle = 'apa'): string {
    return formatBibliography(this.bibliography.list(), style);
  }

  exportBibtex(): string {
    return exportBibtex(this.bibliography.list());
  }

  /**
   * Remove an entry; refused while any snapshot still cites it
   */
  remove(key: string): Promise<boolean> {
    return this.bibliography.remove(key, this.references);
  }
}
