/**
 * Bibliography - process-wide key → entry map
 *
 * Mutations are additive: a new key, or enrichment of fields an existing
 * entry left empty. Each register() runs under a per-key lock and is
 * persisted as one JSONL line (the full merged entry) before the in-memory
 * map changes. On load the last line for a key wins.
 */

import type { FileSystem } from '../storage/FileSystem';
import { JSONLFile } from '../storage/JSONLFile';
import { KeyedLockManager } from '../locking/KeyedLockManager';
import { CitationInUseError, InvalidCitationKeyError, StorageError } from '../errors';
import { createLogger } from '../logger';
import { isValidKey, normalizeKey } from './markers';
import {
  bibliographyRecordSchema,
  type BibliographyEntry,
  type BibliographyRecord,
  type CitationMetadata,
  type CitationReferenceSource,
  type RegisterResult,
} from './types';

const log = createLogger('Bibliography');

export interface BibliographyConfig {
  filePath: string;
  lockTimeoutMs?: number;
}

function isPopulated(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim() !== '';
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

/**
 * Merge incoming metadata into an entry without overwriting populated fields
 */
export function mergeEntry(
  existing: BibliographyEntry,
  incoming: CitationMetadata
): { entry: BibliographyEntry; enrichedFields: string[] } {
  const enrichedFields: string[] = [];
  const entry: BibliographyEntry = {
    ...existing,
    authors: [...existing.authors],
    rawMetadata: { ...existing.rawMetadata },
  };

  const incomingTitle = incoming.title?.trim() ?? '';
  if (!isPopulated(entry.title) && incomingTitle) {
    entry.title = incomingTitle;
    enrichedFields.push('title');
  }

  const incomingAuthors = (incoming.authors ?? []).map(a => a.trim()).filter(Boolean);
  if (!isPopulated(entry.authors) && incomingAuthors.length > 0) {
    entry.authors = incomingAuthors;
    enrichedFields.push('authors');
  }

  const incomingYear = incoming.year === undefined ? '' : String(incoming.year).trim();
  if (!isPopulated(entry.year) && incomingYear) {
    entry.year = incomingYear;
    enrichedFields.push('year');
  }

  if (!isPopulated(entry.sourceDocumentId) && incoming.sourceDocumentId) {
    entry.sourceDocumentId = incoming.sourceDocumentId;
    enrichedFields.push('sourceDocumentId');
  }

  for (const [field, value] of Object.entries(incoming.rawMetadata ?? {})) {
    if (!isPopulated(entry.rawMetadata[field]) && isPopulated(value)) {
      entry.rawMetadata[field] = value;
      enrichedFields.push(`rawMetadata.${field}`);
    }
  }

  return { entry, enrichedFields };
}

function emptyEntry(key: string): BibliographyEntry {
  return { key, title: '', authors: [], year: '', rawMetadata: {} };
}

export class Bibliography {
  private entries = new Map<string, BibliographyEntry>();
  private file: JSONLFile<BibliographyRecord>;
  private locks: KeyedLockManager;
  private loaded: Promise<void> | null = null;

  constructor(
    private fs: FileSystem,
    private config: BibliographyConfig
  ) {
    this.file = new JSONLFile(fs, config.filePath, value => bibliographyRecordSchema.parse(value));
    this.locks = new KeyedLockManager({ acquireTimeoutMs: config.lockTimeoutMs ?? 30_000 });
  }

  /**
   * Load persisted entries (idempotent)
   */
  async load(): Promise<void> {
    if (!this.loaded) {
      this.loaded = this.readRecords().catch((error: unknown) => {
        this.loaded = null;
        throw new StorageError('read', this.config.filePath, error);
      });
    }
    await this.loaded;
  }

  /**
   * Add a key or enrich an existing entry. Never destructive.
   */
  async register(key: string, metadata: CitationMetadata = {}): Promise<RegisterResult> {
    const normalized = normalizeKey(key);
    if (!isValidKey(normalized)) {
      throw new InvalidCitationKeyError(key);
    }

    await this.load();

    return this.locks.withLock(normalized, async () => {
      const existing = this.entries.get(normalized);
      const created = existing === undefined;
      const { entry, enrichedFields } = mergeEntry(existing ?? emptyEntry(normalized), metadata);

      if (!created && enrichedFields.length === 0) {
        return { entry: cloneEntry(entry), created, enrichedFields };
      }

      try {
        await this.file.append({ type: 'entry', entry });
      } catch (error) {
        this.loaded = null;
        throw new StorageError('append', this.config.filePath, error);
      }

      this.entries.set(normalized, entry);
      log.debug(`${created ? 'Registered' : 'Enriched'} ${normalized}`);
      return { entry: cloneEntry(entry), created, enrichedFields };
    });
  }

  /**
   * Remove an entry that no snapshot references
   */
  async remove(key: string, references: CitationReferenceSource): Promise<boolean> {
    const normalized = normalizeKey(key);
    await this.load();

    return this.locks.withLock(normalized, async () => {
      if (!this.entries.has(normalized)) return false;

      const referenced = await references.referencedCitationKeys();
      if (referenced.has(normalized)) {
        throw new CitationInUseError(normalized);
      }

      try {
        await this.file.append({ type: 'removed', key: normalized, removedAt: new Date().toISOString() });
      } catch (error) {
        this.loaded = null;
        throw new StorageError('append', this.config.filePath, error);
      }

      this.entries.delete(normalized);
      return true;
    });
  }

  get(key: string): BibliographyEntry | undefined {
    const entry = this.entries.get(normalizeKey(key));
    return entry ? cloneEntry(entry) : undefined;
  }

  has(key: string): boolean {
    return this.entries.has(normalizeKey(key));
  }

  /**
   * Entries in registration order
   */
  list(): BibliographyEntry[] {
    return Array.from(this.entries.values(), cloneEntry);
  }

  get size(): number {
    return this.entries.size;
  }

  private async readRecords(): Promise<void> {
    const records = await this.file.readAll();
    this.entries.clear();

    for (const record of records) {
      if (record.type === 'removed') {
        this.entries.delete(record.key);
      } else {
        this.entries.set(record.entry.key, record.entry);
      }
    }
  }
}

function cloneEntry(entry: BibliographyEntry): BibliographyEntry {
  return { ...entry, authors: [...entry.authors], rawMetadata: { ...entry.rawMetadata } };
}
