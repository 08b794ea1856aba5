/**
 * SourceCorpus - append-only collection of extracted sources
 *
 * Persisted as an event log (`added` / `removed`) so the current set can be
 * rebuilt from the file alone. Documents are frozen once added; consumers
 * only ever see snapshots.
 */

import type { FileSystem } from '../storage/FileSystem';
import { JSONLFile } from '../storage/JSONLFile';
import { SourceNotFoundError, StorageError } from '../errors';
import { generateId } from '../shared/ids';
import { createLogger } from '../logger';
import {
  sourceRecordSchema,
  type SourceDocument,
  type SourceInput,
  type SourceKind,
  type SourceRecord,
} from './types';

const log = createLogger('SourceCorpus');

export interface SourceCorpusConfig {
  filePath: string;
}

export class SourceCorpus {
  private documents = new Map<string, SourceDocument>();
  private file: JSONLFile<SourceRecord>;
  private loaded: Promise<void> | null = null;

  constructor(
    fs: FileSystem,
    private config: SourceCorpusConfig
  ) {
    this.file = new JSONLFile(fs, config.filePath, value => sourceRecordSchema.parse(value));
  }

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
   * Add a source; returns the stored, frozen document
   */
  async add(input: SourceInput): Promise<SourceDocument> {
    await this.load();

    const document: SourceDocument = {
      id: generateId('src'),
      kind: input.kind,
      title: input.title.trim(),
      extractedText: input.extractedText,
      metadata: {
        authors: (input.metadata?.authors ?? []).map(a => a.trim()).filter(Boolean),
      },
      addedAt: new Date().toISOString(),
    };

    const { year, url, citationKey, keywords } = input.metadata ?? {};
    if (year) document.metadata.year = String(year).trim();
    if (url) document.metadata.url = url;
    if (citationKey) document.metadata.citationKey = citationKey.trim();
    if (keywords && keywords.length > 0) document.metadata.keywords = [...keywords];

    try {
      await this.file.append({ type: 'added', document });
    } catch (error) {
      // Reread the log before the next use; the record may be on disk
      this.loaded = null;
      throw new StorageError('append', this.config.filePath, error);
    }

    const frozen = freezeDocument(document);
    this.documents.set(frozen.id, frozen);
    log.info(`Added ${frozen.kind} source ${frozen.id}: ${frozen.title}`);
    return frozen;
  }

  async remove(id: string): Promise<void> {
    await this.load();

    if (!this.documents.has(id)) {
      throw new SourceNotFoundError(id);
    }

    try {
      await this.file.append({ type: 'removed', id, removedAt: new Date().toISOString() });
    } catch (error) {
      // Reread the log before the next use; the record may be on disk
      this.loaded = null;
      throw new StorageError('append', this.config.filePath, error);
    }

    this.documents.delete(id);
  }

  async get(id: string): Promise<SourceDocument> {
    await this.load();
    const document = this.documents.get(id);
    if (!document) {
      throw new SourceNotFoundError(id);
    }
    return document;
  }

  async list(kind?: SourceKind): Promise<SourceDocument[]> {
    const all = await this.snapshot();
    return kind ? all.filter(d => d.kind === kind) : all;
  }

  /**
   * Stable-ordered view (addedAt, then id) for the assembler
   */
  async snapshot(): Promise<SourceDocument[]> {
    await this.load();
    return Array.from(this.documents.values()).sort(compareCorpusOrder);
  }

  async size(): Promise<number> {
    await this.load();
    return this.documents.size;
  }

  private async readRecords(): Promise<void> {
    const records = await this.file.readAll();
    this.documents.clear();

    for (const record of records) {
      if (record.type === 'removed') {
        this.documents.delete(record.id);
      } else {
        this.documents.set(record.document.id, freezeDocument(record.document));
      }
    }
  }
}

export function compareCorpusOrder(a: SourceDocument, b: SourceDocument): number {
  if (a.addedAt !== b.addedAt) return a.addedAt < b.addedAt ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

function freezeDocument(document: SourceDocument): SourceDocument {
  Object.freeze(document.metadata.authors);
  if (document.metadata.keywords) Object.freeze(document.metadata.keywords);
  Object.freeze(document.metadata);
  return Object.freeze(document);
}
