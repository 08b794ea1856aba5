/**
 * VersionStore - append-only section history
 *
 * Each section has its own JSONL log under `versionsDir`. A section's current
 * snapshot is always the one with the highest version number; nothing is
 * ever rewritten or deleted. Writes to one section are serialized through a
 * keyed lock; different sections proceed independently.
 */

import * as path from 'path';
import type { FileSystem } from '../storage/FileSystem';
import { JSONLFile } from '../storage/JSONLFile';
import { KeyedLockManager } from '../locking/KeyedLockManager';
import { extractCitationKeys } from '../citation-resolver/markers';
import { StorageError, VersionNotFoundError } from '../errors';
import { createLogger } from '../logger';
import { diffLines, invertDiff } from './line-diff';
import {
  sectionSnapshotSchema,
  type DiffRecord,
  type SectionSnapshot,
  type SnapshotOperation,
  type SnapshotSummary,
  type VersionStoreConfig,
} from './types';

const log = createLogger('VersionStore');

const LOG_EXTENSION = '.jsonl';

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export class VersionStore {
  private logs = new Map<string, SectionSnapshot[]>();
  private loading = new Map<string, Promise<SectionSnapshot[]>>();
  private files = new Map<string, JSONLFile<SectionSnapshot>>();
  private locks: KeyedLockManager;

  constructor(
    private fs: FileSystem,
    private config: VersionStoreConfig
  ) {
    this.locks = new KeyedLockManager({ acquireTimeoutMs: config.lockTimeoutMs ?? 30_000 });
  }

  async init(): Promise<void> {
    try {
      await this.fs.mkdir(this.config.versionsDir);
    } catch (error) {
      throw new StorageError('init', this.config.versionsDir, error);
    }
  }

  /**
   * Append a new snapshot; version number is current max + 1
   */
  async append(
    sectionId: string,
    content: string,
    operation: SnapshotOperation,
    detail?: string
  ): Promise<SectionSnapshot> {
    return this.locks.withLock(sectionId, () => this.appendLocked(sectionId, content, operation, detail));
  }

  /**
   * Get a snapshot; omitting versionNumber returns the current one
   */
  async get(sectionId: string, versionNumber?: number): Promise<SectionSnapshot> {
    const snapshots = await this.load(sectionId);
    return this.pick(sectionId, snapshots, versionNumber);
  }

  /**
   * Oldest-first summaries
   */
  async history(sectionId: string): Promise<SnapshotSummary[]> {
    const snapshots = await this.load(sectionId);
    return snapshots.map(s => {
      const summary: SnapshotSummary = {
        versionNumber: s.versionNumber,
        operation: s.operation,
        createdAt: s.createdAt,
        wordCount: s.wordCount,
      };
      if (s.operationDetail !== undefined) summary.operationDetail = s.operationDetail;
      return summary;
    });
  }

  /**
   * Line-level diff from v1 to v2. Same version gives no records; v1 > v2
   * mirrors the forward diff.
   */
  async diff(sectionId: string, v1: number, v2: number): Promise<DiffRecord[]> {
    const snapshots = await this.load(sectionId);
    const from = this.pick(sectionId, snapshots, v1);
    const to = this.pick(sectionId, snapshots, v2);

    if (from.versionNumber === to.versionNumber) {
      return [];
    }
    if (from.versionNumber < to.versionNumber) {
      return diffLines(from.content, to.content);
    }
    return invertDiff(diffLines(to.content, from.content));
  }

  /**
   * Append a copy of targetVersion as a new 'revert' snapshot
   */
  async revert(sectionId: string, targetVersion: number): Promise<SectionSnapshot> {
    return this.locks.withLock(sectionId, async () => {
      const snapshots = await this.load(sectionId);
      const target = this.pick(sectionId, snapshots, targetVersion);
      return this.appendLocked(sectionId, target.content, 'revert', `Reverted to v${target.versionNumber}`);
    });
  }

  /**
   * Highest version number, 0 when the section has none
   */
  async currentVersion(sectionId: string): Promise<number> {
    const snapshots = await this.load(sectionId);
    return snapshots.length;
  }

  async hasSection(sectionId: string): Promise<boolean> {
    return (await this.currentVersion(sectionId)) > 0;
  }

  /**
   * Sections that have at least one persisted snapshot, sorted
   */
  async listSections(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await this.fs.list(this.config.versionsDir);
    } catch (error) {
      throw new StorageError('list', this.config.versionsDir, error);
    }

    const fromDisk: string[] = [];
    for (const name of entries) {
      if (!name.endsWith(LOG_EXTENSION)) continue;
      const sectionId = decodeSectionId(name.slice(0, -LOG_EXTENSION.length));
      if (sectionId === undefined) {
        log.warn(`Ignoring ${name} in ${this.config.versionsDir}: not a section log name`);
        continue;
      }
      fromDisk.push(sectionId);
    }

    const ids = new Set([...fromDisk, ...this.logs.keys()]);
    const present: string[] = [];
    for (const id of ids) {
      if (await this.hasSection(id)) present.push(id);
    }
    return present.sort();
  }

  /**
   * Every citation key referenced by any snapshot of any section
   */
  async referencedCitationKeys(): Promise<Set<string>> {
    const keys = new Set<string>();
    for (const sectionId of await this.listSections()) {
      for (const snapshot of await this.load(sectionId)) {
        snapshot.citationKeys.forEach(k => keys.add(k));
      }
    }
    return keys;
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async appendLocked(
    sectionId: string,
    content: string,
    operation: SnapshotOperation,
    detail?: string
  ): Promise<SectionSnapshot> {
    const snapshots = await this.load(sectionId);

    const snapshot: SectionSnapshot = {
      sectionId,
      versionNumber: snapshots.length + 1,
      content,
      operation,
      createdAt: new Date().toISOString(),
      wordCount: countWords(content),
      citationKeys: extractCitationKeys(content),
    };
    if (detail !== undefined) snapshot.operationDetail = detail;

    const file = this.fileFor(sectionId);
    try {
      await file.append(snapshot);
    } catch (error) {
      // The record may be partly or wholly on disk; reload before the next use
      this.logs.delete(sectionId);
      throw new StorageError('append', file.path, error);
    }

    const frozen = freezeSnapshot(snapshot);
    snapshots.push(frozen);
    log.debug(`Appended ${sectionId} v${frozen.versionNumber} (${operation})`);
    return frozen;
  }

  private pick(sectionId: string, snapshots: SectionSnapshot[], versionNumber?: number): SectionSnapshot {
    const available = snapshots.map(s => s.versionNumber);

    if (versionNumber === undefined) {
      const current = snapshots[snapshots.length - 1];
      if (!current) throw new VersionNotFoundError(sectionId, undefined, available);
      return current;
    }

    const found = Number.isInteger(versionNumber) ? snapshots[versionNumber - 1] : undefined;
    if (!found) throw new VersionNotFoundError(sectionId, versionNumber, available);
    return found;
  }

  /**
   * Load (once) and cache a section log
   */
  private async load(sectionId: string): Promise<SectionSnapshot[]> {
    const cached = this.logs.get(sectionId);
    if (cached) return cached;

    const pending = this.loading.get(sectionId);
    if (pending) return pending;

    const file = this.fileFor(sectionId);
    const promise = file
      .readAll()
      .then(records => {
        const snapshots = keepContiguous(sectionId, records);
        this.logs.set(sectionId, snapshots);
        return snapshots;
      })
      .catch((error: unknown) => {
        throw new StorageError('read', file.path, error);
      })
      .finally(() => {
        this.loading.delete(sectionId);
      });

    this.loading.set(sectionId, promise);
    return promise;
  }

  private fileFor(sectionId: string): JSONLFile<SectionSnapshot> {
    let file = this.files.get(sectionId);
    if (!file) {
      const filePath = path.join(this.config.versionsDir, `${encodeURIComponent(sectionId)}${LOG_EXTENSION}`);
      file = new JSONLFile(this.fs, filePath, value => sectionSnapshotSchema.parse(value));
      this.files.set(sectionId, file);
    }
    return file;
  }
}

function decodeSectionId(encoded: string): string | undefined {
  try {
    return decodeURIComponent(encoded);
  } catch (error) {
    if (error instanceof URIError) return undefined;
    throw error;
  }
}

/**
 * Keep the 1..N prefix of the log. Anything out of sequence (a foreign
 * section id or a duplicated number) is dropped with a warning.
 */
function keepContiguous(sectionId: string, records: SectionSnapshot[]): SectionSnapshot[] {
  const snapshots: SectionSnapshot[] = [];

  for (const record of records) {
    if (record.sectionId !== sectionId || record.versionNumber !== snapshots.length + 1) {
      log.warn(`Ignoring out-of-sequence record ${record.sectionId} v${record.versionNumber}`);
      continue;
    }
    snapshots.push(freezeSnapshot(record));
  }

  return snapshots;
}

function freezeSnapshot(snapshot: SectionSnapshot): SectionSnapshot {
  Object.freeze(snapshot.citationKeys);
  return Object.freeze(snapshot);
}
